/**
 * ============================================================================
 * 故障路径发现
 * ============================================================================
 *
 * 起点选择：
 *   - 所有故障状态的非故障前驱（有边直接指向故障状态的状态），首次出现顺序
 *   - 为空（图过于稀疏）时，从全部非故障状态中随机采样，上限 maxStartStates
 *
 * 对每个起点按策略搜索到"是故障状态"的路径：
 *   - 深度 = min(maxDepth, discoveryDepthCap)；lookbackWindow 为保留参数，不参与裁剪
 *   - bfs/dfs 每起点最多 pathsPerStart 条，a_star 每起点最多 1 条
 *   - 累计达到 maxTotalPaths 后不再发起新的起点搜索；已接受的路径全部返回，
 *     总数最多超出上限 pathsPerStart - 1 条
 */

import { config } from '../../../core/config';
import { createModuleLogger } from '../../../core/logger';
import { SeededRandom, sampleWithoutReplacement } from '../../../lib/math/prng';
import type { RandomSource } from '../../../lib/math/prng';
import type { EquipmentState } from '../encoding/equipment-state';
import type { StateGraph } from '../graph/state-graph';
import { aStarSearch } from '../search/a-star';
import { breadthFirstSearch, depthFirstSearch } from '../search/graph-search';
import { resolveHeuristic } from '../search/heuristics';
import type { GoalPredicate, SearchParams, SearchPath, SearchStrategy } from '../types';

const log = createModuleLogger('failure-discovery');

export interface DiscoveryOptions {
  strategy?: SearchStrategy;
  /** 稀疏图回退采样使用的随机源，默认按 config.mining.randomSeed 播种 */
  random?: RandomSource;
  maxStartStates?: number;
  pathsPerStart?: number;
  maxTotalPaths?: number;
  depthCap?: number;
}

export interface StartStateSelection {
  states: EquipmentState[];
  /** 是否走了随机采样回退 */
  sampled: boolean;
}

/** 故障状态的非故障前驱，去重并保持首次出现顺序 */
export function failurePredecessors(graph: StateGraph): EquipmentState[] {
  const seen = new Set<string>();
  const result: EquipmentState[] = [];
  for (const failure of graph.getFailureStates()) {
    for (const pred of graph.getPredecessors(failure)) {
      if (graph.isFailureState(pred) || seen.has(pred.key)) continue;
      seen.add(pred.key);
      result.push(pred);
    }
  }
  return result;
}

export function selectStartStates(
  graph: StateGraph,
  random: RandomSource,
  maxStartStates: number,
): StartStateSelection {
  const predecessors = failurePredecessors(graph);
  if (predecessors.length > 0) return { states: predecessors, sampled: false };

  const candidates = graph.getNodes().filter(s => !graph.isFailureState(s));
  return {
    states: sampleWithoutReplacement(candidates, maxStartStates, random),
    sampled: true,
  };
}

export function discoverFailurePaths(
  graph: StateGraph,
  params: SearchParams,
  options: DiscoveryOptions = {},
): SearchPath[] {
  const strategy = options.strategy ?? 'bfs';
  const random = options.random ?? new SeededRandom(config.mining.randomSeed);
  const maxStartStates = options.maxStartStates ?? config.mining.maxStartStates;
  const pathsPerStart = options.pathsPerStart ?? config.mining.pathsPerStart;
  const maxTotalPaths = options.maxTotalPaths ?? config.mining.maxTotalPaths;
  const depthCap = options.depthCap ?? config.mining.discoveryDepthCap;
  const maxDepth = Math.min(params.maxDepth, depthCap);

  const isGoal: GoalPredicate = state => graph.isFailureState(state);
  const heuristic = strategy === 'a_star' ? resolveHeuristic(params.heuristic) : null;
  const { states: starts, sampled } = selectStartStates(graph, random, maxStartStates);

  const paths: SearchPath[] = [];
  let searched = 0;
  for (const start of starts) {
    if (paths.length >= maxTotalPaths) break;
    searched++;

    if (strategy === 'a_star' && heuristic) {
      const path = aStarSearch(graph, start, isGoal, heuristic, { maxDepth, weight: params.aStarWeight });
      if (path) paths.push(path);
    } else if (strategy === 'dfs') {
      paths.push(...depthFirstSearch(graph, start, isGoal, { maxDepth, maxPaths: pathsPerStart }));
    } else {
      paths.push(...breadthFirstSearch(graph, start, isGoal, { maxDepth, maxPaths: pathsPerStart }));
    }
  }

  if (searched < starts.length) {
    log.debug(
      { found: paths.length, maxTotalPaths, searched, startStates: starts.length },
      'Global path cap reached',
    );
  }

  log.info(
    { strategy, maxDepth, startStates: starts.length, sampledStarts: sampled, paths: paths.length },
    'Failure path discovery finished',
  );
  return paths;
}
