/**
 * 启发式最优优先搜索（A*）
 *
 * 优先级 f = g + h·weight，g 为已走步数（单位边代价）。
 * 状态首次出队即关闭，之后的重复出队忽略；f 相同按入队顺序。
 * 返回第一条到达目标的路径，边界内无路可达时返回 null。
 */

import { createModuleLogger } from '../../../core/logger';
import type { EquipmentState } from '../encoding/equipment-state';
import type { StateGraph } from '../graph/state-graph';
import type { GoalPredicate, SearchPath } from '../types';
import type { Heuristic } from './heuristics';
import { MinPriorityQueue } from './priority-queue';

const log = createModuleLogger('search').child('a-star');

export interface AStarOptions {
  maxDepth: number;
  /** 启发权重，默认 1.0（标准 A*），>1 更贪心 */
  weight?: number;
}

interface AStarNode {
  state: EquipmentState;
  path: EquipmentState[];
  g: number;
}

export function aStarSearch(
  graph: StateGraph,
  start: EquipmentState,
  isGoal: GoalPredicate,
  heuristic: Heuristic,
  options: AStarOptions,
): SearchPath | null {
  const { maxDepth } = options;
  const weight = options.weight ?? 1.0;
  if (maxDepth < 0) return null;

  const open = new MinPriorityQueue<AStarNode>();
  const bestG = new Map<string, number>([[start.key, 0]]);
  const closed = new Set<string>();

  open.push({ state: start, path: [start], g: 0 }, heuristic(start, graph) * weight);

  let expansions = 0;
  while (!open.isEmpty()) {
    const node = open.pop();
    if (node === undefined) break;
    const { state, path, g } = node;

    if (closed.has(state.key)) continue;
    closed.add(state.key);

    if (isGoal(state)) {
      log.debug({ start: start.describe(), length: path.length, expansions }, 'Goal reached');
      return path;
    }
    if (g >= maxDepth) continue;
    expansions++;

    for (const neighbor of graph.getNeighbors(state)) {
      if (closed.has(neighbor.key)) continue;
      const tentative = g + 1;
      const known = bestG.get(neighbor.key);
      if (known !== undefined && tentative >= known) continue;
      bestG.set(neighbor.key, tentative);
      open.push(
        { state: neighbor, path: [...path, neighbor], g: tentative },
        tentative + heuristic(neighbor, graph) * weight,
      );
    }
  }

  return null;
}
