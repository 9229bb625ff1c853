/**
 * ============================================================================
 * 故障模式挖掘流水线
 * ============================================================================
 *
 *   采样 → 建图 → 路径发现 → 序列提取 → 预警排序
 *
 * 纯内存计算，不做任何 I/O。读写由 io/ 下的适配器负责。
 */

import { config } from '../../core/config';
import { createModuleLogger } from '../../core/logger';
import { SeededRandom, sampleWithoutReplacement, shuffle } from '../../lib/math/prng';
import type { RandomSource } from '../../lib/math/prng';
import { discoverFailurePaths } from './discovery/failure-discovery';
import { buildStateGraph } from './graph/graph-builder';
import type { StateGraph, StateGraphStats } from './graph/state-graph';
import { extractSequences } from './patterns/sequence-extractor';
import { rankWarningSigns } from './patterns/warning-ranker';
import type {
  CanonicalRecord,
  FailureSequence,
  GraphConfig,
  SearchParams,
  SearchPath,
  SearchStrategy,
  WarningSign,
} from './types';

const log = createModuleLogger('pipeline');

export interface MiningOptions {
  strategy?: SearchStrategy;
  /** 记录采样与稀疏图起点采样共用的随机源 */
  random?: RandomSource;
  maxRecords?: number;
  maxSimilarNeighbors?: number;
}

export interface MiningStats {
  inputRecords: number;
  usedRecords: number;
  sampled: boolean;
  graph: StateGraphStats;
  paths: number;
  sequences: number;
  durationMs: number;
}

export interface MiningResult {
  graph: StateGraph;
  paths: SearchPath[];
  sequences: FailureSequence[];
  warnings: WarningSign[];
  stats: MiningStats;
}

/**
 * 超过上限时采样：故障记录最多占一半预算，其余用正常记录补足，最后洗牌。
 * 未超过上限时原样返回（拷贝）。
 */
export function sampleRecords(
  records: readonly CanonicalRecord[],
  maxRecords: number,
  random: RandomSource,
): CanonicalRecord[] {
  if (records.length <= maxRecords) return [...records];

  const failures = records.filter(r => r.failure);
  const normals = records.filter(r => !r.failure);
  const failureBudget = Math.min(failures.length, Math.floor(maxRecords / 2));
  const keptFailures = sampleWithoutReplacement(failures, failureBudget, random);
  const keptNormals = sampleWithoutReplacement(normals, maxRecords - keptFailures.length, random);
  const sampled = shuffle([...keptFailures, ...keptNormals], random);

  log.info(
    { input: records.length, kept: sampled.length, failures: keptFailures.length, maxRecords },
    'Record batch sampled',
  );
  return sampled;
}

export function mineFailurePatterns(
  records: readonly CanonicalRecord[],
  graphConfig: GraphConfig,
  searchParams: SearchParams,
  options: MiningOptions = {},
): MiningResult {
  const startedAt = Date.now();
  const random = options.random ?? new SeededRandom(config.mining.randomSeed);
  const maxRecords = options.maxRecords ?? config.mining.maxRecords;

  const used = sampleRecords(records, maxRecords, random);
  const graph = buildStateGraph(used, graphConfig, { maxSimilarNeighbors: options.maxSimilarNeighbors });
  const paths = discoverFailurePaths(graph, searchParams, { strategy: options.strategy, random });
  const sequences = extractSequences(paths, searchParams.minPatternLength);
  const warnings = rankWarningSigns(sequences);

  const stats: MiningStats = {
    inputRecords: records.length,
    usedRecords: used.length,
    sampled: used.length < records.length,
    graph: graph.getStats(),
    paths: paths.length,
    sequences: sequences.length,
    durationMs: Date.now() - startedAt,
  };
  log.info(
    {
      records: stats.usedRecords,
      mode: stats.graph.mode,
      paths: stats.paths,
      sequences: stats.sequences,
      durationMs: stats.durationMs,
    },
    'Mining finished',
  );

  return { graph, paths, sequences, warnings, stats };
}
