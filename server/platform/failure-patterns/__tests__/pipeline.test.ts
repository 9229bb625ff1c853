/**
 * 挖掘流水线测试：记录采样 + 端到端场景
 */
import { describe, it, expect, vi } from 'vitest';
import type { RandomSource } from '../../../lib/math/prng';
import { SeededRandom } from '../../../lib/math/prng';
import { buildStateGraph } from '../graph/graph-builder';
import { DEFAULT_SEARCH_PARAMS } from '../mining-config';
import { extractSequences } from '../patterns/sequence-extractor';
import { rankWarningSigns } from '../patterns/warning-ranker';
import { mineFailurePatterns, sampleRecords } from '../pipeline';
import { aStarSearch } from '../search/a-star';
import { breadthFirstSearch } from '../search/graph-search';
import { timeToFailureHeuristic } from '../search/heuristics';
import type { CanonicalRecord } from '../types';
import { TWO_SENSOR_CONFIG, rec, st } from './helpers';

vi.mock('../../../core/logger', async () => (await import('./helpers')).silentLoggerModule());

const zero: RandomSource = { next: () => 0 };

function batch(failures: number, normals: number): CanonicalRecord[] {
  return [
    ...Array.from({ length: failures }, (_, i) => rec(`F${i}`, i, 80, 8, true)),
    ...Array.from({ length: normals }, (_, i) => rec(`N${i}`, i, 10, 1)),
  ];
}

describe('sampleRecords', () => {
  it('未超过上限时原样返回拷贝', () => {
    const records = batch(1, 2);
    const out = sampleRecords(records, 3, zero);
    expect(out).toEqual(records);
    expect(out).not.toBe(records);
  });

  it('故障记录最多占一半预算，其余用正常记录补足', () => {
    const out = sampleRecords(batch(6, 4), 4, new SeededRandom(7));
    expect(out).toHaveLength(4);
    expect(out.filter(r => r.failure)).toHaveLength(2);
  });

  it('故障记录不足一半时全部保留', () => {
    const out = sampleRecords(batch(1, 9), 4, new SeededRandom(7));
    expect(out).toHaveLength(4);
    expect(out.filter(r => r.failure)).toHaveLength(1);
  });

  it('正常记录不足时总数可少于上限', () => {
    const out = sampleRecords(batch(6, 1), 4, new SeededRandom(7));
    expect(out).toHaveLength(3);
    expect(out.filter(r => r.failure)).toHaveLength(2);
  });

  it('相同种子结果可复现', () => {
    const records = batch(6, 10);
    const a = sampleRecords(records, 6, new SeededRandom(3)).map(r => r.machineId);
    const b = sampleRecords(records, 6, new SeededRandom(3)).map(r => r.machineId);
    expect(a).toEqual(b);
  });
});

describe('端到端：单设备 S1 → S2 → S3(故障)', () => {
  const S1 = st('M1', 'low', 'low');
  const S2 = st('M1', 'high', 'low');
  const S3 = st('M1', 'high', 'high');
  const records = [rec('M1', 1, 10, 1), rec('M1', 2, 80, 1), rec('M1', 3, 80, 8, true)];

  it('建图、搜索、提取、排序', () => {
    const graph = buildStateGraph(records, TWO_SENSOR_CONFIG);
    expect(graph.getStats()).toEqual({ nodeCount: 3, edgeCount: 2, failureStateCount: 1, mode: 'temporal' });

    const isGoal = (s: typeof S1): boolean => graph.isFailureState(s);
    const bfs = breadthFirstSearch(graph, S1, isGoal, { maxDepth: 10, maxPaths: 5 });
    expect(bfs).toEqual([[S1, S2, S3]]);
    expect(aStarSearch(graph, S1, isGoal, timeToFailureHeuristic, { maxDepth: 10 })).toEqual([S1, S2, S3]);

    const sequences = extractSequences(bfs, 2);
    expect(sequences).toHaveLength(1);
    expect(sequences[0].states).toEqual([S1, S2]);
    expect(sequences[0].frequency).toBe(1);

    const warnings = rankWarningSigns(sequences);
    expect(warnings).toEqual([
      {
        pattern: "State transition: ('low', 'low') -> ('high', 'low') (2 steps)",
        predictiveScore: 0.1,
        frequency: 1,
        falsePositiveRate: 0,
      },
    ]);
  });

  it('mineFailurePatterns 从故障前驱出发', () => {
    const result = mineFailurePatterns(records, TWO_SENSOR_CONFIG, { ...DEFAULT_SEARCH_PARAMS, minPatternLength: 2 }, {
      random: zero,
    });

    expect(result.paths).toEqual([[S2, S3]]);
    expect(result.sequences.map(s => s.states)).toEqual([[S2]]);
    expect(result.warnings.map(w => w.pattern)).toEqual(["State transition: ('high', 'low') -> ('high', 'low') (1 steps)"]);
    expect(result.stats).toMatchObject({
      inputRecords: 3,
      usedRecords: 3,
      sampled: false,
      paths: 1,
      sequences: 1,
      graph: { nodeCount: 3, edgeCount: 2, failureStateCount: 1, mode: 'temporal' },
    });
  });
});

describe('mineFailurePatterns', () => {
  it('两台设备各自的故障前序列分别计数', () => {
    const records = [
      rec('M2', 1, 10, 1),
      rec('M1', 1, 10, 1),
      rec('M1', 2, 80, 1),
      rec('M2', 2, 80, 1),
      rec('M1', 3, 80, 8, true),
      rec('M2', 3, 80, 8, true),
    ];
    const result = mineFailurePatterns(records, TWO_SENSOR_CONFIG, { ...DEFAULT_SEARCH_PARAMS, minPatternLength: 2 }, {
      random: zero,
    });

    expect(result.graph.getStats()).toEqual({ nodeCount: 6, edgeCount: 4, failureStateCount: 2, mode: 'temporal' });
    expect(result.sequences.map(s => ({ machines: s.machines, frequency: s.frequency }))).toEqual([
      { machines: ['M2'], frequency: 1 },
      { machines: ['M1'], frequency: 1 },
    ]);
    expect(result.warnings.every(w => w.predictiveScore === 0.1)).toBe(true);
  });

  it('默认 minPatternLength 为 3 时两步路径被丢弃', () => {
    const records = [rec('M1', 1, 10, 1), rec('M1', 2, 80, 1), rec('M1', 3, 80, 8, true)];
    const result = mineFailurePatterns(records, TWO_SENSOR_CONFIG, DEFAULT_SEARCH_PARAMS, { random: zero });
    expect(result.paths).toHaveLength(1);
    expect(result.sequences).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it('similarity 模式下其他设备的相似状态连到故障状态', () => {
    // A、B 与 C 的标签只差振动一位；A、B 之间标签相同，不连边
    const records = [rec('A', 0, 80, 1), rec('B', 0, 80, 1), rec('C', 0, 80, 8, true)];
    const result = mineFailurePatterns(records, TWO_SENSOR_CONFIG, { ...DEFAULT_SEARCH_PARAMS, minPatternLength: 2 }, {
      random: zero,
    });
    expect(result.graph.mode).toBe('similarity');
    expect(result.sequences.map(s => s.states.map(x => x.machineId))).toEqual([['A'], ['B']]);
  });

  it('超过 maxRecords 时先采样', () => {
    const records = batch(2, 8);
    const result = mineFailurePatterns(records, TWO_SENSOR_CONFIG, DEFAULT_SEARCH_PARAMS, {
      random: new SeededRandom(1),
      maxRecords: 4,
    });
    expect(result.stats.inputRecords).toBe(10);
    expect(result.stats.usedRecords).toBe(4);
    expect(result.stats.sampled).toBe(true);
  });
});
