/**
 * 预警征兆排序
 *
 * predictiveScore = min(frequency / 10, 1)
 * falsePositiveRate 暂未基于数据计算，固定为 0（已知缺口）。
 */

import type { FailureSequence, WarningSign } from '../types';

/** 达到满分所需的出现次数 */
export const SCORE_SATURATION_FREQUENCY = 10;

export function describeSequence(sequence: FailureSequence): string {
  const { states } = sequence;
  if (states.length === 0) return 'Empty sequence';
  const first = states[0];
  const last = states[states.length - 1];
  return `State transition: ${first.labelTuple()} -> ${last.labelTuple()} (${states.length} steps)`;
}

export function predictiveScore(frequency: number): number {
  return Math.min(frequency / SCORE_SATURATION_FREQUENCY, 1.0);
}

export function rankWarningSigns(sequences: readonly FailureSequence[]): WarningSign[] {
  return sequences
    .map(seq => ({
      pattern: describeSequence(seq),
      predictiveScore: predictiveScore(seq.frequency),
      frequency: seq.frequency,
      falsePositiveRate: 0,
    }))
    .sort((a, b) => b.predictiveScore - a.predictiveScore);
}
