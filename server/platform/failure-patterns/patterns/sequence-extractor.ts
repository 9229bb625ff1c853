/**
 * 故障序列提取与聚合
 *
 * 丢弃短于 minLength 的路径；去掉终止故障状态得到序列；
 * 按状态逐个值相等分组计数，并记录路径起点所属设备。
 * 结果按出现次数降序，次数相同保持首次出现顺序。
 */

import { createModuleLogger } from '../../../core/logger';
import type { EquipmentState } from '../encoding/equipment-state';
import type { FailureSequence, SearchPath } from '../types';

const log = createModuleLogger('sequence-extractor');

interface SequenceBucket {
  states: readonly EquipmentState[];
  count: number;
  machines: Set<string>;
}

function sequenceKey(states: readonly EquipmentState[]): string {
  return JSON.stringify(states.map(s => s.key));
}

export function extractSequences(
  paths: readonly SearchPath[],
  minLength: number,
): FailureSequence[] {
  const buckets = new Map<string, SequenceBucket>();
  let dropped = 0;

  for (const path of paths) {
    if (path.length < minLength) {
      dropped++;
      continue;
    }
    const states = path.slice(0, -1);
    const key = sequenceKey(states);
    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = { states, count: 0, machines: new Set() };
      buckets.set(key, bucket);
    }
    bucket.count++;
    if (path.length > 0) bucket.machines.add(path[0].machineId);
  }

  // Array.prototype.sort 稳定，次数相同保持插入顺序
  const sequences: FailureSequence[] = Array.from(buckets.values())
    .map(b => ({
      states: b.states,
      frequency: b.count,
      machines: Array.from(b.machines),
      avgTimeToFailure: 0,
    }))
    .sort((a, b) => b.frequency - a.frequency);

  log.debug({ paths: paths.length, dropped, sequences: sequences.length }, 'Sequences extracted');
  return sequences;
}
