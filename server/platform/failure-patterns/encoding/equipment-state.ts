/**
 * 设备离散状态
 *
 * 状态由 (machineId, 标签元组) 唯一确定，按值相等而非引用相等：
 * 独立构造的两个相同状态拥有相同 key，在图中折叠为同一节点。
 */

/** 缺失或越界传感器的占位标签 */
export const UNKNOWN_LABEL = 'unknown';

export class EquipmentState {
  readonly machineId: string;
  readonly labels: readonly string[];
  /** 结构化身份键，用于 Map/Set 去重 */
  readonly key: string;

  constructor(machineId: string, labels: readonly string[]) {
    this.machineId = machineId;
    this.labels = Object.freeze([...labels]);
    this.key = stateKey(machineId, this.labels);
    Object.freeze(this);
  }

  equals(other: EquipmentState): boolean {
    return this.key === other.key;
  }

  /** 元组形式的标签，例如 ('medium', 'low')；单元素写作 ('low',) */
  labelTuple(): string {
    const items = this.labels.map(label => `'${label}'`);
    return items.length === 1 ? `(${items[0]},)` : `(${items.join(', ')})`;
  }

  describe(): string {
    return `State(machine=${this.machineId}, bins=${this.labelTuple()})`;
  }

  toString(): string {
    return this.describe();
  }
}

export function stateKey(machineId: string, labels: readonly string[]): string {
  return JSON.stringify([machineId, ...labels]);
}

/**
 * 标签元组的汉明距离（忽略 machineId）
 * 长度不同视为不可比，返回 Infinity
 */
export function hammingDistance(a: EquipmentState, b: EquipmentState): number {
  if (a.labels.length !== b.labels.length) return Infinity;
  let diff = 0;
  for (let i = 0; i < a.labels.length; i++) {
    if (a.labels[i] !== b.labels[i]) diff++;
  }
  return diff;
}
