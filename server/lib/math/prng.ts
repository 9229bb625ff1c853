/**
 * 确定性伪随机数源
 *
 * 挖掘流程中所有随机行为（稀疏图起点采样、超大批次记录采样）都通过
 * RandomSource 注入，测试可以传固定种子或桩实现。
 */

/** 随机源接口：next() 返回 [0, 1) 区间的数 */
export interface RandomSource {
  next(): number;
}

// 线性同余生成器 (Linear Congruential Generator)
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed & 0x7fffffff;
  }

  next(): number {
    this.state = (Math.imul(this.state, 1103515245) + 12345) & 0x7fffffff;
    return this.state / 0x80000000;
  }

  nextInt(max: number): number {
    return Math.floor(this.next() * max);
  }
}

/**
 * 不放回采样（部分 Fisher-Yates）
 * 返回 min(k, items.length) 个元素，不修改输入
 */
export function sampleWithoutReplacement<T>(items: readonly T[], k: number, rng: RandomSource): T[] {
  const pool = [...items];
  const count = Math.max(0, Math.min(k, pool.length));
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(rng.next() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, count);
}

/** 洗牌（Fisher-Yates），返回新数组 */
export function shuffle<T>(items: readonly T[], rng: RandomSource): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(rng.next() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
