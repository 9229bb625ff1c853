/**
 * 离散化器：连续传感器读数 → 分箱标签
 */

import { BinningRangeError } from '../../../core/errors';
import { createModuleLogger } from '../../../core/logger';
import type { BinningScheme } from '../types';
import { UNKNOWN_LABEL } from './equipment-state';

const log = createModuleLogger('discretizer');

/**
 * 单值分箱
 *
 * 逐个测试 bins[i] <= value < bins[i+1]，首个命中返回 labels[i]；
 * value >= 最后边界时返回最后一个标签（顶部区间向上闭合）。
 *
 * @throws BinningRangeError value 低于 bins[0]（含 NaN）
 */
export function binValue(value: number, scheme: BinningScheme, sensor = 'value'): string {
  const { bins, labels } = scheme;
  for (let i = 0; i < bins.length - 1; i++) {
    if (bins[i] <= value && value < bins[i + 1]) return labels[i];
  }
  if (value >= bins[bins.length - 1]) return labels[labels.length - 1];
  throw new BinningRangeError(sensor, value, bins[0]);
}

/**
 * 批量离散化
 *
 * 只返回同时满足以下条件的传感器：在方案中、在输入中、在量程内。
 * 越界传感器静默丢弃，由调用方在组装状态时补 "unknown"。
 */
export function discretizeSensors(
  values: Readonly<Record<string, number>>,
  schemes: Readonly<Record<string, BinningScheme>>,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [sensor, scheme] of Object.entries(schemes)) {
    if (!Object.prototype.hasOwnProperty.call(values, sensor)) continue;
    try {
      result[sensor] = binValue(values[sensor], scheme, sensor);
    } catch (err) {
      if (!(err instanceof BinningRangeError)) throw err;
      log.debug({ sensor, value: values[sensor] }, 'Sensor value out of binning range, dropped');
    }
  }
  return result;
}

/** 按状态分量顺序组装标签元组，缺失位置填 UNKNOWN_LABEL */
export function stateLabels(
  discretized: Readonly<Record<string, string>>,
  components: readonly string[],
): string[] {
  return components.map(c =>
    Object.prototype.hasOwnProperty.call(discretized, c) ? discretized[c] : UNKNOWN_LABEL,
  );
}
