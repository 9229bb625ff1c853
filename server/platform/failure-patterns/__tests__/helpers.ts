/**
 * 测试辅助：状态与小图构造
 */
import { EquipmentState } from '../encoding/equipment-state';
import { StateGraph } from '../graph/state-graph';
import type { CanonicalRecord, GraphConfig } from '../types';

export function st(machineId: string, ...labels: string[]): EquipmentState {
  return new EquipmentState(machineId, labels);
}

/** 按给定边构图，failures 标记为故障状态，构建后封存 */
export function graphOf(
  edges: ReadonlyArray<readonly [EquipmentState, EquipmentState]>,
  failures: readonly EquipmentState[] = [],
  isolated: readonly EquipmentState[] = [],
): StateGraph {
  const graph = new StateGraph();
  for (const [from, to] of edges) graph.addEdge(from, to);
  for (const s of isolated) graph.addNode(s);
  for (const f of failures) graph.markFailureState(f);
  graph.setMode('temporal');
  return graph.seal();
}

/** 两个传感器、两档分箱：<50 low，>=50 high；振动 <5 low，>=5 high */
export const TWO_SENSOR_CONFIG: GraphConfig = {
  discretization: {
    Temperature: { bins: [0, 50, 100], labels: ['low', 'high'] },
    Vibration_Level: { bins: [0, 5, 10], labels: ['low', 'high'] },
  },
  stateComponents: ['Temperature', 'Vibration_Level'],
};

export function rec(
  machineId: string,
  timeKey: number | Date,
  temperature: number,
  vibration: number,
  failure = false,
): CanonicalRecord {
  return { machineId, timeKey, sensors: { Temperature: temperature, Vibration_Level: vibration }, failure };
}

/** 静默 logger 模块，供 vi.mock 工厂使用 */
export function silentLoggerModule(): Record<string, unknown> {
  const noop = (): void => undefined;
  const make = (): Record<string, unknown> => ({
    trace: noop, debug: noop, info: noop, warn: noop, error: noop, fatal: noop, child: make,
  });
  return { createModuleLogger: make };
}
