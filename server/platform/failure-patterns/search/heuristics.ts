/**
 * A* 启发函数
 *
 * 估计从当前状态到最近故障状态的剩余距离（单位边代价）。
 */

import { ValidationError } from '../../../core/errors';
import { hammingDistance } from '../encoding/equipment-state';
import type { EquipmentState } from '../encoding/equipment-state';
import type { StateGraph } from '../graph/state-graph';
import type { HeuristicName } from '../types';

export type Heuristic = (state: EquipmentState, graph: StateGraph) => number;

/** 无同设备故障状态可比时的兜底估计 */
export const NO_FAILURE_DISTANCE = 10;

/** 常数估计：故障状态为 0，其余为 1 */
export const timeToFailureHeuristic: Heuristic = (state, graph) =>
  graph.isFailureState(state) ? 0 : 1;

/** 传感器距离：与同设备故障状态标签元组的最小汉明距离 */
export const sensorDistanceHeuristic: Heuristic = (state, graph) => {
  if (graph.isFailureState(state)) return 0;
  let best = Infinity;
  for (const failure of graph.getFailureStates()) {
    if (failure.machineId !== state.machineId) continue;
    best = Math.min(best, hammingDistance(state, failure));
  }
  return Number.isFinite(best) ? best : NO_FAILURE_DISTANCE;
};

const HEURISTICS: Record<HeuristicName, Heuristic> = {
  time_to_failure: timeToFailureHeuristic,
  sensor_distance: sensorDistanceHeuristic,
};

export function isHeuristicName(name: string): name is HeuristicName {
  return Object.prototype.hasOwnProperty.call(HEURISTICS, name);
}

export function resolveHeuristic(name: string): Heuristic {
  if (!isHeuristicName(name)) {
    throw new ValidationError(`Unknown heuristic '${name}'`, { heuristic: name });
  }
  return HEURISTICS[name];
}
