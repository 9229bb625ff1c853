/**
 * 设备故障模式挖掘：统一导出
 */

export * from './types';
export { EquipmentState, UNKNOWN_LABEL, hammingDistance, stateKey } from './encoding/equipment-state';
export { binValue, discretizeSensors, stateLabels } from './encoding/discretizer';
export { StateGraph } from './graph/state-graph';
export type { StateGraphStats } from './graph/state-graph';
export { buildStateGraph, groupByMachine, recordToState, selectGraphMode } from './graph/graph-builder';
export type { GraphBuildOptions } from './graph/graph-builder';
export { breadthFirstSearch, depthFirstSearch } from './search/graph-search';
export { aStarSearch } from './search/a-star';
export {
  NO_FAILURE_DISTANCE,
  isHeuristicName,
  resolveHeuristic,
  sensorDistanceHeuristic,
  timeToFailureHeuristic,
} from './search/heuristics';
export type { Heuristic } from './search/heuristics';
export { MinPriorityQueue } from './search/priority-queue';
export { discoverFailurePaths, failurePredecessors, selectStartStates } from './discovery/failure-discovery';
export type { DiscoveryOptions, StartStateSelection } from './discovery/failure-discovery';
export { extractSequences } from './patterns/sequence-extractor';
export { describeSequence, predictiveScore, rankWarningSigns, SCORE_SATURATION_FREQUENCY } from './patterns/warning-ranker';
export { DEFAULT_SEARCH_PARAMS, parseGraphConfig, parseSearchParams } from './mining-config';
export { mineFailurePatterns, sampleRecords } from './pipeline';
export type { MiningOptions, MiningResult, MiningStats } from './pipeline';
export { loadRecordsCsv, parseRecordsCsv, isTimeMode, TIME_MODES } from './io/record-loader';
export type { RecordLoadOptions, TimeMode } from './io/record-loader';
export { loadGraphConfig, loadSearchParams } from './io/config-loader';
export { serializeSequence, serializeWarningSign, writeMiningResult } from './io/result-writer';
