/**
 * ============================================================================
 * 状态图构建器
 * ============================================================================
 *
 * 流程：
 *   1. 按 machineId 分组，组内按 timeKey 升序（稳定排序，不修改输入）
 *   2. 每条记录离散化 → 状态；等值状态复用图中已注册实例
 *   3. 记录挂到状态上；故障记录标记该状态为故障状态
 *   4. 建边（整批统一决定模式）：
 *      - temporal：任一设备记录数 > 1，连接同设备时间相邻的状态（允许自环）
 *      - similarity：每台设备仅 1 条记录，连接标签汉明距离为 1 的状态
 *        （忽略 machineId），每个源状态最多 maxSimilarNeighbors 条边
 *
 * similarity 模式的邻居集合取决于节点枚举顺序（插入顺序），
 * 同一输入顺序下结果可复现，但不保证是"最近"的邻居。
 */

import { config } from '../../../core/config';
import { createModuleLogger } from '../../../core/logger';
import { discretizeSensors, stateLabels } from '../encoding/discretizer';
import { EquipmentState, hammingDistance } from '../encoding/equipment-state';
import type { CanonicalRecord, GraphConfig, GraphMode, TimeKey } from '../types';
import { StateGraph } from './state-graph';

const log = createModuleLogger('graph-builder');

export interface GraphBuildOptions {
  /** similarity 模式下每个源状态的最大出边数 */
  maxSimilarNeighbors?: number;
}

function timeValue(key: TimeKey): number {
  return key instanceof Date ? key.getTime() : key;
}

/** 按设备分组，设备按首次出现顺序，组内按时间升序 */
export function groupByMachine(records: readonly CanonicalRecord[]): Map<string, CanonicalRecord[]> {
  const groups = new Map<string, CanonicalRecord[]>();
  for (const record of records) {
    const list = groups.get(record.machineId);
    if (list) list.push(record);
    else groups.set(record.machineId, [record]);
  }
  for (const list of groups.values()) {
    list.sort((a, b) => timeValue(a.timeKey) - timeValue(b.timeKey));
  }
  return groups;
}

/** 整批决定建边模式 */
export function selectGraphMode(groups: ReadonlyMap<string, readonly CanonicalRecord[]>): GraphMode {
  for (const list of groups.values()) {
    if (list.length > 1) return 'temporal';
  }
  return 'similarity';
}

/** 记录 → 状态 */
export function recordToState(record: CanonicalRecord, graphConfig: GraphConfig): EquipmentState {
  const discretized = discretizeSensors(record.sensors, graphConfig.discretization);
  return new EquipmentState(record.machineId, stateLabels(discretized, graphConfig.stateComponents));
}

export function buildStateGraph(
  records: readonly CanonicalRecord[],
  graphConfig: GraphConfig,
  options: GraphBuildOptions = {},
): StateGraph {
  const maxSimilarNeighbors = options.maxSimilarNeighbors ?? config.mining.similarityNeighborCap;
  const graph = new StateGraph();
  const groups = groupByMachine(records);
  const mode = selectGraphMode(groups);
  graph.setMode(mode);

  // 每台设备的时间有序状态序列（已替换为图中规范实例）
  const sequences: EquipmentState[][] = [];

  for (const machineRecords of groups.values()) {
    const sequence: EquipmentState[] = [];
    for (const record of machineRecords) {
      const state = graph.addNode(recordToState(record, graphConfig));
      graph.attachRecord(state, record);
      if (record.failure) graph.markFailureState(state);
      sequence.push(state);
    }
    sequences.push(sequence);
  }

  if (mode === 'temporal') {
    for (const sequence of sequences) {
      for (let i = 0; i < sequence.length - 1; i++) {
        graph.addEdge(sequence[i], sequence[i + 1]);
      }
    }
  } else {
    addSimilarityEdges(graph, maxSimilarNeighbors);
  }

  graph.seal();
  log.info(
    { records: records.length, machines: groups.size, ...graph.getStats() },
    'State graph built',
  );
  return graph;
}

/**
 * 相似建边：对每个源状态按插入顺序扫描候选，
 * 达到上限即停止扫描该源状态的后续候选。
 */
function addSimilarityEdges(graph: StateGraph, maxNeighbors: number): void {
  const states = graph.getNodes();
  let capped = 0;
  for (const source of states) {
    let found = 0;
    for (const candidate of states) {
      if (candidate.equals(source)) continue;
      if (found >= maxNeighbors) {
        capped++;
        break;
      }
      if (hammingDistance(source, candidate) === 1) {
        graph.addEdge(source, candidate);
        found++;
      }
    }
  }
  if (capped > 0) {
    log.debug({ capped, maxNeighbors }, 'Similarity neighbor cap reached for some states');
  }
}
