/**
 * ============================================================================
 * 状态转移图 (State Graph)
 * ============================================================================
 *
 * 节点：离散设备状态（按 key 去重，插入顺序稳定）
 * 边：  有向转移，邻接表保持插入顺序，重复边被抑制
 * 标记：故障状态集合
 * 溯源：节点 → 产生该状态的历史记录
 *
 * 构建完成后由 builder 调用 seal()，此后图只读。
 */

import { DataIntegrityError } from '../../../core/errors';
import type { EquipmentState } from '../encoding/equipment-state';
import type { CanonicalRecord, GraphMode } from '../types';

export interface StateGraphStats {
  nodeCount: number;
  edgeCount: number;
  failureStateCount: number;
  mode: GraphMode | null;
}

export class StateGraph {
  /** key → 规范节点实例 */
  private nodes: Map<string, EquipmentState> = new Map();
  /** 邻接表：key → 后继（插入顺序） */
  private adjacency: Map<string, EquipmentState[]> = new Map();
  /** 反向邻接表：key → 前驱（插入顺序） */
  private reverseAdjacency: Map<string, EquipmentState[]> = new Map();
  private failureKeys: Set<string> = new Set();
  private records: Map<string, CanonicalRecord[]> = new Map();
  private edgeCount = 0;
  private sealed = false;
  /** seal 时固定的故障状态列表 */
  private sealedFailureStates: readonly EquipmentState[] | null = null;

  /** 建边模式，由 builder 写入 */
  private graphMode: GraphMode | null = null;

  // --------------------------------------------------------------------------
  // 写操作（seal 之前）
  // --------------------------------------------------------------------------

  /**
   * 注册节点，返回图中的规范实例。
   * 已有等值节点时直接返回已注册的实例（结构去重，O(1)）。
   */
  addNode(state: EquipmentState): EquipmentState {
    const existing = this.nodes.get(state.key);
    if (existing) return existing;
    this.assertMutable('addNode');
    this.nodes.set(state.key, state);
    this.adjacency.set(state.key, []);
    this.reverseAdjacency.set(state.key, []);
    this.records.set(state.key, []);
    return state;
  }

  /** 添加有向边，缺失端点自动注册；重复边忽略。返回是否新增 */
  addEdge(from: EquipmentState, to: EquipmentState): boolean {
    this.assertMutable('addEdge');
    const source = this.addNode(from);
    const target = this.addNode(to);
    const successors = this.successorList(source.key);
    if (successors.some(s => s.key === target.key)) return false;
    successors.push(target);
    this.predecessorList(target.key).push(source);
    this.edgeCount++;
    return true;
  }

  markFailureState(state: EquipmentState): void {
    this.assertMutable('markFailureState');
    const node = this.addNode(state);
    this.failureKeys.add(node.key);
  }

  attachRecord(state: EquipmentState, record: CanonicalRecord): void {
    this.assertMutable('attachRecord');
    const node = this.addNode(state);
    const list = this.records.get(node.key);
    if (list) list.push(record);
  }

  setMode(mode: GraphMode): void {
    this.assertMutable('setMode');
    this.graphMode = mode;
  }

  /** 冻结图：之后任何写操作抛出 DataIntegrityError */
  seal(): this {
    if (this.sealed) return this;
    this.sealedFailureStates = Object.freeze(this.collectFailureStates());
    this.sealed = true;
    return this;
  }

  // --------------------------------------------------------------------------
  // 读操作
  // --------------------------------------------------------------------------

  get isSealed(): boolean {
    return this.sealed;
  }

  get mode(): GraphMode | null {
    return this.graphMode;
  }

  get size(): number {
    return this.nodes.size;
  }

  hasNode(state: EquipmentState): boolean {
    return this.nodes.has(state.key);
  }

  /** 返回与给定状态等值的已注册实例 */
  getNode(state: EquipmentState): EquipmentState | undefined {
    return this.nodes.get(state.key);
  }

  /** 全部节点（插入顺序） */
  getNodes(): readonly EquipmentState[] {
    return Array.from(this.nodes.values());
  }

  getNeighbors(state: EquipmentState): readonly EquipmentState[] {
    return this.adjacency.get(state.key) ?? [];
  }

  getPredecessors(state: EquipmentState): readonly EquipmentState[] {
    return this.reverseAdjacency.get(state.key) ?? [];
  }

  isFailureState(state: EquipmentState): boolean {
    return this.failureKeys.has(state.key);
  }

  /** 故障状态（按节点插入顺序）；seal 之后返回同一个冻结数组 */
  getFailureStates(): readonly EquipmentState[] {
    return this.sealedFailureStates ?? this.collectFailureStates();
  }

  getRecords(state: EquipmentState): readonly CanonicalRecord[] {
    return this.records.get(state.key) ?? [];
  }

  /** 全部有向边（按源节点插入顺序） */
  getEdges(): Array<[EquipmentState, EquipmentState]> {
    const edges: Array<[EquipmentState, EquipmentState]> = [];
    for (const node of this.nodes.values()) {
      for (const target of this.getNeighbors(node)) edges.push([node, target]);
    }
    return edges;
  }

  getStats(): StateGraphStats {
    return {
      nodeCount: this.nodes.size,
      edgeCount: this.edgeCount,
      failureStateCount: this.failureKeys.size,
      mode: this.graphMode,
    };
  }

  // --------------------------------------------------------------------------
  // 内部
  // --------------------------------------------------------------------------

  private collectFailureStates(): EquipmentState[] {
    return this.getNodes().filter(s => this.failureKeys.has(s.key));
  }

  private successorList(key: string): EquipmentState[] {
    let list = this.adjacency.get(key);
    if (!list) {
      list = [];
      this.adjacency.set(key, list);
    }
    return list;
  }

  private predecessorList(key: string): EquipmentState[] {
    let list = this.reverseAdjacency.get(key);
    if (!list) {
      list = [];
      this.reverseAdjacency.set(key, list);
    }
    return list;
  }

  private assertMutable(operation: string): void {
    if (this.sealed) {
      throw new DataIntegrityError(`State graph is sealed, '${operation}' rejected`, { operation });
    }
  }
}
