/**
 * ============================================================================
 * 无信息搜索：BFS / DFS
 * ============================================================================
 *
 * 深度约定（两种搜索一致）：
 *   - 起点深度为 0，深度 d 的路径含 d+1 个状态
 *   - 深度 <= maxDepth 的目标状态都被接受
 *   - 深度 == maxDepth 的状态不再扩展
 *   因此返回路径长度不超过 maxDepth + 1。
 *
 * 命中目标的路径被接受后不再从该目标继续扩展。
 */

import type { EquipmentState } from '../encoding/equipment-state';
import type { StateGraph } from '../graph/state-graph';
import type { GoalPredicate, SearchPath } from '../types';

export interface BfsOptions {
  maxDepth: number;
  /** 接受的路径数达到上限后提前终止 */
  maxPaths: number;
}

export interface DfsOptions {
  maxDepth: number;
  /** 可选路径上限，默认不限 */
  maxPaths?: number;
}

/**
 * 广度优先（FIFO）
 *
 * 以 (state, depth) 去重：同一状态在同一深度只扩展一次，
 * 不同深度仍可再次到达，所以 BFS 路径可能包含环。
 */
export function breadthFirstSearch(
  graph: StateGraph,
  start: EquipmentState,
  isGoal: GoalPredicate,
  options: BfsOptions,
): SearchPath[] {
  const { maxDepth, maxPaths } = options;
  const paths: SearchPath[] = [];
  if (maxPaths <= 0 || maxDepth < 0) return paths;

  const queue: SearchPath[] = [[start]];
  const expanded = new Set<string>();
  let head = 0;

  while (head < queue.length && paths.length < maxPaths) {
    const path = queue[head++];
    const current = path[path.length - 1];
    const depth = path.length - 1;

    const visitKey = `${depth}|${current.key}`;
    if (expanded.has(visitKey)) continue;
    expanded.add(visitKey);

    if (isGoal(current)) {
      paths.push(path);
      continue;
    }
    if (depth >= maxDepth) continue;

    for (const neighbor of graph.getNeighbors(current)) {
      queue.push([...path, neighbor]);
    }
  }

  return paths;
}

/**
 * 深度优先（LIFO）
 *
 * 维护"当前活动路径上的状态"集合防环，回溯经过某状态时将其移出。
 * 单条路径内不会出现重复状态。邻居按邻接表顺序探索。
 */
export function depthFirstSearch(
  graph: StateGraph,
  start: EquipmentState,
  isGoal: GoalPredicate,
  options: DfsOptions,
): SearchPath[] {
  const { maxDepth } = options;
  const maxPaths = options.maxPaths ?? Infinity;
  const paths: SearchPath[] = [];
  if (maxPaths <= 0 || maxDepth < 0) return paths;

  const path: EquipmentState[] = [];
  const onPath = new Set<string>();
  // 栈帧：状态 + 下一个待探索邻居下标
  const stack: Array<{ state: EquipmentState; next: number }> = [];

  const enter = (state: EquipmentState): void => {
    path.push(state);
    onPath.add(state.key);
    if (isGoal(state)) {
      paths.push([...path]);
      path.pop();
      onPath.delete(state.key);
      return;
    }
    stack.push({ state, next: 0 });
  };

  enter(start);

  while (stack.length > 0 && paths.length < maxPaths) {
    const frame = stack[stack.length - 1];
    const depth = path.length - 1;
    const neighbors = depth < maxDepth ? graph.getNeighbors(frame.state) : [];

    if (frame.next >= neighbors.length) {
      // 回溯
      stack.pop();
      path.pop();
      onPath.delete(frame.state.key);
      continue;
    }

    const neighbor = neighbors[frame.next++];
    if (onPath.has(neighbor.key)) continue;
    enter(neighbor);
  }

  return paths;
}
