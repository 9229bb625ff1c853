/**
 * ============================================================================
 * 故障模式挖掘：核心类型
 * ============================================================================
 *
 * 数据流（单向）：
 *   规范记录 → 离散状态 → 状态图 → 搜索路径 → 聚合序列 → 预警征兆
 *
 * 每个阶段只读取上一阶段的不可变快照，不原地修改前驱产物。
 */

import type { EquipmentState } from './encoding/equipment-state';

// ============================================================================
// 输入
// ============================================================================

/**
 * 分箱方案
 * bins 严格递增，labels.length === bins.length - 1
 * 区间 [bins[i], bins[i+1]) → labels[i]；>= 最后边界 → 最后一个标签
 */
export interface BinningScheme {
  readonly bins: readonly number[];
  readonly labels: readonly string[];
}

/** 时间键：时间戳、累计运行时长或行序号，同一设备内全序可比 */
export type TimeKey = number | Date;

/** 规范历史记录（由 I/O 适配器产出） */
export interface CanonicalRecord {
  readonly machineId: string;
  readonly timeKey: TimeKey;
  /** 传感器名 → 数值 */
  readonly sensors: Readonly<Record<string, number>>;
  /** 该读数是否对应一次故障 */
  readonly failure: boolean;
}

/** 图构建配置 */
export interface GraphConfig {
  /** 传感器名 → 分箱方案 */
  readonly discretization: Readonly<Record<string, BinningScheme>>;
  /** 组成状态元组的传感器，顺序即元组位置 */
  readonly stateComponents: readonly string[];
}

/** A* 启发函数选择器 */
export type HeuristicName = 'time_to_failure' | 'sensor_distance';

/** 搜索参数 */
export interface SearchParams {
  /** 最大搜索深度 */
  readonly maxDepth: number;
  /** 回溯窗口（保留参数，当前搜索不使用） */
  readonly lookbackWindow: number;
  /** 模式最小长度（含终止故障状态） */
  readonly minPatternLength: number;
  readonly heuristic: HeuristicName;
  /** 启发权重，>1 更贪心 */
  readonly aStarWeight: number;
}

// ============================================================================
// 中间产物
// ============================================================================

/** 建边模式：按时间相邻 / 按标签相似 */
export type GraphMode = 'temporal' | 'similarity';

/** 一条搜索路径：从起点到目标状态（含两端） */
export type SearchPath = readonly EquipmentState[];

/** 目标判定 */
export type GoalPredicate = (state: EquipmentState) => boolean;

/** 发现阶段使用的搜索策略 */
export type SearchStrategy = 'bfs' | 'dfs' | 'a_star';

// ============================================================================
// 输出
// ============================================================================

/** 故障前序列（不含终止故障状态） */
export interface FailureSequence {
  readonly states: readonly EquipmentState[];
  readonly frequency: number;
  /** 出现过该序列的设备（首次出现顺序） */
  readonly machines: readonly string[];
  /** 保留字段，当前恒为 0 */
  readonly avgTimeToFailure: number;
}

/** 预警征兆 */
export interface WarningSign {
  readonly pattern: string;
  /** [0, 1] 启发式严重度，非校准概率 */
  readonly predictiveScore: number;
  readonly frequency: number;
  /** 保留字段：未基于数据计算，恒为 0 */
  readonly falsePositiveRate: number;
}
