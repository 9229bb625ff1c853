/**
 * 统一配置中心
 * 运行参数、挖掘上限、输出目录的唯一来源
 *
 * 使用方式：
 *   import { config } from '../core/config';
 *   const cap = config.mining.maxTotalPaths;
 *
 * 环境变量优先级：
 *   环境变量 > .env 文件（env-loader）> 默认值
 *
 * 零依赖原则：本文件仅依赖 process.env，不导入任何其他模块
 */

// ============================================
// 辅助函数
// ============================================

function env(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function envInt(key: string, defaultValue: number): number {
  const v = process.env[key];
  return v ? parseInt(v, 10) : defaultValue;
}

function envEnum<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
  const v = process.env[key];
  const match = allowed.find(a => a === v);
  return match ?? defaultValue;
}

const APP_ENVS = ['development', 'production', 'test'] as const;
const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

// ============================================
// 配置结构
// ============================================

export const config = {

  /** 应用基础配置 */
  app: {
    name: env('APP_NAME', 'Equipment Failure Pattern Miner'),
    version: env('APP_VERSION', '1.0.0'),
    env: envEnum('NODE_ENV', APP_ENVS, 'development'),
    logLevel: envEnum('LOG_LEVEL', LOG_LEVELS, 'info'),
  },

  /** 故障模式挖掘的规模上限 */
  mining: {
    /** 单批次记录上限，超过后按故障优先策略采样 */
    maxRecords: envInt('MINING_MAX_RECORDS', 1000),
    /** 相似模式下每个源状态最多添加的边数 */
    similarityNeighborCap: envInt('MINING_SIMILARITY_NEIGHBOR_CAP', 20),
    /** 稀疏图回退时随机采样的起始状态上限 */
    maxStartStates: envInt('MINING_MAX_START_STATES', 100),
    /** 每个起始状态最多接受的路径数 */
    pathsPerStart: envInt('MINING_PATHS_PER_START', 5),
    /** 全局路径上限 */
    maxTotalPaths: envInt('MINING_MAX_TOTAL_PATHS', 100),
    /** 发现阶段的搜索深度硬上限 */
    discoveryDepthCap: envInt('MINING_DISCOVERY_DEPTH_CAP', 10),
    /** 回退采样与记录采样使用的随机种子 */
    randomSeed: envInt('MINING_RANDOM_SEED', 42),
  },

  /** 输入输出 */
  io: {
    outputDir: env('MINING_OUTPUT_DIR', 'outputs/failure-patterns'),
  },

};

export type AppConfig = typeof config;

// ============================================
// 配置摘要
// ============================================

/** 获取所有配置的摘要（启动时以 debug 级别输出） */
export function getConfigSummary(): Record<string, Record<string, string>> {
  return {
    app: {
      name: config.app.name,
      version: config.app.version,
      env: config.app.env,
      logLevel: config.app.logLevel,
    },
    mining: Object.fromEntries(
      Object.entries(config.mining).map(([k, v]) => [k, String(v)]),
    ),
    io: {
      outputDir: config.io.outputDir,
    },
  };
}

export default config;
