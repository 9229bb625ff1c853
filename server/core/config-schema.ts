/**
 * ============================================================================
 * 配置验证 Schema：Zod 强类型验证
 * ============================================================================
 *
 * 用途：
 *   1. 启动时验证所有环境变量的类型和范围
 *   2. 提供清晰的错误消息，帮助快速定位配置问题
 *
 * 使用方式：
 *   import { validateConfigWithSchema } from './config-schema';
 *   const result = validateConfigWithSchema(config);
 *   if (!result.success) process.exit(1);
 *
 * ============================================================================
 */

import { z } from 'zod';
import { createModuleLogger } from './logger';

const log = createModuleLogger('config-validator');

// ============================================================
// Schema 定义
// ============================================================

const positiveInt = z.number().int().min(1);

/** 应用基础配置 */
const appSchema = z.object({
  name: z.string().min(1),
  version: z.string().regex(/^\d+\.\d+\.\d+/, 'must be semver format (e.g., 1.0.0)'),
  env: z.enum(['development', 'production', 'test']),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error']),
});

/** 挖掘上限 */
const miningSchema = z.object({
  maxRecords: positiveInt,
  similarityNeighborCap: positiveInt,
  maxStartStates: positiveInt,
  pathsPerStart: positiveInt,
  maxTotalPaths: positiveInt,
  discoveryDepthCap: positiveInt.max(50),
  randomSeed: z.number().int(),
});

const ioSchema = z.object({
  outputDir: z.string().min(1),
});

/** 完整配置 Schema */
const configSchema = z.object({
  app: appSchema,
  mining: miningSchema,
  io: ioSchema,
});

// ============================================================
// 公开 API
// ============================================================

export interface ConfigValidationResult {
  success: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * 使用 Zod Schema 验证配置
 *
 * @param cfg - config 对象（来自 config.ts）
 */
export function validateConfigWithSchema(cfg: unknown): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const result = configSchema.safeParse(cfg);
  if (!result.success) {
    for (const issue of result.error.issues) {
      errors.push(`${issue.path.join('.')}: ${issue.message}`);
    }
  } else {
    const { mining } = result.data;
    if (mining.pathsPerStart > mining.maxTotalPaths) {
      warnings.push('mining.pathsPerStart exceeds mining.maxTotalPaths');
    }
  }

  const success = errors.length === 0;

  if (errors.length > 0) {
    log.warn({ errors }, `Configuration validation found ${errors.length} error(s)`);
  }

  if (warnings.length > 0) {
    log.warn({ warnings }, `Configuration warnings (${warnings.length})`);
  }

  if (success) {
    log.debug('Configuration validation passed');
  }

  return { success, errors, warnings };
}

/**
 * 启动时验证配置并快速失败
 * 在 CLI 入口处调用
 */
export function validateConfigOrDie(cfg: unknown): void {
  const result = validateConfigWithSchema(cfg);
  if (!result.success) {
    log.fatal(
      { errors: result.errors },
      'Configuration validation failed. Fix the above errors and rerun.',
    );
    process.exit(1);
  }
}
