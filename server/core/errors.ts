/**
 * 统一错误体系
 * 分层错误类 + 错误码
 *
 * 使用方式：
 *   import { ConfigurationError, BinningRangeError } from '../core/errors';
 *   throw new ConfigurationError('graph config', ['state_components.0: unknown sensor']);
 *   throw new BinningRangeError('Temperature', -5, 0);
 */

// ============================================
// 错误码枚举
// ============================================

export enum ErrorCode {
  // 通用错误 (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,

  // 验证错误 (2xxx)
  VALIDATION = 2000,
  OUT_OF_RANGE = 2004,
  CONFIG_INVALID = 2005,

  // 资源错误 (4xxx)
  NOT_FOUND = 4000,

  // 数据错误 (8xxx)
  DATA_INTEGRITY = 8000,
}

// ============================================
// 基础错误类
// ============================================

export class MiningError extends Error {
  public readonly code: ErrorCode;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Record<string, unknown> = {},
    isOperational = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.timestamp = new Date().toISOString();
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  /** 序列化为结构化日志/输出格式 */
  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

// ============================================
// 具体错误类
// ============================================

/** 验证错误 */
export class ValidationError extends MiningError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.VALIDATION, context);
  }
}

/** 资源未找到 */
export class NotFoundError extends MiningError {
  constructor(resource: string, id?: string | number, context: Record<string, unknown> = {}) {
    const msg = id ? `${resource} '${id}' not found` : `${resource} not found`;
    super(msg, ErrorCode.NOT_FOUND, { resource, id, ...context });
  }
}

/** 配置错误：启动阶段抛出，不在内部恢复 */
export class ConfigurationError extends MiningError {
  public readonly issues: string[];

  constructor(source: string, issues: string[], context: Record<string, unknown> = {}) {
    super(`Invalid ${source}: ${issues.join('; ')}`, ErrorCode.CONFIG_INVALID, { source, issues, ...context });
    this.issues = issues;
  }
}

/** 分箱越界：数值低于最小边界 */
export class BinningRangeError extends MiningError {
  constructor(sensor: string, value: number, lowerBound: number, context: Record<string, unknown> = {}) {
    super(
      `Value ${value} for '${sensor}' is below minimum bin boundary ${lowerBound}`,
      ErrorCode.OUT_OF_RANGE,
      { sensor, value, lowerBound, ...context },
    );
  }
}

/** 数据完整性错误 */
export class DataIntegrityError extends MiningError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.DATA_INTEGRITY, context, false); // 非运营性错误
  }
}

// ============================================
// 错误处理工具
// ============================================

/** 判断是否为 MiningError */
export function isMiningError(err: unknown): err is MiningError {
  return err instanceof MiningError;
}

/** 将未知错误包装为 MiningError */
export function wrapError(err: unknown, context: Record<string, unknown> = {}): MiningError {
  if (isMiningError(err)) return err;

  if (err instanceof Error) {
    return new MiningError(err.message, ErrorCode.INTERNAL, {
      originalName: err.name,
      stack: err.stack,
      ...context,
    });
  }

  return new MiningError(String(err), ErrorCode.UNKNOWN, context);
}
