/**
 * 统一日志框架
 * 基于自定义 Logger 的结构化日志系统，替代散落的 console.log
 *
 * 使用方式：
 *   import { createModuleLogger } from '../core/logger';
 *   const log = createModuleLogger('graph-builder');
 *   log.info({ nodes, edges }, 'State graph built');
 *   log.error({ err }, 'Config load failed');
 *
 * 全局级别取自 config.app.logLevel（LOG_LEVEL），显式传入 level 的实例不受影响
 */

import { config } from './config';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

interface LogEntry {
  level: LogLevel;
  module: string;
  timestamp: string;
  message: string;
  [key: string]: unknown;
}

interface LoggerOptions {
  level?: LogLevel;
  module?: string;
  pretty?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',   // gray
  debug: '\x1b[36m',   // cyan
  info: '\x1b[32m',    // green
  warn: '\x1b[33m',    // yellow
  error: '\x1b[31m',   // red
  fatal: '\x1b[35m',   // magenta
};

const RESET = '\x1b[0m';

// ============================================
// Logger 核心类
// ============================================

class Logger {
  /** 未显式指定 level 时取全局级别 */
  private level: LogLevel;
  private module: string;
  private pretty: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? config.app.logLevel;
    this.module = options.module || 'app';
    this.pretty = options.pretty ?? (config.app.env !== 'production');
  }

  /** 创建子日志器（继承模块前缀） */
  child(subModule: string): Logger {
    return new Logger({
      module: `${this.module}:${subModule}`,
      level: this.level,
      pretty: this.pretty,
    });
  }

  trace(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('trace', data, message);
  }

  debug(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('debug', data, message);
  }

  info(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('info', data, message);
  }

  warn(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('warn', data, message);
  }

  error(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('error', data, message);
  }

  fatal(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('fatal', data, message);
  }

  private log(level: LogLevel, data: Record<string, unknown> | string, message?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;

    const timestamp = new Date().toISOString();
    let msg: string;
    let extra: Record<string, unknown> = {};

    if (typeof data === 'string') {
      msg = data;
      // 第二参数是非字符串值（如 Error 对象）时附加到 extra
      if (message !== undefined && typeof message !== 'string') {
        extra = { err: message instanceof Error ? { message: message.message, stack: message.stack } : message };
      }
    } else {
      msg = typeof message === 'string' ? message : (message !== undefined ? String(message) : '');
      extra = data;
    }

    const entry: LogEntry = {
      level,
      module: this.module,
      timestamp,
      message: msg,
      ...extra,
    };

    if (this.pretty) {
      this.prettyPrint(level, timestamp, msg, extra);
    } else {
      const output = level === 'error' || level === 'fatal' ? process.stderr : process.stdout;
      output.write(JSON.stringify(entry) + '\n');
    }
  }

  private prettyPrint(
    level: LogLevel,
    timestamp: string,
    msg: string,
    extra: Record<string, unknown>,
  ): void {
    const color = LEVEL_COLORS[level];
    const time = timestamp.slice(11, 23); // HH:mm:ss.SSS
    const levelStr = level.toUpperCase().padEnd(5);
    const moduleStr = `[${this.module}]`;

    let extraStr = '';
    const keys = Object.keys(extra);
    if (keys.length > 0) {
      // err 字段单独展开堆栈
      if (extra.err instanceof Error) {
        extraStr = `\n  ${extra.err.stack || extra.err.message}`;
        const rest = { ...extra };
        delete rest.err;
        if (Object.keys(rest).length > 0) {
          extraStr += `\n  ${JSON.stringify(rest)}`;
        }
      } else {
        extraStr = ` ${JSON.stringify(extra)}`;
      }
    }

    const output = level === 'error' || level === 'fatal' ? process.stderr : process.stdout;
    output.write(`${color}${time} ${levelStr}${RESET} ${moduleStr} ${msg}${extraStr}\n`);
  }
}

// ============================================
// 导出 API
// ============================================

/** 创建模块级日志器 */
export function createModuleLogger(module: string): Logger {
  return new Logger({ module });
}

export { Logger };
export type { LogLevel, LogEntry };
