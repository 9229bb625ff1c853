/**
 * dotenv 分层加载器
 *
 * 加载优先级（后加载的覆盖先加载的）：
 *   1. .env.development / .env.production（按 NODE_ENV 选择）
 *   2. .env.local（个人覆盖，不提交到 Git）
 *   3. .env
 *
 * 已存在于 process.env 的变量（命令行 MINING_MAX_RECORDS=500 npx tsx ...）始终优先。
 *
 * 注意：此文件必须在所有其他 import 之前执行（side-effect import）。
 */

import { parse } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

const ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '../../');

// 进程启动时已有的变量不允许被文件覆盖
const shellKeys = new Set(Object.keys(process.env));

function loadIfExists(filePath: string): boolean {
  const fullPath = resolve(ROOT, filePath);
  if (!existsSync(fullPath)) return false;

  const parsed = parse(readFileSync(fullPath, 'utf-8'));
  for (const [key, value] of Object.entries(parsed)) {
    if (!shellKeys.has(key)) process.env[key] = value;
  }
  return true;
}

const nodeEnv = process.env.NODE_ENV || 'development';
const loaded: string[] = [];

// 第 1 层：环境特定配置（团队共享默认值）
if (loadIfExists(`.env.${nodeEnv}`)) {
  loaded.push(`.env.${nodeEnv}`);
}

// 第 2 层：个人覆盖
if (loadIfExists('.env.local')) {
  loaded.push('.env.local');
}

// 第 3 层：通用 .env
if (loadIfExists('.env')) {
  loaded.push('.env');
}

if (loaded.length > 0 && process.env.LOG_LEVEL === 'debug') {
  // logger 尚未初始化，使用 console
  console.debug(`[env-loader] Loaded config files: ${loaded.join(' → ')}`);
}

export { loaded as loadedEnvFiles };
