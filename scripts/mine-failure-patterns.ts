#!/usr/bin/env tsx
/**
 * 设备故障模式挖掘命令行
 *
 * 用法:
 *   npx tsx scripts/mine-failure-patterns.ts \
 *     --data=data/machines.csv \
 *     --graph-config=data/failure-patterns/graph_config.json \
 *     --search-params=data/failure-patterns/search_params.json \
 *     [--output-dir=outputs/failure-patterns] [--time-mode=timestamp|runtime|row_order] \
 *     [--strategy=bfs|dfs|a_star] [--seed=42]
 */

import '../server/core/env-loader';
import { config, getConfigSummary } from '../server/core/config';
import { validateConfigOrDie } from '../server/core/config-schema';
import { wrapError } from '../server/core/errors';
import { createModuleLogger } from '../server/core/logger';
import { SeededRandom } from '../server/lib/math/prng';
import {
  isTimeMode,
  loadGraphConfig,
  loadRecordsCsv,
  loadSearchParams,
  mineFailurePatterns,
  writeMiningResult,
} from '../server/platform/failure-patterns';
import type { SearchStrategy } from '../server/platform/failure-patterns';

const log = createModuleLogger('cli');

const STRATEGIES: readonly SearchStrategy[] = ['bfs', 'dfs', 'a_star'];

const USAGE = [
  '用法: npx tsx scripts/mine-failure-patterns.ts --data=<csv> --graph-config=<json> --search-params=<json>',
  '      [--output-dir=<dir>] [--time-mode=timestamp|runtime|row_order] [--strategy=bfs|dfs|a_star] [--seed=<n>]',
].join('\n');

function argValue(args: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = args.find(a => a.startsWith(prefix));
  return arg === undefined ? undefined : arg.slice(prefix.length);
}

function usageError(message: string): never {
  console.error(message);
  console.error(USAGE);
  process.exit(1);
}

function main(): void {
  const args = process.argv.slice(2);
  const dataPath = argValue(args, 'data');
  const graphConfigPath = argValue(args, 'graph-config');
  const searchParamsPath = argValue(args, 'search-params');
  const outputDir = argValue(args, 'output-dir') ?? config.io.outputDir;
  const timeMode = argValue(args, 'time-mode') ?? 'timestamp';
  const strategyArg = argValue(args, 'strategy') ?? 'bfs';
  const seedArg = argValue(args, 'seed');

  if (!dataPath || !graphConfigPath || !searchParamsPath) usageError('缺少必需参数');
  if (!isTimeMode(timeMode)) usageError(`未知的 time-mode: ${timeMode}`);
  const strategy = STRATEGIES.find(s => s === strategyArg);
  if (!strategy) usageError(`未知的 strategy: ${strategyArg}`);
  const seed = seedArg === undefined ? config.mining.randomSeed : Number(seedArg);
  if (!Number.isInteger(seed)) usageError(`seed 必须是整数: ${seedArg}`);

  validateConfigOrDie(config);
  log.debug({ config: getConfigSummary() }, 'Effective configuration');

  const graphConfig = loadGraphConfig(graphConfigPath);
  const searchParams = loadSearchParams(searchParamsPath);
  const records = loadRecordsCsv(dataPath, { timeMode });

  const result = mineFailurePatterns(records, graphConfig, searchParams, {
    strategy,
    random: new SeededRandom(seed),
  });
  const files = writeMiningResult(result, outputDir);

  const { stats } = result;
  console.log(`\n故障模式挖掘完成`);
  console.log(`${'='.repeat(60)}`);
  console.log(`记录: ${stats.usedRecords}/${stats.inputRecords}${stats.sampled ? ' (已采样)' : ''}`);
  console.log(`状态图: ${stats.graph.nodeCount} 节点 | ${stats.graph.edgeCount} 边 | ${stats.graph.failureStateCount} 故障状态 | 模式 ${stats.graph.mode}`);
  console.log(`路径: ${stats.paths} | 序列: ${stats.sequences} | 耗时 ${stats.durationMs}ms`);
  for (const sign of result.warnings.slice(0, 5)) {
    console.log(`  [${sign.predictiveScore.toFixed(2)}] ${sign.pattern} ×${sign.frequency}`);
  }
  console.log(`\n输出:`);
  console.log(`  ${files.sequences}`);
  console.log(`  ${files.warningSigns}`);
}

try {
  main();
} catch (err) {
  const error = wrapError(err, { command: 'mine-failure-patterns' });
  // 非运营性错误（数据完整性等）附带堆栈
  log.fatal(
    error.isOperational ? error.toJSON() : { ...error.toJSON(), stack: error.stack },
    'Failure pattern mining aborted',
  );
  process.exit(1);
}
