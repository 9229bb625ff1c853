/**
 * 配置文件加载与结果输出测试
 */
import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError, NotFoundError } from '../../../core/errors';
import { loadGraphConfig, loadSearchParams } from '../io/config-loader';
import { serializeSequence, serializeWarningSign, writeMiningResult } from '../io/result-writer';
import type { FailureSequence, WarningSign } from '../types';
import { st } from './helpers';

vi.mock('../../../core/logger', async () => (await import('./helpers')).silentLoggerModule());

let dir = '';

beforeAll(() => {
  dir = mkdtempSync(path.join(os.tmpdir(), 'failure-patterns-'));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeJson(name: string, content: string): string {
  const file = path.join(dir, name);
  writeFileSync(file, content, 'utf-8');
  return file;
}

describe('config-loader', () => {
  it('加载图配置', () => {
    const file = writeJson(
      'graph.json',
      JSON.stringify({
        discretization: { Temperature: { bins: [0, 50, 100], labels: ['low', 'high'] } },
        state_components: ['Temperature'],
      }),
    );
    expect(loadGraphConfig(file)).toEqual({
      discretization: { Temperature: { bins: [0, 50, 100], labels: ['low', 'high'] } },
      stateComponents: ['Temperature'],
    });
  });

  it('加载搜索参数', () => {
    const file = writeJson('search.json', JSON.stringify({ max_depth: 5 }));
    expect(loadSearchParams(file)).toEqual({
      maxDepth: 5,
      lookbackWindow: 50,
      minPatternLength: 3,
      heuristic: 'time_to_failure',
      aStarWeight: 1,
    });
  });

  it('文件不存在抛出 NotFoundError', () => {
    expect(() => loadGraphConfig(path.join(dir, 'nope.json'))).toThrow(NotFoundError);
  });

  it('JSON 语法错误抛出 ConfigurationError', () => {
    const file = writeJson('broken.json', '{ "max_depth": ');
    expect(() => loadSearchParams(file)).toThrow(ConfigurationError);
  });

  it('Schema 错误抛出 ConfigurationError，消息带文件路径', () => {
    const file = writeJson('bad-graph.json', JSON.stringify({ discretization: {}, state_components: ['Temperature'] }));
    expect(() => loadGraphConfig(file)).toThrow(
      `Invalid graph config (${file}): state_components.0: unknown sensor 'Temperature' (no discretization scheme)`,
    );
  });
});

describe('result-writer', () => {
  const sequence: FailureSequence = {
    states: [st('M1', 'low', 'low'), st('M1', 'high', 'low')],
    frequency: 3,
    machines: ['M1'],
    avgTimeToFailure: 0,
  };
  const warning: WarningSign = {
    pattern: "State transition: ('low', 'low') -> ('high', 'low') (2 steps)",
    predictiveScore: 0.3,
    frequency: 3,
    falsePositiveRate: 0,
  };

  it('序列序列化为可读状态描述', () => {
    expect(serializeSequence(sequence)).toEqual({
      sequence: ["State(machine=M1, bins=('low', 'low'))", "State(machine=M1, bins=('high', 'low'))"],
      frequency: 3,
      avg_time_to_failure: 0,
      machines: ['M1'],
    });
  });

  it('预警征兆使用 snake_case 字段', () => {
    expect(serializeWarningSign(warning)).toEqual({
      pattern: "State transition: ('low', 'low') -> ('high', 'low') (2 steps)",
      predictive_score: 0.3,
      frequency: 3,
      false_positive_rate: 0,
    });
  });

  it('写出两个 JSON 文件并自动创建目录', () => {
    const outputDir = path.join(dir, 'out', 'nested');
    const files = writeMiningResult({ sequences: [sequence], warnings: [warning] }, outputDir);

    expect(files).toEqual({
      sequences: path.join(outputDir, 'sequences.json'),
      warningSigns: path.join(outputDir, 'warning_signs.json'),
    });

    const sequencesText = readFileSync(files.sequences, 'utf-8');
    expect(sequencesText).toBe(JSON.stringify({ sequences: [serializeSequence(sequence)] }, null, 2));
    expect(JSON.parse(readFileSync(files.warningSigns, 'utf-8'))).toEqual({
      warning_signs: [serializeWarningSign(warning)],
    });
  });

  it('空结果写出空列表', () => {
    const outputDir = path.join(dir, 'empty');
    const files = writeMiningResult({ sequences: [], warnings: [] }, outputDir);
    expect(JSON.parse(readFileSync(files.sequences, 'utf-8'))).toEqual({ sequences: [] });
    expect(JSON.parse(readFileSync(files.warningSigns, 'utf-8'))).toEqual({ warning_signs: [] });
  });
});
