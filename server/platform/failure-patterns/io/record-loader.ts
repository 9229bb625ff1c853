/**
 * ============================================================================
 * 历史记录 CSV 适配器
 * ============================================================================
 *
 * CSV → CanonicalRecord[]
 *
 * 必需列：Machine_ID、Failure_Status（1/true/yes 视为故障，不区分大小写）
 * 时间列取决于 timeMode：
 *   - timestamp  Timestamp 列，ISO-8601 或 "YYYY-MM-DD HH:mm:ss"（无时区按 UTC）
 *   - runtime    Runtime_Hours 列，累计运行小时数
 *   - row_order  无时间列，数据行序号即时间键
 * 其余列默认都当作传感器列；非数值单元格跳过。
 * 结果按 machineId、timeKey 排序。
 */

import { existsSync, readFileSync } from 'fs';
import { NotFoundError, ValidationError } from '../../../core/errors';
import { createModuleLogger } from '../../../core/logger';
import type { CanonicalRecord, TimeKey } from '../types';

const log = createModuleLogger('record-loader');

export const TIME_MODES = ['timestamp', 'runtime', 'row_order'] as const;
export type TimeMode = (typeof TIME_MODES)[number];

export const MACHINE_COLUMN = 'Machine_ID';
export const FAILURE_COLUMN = 'Failure_Status';
export const TIMESTAMP_COLUMN = 'Timestamp';
export const RUNTIME_COLUMN = 'Runtime_Hours';

const FAILURE_TRUE_VALUES = new Set(['1', 'true', 'yes']);
const NAIVE_DATETIME = /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

export interface RecordLoadOptions {
  timeMode?: TimeMode;
  /** 显式指定传感器列；缺省时自动识别 */
  sensorColumns?: readonly string[];
}

export function isTimeMode(value: string): value is TimeMode {
  return TIME_MODES.some(m => m === value);
}

function splitRow(line: string): string[] {
  return line.split(',').map(cell => cell.trim().replace(/^"(.*)"$/, '$1'));
}

export function parseFailureFlag(cell: string): boolean {
  return FAILURE_TRUE_VALUES.has(cell.trim().toLowerCase());
}

/** 无时区的日期时间按 UTC 解释，保证跨时区可复现 */
export function parseTimestamp(cell: string, line: number): Date {
  const text = cell.trim();
  const iso = NAIVE_DATETIME.test(text) ? `${text.replace(' ', 'T')}Z` : text;
  const ms = Date.parse(iso);
  if (!text || Number.isNaN(ms)) {
    throw new ValidationError(`Unparseable timestamp '${cell}' on line ${line}`, { line, value: cell });
  }
  return new Date(ms);
}

function parseNumber(cell: string): number | null {
  if (cell === '') return null;
  const n = Number(cell);
  return Number.isFinite(n) ? n : null;
}

function timeValue(key: TimeKey): number {
  return key instanceof Date ? key.getTime() : key;
}

function requireColumn(header: readonly string[], column: string): number {
  const index = header.indexOf(column);
  if (index < 0) {
    throw new ValidationError(`Missing required column '${column}'`, { column, header: [...header] });
  }
  return index;
}

export function parseRecordsCsv(text: string, options: RecordLoadOptions = {}): CanonicalRecord[] {
  const timeMode = options.timeMode ?? 'timestamp';
  const lines = text.split(/\r?\n/);
  const headerLine = lines.findIndex(l => l.trim() !== '');
  if (headerLine < 0) throw new ValidationError('CSV input is empty');

  const header = splitRow(lines[headerLine]);
  const machineIdx = requireColumn(header, MACHINE_COLUMN);
  const failureIdx = requireColumn(header, FAILURE_COLUMN);
  const timeIdx =
    timeMode === 'timestamp' ? requireColumn(header, TIMESTAMP_COLUMN)
      : timeMode === 'runtime' ? requireColumn(header, RUNTIME_COLUMN)
        : -1;

  const reserved = new Set([MACHINE_COLUMN, FAILURE_COLUMN, TIMESTAMP_COLUMN, RUNTIME_COLUMN]);
  const sensorColumns = options.sensorColumns
    ? options.sensorColumns.map(c => ({ name: c, index: requireColumn(header, c) }))
    : header.flatMap((name, index) => (reserved.has(name) || name === '' ? [] : [{ name, index }]));

  const records: CanonicalRecord[] = [];
  let skippedCells = 0;

  for (let i = headerLine + 1; i < lines.length; i++) {
    if (lines[i].trim() === '') continue;
    const lineNo = i + 1;
    const cells = splitRow(lines[i]);
    const cell = (index: number): string => cells[index] ?? '';

    const machineId = cell(machineIdx);
    if (!machineId) {
      throw new ValidationError(`Empty ${MACHINE_COLUMN} on line ${lineNo}`, { line: lineNo });
    }

    let timeKey: TimeKey;
    if (timeMode === 'timestamp') {
      timeKey = parseTimestamp(cell(timeIdx), lineNo);
    } else if (timeMode === 'runtime') {
      const hours = parseNumber(cell(timeIdx));
      if (hours === null) {
        throw new ValidationError(`Non-numeric ${RUNTIME_COLUMN} on line ${lineNo}`, { line: lineNo, value: cell(timeIdx) });
      }
      timeKey = hours;
    } else {
      timeKey = records.length;
    }

    const sensors: Record<string, number> = {};
    for (const { name, index } of sensorColumns) {
      const value = parseNumber(cell(index));
      if (value === null) skippedCells++;
      else sensors[name] = value;
    }

    records.push({ machineId, timeKey, sensors, failure: parseFailureFlag(cell(failureIdx)) });
  }

  records.sort((a, b) => {
    if (a.machineId !== b.machineId) return a.machineId < b.machineId ? -1 : 1;
    return timeValue(a.timeKey) - timeValue(b.timeKey);
  });

  log.debug(
    { records: records.length, timeMode, sensors: sensorColumns.map(s => s.name), skippedCells },
    'CSV records parsed',
  );
  return records;
}

export function loadRecordsCsv(path: string, options: RecordLoadOptions = {}): CanonicalRecord[] {
  if (!existsSync(path)) throw new NotFoundError('Data file', path);
  const records = parseRecordsCsv(readFileSync(path, 'utf-8'), options);
  log.info({ path, records: records.length }, 'Records loaded');
  return records;
}
