/**
 * 挖掘结果输出
 *
 * sequences.json      { "sequences": [{ sequence, frequency, avg_time_to_failure, machines }] }
 * warning_signs.json  { "warning_signs": [{ pattern, predictive_score, frequency, false_positive_rate }] }
 */

import { mkdirSync, writeFileSync } from 'fs';
import * as path from 'path';
import { createModuleLogger } from '../../../core/logger';
import type { FailureSequence, WarningSign } from '../types';

const log = createModuleLogger('result-writer');

export const SEQUENCES_FILE = 'sequences.json';
export const WARNING_SIGNS_FILE = 'warning_signs.json';

export interface SerializedSequence {
  sequence: string[];
  frequency: number;
  avg_time_to_failure: number;
  machines: string[];
}

export interface SerializedWarningSign {
  pattern: string;
  predictive_score: number;
  frequency: number;
  false_positive_rate: number;
}

export interface WrittenFiles {
  sequences: string;
  warningSigns: string;
}

export function serializeSequence(sequence: FailureSequence): SerializedSequence {
  return {
    sequence: sequence.states.map(s => s.describe()),
    frequency: sequence.frequency,
    avg_time_to_failure: sequence.avgTimeToFailure,
    machines: [...sequence.machines],
  };
}

export function serializeWarningSign(sign: WarningSign): SerializedWarningSign {
  return {
    pattern: sign.pattern,
    predictive_score: sign.predictiveScore,
    frequency: sign.frequency,
    false_positive_rate: sign.falsePositiveRate,
  };
}

export function writeMiningResult(
  result: { sequences: readonly FailureSequence[]; warnings: readonly WarningSign[] },
  outputDir: string,
): WrittenFiles {
  mkdirSync(outputDir, { recursive: true });

  const files: WrittenFiles = {
    sequences: path.join(outputDir, SEQUENCES_FILE),
    warningSigns: path.join(outputDir, WARNING_SIGNS_FILE),
  };
  writeFileSync(
    files.sequences,
    JSON.stringify({ sequences: result.sequences.map(serializeSequence) }, null, 2),
    'utf-8',
  );
  writeFileSync(
    files.warningSigns,
    JSON.stringify({ warning_signs: result.warnings.map(serializeWarningSign) }, null, 2),
    'utf-8',
  );

  log.info({ outputDir, sequences: result.sequences.length, warnings: result.warnings.length }, 'Results written');
  return files;
}
