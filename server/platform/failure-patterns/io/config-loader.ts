/**
 * 挖掘配置文件加载（JSON → 校验后的配置）
 */

import { existsSync, readFileSync } from 'fs';
import { ConfigurationError, NotFoundError } from '../../../core/errors';
import { createModuleLogger } from '../../../core/logger';
import { parseGraphConfig, parseSearchParams } from '../mining-config';
import type { GraphConfig, SearchParams } from '../types';

const log = createModuleLogger('config-loader');

export function readJsonFile(path: string, label: string): unknown {
  if (!existsSync(path)) throw new NotFoundError(label, path);
  const text = readFileSync(path, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(label, [`invalid JSON: ${err instanceof Error ? err.message : String(err)}`], { path });
  }
}

export function loadGraphConfig(path: string): GraphConfig {
  const graphConfig = parseGraphConfig(readJsonFile(path, 'graph config'), `graph config (${path})`);
  log.info(
    { path, sensors: Object.keys(graphConfig.discretization).length, components: graphConfig.stateComponents },
    'Graph config loaded',
  );
  return graphConfig;
}

export function loadSearchParams(path: string): SearchParams {
  const params = parseSearchParams(readJsonFile(path, 'search params'), `search params (${path})`);
  log.info({ path, ...params }, 'Search params loaded');
  return params;
}
