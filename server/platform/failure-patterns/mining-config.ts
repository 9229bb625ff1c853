/**
 * ============================================================================
 * 挖掘配置 Schema：图构建配置 + 搜索参数
 * ============================================================================
 *
 * 磁盘格式（snake_case）：
 *   graph_config.json
 *   {
 *     "discretization": {
 *       "Temperature": { "bins": [0, 30, 50, 70, 100], "labels": ["low", "medium", "high", "very_high"] }
 *     },
 *     "state_components": ["Temperature", "Vibration_Level"]
 *   }
 *
 *   search_params.json
 *   { "max_depth": 50, "lookback_window": 50, "min_pattern_length": 3,
 *     "heuristic": "time_to_failure", "a_star_weight": 1.0 }
 *
 * 配置错误在建图之前以 ConfigurationError 抛出，不在内部恢复。
 * ============================================================================
 */

import { z } from 'zod';
import { ConfigurationError } from '../../core/errors';
import type { GraphConfig, SearchParams } from './types';

// ============================================================
// Schema 定义
// ============================================================

const binningSchema = z
  .object({
    bins: z.array(z.number().finite()).min(2, 'needs at least two boundaries'),
    labels: z.array(z.string().min(1)).min(1),
  })
  .superRefine((scheme, ctx) => {
    if (scheme.labels.length !== scheme.bins.length - 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['labels'],
        message: `expected ${scheme.bins.length - 1} labels for ${scheme.bins.length} boundaries, got ${scheme.labels.length}`,
      });
    }
    for (let i = 1; i < scheme.bins.length; i++) {
      if (!(scheme.bins[i] > scheme.bins[i - 1])) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['bins', i],
          message: 'bins must be strictly increasing',
        });
        break;
      }
    }
  });

export const graphConfigSchema = z
  .object({
    discretization: z.record(binningSchema),
    state_components: z.array(z.string().min(1)).min(1, 'at least one state component required'),
  })
  .superRefine((cfg, ctx) => {
    cfg.state_components.forEach((sensor, i) => {
      if (!Object.prototype.hasOwnProperty.call(cfg.discretization, sensor)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['state_components', i],
          message: `unknown sensor '${sensor}' (no discretization scheme)`,
        });
      }
    });
  });

export const searchParamsSchema = z.object({
  max_depth: z.number().int().min(0).default(50),
  lookback_window: z.number().int().min(0).default(50),
  min_pattern_length: z.number().int().min(0).default(3),
  heuristic: z.enum(['time_to_failure', 'sensor_distance']).default('time_to_failure'),
  a_star_weight: z.number().finite().min(0).default(1.0),
});

export type GraphConfigInput = z.input<typeof graphConfigSchema>;
export type SearchParamsInput = z.input<typeof searchParamsSchema>;

export const DEFAULT_SEARCH_PARAMS: SearchParams = Object.freeze({
  maxDepth: 50,
  lookbackWindow: 50,
  minPatternLength: 3,
  heuristic: 'time_to_failure',
  aStarWeight: 1.0,
});

// ============================================================
// 解析
// ============================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/** 校验并转换图构建配置 */
export function parseGraphConfig(raw: unknown, source = 'graph config'): GraphConfig {
  const result = graphConfigSchema.safeParse(raw);
  if (!result.success) throw new ConfigurationError(source, formatIssues(result.error));

  const discretization = Object.fromEntries(
    Object.entries(result.data.discretization).map(([sensor, scheme]) => [
      sensor,
      Object.freeze({ bins: Object.freeze([...scheme.bins]), labels: Object.freeze([...scheme.labels]) }),
    ]),
  );
  return Object.freeze({
    discretization: Object.freeze(discretization),
    stateComponents: Object.freeze([...result.data.state_components]),
  });
}

/** 校验并转换搜索参数，缺省字段取默认值 */
export function parseSearchParams(raw: unknown, source = 'search params'): SearchParams {
  const result = searchParamsSchema.safeParse(raw ?? {});
  if (!result.success) throw new ConfigurationError(source, formatIssues(result.error));

  const p = result.data;
  return Object.freeze({
    maxDepth: p.max_depth,
    lookbackWindow: p.lookback_window,
    minPatternLength: p.min_pattern_length,
    heuristic: p.heuristic,
    aStarWeight: p.a_star_weight,
  });
}
