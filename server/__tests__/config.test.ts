/**
 * config.ts 配置系统测试
 *
 * 覆盖范围：
 * - 配置结构完整性（所有必需字段存在且类型正确）
 * - 环境变量覆盖机制
 * - validateConfigWithSchema() 在各场景下的行为
 * - getConfigSummary
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

vi.mock('../core/logger', () => ({
  createModuleLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  }),
}));

describe('config', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  describe('默认值', () => {
    it('mining 上限应有约定的默认值', async () => {
      delete process.env.MINING_MAX_RECORDS;
      delete process.env.MINING_SIMILARITY_NEIGHBOR_CAP;
      delete process.env.MINING_MAX_START_STATES;
      delete process.env.MINING_PATHS_PER_START;
      delete process.env.MINING_MAX_TOTAL_PATHS;
      delete process.env.MINING_DISCOVERY_DEPTH_CAP;
      delete process.env.MINING_RANDOM_SEED;
      const { config } = await import('../core/config');
      expect(config.mining).toEqual({
        maxRecords: 1000,
        similarityNeighborCap: 20,
        maxStartStates: 100,
        pathsPerStart: 5,
        maxTotalPaths: 100,
        discoveryDepthCap: 10,
        randomSeed: 42,
      });
    });

    it('app 配置应有合法取值', async () => {
      const { config } = await import('../core/config');
      expect(config.app.version).toMatch(/^\d+\.\d+\.\d+/);
      expect(['development', 'production', 'test']).toContain(config.app.env);
      expect(['trace', 'debug', 'info', 'warn', 'error']).toContain(config.app.logLevel);
    });
  });

  describe('环境变量覆盖', () => {
    it('MINING_MAX_TOTAL_PATHS 覆盖默认值', async () => {
      process.env.MINING_MAX_TOTAL_PATHS = '250';
      const { config } = await import('../core/config');
      expect(config.mining.maxTotalPaths).toBe(250);
    });

    it('非法 LOG_LEVEL 回退到 info', async () => {
      process.env.LOG_LEVEL = 'verbose';
      const { config } = await import('../core/config');
      expect(config.app.logLevel).toBe('info');
    });
  });

  describe('validateConfigWithSchema()', () => {
    it('默认配置通过 schema 验证', async () => {
      const { config } = await import('../core/config');
      const { validateConfigWithSchema } = await import('../core/config-schema');
      const result = validateConfigWithSchema(config);
      expect(result.success).toBe(true);
    });

    it('非数字上限报告字段路径', async () => {
      process.env.MINING_MAX_RECORDS = 'lots';
      const { config } = await import('../core/config');
      const { validateConfigWithSchema } = await import('../core/config-schema');
      const result = validateConfigWithSchema(config);
      expect(result.success).toBe(false);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].startsWith('mining.maxRecords:')).toBe(true);
    });

    it('每起点上限超过全局上限时给出警告', async () => {
      process.env.MINING_PATHS_PER_START = '500';
      const { config } = await import('../core/config');
      const { validateConfigWithSchema } = await import('../core/config-schema');
      const result = validateConfigWithSchema(config);
      expect(result.success).toBe(true);
      expect(result.warnings).toEqual(['mining.pathsPerStart exceeds mining.maxTotalPaths']);
    });

    it('报告字段路径', async () => {
      const { config } = await import('../core/config');
      const { validateConfigWithSchema } = await import('../core/config-schema');
      const broken = { ...config, mining: { ...config.mining, maxTotalPaths: 0 } };
      const result = validateConfigWithSchema(broken);
      expect(result.success).toBe(false);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].startsWith('mining.maxTotalPaths:')).toBe(true);
    });
  });

  describe('getConfigSummary()', () => {
    it('mining 字段转为字符串', async () => {
      delete process.env.MINING_MAX_RECORDS;
      const { getConfigSummary } = await import('../core/config');
      const summary = getConfigSummary();
      expect(summary.mining.maxRecords).toBe('1000');
      expect(summary.io.outputDir).toBeTruthy();
    });
  });
});
