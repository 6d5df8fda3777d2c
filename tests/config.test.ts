/**
 * Router Configuration Tests
 *
 * Contract for configuration loading:
 * - Defaults when nothing is set
 * - JSON file named by HOOPS_ROUTER_CONFIG, then environment overrides
 * - Anything invalid fails with CONFIG_INVALID
 *
 * The implementation lives in: src/config.ts
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_ROUTER_CONFIG, loadRouterConfig } from '../src/config.js';

describe('Router Configuration', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hoops-router-config-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(name: string, content: string): Promise<string> {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  describe('Defaults', () => {
    it('should fill every section', () => {
      expect(DEFAULT_ROUTER_CONFIG).toEqual({
        version: '1.0.0',
        thresholds: {
          ratio_floor: 1.5,
          ratio_min: 0.4,
          auto_promote_statistical: 4.0,
          auto_promote_contextual: 2.0,
        },
        logging: { level: 'info' },
        fallback: {
          base_url: 'https://api.openai.com/v1',
          model: 'gpt-4o-mini',
          timeout_ms: 10000,
        },
      });
    });

    it('should return the defaults for an empty environment', async () => {
      await expect(loadRouterConfig({})).resolves.toEqual(DEFAULT_ROUTER_CONFIG);
    });
  });

  describe('Configuration file', () => {
    it('should merge a partial file over the defaults', async () => {
      const filePath = await writeConfig('partial.json', JSON.stringify({
        thresholds: { ratio_min: 0.5 },
        logging: { level: 'debug' },
      }));

      const config = await loadRouterConfig({ HOOPS_ROUTER_CONFIG: filePath });

      expect(config.thresholds).toEqual({
        ratio_floor: 1.5,
        ratio_min: 0.5,
        auto_promote_statistical: 4.0,
        auto_promote_contextual: 2.0,
      });
      expect(config.logging.level).toBe('debug');
      expect(config.fallback.model).toBe('gpt-4o-mini');
    });

    it('should let the environment override the file', async () => {
      const filePath = await writeConfig('model.json', JSON.stringify({
        fallback: { model: 'file-model' },
      }));

      const config = await loadRouterConfig({
        HOOPS_ROUTER_CONFIG: filePath,
        OPENAI_MODEL: 'env-model',
        OPENAI_API_KEY: 'test-secret',
        OPENAI_BASE_URL: 'http://localhost:8080/v1',
        HOOPS_ROUTER_LOG_LEVEL: 'warn',
      });

      expect(config.fallback).toEqual({
        base_url: 'http://localhost:8080/v1',
        model: 'env-model',
        api_key: 'test-secret',
        timeout_ms: 10000,
      });
      expect(config.logging.level).toBe('warn');
    });

    it('should reject unknown keys', async () => {
      const filePath = await writeConfig('unknown.json', JSON.stringify({ thresholdz: {} }));

      const error = await loadRouterConfig({ HOOPS_ROUTER_CONFIG: filePath }).catch((e: unknown) => e);

      expect(error).toMatchObject({ code: 'CONFIG_INVALID', message: `Invalid router configuration from ${filePath}` });
    });

    it('should reject a file that is not JSON', async () => {
      const filePath = await writeConfig('broken.json', '{ not json');

      const error = await loadRouterConfig({ HOOPS_ROUTER_CONFIG: filePath }).catch((e: unknown) => e);

      expect(error).toMatchObject({ code: 'CONFIG_INVALID', message: `Configuration file ${filePath} is not valid JSON` });
    });

    it('should reject a missing file', async () => {
      const filePath = path.join(tempDir, 'missing.json');

      const error = await loadRouterConfig({ HOOPS_ROUTER_CONFIG: filePath }).catch((e: unknown) => e);

      expect(error).toMatchObject({ code: 'CONFIG_INVALID', message: `Cannot read configuration file ${filePath}` });
    });

    it('should reject a ratio minimum above one', async () => {
      const filePath = await writeConfig('ratio.json', JSON.stringify({ thresholds: { ratio_min: 1.5 } }));

      const error = await loadRouterConfig({ HOOPS_ROUTER_CONFIG: filePath }).catch((e: unknown) => e);

      expect(error).toMatchObject({ code: 'CONFIG_INVALID' });
    });
  });

  describe('Environment overrides', () => {
    it('should report the path of an invalid log level', async () => {
      const error = await loadRouterConfig({ HOOPS_ROUTER_LOG_LEVEL: 'verbose' }).catch((e: unknown) => e);

      expect(error).toMatchObject({
        code: 'CONFIG_INVALID',
        message: 'Invalid router configuration from environment',
        details: [expect.objectContaining({ path: 'logging.level' })],
      });
    });

    it('should reject a base URL that is not a URL', async () => {
      const error = await loadRouterConfig({ OPENAI_BASE_URL: 'not a url' }).catch((e: unknown) => e);

      expect(error).toMatchObject({ code: 'CONFIG_INVALID' });
    });
  });
});
