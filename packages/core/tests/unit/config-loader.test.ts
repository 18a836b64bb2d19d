/**
 * Unit tests for config-loader module.
 *
 * Tests cover:
 * - Default value population
 * - Relative path resolution
 * - .env file loading
 * - Invalid configuration error reporting
 * - File-not-found error handling
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import {
  BUNDLED_KNOWLEDGE_PATH,
  DeskmateConfigSchema,
  defaultConfig,
  loadConfig,
} from '../../src/config-loader.js';
import { DeskmateError, NotFoundError } from '../../src/errors.js';

/** Helper to create a temporary directory */
async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'deskmate-config-test-'));
}

function fullYaml(): string {
  return [
    'language: np',
    'knowledge:',
    '  path: data/kb.db',
    '  minConfidence: 80',
    '  cacheSize: 50',
    'history:',
    '  limit: 5',
    '  unmatchedLog: logs/unmatched.jsonl',
    'semantic:',
    '  enabled: true',
    '  apiKeyEnv: DESKMATE_TEST_OPENAI_KEY',
    '  threshold: 0.7',
    'internet:',
    '  timeout: 3s',
    '  backends:',
    '    - type: wikipedia',
    '      name: wiki',
    'monitor:',
    '  interval: 30s',
    '  thresholds:',
    '    cpu: 75',
    '  checks:',
    '    network: false',
    '  autoHeal: false',
  ].join('\n');
}

describe('config-loader', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await createTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    delete process.env.DESKMATE_CFG_TEST_KEY;
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function writeConfig(content: string, name = 'deskmate.yaml'): Promise<string> {
    const file = path.join(tmpDir, name);
    await fs.writeFile(file, content, 'utf-8');
    return file;
  }

  describe('defaults', () => {
    it('fills every section from an empty document', () => {
      const config = defaultConfig();
      expect(config.language).toBe('auto');
      expect(config.knowledge).toEqual({ path: BUNDLED_KNOWLEDGE_PATH, minConfidence: 75, cacheSize: 500 });
      expect(config.history).toEqual({ limit: 20 });
      expect(config.semantic).toEqual({
        enabled: false,
        provider: 'openai',
        model: 'text-embedding-3-small',
        apiKeyEnv: 'OPENAI_API_KEY',
        threshold: 0.6,
      });
      expect(config.internet).toEqual({
        enabled: true,
        timeout: '8s',
        backends: [{ type: 'duckduckgo' }, { type: 'wikipedia' }],
      });
      expect(config.monitor.interval).toBe('10s');
      expect(config.monitor.thresholds).toEqual({
        cpu: 90, memory: 90, storage: 90, minUploadKBps: 10, minDownloadKBps: 10, battery: 20,
      });
      expect(config.monitor.autoHeal).toBe(true);
    });

    it('points the default knowledge base at the bundled data file', async () => {
      const raw: unknown = JSON.parse(await fs.readFile(BUNDLED_KNOWLEDGE_PATH, 'utf-8'));
      expect(Array.isArray(raw)).toBe(true);
    });

    it('treats an empty file as all defaults', async () => {
      const config = await loadConfig(await writeConfig(''));
      expect(config).toEqual(defaultConfig());
    });
  });

  describe('loading', () => {
    it('loads every section and resolves paths against the config directory', async () => {
      const config = await loadConfig(await writeConfig(fullYaml()));

      expect(config.language).toBe('np');
      expect(config.knowledge).toEqual({ path: path.join(tmpDir, 'data/kb.db'), minConfidence: 80, cacheSize: 50 });
      expect(config.history).toEqual({ limit: 5, unmatchedLog: path.join(tmpDir, 'logs/unmatched.jsonl') });
      expect(config.semantic.enabled).toBe(true);
      expect(config.semantic.apiKeyEnv).toBe('DESKMATE_TEST_OPENAI_KEY');
      expect(config.semantic.threshold).toBe(0.7);
      expect(config.internet).toEqual({ enabled: true, timeout: '3s', backends: [{ type: 'wikipedia', name: 'wiki' }] });
      expect(config.monitor.interval).toBe('30s');
      expect(config.monitor.thresholds.cpu).toBe(75);
      expect(config.monitor.thresholds.memory).toBe(90);
      expect(config.monitor.checks).toEqual({ cpu: true, memory: true, storage: true, network: false, power: true });
      expect(config.monitor.autoHeal).toBe(false);
    });

    it('keeps an absolute knowledge path as given', async () => {
      const absolute = path.join(os.tmpdir(), 'elsewhere', 'kb.json');
      const config = await loadConfig(await writeConfig(`knowledge:\n  path: ${absolute}\n`));
      expect(config.knowledge.path).toBe(absolute);
    });

    it('finds deskmate.yml in the working directory', async () => {
      await writeConfig('language: np\n', 'deskmate.yml');
      vi.spyOn(process, 'cwd').mockReturnValue(tmpDir);

      const config = await loadConfig();
      expect(config.language).toBe('np');
    });

    it('returns defaults when the working directory has no config file', async () => {
      vi.spyOn(process, 'cwd').mockReturnValue(tmpDir);
      await expect(loadConfig()).resolves.toEqual(defaultConfig());
    });

    it('loads .env from the config directory', async () => {
      await fs.writeFile(path.join(tmpDir, '.env'), 'DESKMATE_CFG_TEST_KEY=test-secret\n', 'utf-8');
      await loadConfig(await writeConfig('language: en\n'));
      expect(process.env.DESKMATE_CFG_TEST_KEY).toBe('test-secret');
    });
  });

  describe('errors', () => {
    it('throws NotFoundError for an explicit path that does not exist', async () => {
      await expect(loadConfig(path.join(tmpDir, 'missing.yaml'))).rejects.toThrow(NotFoundError);
    });

    it('reports YAML syntax errors as CONFIG_INVALID', async () => {
      const file = await writeConfig('language: [unclosed\n');
      const error = await loadConfig(file).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(DeskmateError);
      expect(error).toMatchObject({ structuredError: { code: 'CONFIG_INVALID' } });
      expect(error instanceof Error && error.message.startsWith(`YAML syntax error in ${file}`)).toBe(true);
    });

    it('lists every invalid field', async () => {
      const file = await writeConfig([
        'language: fr',
        'knowledge:',
        '  minConfidence: 150',
        'internet:',
        '  timeout: soon',
      ].join('\n'));
      const error = await loadConfig(file).catch((err: unknown) => err);

      expect(error).toMatchObject({
        structuredError: {
          code: 'CONFIG_INVALID',
          details: { issues: ['language', 'knowledge.minConfidence', 'internet.timeout'] },
        },
      });
      expect(error instanceof Error ? error.message : '').toContain(
        '  - internet.timeout: Expected a duration such as "500ms", "8s" or "1m"',
      );
    });

    it('rejects an unknown web backend type', () => {
      const result = DeskmateConfigSchema.safeParse({ internet: { backends: [{ type: 'bing' }] } });
      expect(result.success).toBe(false);
    });
  });
});
