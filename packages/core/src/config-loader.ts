/**
 * @module config-loader
 * Configuration loader for Deskmate.
 *
 * Loads `deskmate.yaml`, validates it with Zod schemas (every field has a
 * default), and loads a `.env` file from the config file's directory so API
 * keys referenced by `semantic.apiKeyEnv` can live outside the YAML.
 */

import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';
import { DeskmateError, NotFoundError, errorMessage } from './errors.js';
import { isErrnoException } from './knowledge/json-repository.js';
import { parseDuration } from './duration.js';
import { SUPPORTED_LANGUAGES } from './types.js';

/** The starter knowledge base shipped with this package. */
export const BUNDLED_KNOWLEDGE_PATH = fileURLToPath(new URL('../data/problems.json', import.meta.url));

export const CONFIG_FILE_NAMES = ['deskmate.yaml', 'deskmate.yml'] as const;

// =====================================================================
// Zod Sub-Schemas
// =====================================================================

const DurationSchema = z.string().refine((value) => {
  try {
    parseDuration(value);
    return true;
  } catch {
    return false;
  }
}, { message: 'Expected a duration such as "500ms", "8s" or "1m"' });

/** Knowledge base location and matching settings */
export const KnowledgeConfigSchema = z.object({
  path: z.string().default(BUNDLED_KNOWLEDGE_PATH).describe('Knowledge base file (relative to deskmate.yaml)'),
  backend: z.enum(['json', 'sqlite']).optional().describe('Storage backend; inferred from the file extension when omitted'),
  minConfidence: z.number().min(0).max(100).default(75).describe('Minimum fuzzy score (0-100) for a local match'),
  cacheSize: z.number().int().min(1).default(500).describe('Match cache capacity'),
}).describe('Knowledge base configuration');

/** Query history configuration */
export const HistoryConfigSchema = z.object({
  limit: z.number().int().min(1).default(20).describe('Number of recent queries kept in memory'),
  unmatchedLog: z.string().optional().describe('JSON-lines file receiving queries with no local answer'),
}).describe('Query history configuration');

/** Embedding search configuration */
export const SemanticConfigSchema = z.object({
  enabled: z.boolean().default(false).describe('Enable embedding-similarity search'),
  provider: z.literal('openai').default('openai').describe('Embedding provider'),
  model: z.string().default('text-embedding-3-small').describe('Embedding model name'),
  apiKeyEnv: z.string().default('OPENAI_API_KEY').describe('Environment variable holding the API key'),
  threshold: z.number().min(-1).max(1).default(0.6).describe('Minimum cosine similarity for a semantic match'),
}).describe('Semantic search configuration');

/** Web search backend schema */
export const BackendConfigSchema = z.object({
  type: z.enum(['duckduckgo', 'wikipedia']).describe('Backend implementation'),
  name: z.string().optional().describe('Display name used in logs'),
  endpoint: z.string().url().optional().describe('Override the API endpoint'),
}).describe('Web search backend');

/** Internet fallback configuration */
export const InternetConfigSchema = z.object({
  enabled: z.boolean().default(true).describe('Search the web when nothing local matches'),
  timeout: DurationSchema.default('8s').describe('Per-backend request timeout'),
  backends: z.array(BackendConfigSchema).min(1).default([{ type: 'duckduckgo' }, { type: 'wikipedia' }])
    .describe('Backends tried in order'),
}).describe('Internet fallback configuration');

/** Health monitor configuration */
export const MonitorConfigSchema = z.object({
  interval: DurationSchema.default('10s').describe('Pause between monitoring passes'),
  thresholds: z.object({
    cpu: z.number().default(90),
    memory: z.number().default(90),
    storage: z.number().default(90),
    minUploadKBps: z.number().default(10),
    minDownloadKBps: z.number().default(10),
    battery: z.number().default(20),
  }).default({}).describe('Alert thresholds'),
  checks: z.object({
    cpu: z.boolean().default(true),
    memory: z.boolean().default(true),
    storage: z.boolean().default(true),
    network: z.boolean().default(true),
    power: z.boolean().default(true),
  }).default({}).describe('Enable or disable individual checks'),
  autoHeal: z.boolean().default(true).describe('Run the remediation for each alert'),
}).describe('Health monitor configuration');

// =====================================================================
// Complete Configuration Schema
// =====================================================================

export const DeskmateConfigSchema = z.object({
  language: z.union([z.literal('auto'), z.enum(SUPPORTED_LANGUAGES)]).default('auto')
    .describe('Default answer language; auto detects it from each query'),
  knowledge: KnowledgeConfigSchema.default({}),
  history: HistoryConfigSchema.default({}),
  semantic: SemanticConfigSchema.default({}),
  internet: InternetConfigSchema.default({}),
  monitor: MonitorConfigSchema.default({}),
}).describe('Deskmate configuration');

export type DeskmateConfig = z.infer<typeof DeskmateConfigSchema>;

/** Configuration with every default applied. */
export function defaultConfig(): DeskmateConfig {
  return DeskmateConfigSchema.parse({});
}

// =====================================================================
// Config Loader
// =====================================================================

/**
 * Load and validate a Deskmate configuration file.
 *
 * Steps:
 * 1. Resolve the file: `configPath`, else `deskmate.yaml`/`deskmate.yml` in cwd
 * 2. Load `.env` from the config file's directory (or cwd)
 * 3. Parse YAML and validate with the Zod schema
 * 4. Resolve relative paths against the config file's directory
 *
 * Without an explicit path and with no config file in cwd, defaults apply.
 *
 * @throws {NotFoundError} `configPath` was given and does not exist
 * @throws {DeskmateError} `CONFIG_INVALID` on YAML syntax or validation errors
 */
export async function loadConfig(configPath?: string): Promise<DeskmateConfig> {
  const resolvedPath = configPath ? path.resolve(configPath) : await findConfigFile(process.cwd());
  const baseDir = resolvedPath ? path.dirname(resolvedPath) : process.cwd();

  dotenv.config({ path: path.resolve(baseDir, '.env') });

  if (!resolvedPath) {
    return defaultConfig();
  }

  let rawContent: string;
  try {
    rawContent = await fs.readFile(resolvedPath, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new NotFoundError(`Configuration file not found: ${resolvedPath}`, { path: resolvedPath });
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(rawContent);
  } catch (err) {
    throw new DeskmateError('CONFIG_INVALID', `YAML syntax error in ${resolvedPath}: ${errorMessage(err)}`, {
      path: resolvedPath,
    });
  }

  const result = DeskmateConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new DeskmateError('CONFIG_INVALID', `Configuration validation failed:\n${issues.join('\n')}`, {
      path: resolvedPath,
      issues: result.error.issues.map((issue) => issue.path.join('.')),
    });
  }

  return resolvePaths(result.data, baseDir);
}

// =====================================================================
// Internal Helpers
// =====================================================================

/** First of `deskmate.yaml`, `deskmate.yml` present in `dir`, or null. */
async function findConfigFile(dir: string): Promise<string | null> {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.resolve(dir, name);
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      // Try the next name
    }
  }
  return null;
}

function resolvePaths(config: DeskmateConfig, baseDir: string): DeskmateConfig {
  const unmatchedLog = config.history.unmatchedLog;
  return {
    ...config,
    knowledge: { ...config.knowledge, path: path.resolve(baseDir, config.knowledge.path) },
    history: {
      ...config.history,
      unmatchedLog: unmatchedLog === undefined ? undefined : path.resolve(baseDir, unmatchedLog),
    },
  };
}
