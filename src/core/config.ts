/**
 * Configuration loading
 *
 * Order (later wins): schema defaults, bountygate.config.yml, .env, process environment.
 * Scope files are loaded here too; both fail with ConfigError before any run starts.
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import { parse as parseDotenv } from 'dotenv';
import YAML from 'yaml';
import { BountyGateConfig, ScopeDefinition } from '../types.js';
import { ConfigError } from './errors.js';
import { formatZodError } from './validation.js';
import { isMockLlmEnabled } from '../providers/executors/mock.js';

export const CONFIG_FILENAME = 'bountygate.config.yml';

type Env = Record<string, string | undefined>;
type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─────────────────────────────────────────────────────────────
// Environment overlay
// ─────────────────────────────────────────────────────────────

type EnvKind = 'string' | 'number' | 'boolean' | 'list';

const ENV_BINDINGS: Array<[variable: string, path: string[], kind: EnvKind]> = [
  ['ADVISORY_PROVIDER', ['advisory', 'provider'], 'string'],
  ['ADVISORY_MODEL', ['advisory', 'model'], 'string'],
  ['ADVISORY_BASE_URL', ['advisory', 'baseURL'], 'string'],
  ['GEMINI_API_KEY', ['advisory', 'apiKey'], 'string'],
  ['ADVISORY_API_KEY', ['advisory', 'apiKey'], 'string'],
  ['STORE_LLM_RESPONSES', ['advisory', 'storeResponses'], 'boolean'],
  ['SCAN_RATE', ['scanRate'], 'number'],
  ['MAX_CONCURRENCY', ['maxConcurrency'], 'number'],
  ['TIMEOUT', ['timeoutSeconds'], 'number'],
  ['RUN_TIMEOUT', ['runTimeoutSeconds'], 'number'],
  ['ALLOW_MANUAL_UNBLOCK', ['allowManualUnblock'], 'boolean'],
  ['MANIFEST_PATH', ['manifestPath'], 'string'],
  ['LOG_LEVEL', ['logging', 'level'], 'string'],
  ['LOG_FORMAT', ['logging', 'format'], 'string'],
  ['LOG_FILE', ['logging', 'file'], 'boolean'],
  ['OUTPUT_DIR', ['outputDir'], 'string'],
  ['DATA_DIR', ['dataDir'], 'string'],
  ['ML_WEIGHT', ['triage', 'mlWeight'], 'number'],
  ['LLM_WEIGHT', ['triage', 'llmWeight'], 'number'],
  ['MODEL_PATH', ['triage', 'modelPath'], 'string'],
  ['NUCLEI_RATE_LIMIT', ['nuclei', 'rateLimit'], 'number'],
  ['NUCLEI_CONCURRENCY', ['nuclei', 'concurrency'], 'number'],
  ['NUCLEI_TEMPLATE_TAGS', ['nuclei', 'templateTags'], 'list'],
  ['HTTPX_THREADS', ['httpxThreads'], 'number'],
  ['CRAWLER_DELAY', ['crawler', 'delaySeconds'], 'number'],
  ['CRAWLER_MAX_DEPTH', ['crawler', 'maxDepth'], 'number'],
];

function coerceEnvValue(raw: string, kind: EnvKind): unknown {
  switch (kind) {
    case 'number': {
      const value = Number(raw);
      // Leave unparseable text in place so the schema reports it
      return raw.trim() !== '' && Number.isFinite(value) ? value : raw;
    }
    case 'boolean': {
      const lowered = raw.trim().toLowerCase();
      if (['true', '1', 'yes'].includes(lowered)) return true;
      if (['false', '0', 'no'].includes(lowered)) return false;
      return raw;
    }
    case 'list':
      return raw.split(',').map((s) => s.trim()).filter(Boolean);
    case 'string':
      return raw;
  }
}

function setPath(target: RawConfig, path: string[], value: unknown): void {
  let node = target;
  for (const key of path.slice(0, -1)) {
    const next = node[key];
    if (isRecord(next)) {
      node = next;
    } else {
      const created: RawConfig = {};
      node[key] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}

function applyEnv(raw: RawConfig, env: Env): void {
  for (const [variable, path, kind] of ENV_BINDINGS) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      setPath(raw, path, coerceEnvValue(value, kind));
    }
  }
}

// ─────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────

function readConfigFile(path: string): RawConfig {
  let doc: unknown;
  try {
    doc = YAML.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to read ${path}: ${error instanceof Error ? error.message : String(error)}`, error);
  }
  if (doc === null || doc === undefined) {
    return {};
  }
  if (!isRecord(doc)) {
    throw new ConfigError(`${path} must contain a mapping at the top level`);
  }
  return { ...doc };
}

function readDotenv(cwd: string): Env {
  const path = join(cwd, '.env');
  if (!existsSync(path)) {
    return {};
  }
  return parseDotenv(readFileSync(path));
}

export interface LoadConfigOptions {
  env?: Env;
  configPath?: string;
}

export function loadConfig(cwd: string, options: LoadConfigOptions = {}): BountyGateConfig {
  const configPath = options.configPath ?? join(cwd, CONFIG_FILENAME);
  const raw: RawConfig = existsSync(configPath) ? readConfigFile(configPath) : {};

  if (options.configPath && !existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  const env: Env = { ...readDotenv(cwd), ...(options.env ?? process.env) };
  applyEnv(raw, env);

  // A key on its own selects the default hosted provider
  const advisory = isRecord(raw.advisory) ? raw.advisory : undefined;
  if (advisory && advisory.apiKey !== undefined && advisory.provider === undefined) {
    advisory.provider = 'gemini';
  }
  if (isMockLlmEnabled(env)) {
    setPath(raw, ['advisory', 'provider'], 'mock');
  }

  const result = BountyGateConfig.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodError(result.error)}`);
  }

  const config = result.data;
  if ((config.advisory.provider === 'gemini' || config.advisory.provider === 'openai') && !config.advisory.apiKey) {
    throw new ConfigError(
      `Advisory provider ${config.advisory.provider} needs an API key (set ADVISORY_API_KEY or GEMINI_API_KEY)`
    );
  }

  return config;
}

/**
 * Load a scope file. JSON is a subset of YAML, so one parser reads both.
 */
export function loadScopeDefinition(path: string): Readonly<ScopeDefinition> {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new ConfigError(`Scope file not found: ${fullPath}`);
  }

  let doc: unknown;
  try {
    doc = YAML.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Scope file is not valid JSON or YAML: ${fullPath}`, error);
  }

  const result = ScopeDefinition.safeParse(doc);
  if (!result.success) {
    throw new ConfigError(`Invalid scope file ${fullPath}: ${formatZodError(result.error)}`);
  }

  const scope: ScopeDefinition = {
    in_scope: [...result.data.in_scope],
    out_of_scope: [...result.data.out_of_scope],
  };
  Object.freeze(scope.in_scope);
  Object.freeze(scope.out_of_scope);
  return Object.freeze(scope);
}
