import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig } from '../../../src/core/config.js';
import { ConfigError } from '../../../src/core/errors.js';
import { createRuntime } from '../../../src/cli/context.js';

describe('cli/context', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'bountygate-runtime-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should enable the manual override only with both the flag and the config switch', () => {
    const locked = loadConfig(dir, { env: {} });
    const unlocked = loadConfig(dir, { env: { ALLOW_MANUAL_UNBLOCK: 'true' } });

    expect(createRuntime(dir, locked, { allowUnblock: true }).gate.overrideEnabled).toBe(false);
    expect(createRuntime(dir, unlocked, {}).gate.overrideEnabled).toBe(false);
    expect(createRuntime(dir, unlocked, { allowUnblock: true }).gate.overrideEnabled).toBe(true);
  });

  it('should build an advisory client only when a provider is selected', () => {
    expect(createRuntime(dir, loadConfig(dir, { env: {} })).advisory).toBeUndefined();
    expect(createRuntime(dir, loadConfig(dir, { env: { MOCK_LLM: '1' } })).advisory).toBeDefined();
  });

  it('should refuse a broken manifest before anything runs', () => {
    writeFileSync(join(dir, 'manifest.json'), '{"blocked_patterns": "nope"}');
    const config = loadConfig(dir, { env: { MANIFEST_PATH: 'manifest.json' } });

    expect(() => createRuntime(dir, config)).toThrow(ConfigError);
  });
});
