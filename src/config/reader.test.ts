/**
 * Tests for the runtime config reader.
 *
 * Covers:
 * - Missing file returns all defaults
 * - Partial override merges with defaults
 * - Invalid JSON throws RuntimeConfigError
 * - Out-of-range and wrong-type values throw with field paths
 * - Pure validateRuntimeConfig function
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { readRuntimeConfig, validateRuntimeConfig, RuntimeConfigError } from './reader.js';
import { DEFAULT_RUNTIME_CONFIG } from './schema.js';

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'runtime-config-test-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

async function writeConfig(content: string): Promise<string> {
  const path = join(tempDir, 'agent-recipes.json');
  await writeFile(path, content, 'utf-8');
  return path;
}

// ============================================================================
// Defaults
// ============================================================================

describe('readRuntimeConfig - defaults', () => {
  it('returns all defaults when the file does not exist', async () => {
    const config = await readRuntimeConfig(join(tempDir, 'missing.json'));
    expect(config).toEqual(DEFAULT_RUNTIME_CONFIG);
  });

  it('defaults have expected values', () => {
    expect(DEFAULT_RUNTIME_CONFIG).toEqual({
      workflows: {
        enabled: true,
        path: 'workspace/workflows',
        runs_dir: 'workspace/runs',
        max_retained_runs: 100,
        step_timeout_ms: null,
        approval_timeout_ms: null,
        approval_session_key: 'dashboard:approvals',
      },
      agent: { name: 'default', command: null, args: [], model: null },
      logging: { level: 'info', color: true },
    });
  });

  it('merges a partial file with defaults', async () => {
    const path = await writeConfig(
      JSON.stringify({ workflows: { step_timeout_ms: 5000 }, agent: { command: './agent.sh' } }),
    );

    const config = await readRuntimeConfig(path);

    expect(config.workflows.step_timeout_ms).toBe(5000);
    expect(config.workflows.path).toBe('workspace/workflows');
    expect(config.agent).toEqual({ name: 'default', command: './agent.sh', args: [], model: null });
    expect(config.logging.level).toBe('info');
  });

  it('accepts null runs_dir to disable run history', async () => {
    const path = await writeConfig(JSON.stringify({ workflows: { runs_dir: null } }));
    const config = await readRuntimeConfig(path);
    expect(config.workflows.runs_dir).toBeNull();
  });
});

// ============================================================================
// Errors
// ============================================================================

describe('readRuntimeConfig - errors', () => {
  it('throws RuntimeConfigError on invalid JSON', async () => {
    const path = await writeConfig('{ not json');
    await expect(readRuntimeConfig(path)).rejects.toThrow(RuntimeConfigError);
    await expect(readRuntimeConfig(path)).rejects.toThrow(`Invalid JSON in config file: ${path}`);
  });

  it('names the field of an out-of-range value', async () => {
    const path = await writeConfig(JSON.stringify({ workflows: { max_retained_runs: 0 } }));

    const err = await readRuntimeConfig(path).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RuntimeConfigError);
    expect(err).toMatchObject({ field: 'workflows.max_retained_runs' });
    expect(String(err)).toContain('workflows.max_retained_runs:');
  });

  it('rejects an unknown log level', async () => {
    const path = await writeConfig(JSON.stringify({ logging: { level: 'trace' } }));
    await expect(readRuntimeConfig(path)).rejects.toMatchObject({ field: 'logging.level' });
  });
});

// ============================================================================
// validateRuntimeConfig
// ============================================================================

describe('validateRuntimeConfig', () => {
  it('returns the parsed config for valid input', () => {
    const result = validateRuntimeConfig({ agent: { name: 'assistant' } });
    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.config.agent.name).toBe('assistant');
    }
  });

  it('lists every problem for invalid input', () => {
    const result = validateRuntimeConfig({
      workflows: { step_timeout_ms: -1 },
      agent: { args: 'not-a-list' },
    });
    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors).toHaveLength(2);
      expect(result.errors[0]).toMatch(/^workflows\.step_timeout_ms: /);
      expect(result.errors[1]).toMatch(/^agent\.args: /);
    }
  });
});
