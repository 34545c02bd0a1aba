/**
 * Tests for the recipe CLI commands.
 *
 * Exercises the commands against real recipe files in a temp directory,
 * with the agent replaced by an in-process callback.
 *
 * Covers:
 * 1. Argument helpers: parseVars, extractFlag, positionals, agent command paths
 * 2. list: valid and invalid recipes
 * 3. validate: all recipes, named recipes, template warnings, exit codes
 * 4. run: results, exit codes, approval handling, argument errors
 * 5. status: stored runs, single run lookup, disabled history
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { mkdtemp, rm, writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  extractFlag,
  listCommand,
  parseVars,
  positionals,
  resolveAgentCommand,
  runCommand,
  statusCommand,
  validateCommand,
} from './recipe.js';
import type { CliContext } from './recipe.js';
import { RuntimeConfigSchema } from '../../config/schema.js';
import { silentLogger } from '../../logging/logger.js';
import { RunResultSchema } from '../../workflow-runtime/index.js';
import type { AgentHandle, StepCallback } from '../../workflow-runtime/index.js';

// ============================================================================
// Test helpers
// ============================================================================

const GREET = [
  'name: greet',
  'steps:',
  '  - id: hello',
  '    prompt: Hello {who}',
  '  - id: bye',
  '    prompt: Bye after {hello_output}',
].join('\n');

const echo: StepCallback = async (_agent, prompt) => `echo: ${prompt}`;

let tempDir: string;
let recipesDir: string;
let logSpy: MockInstance<typeof console.log>;

function context(overrides: Partial<CliContext> = {}, workflows: Record<string, unknown> = {}): CliContext {
  return {
    config: RuntimeConfigSchema.parse({ workflows: { path: 'workflows', runs_dir: 'runs', ...workflows } }),
    logger: silentLogger,
    baseDir: tempDir,
    callback: echo,
    ...overrides,
  };
}

/** The JSON printed by the most recent console.log call. */
function lastJson(): unknown {
  const call = logSpy.mock.calls.at(-1);
  return JSON.parse(String(call?.[0]));
}

async function writeRecipe(name: string, content: string): Promise<string> {
  const path = join(recipesDir, name);
  await writeFile(path, content, 'utf-8');
  return path;
}

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'recipe-cli-test-'));
  recipesDir = join(tempDir, 'workflows');
  await mkdir(recipesDir);
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(async () => {
  logSpy.mockRestore();
  await rm(tempDir, { recursive: true, force: true });
});

// ============================================================================
// 1. Argument helpers
// ============================================================================

describe('argument helpers', () => {
  it('merges --vars with --var pairs, later pairs winning', () => {
    expect(
      parseVars(['--vars={"a":1,"b":"x"}', '--var=b=y', '--var=c=d=e', '--var=flag']),
    ).toEqual({ a: 1, b: 'y', c: 'd=e', flag: '' });
  });

  it('rejects malformed vars', () => {
    expect(() => parseVars(['--vars={oops'])).toThrow('Invalid JSON in --vars flag');
    expect(() => parseVars(['--vars=[1,2]'])).toThrow('--vars must be a JSON object');
    expect(() => parseVars(['--var==v'])).toThrow('Invalid --var flag: "--var==v" (expected --var=key=value)');
  });

  it('takes the last flag value and filters positionals', () => {
    expect(extractFlag(['--limit=1', '--limit=5'], 'limit')).toBe('5');
    expect(extractFlag(['--pretty'], 'limit')).toBeUndefined();
    expect(positionals(['greet', '--pretty', 'other'])).toEqual(['greet', 'other']);
  });

  it('resolves relative agent commands against the config directory', () => {
    expect(resolveAgentCommand('./scripts/agent.sh', '/srv/recipes')).toBe('/srv/recipes/scripts/agent.sh');
    expect(resolveAgentCommand('bin/agent', '/srv/recipes')).toBe('/srv/recipes/bin/agent');
    expect(resolveAgentCommand('/usr/local/bin/agent', '/srv/recipes')).toBe('/usr/local/bin/agent');
    expect(resolveAgentCommand('agent', '/srv/recipes')).toBe('agent');
  });
});

// ============================================================================
// 2. list
// ============================================================================

describe('listCommand', () => {
  it('lists valid recipes and reports invalid ones', async () => {
    const greetPath = await writeRecipe('greet.yaml', GREET);
    const brokenPath = await writeRecipe('broken.yaml', 'steps: []\n');

    const code = await listCommand([], context());

    expect(code).toBe(0);
    expect(lastJson()).toEqual({
      recipes: [
        { name: 'broken', path: brokenPath, error: 'Invalid workflow recipe: steps: recipe has no steps' },
        { name: 'greet', path: greetPath, mode: 'linear', steps: 2 },
      ],
    });
  });

  it('prints a notice for an empty directory with --pretty', async () => {
    const code = await listCommand(['--pretty'], context());

    expect(code).toBe(0);
    expect(logSpy).toHaveBeenCalledWith(`No recipes found in ${recipesDir}`);
  });
});

// ============================================================================
// 3. validate
// ============================================================================

describe('validateCommand', () => {
  it('validates every recipe and fails when one is invalid', async () => {
    const greetPath = await writeRecipe('greet.yaml', GREET);
    const brokenPath = await writeRecipe('broken.yaml', 'steps: []\n');

    const code = await validateCommand([], context());

    expect(code).toBe(1);
    expect(lastJson()).toEqual({
      valid: false,
      recipes: [
        {
          recipe: brokenPath,
          valid: false,
          path: brokenPath,
          errors: ['steps: recipe has no steps'],
          warnings: [],
        },
        {
          recipe: 'greet',
          valid: true,
          path: greetPath,
          mode: 'linear',
          execution_order: ['hello', 'bye'],
          errors: [],
          warnings: [],
        },
      ],
    });
  });

  it('validates only the named recipes', async () => {
    await writeRecipe('greet.yaml', GREET);
    await writeRecipe('broken.yaml', 'steps: []\n');

    const code = await validateCommand(['greet'], context());

    expect(code).toBe(0);
    expect(lastJson()).toMatchObject({ valid: true, recipes: [{ recipe: 'greet', valid: true }] });
  });

  it('reports dag order and template warnings', async () => {
    await writeRecipe(
      'loose.yaml',
      [
        'mode: dag',
        'steps:',
        '  - id: summary',
        '    prompt: Summarize {fetch_output}',
        '  - id: fetch',
        '    prompt: Fetch news',
      ].join('\n'),
    );

    const code = await validateCommand(['loose'], context());

    expect(code).toBe(0);
    expect(lastJson()).toMatchObject({
      valid: true,
      recipes: [
        {
          recipe: 'loose',
          execution_order: ['summary', 'fetch'],
          warnings: ['Step "summary" uses {fetch_output}, but step "fetch" does not run before it'],
        },
      ],
    });
  });

  it('reports a recipe that does not exist', async () => {
    const code = await validateCommand(['nope'], context());

    expect(code).toBe(1);
    expect(lastJson()).toEqual({
      valid: false,
      recipes: [{ recipe: 'nope', valid: false, errors: ['Workflow recipe not found: nope'], warnings: [] }],
    });
  });
});

// ============================================================================
// 4. run
// ============================================================================

describe('runCommand', () => {
  it('runs a recipe and prints its result', async () => {
    await writeRecipe('greet.yaml', GREET);
    const agents: AgentHandle[] = [];
    const callback: StepCallback = async (agent, prompt) => {
      agents.push(agent);
      return `echo: ${prompt}`;
    };

    const code = await runCommand(['greet', '--var=who=Ada'], context({ callback }));

    expect(code).toBe(0);
    expect(lastJson()).toMatchObject({
      recipe_name: 'greet',
      status: 'completed',
      steps: [
        { step_id: 'hello', status: 'succeeded', output: 'echo: Hello Ada' },
        { step_id: 'bye', status: 'succeeded', output: 'echo: Bye after echo: Hello Ada' },
      ],
    });
    expect(agents[0]).toMatchObject({ channel: 'cli', chat_id: 'cli', session_key: 'workflow:greet:hello' });
  });

  it('exits 1 when the run fails', async () => {
    await writeRecipe('greet.yaml', GREET);

    const code = await runCommand(
      ['greet'],
      context({
        callback: async () => {
          throw new Error('agent offline');
        },
      }),
    );

    expect(code).toBe(1);
    expect(lastJson()).toMatchObject({
      status: 'failed',
      steps: [
        { step_id: 'hello', status: 'failed', error: { kind: 'StepExecutionError', message: 'agent offline' } },
        { step_id: 'bye', status: 'skipped', error: { kind: 'PreviousStepStopped' } },
      ],
    });
  });

  it('requires a recipe name', async () => {
    expect(await runCommand([], context())).toBe(1);
    expect(lastJson()).toEqual({
      error: 'Recipe name is required',
      help: 'Usage: agent-recipes run <recipe> [--var=key=value] [--vars=<json>]',
    });
  });

  it('requires an agent command when no callback is injected', async () => {
    await writeRecipe('greet.yaml', GREET);

    expect(await runCommand(['greet'], context({ callback: undefined }))).toBe(1);
    expect(lastJson()).toEqual({
      error: 'No agent command configured (set agent.command in the config file)',
    });
  });

  it('reports unknown recipes and bad vars', async () => {
    await writeRecipe('greet.yaml', GREET);

    expect(await runCommand(['nope'], context())).toBe(1);
    expect(lastJson()).toEqual({ error: 'Workflow recipe not found: nope' });

    expect(await runCommand(['greet', '--vars=nope'], context())).toBe(1);
    expect(lastJson()).toEqual({ error: 'Invalid JSON in --vars flag' });
  });

  it('approves every step with --approve-all', async () => {
    await writeRecipe('guarded.yaml', 'steps:\n  - id: send\n    prompt: send it\n    require_approval: true\n');

    const code = await runCommand(['guarded', '--approve-all'], context());

    expect(code).toBe(0);
    expect(lastJson()).toMatchObject({ status: 'completed', steps: [{ step_id: 'send', output: 'echo: send it' }] });
  });

  it('honours an injected approval gate', async () => {
    await writeRecipe('guarded.yaml', 'steps:\n  - id: send\n    prompt: send it\n    require_approval: true\n');

    const code = await runCommand(['guarded'], context({ approvalGate: async () => 'denied' }));

    expect(code).toBe(1);
    expect(lastJson()).toMatchObject({
      status: 'failed',
      steps: [{ step_id: 'send', error: { kind: 'ApprovalDenied', message: 'Step "send" was not approved' } }],
    });
  });
});

// ============================================================================
// 5. status
// ============================================================================

describe('statusCommand', () => {
  it('lists stored runs and shows one by id', async () => {
    await writeRecipe('greet.yaml', GREET);
    const ctx = context();
    await runCommand(['greet', '--var=who=Ada'], ctx);
    const runId = RunResultSchema.parse(lastJson()).run_id;

    expect(await statusCommand([], ctx)).toBe(0);
    expect(lastJson()).toEqual({
      runs: [
        {
          run_id: runId,
          recipe_name: 'greet',
          status: 'completed',
          started_at: expect.any(String),
          duration_ms: expect.any(Number),
        },
      ],
    });

    expect(await statusCommand([runId], ctx)).toBe(0);
    expect(lastJson()).toMatchObject({ run_id: runId, status: 'completed' });
  });

  it('filters by recipe', async () => {
    await writeRecipe('greet.yaml', GREET);
    const ctx = context();
    await runCommand(['greet', '--var=who=Ada'], ctx);

    expect(await statusCommand(['--recipe=other'], ctx)).toBe(0);
    expect(lastJson()).toEqual({ runs: [] });
  });

  it('reports an unknown run id', async () => {
    expect(await statusCommand(['wf_000000000000'], context())).toBe(1);
    expect(lastJson()).toEqual({ error: 'Unknown workflow run: wf_000000000000' });
  });

  it('rejects a bad --limit', async () => {
    expect(await statusCommand(['--limit=0'], context())).toBe(1);
    expect(lastJson()).toEqual({ error: 'Invalid --limit value: 0' });
  });

  it('fails when run history is disabled', async () => {
    expect(await statusCommand([], context({}, { runs_dir: null }))).toBe(1);
    expect(lastJson()).toEqual({ error: 'Run history is disabled (workflows.runs_dir is null)' });
  });
});
