/**
 * CLI handlers for workflow recipes.
 *
 * Commands:
 * - list: recipes in the recipes directory with their mode and step count
 * - validate: load recipes and report every problem plus template warnings
 * - run: run a recipe to completion and print its RunResult
 * - status: show a stored run result, or the most recent runs
 *
 * Output is JSON by default for scripting; --pretty prints for humans.
 * Failures print { error } JSON and return exit code 1.
 */

import { isAbsolute, resolve } from 'node:path';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { Logger } from '../../logging/logger.js';
import type { RuntimeConfig } from '../../config/schema.js';
import {
  RecipeError,
  RecipeRepository,
  RunStore,
  WorkflowRuntime,
  describeError,
  findTemplateWarnings,
  validateRecipe,
} from '../../workflow-runtime/index.js';
import type {
  ApprovalGate,
  ApprovalQueue,
  ApprovalRequestHandler,
  PendingApproval,
  RunResult,
  StepCallback,
  StepResult,
} from '../../workflow-runtime/index.js';
import { createCommandAgent } from '../../agents/command-agent.js';

// ============================================================================
// Argument parsing helpers
// ============================================================================

/**
 * Extract a flag value from args in --key=value format. The last
 * occurrence wins.
 */
export function extractFlag(args: string[], flag: string): string | undefined {
  const prefix = `--${flag}=`;
  const arg = args.filter((a) => a.startsWith(prefix)).pop();
  return arg ? arg.slice(prefix.length) : undefined;
}

/**
 * Check if a boolean flag is present in args.
 */
export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(`--${flag}`);
}

/** Arguments that are not flags. */
export function positionals(args: string[]): string[] {
  return args.filter((a) => !a.startsWith('--'));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collect template vars: --vars=<json object> first, then each
 * --var=key=value on top of it.
 *
 * @throws Error when --vars is not a JSON object or a --var has no key
 */
export function parseVars(args: string[]): Record<string, unknown> {
  const vars: Record<string, unknown> = {};

  const json = extractFlag(args, 'vars');
  if (json !== undefined) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch {
      throw new Error('Invalid JSON in --vars flag');
    }
    if (!isRecord(parsed)) {
      throw new Error('--vars must be a JSON object');
    }
    Object.assign(vars, parsed);
  }

  for (const arg of args) {
    if (!arg.startsWith('--var=')) continue;
    const pair = arg.slice('--var='.length);
    const eq = pair.indexOf('=');
    const key = (eq === -1 ? pair : pair.slice(0, eq)).trim();
    if (!key) {
      throw new Error(`Invalid --var flag: "${arg}" (expected --var=key=value)`);
    }
    vars[key] = eq === -1 ? '' : pair.slice(eq + 1);
  }

  return vars;
}

// ============================================================================
// Shared context
// ============================================================================

export interface CliContext {
  config: RuntimeConfig;
  logger: Logger;
  /** Directory relative config paths resolve against */
  baseDir: string;
  /** Replaces the configured agent command, mainly for tests */
  callback?: StepCallback;
  /** Replaces the terminal approval prompt, mainly for tests */
  approvalGate?: ApprovalGate;
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function printError(err: unknown): void {
  if (err instanceof RecipeError) {
    printJson({
      error: err.message,
      issues: err.issues,
      ...(err.stepId !== undefined ? { step_id: err.stepId } : {}),
    });
    return;
  }
  printJson({ error: describeError(err) });
}

function repositoryFor(ctx: CliContext): RecipeRepository {
  return new RecipeRepository(resolve(ctx.baseDir, ctx.config.workflows.path));
}

// ============================================================================
// Approval prompt
// ============================================================================

/**
 * Answers approval requests for terminal runs. With --approve-all every
 * step is approved; without a TTY every step is denied; otherwise the user
 * is asked, one question at a time. Requests that time out or are
 * cancelled while queued behind another question are not asked.
 */
export function createCliApprovalHandler(options: {
  approveAll: boolean;
  interactive: boolean;
  logger: Logger;
}): ApprovalRequestHandler {
  let prompts: Promise<void> = Promise.resolve();

  const ask = async (approval: PendingApproval, queue: ApprovalQueue): Promise<void> => {
    if (!queue.isPending(approval.id)) return;
    p.note(approval.prompt_preview, `Approval needed: ${approval.recipe_name} / ${approval.step_id}`);
    const answer = await p.confirm({ message: `Run step "${approval.step_id}"?` });
    queue.resolve(approval.id, !p.isCancel(answer) && answer === true ? 'approved' : 'denied');
  };

  return (approval, queue) => {
    if (options.approveAll) {
      queue.resolve(approval.id, 'approved');
      return;
    }
    if (!options.interactive) {
      options.logger.warn(
        `Step ${approval.step_id} needs approval but there is no terminal to ask; denying (use --approve-all)`,
      );
      queue.resolve(approval.id, 'denied');
      return;
    }

    prompts = prompts
      .then(() => ask(approval, queue))
      .catch((err: unknown) => {
        options.logger.warn(`Approval prompt failed for step ${approval.step_id}`, {
          error: describeError(err),
        });
        queue.resolve(approval.id, 'denied');
      });
  };
}

// ============================================================================
// list
// ============================================================================

export async function listCommand(args: string[], ctx: CliContext): Promise<number> {
  const pretty = hasFlag(args, 'pretty');

  try {
    const repository = repositoryFor(ctx);
    const entries = await repository.list();

    const recipes: Array<{
      name: string;
      path: string;
      mode?: string;
      steps?: number;
      description?: string;
      error?: string;
    }> = [];

    for (const entry of entries) {
      try {
        const recipe = await repository.load(entry.path);
        recipes.push({
          name: entry.name,
          path: entry.path,
          mode: recipe.mode,
          steps: recipe.steps.length,
          ...(recipe.description !== undefined ? { description: recipe.description } : {}),
        });
      } catch (err) {
        recipes.push({ name: entry.name, path: entry.path, error: describeError(err) });
      }
    }

    if (!pretty) {
      printJson({ recipes });
      return 0;
    }

    if (recipes.length === 0) {
      console.log(`No recipes found in ${repository.recipesDir}`);
      return 0;
    }
    console.log('Recipes:');
    for (const r of recipes) {
      if (r.error !== undefined) {
        console.log(`  ${pc.red(r.name)} ${pc.dim(`(invalid: ${r.error})`)}`);
        continue;
      }
      const desc = r.description ? ` - ${r.description}` : '';
      console.log(`  ${pc.bold(r.name)}${desc} ${pc.dim(`(${r.mode}, ${r.steps} steps)`)}`);
    }
    return 0;
  } catch (err) {
    printError(err);
    return 1;
  }
}

// ============================================================================
// validate
// ============================================================================

interface ValidationReport {
  recipe: string;
  valid: boolean;
  path?: string;
  mode?: string;
  execution_order?: string[];
  errors: string[];
  warnings: string[];
}

async function validateOne(repository: RecipeRepository, reference: string): Promise<ValidationReport> {
  let path: string;
  try {
    path = await repository.resolve(reference);
  } catch (err) {
    return { recipe: reference, valid: false, errors: [describeError(err)], warnings: [] };
  }

  try {
    const recipe = await repository.load(path);
    const order =
      recipe.mode === 'dag'
        ? (validateRecipe(recipe).executionOrder ?? [])
        : recipe.steps.map((s) => s.id);
    return {
      recipe: recipe.name,
      valid: true,
      path,
      mode: recipe.mode,
      execution_order: order,
      errors: [],
      warnings: findTemplateWarnings(recipe),
    };
  } catch (err) {
    const errors = err instanceof RecipeError ? err.issues : [describeError(err)];
    return { recipe: reference, valid: false, path, errors, warnings: [] };
  }
}

/**
 * Validate the named recipes, or every recipe when none is named.
 * Exit code 1 when any recipe is invalid.
 */
export async function validateCommand(args: string[], ctx: CliContext): Promise<number> {
  const pretty = hasFlag(args, 'pretty');

  try {
    const repository = repositoryFor(ctx);
    const names = positionals(args);
    const references = names.length > 0 ? names : (await repository.list()).map((e) => e.path);

    const reports: ValidationReport[] = [];
    for (const reference of references) {
      reports.push(await validateOne(repository, reference));
    }
    const allValid = reports.every((r) => r.valid);

    if (!pretty) {
      printJson({ valid: allValid, recipes: reports });
      return allValid ? 0 : 1;
    }

    if (reports.length === 0) {
      console.log(`No recipes found in ${repository.recipesDir}`);
    }
    for (const report of reports) {
      const mark = report.valid ? pc.green('valid') : pc.red('invalid');
      console.log(`${pc.bold(report.recipe)}: ${mark}`);
      for (const error of report.errors) console.log(`  ${pc.red('error')} ${error}`);
      for (const warning of report.warnings) console.log(`  ${pc.yellow('warn')}  ${warning}`);
      if (report.execution_order) {
        console.log(pc.dim(`  order: ${report.execution_order.join(' -> ')}`));
      }
    }
    return allValid ? 0 : 1;
  } catch (err) {
    printError(err);
    return 1;
  }
}

// ============================================================================
// run
// ============================================================================

const STATUS_COLOR: Record<StepResult['status'], (s: string) => string> = {
  succeeded: pc.green,
  failed: pc.red,
  skipped: pc.yellow,
  cancelled: pc.yellow,
  pending: pc.dim,
  running: pc.cyan,
  awaiting_approval: pc.cyan,
};

function printRunPretty(result: RunResult): void {
  const status =
    result.status === 'completed' ? pc.green(result.status) : pc.red(result.status);
  console.log(
    `${pc.bold(result.recipe_name)} ${pc.dim(`(${result.mode})`)} ${status} in ${result.duration_ms}ms ${pc.dim(result.run_id)}`,
  );
  for (const step of result.steps) {
    const attempts = step.attempt_count === 1 ? '1 attempt' : `${step.attempt_count} attempts`;
    const reason = step.error ? `: ${step.error.kind}: ${step.error.message}` : '';
    console.log(`  ${STATUS_COLOR[step.status](step.status.padEnd(9))} ${step.step_id} ${pc.dim(`(${attempts})`)}${reason}`);
    if (step.output !== null) {
      for (const line of step.output.split('\n')) {
        console.log(pc.dim(`      ${line}`));
      }
    }
  }
}

/**
 * Agent command with a relative path (`./scripts/agent.sh`) resolved against
 * the config directory. Bare names are left for PATH lookup.
 */
export function resolveAgentCommand(command: string, baseDir: string): string {
  if (isAbsolute(command) || !/[\\/]/.test(command)) return command;
  return resolve(baseDir, command);
}

function resolveCallback(ctx: CliContext): StepCallback | null {
  if (ctx.callback) return ctx.callback;
  const { command, args } = ctx.config.agent;
  return command ? createCommandAgent({ command: resolveAgentCommand(command, ctx.baseDir), args }) : null;
}

/**
 * Run a recipe and wait for it. Ctrl-C cancels the run; steps already
 * talking to the agent finish first. Exit code 0 only for a completed run.
 */
export async function runCommand(args: string[], ctx: CliContext): Promise<number> {
  const pretty = hasFlag(args, 'pretty');
  const recipeName = positionals(args)[0];

  if (!recipeName) {
    printJson({
      error: 'Recipe name is required',
      help: 'Usage: agent-recipes run <recipe> [--var=key=value] [--vars=<json>]',
    });
    return 1;
  }

  const callback = resolveCallback(ctx);
  if (!callback) {
    printJson({ error: 'No agent command configured (set agent.command in the config file)' });
    return 1;
  }

  let onSigint: (() => void) | undefined;
  try {
    const vars = parseVars(args);
    const runtime = WorkflowRuntime.fromConfig(ctx.config, {
      callback,
      approvalGate: ctx.approvalGate,
      onApprovalRequest: createCliApprovalHandler({
        approveAll: hasFlag(args, 'approve-all'),
        interactive: Boolean(process.stdin.isTTY && process.stdout.isTTY),
        logger: ctx.logger,
      }),
      logger: ctx.logger,
      baseDir: ctx.baseDir,
    });

    const runId = await runtime.submit({
      recipeName,
      vars,
      callerContext: { channel: 'cli', chat_id: 'cli' },
    });

    const sigint = (): void => {
      if (runtime.cancel(runId)) {
        ctx.logger.warn(`Cancelling run ${runId}; waiting for in-flight steps`);
      }
    };
    onSigint = sigint;
    process.on('SIGINT', sigint);

    const result = await runtime.waitForRun(runId);
    await runtime.flush();

    if (pretty) {
      printRunPretty(result);
    } else {
      printJson(result);
    }
    return result.status === 'completed' ? 0 : 1;
  } catch (err) {
    printError(err);
    return 1;
  } finally {
    if (onSigint) process.off('SIGINT', onSigint);
  }
}

// ============================================================================
// status
// ============================================================================

/**
 * Show one stored run (`status <run_id>`) or the most recent runs
 * (`status [--recipe=<name>] [--limit=<n>]`).
 */
export async function statusCommand(args: string[], ctx: CliContext): Promise<number> {
  const pretty = hasFlag(args, 'pretty');
  const runsDir = ctx.config.workflows.runs_dir;

  if (runsDir === null) {
    printJson({ error: 'Run history is disabled (workflows.runs_dir is null)' });
    return 1;
  }

  try {
    const store = new RunStore(resolve(ctx.baseDir, runsDir), ctx.logger);
    const runId = positionals(args)[0];

    if (runId) {
      const result = await store.getRun(runId);
      if (!result) {
        printJson({ error: `Unknown workflow run: ${runId}` });
        return 1;
      }
      if (pretty) {
        printRunPretty(result);
      } else {
        printJson(result);
      }
      return 0;
    }

    const limitFlag = extractFlag(args, 'limit');
    const limit = limitFlag === undefined ? 20 : Number.parseInt(limitFlag, 10);
    if (!Number.isInteger(limit) || limit < 1) {
      printJson({ error: `Invalid --limit value: ${limitFlag ?? ''}` });
      return 1;
    }

    const recipeName = extractFlag(args, 'recipe');
    const runs = await store.listRuns({ limit, ...(recipeName ? { recipeName } : {}) });
    const summaries = runs.map((r) => ({
      run_id: r.run_id,
      recipe_name: r.recipe_name,
      status: r.status,
      started_at: r.started_at,
      duration_ms: r.duration_ms,
    }));

    if (!pretty) {
      printJson({ runs: summaries });
      return 0;
    }

    if (summaries.length === 0) {
      console.log('No runs recorded yet.');
      return 0;
    }
    for (const run of summaries) {
      const status = run.status === 'completed' ? pc.green(run.status) : pc.red(run.status);
      console.log(`${run.run_id}  ${run.recipe_name}  ${status}  ${pc.dim(run.started_at)}`);
    }
    return 0;
  } catch (err) {
    printError(err);
    return 1;
  }
}
