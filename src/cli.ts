#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { z } from 'zod';
import { readRuntimeConfig, DEFAULT_CONFIG_PATH } from './config/index.js';
import { createLogger } from './logging/index.js';
import {
  extractFlag,
  hasFlag,
  listCommand,
  runCommand,
  statusCommand,
  validateCommand,
} from './cli/commands/recipe.js';
import type { CliContext } from './cli/commands/recipe.js';

const PackageInfoSchema = z.object({ name: z.string(), version: z.string() });

async function printVersion(): Promise<void> {
  const content = await readFile(new URL('../package.json', import.meta.url), 'utf-8');
  const pkg = PackageInfoSchema.parse(JSON.parse(content));

  console.log(`${pkg.name}  v${pkg.version}`);
  console.log(`Node.js        ${process.version}`);
  console.log(`Platform       ${process.platform} ${process.arch}`);
}

/**
 * Load the config named by --config (default: agent-recipes.json in the
 * working directory). Relative paths inside it resolve against the
 * config file's directory.
 */
async function createContext(args: string[]): Promise<CliContext> {
  const configPath = resolve(extractFlag(args, 'config') ?? DEFAULT_CONFIG_PATH);
  const config = await readRuntimeConfig(configPath);
  const logger = createLogger({
    level: hasFlag(args, 'verbose') ? 'debug' : config.logging.level,
    color: config.logging.color && Boolean(process.stderr.isTTY),
  });
  return { config, logger, baseDir: dirname(configPath) };
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === '--version' || command === '-V' || args.includes('--version') || args.includes('-V')) {
    await printVersion();
    return;
  }

  if (!command || command === 'help' || command === '--help' || command === '-h') {
    showHelp();
    return;
  }

  const commandArgs = args.slice(1);
  let exitCode: number;

  switch (command) {
    case 'list':
    case 'ls': {
      exitCode = await listCommand(commandArgs, await createContext(commandArgs));
      break;
    }

    case 'validate':
    case 'v': {
      exitCode = await validateCommand(commandArgs, await createContext(commandArgs));
      break;
    }

    case 'run':
    case 'r': {
      exitCode = await runCommand(commandArgs, await createContext(commandArgs));
      break;
    }

    case 'status':
    case 's': {
      exitCode = await statusCommand(commandArgs, await createContext(commandArgs));
      break;
    }

    default: {
      p.log.error(`Unknown command: ${command}`);
      showHelp();
      exitCode = 1;
    }
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

function showHelp() {
  console.log(`
${pc.bold('agent-recipes')} - Run multi-step agent workflows from recipe files

Usage:
  agent-recipes <command> [options]

Commands:
  list, ls            List recipes in the recipes directory
  validate, v         Validate recipes (all of them when none is named)
  run, r              Run a recipe and print its result
  status, s           Show a recorded run, or the most recent runs

Global Options:
  --config=<path>     Config file (default: ${DEFAULT_CONFIG_PATH})
  --pretty            Human-readable output instead of JSON
  --verbose           Log at debug level
  --version, -V       Show version information

Run Options:
  --var=<key>=<value> Template variable (repeatable)
  --vars=<json>       Template variables as a JSON object
  --approve-all       Approve every step that asks for approval

Status Options:
  --recipe=<name>     Only runs of this recipe
  --limit=<n>         Number of runs to show (default: 20)

Examples:
  agent-recipes list --pretty
  agent-recipes validate daily-digest
  agent-recipes run daily-digest --var=topic=release-notes --pretty
  agent-recipes status wf_0123456789ab

Recipes:
  Recipes are .yaml, .yml or .json files under workflows.path
  (default: workspace/workflows). Each run appends its events and its
  final result as JSON lines under workflows.runs_dir
  (default: workspace/runs).
`);
}

main().catch((err: unknown) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
