/**
 * Runtime config file reader with Zod validation.
 *
 * Reads the JSON config file, parses it through RuntimeConfigSchema, and
 * returns a fully populated config. Missing file = all defaults. Invalid
 * input = RuntimeConfigError naming the offending field paths.
 *
 * @module config/reader
 */

import { readFile } from 'node:fs/promises';
import { RuntimeConfigSchema, DEFAULT_RUNTIME_CONFIG } from './schema.js';
import type { RuntimeConfig } from './schema.js';

/** Default path for the runtime config file, relative to the working directory. */
export const DEFAULT_CONFIG_PATH = 'agent-recipes.json';

export class RuntimeConfigError extends Error {
  override name = 'RuntimeConfigError' as const;

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string[] {
  return issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Read and validate the runtime config from disk.
 *
 * @throws {RuntimeConfigError} On invalid JSON or validation failure
 */
export async function readRuntimeConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
): Promise<RuntimeConfig> {
  let content: string;

  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return DEFAULT_RUNTIME_CONFIG;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new RuntimeConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  const result = RuntimeConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new RuntimeConfigError(
      `Config validation failed:\n${formatIssues(result.error.issues).join('\n')}`,
      result.error.issues[0]?.path.join('.'),
    );
  }

  return result.data;
}

/**
 * Validate raw input against the config schema without touching the filesystem.
 */
export function validateRuntimeConfig(
  raw: unknown,
): { valid: true; config: RuntimeConfig } | { valid: false; errors: string[] } {
  const result = RuntimeConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data };
  }

  return { valid: false, errors: formatIssues(result.error.issues) };
}
