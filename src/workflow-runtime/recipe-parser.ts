/**
 * Recipe loading: YAML/JSON parsing, schema validation, and graph checks.
 *
 * Entry points:
 * - loadRecipe(raw): validate an already-parsed object into a Recipe
 * - parseRecipeText(content, format): parse YAML or JSON text into a Recipe
 * - parseRecipeFile(filePath): read a .yaml/.yml/.json file into a Recipe
 *
 * All three throw RecipeError on any problem, so a recipe that loads is a
 * recipe that can run. YAML is loaded with JSON_SCHEMA (no executable tags).
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { load, JSON_SCHEMA } from 'js-yaml';
import { RecipeFileSchema } from './types.js';
import type { Recipe, RecipeStep, RecipeMode } from './types.js';
import { RecipeError, describeError } from './errors.js';
import { collectRecipeIssues } from './recipe-validator.js';

export type RecipeFormat = 'yaml' | 'json';

/** File extensions recognised as recipes, in lookup order. */
export const RECIPE_EXTENSIONS = ['.yaml', '.yml', '.json'] as const;

// ============================================================================
// Alias folding
// ============================================================================

const RECIPE_ALIASES: Record<string, string> = {
  maxParallel: 'max_parallel',
};

const STEP_ALIASES: Record<string, string> = {
  dependsOn: 'depends_on',
  retryMaxAttempts: 'retry_max_attempts',
  retryBackoffMs: 'retry_backoff_ms',
  requireApproval: 'require_approval',
  onFailure: 'on_failure',
  message: 'prompt',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy aliased keys onto their canonical names. The canonical spelling wins
 * when both are present.
 */
function foldAliases(raw: Record<string, unknown>, aliases: Record<string, string>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...raw };
  for (const [alias, canonical] of Object.entries(aliases)) {
    if (alias in out) {
      if (out[canonical] === undefined) {
        out[canonical] = out[alias];
      }
      delete out[alias];
    }
  }
  return out;
}

function normalizeRaw(raw: Record<string, unknown>): Record<string, unknown> {
  const recipe = foldAliases(raw, RECIPE_ALIASES);
  if (Array.isArray(recipe.steps)) {
    recipe.steps = recipe.steps.map((step: unknown) =>
      isRecord(step) ? foldAliases(step, STEP_ALIASES) : step,
    );
  }
  return recipe;
}

// ============================================================================
// loadRecipe
// ============================================================================

/** Positional id for a step declared without one (1-based). */
export function defaultStepId(index: number): string {
  return `step-${index + 1}`;
}

function stepIdAt(raw: Record<string, unknown>, index: number): string {
  const steps = raw.steps;
  if (Array.isArray(steps)) {
    const step: unknown = steps[index];
    if (isRecord(step) && typeof step.id === 'number') return String(step.id);
    if (isRecord(step) && typeof step.id === 'string' && step.id.trim()) {
      return step.id.trim();
    }
  }
  return defaultStepId(index);
}

/**
 * Validate a parsed recipe object.
 *
 * @param raw - Parsed YAML/JSON value
 * @param fallbackName - Name used when the recipe has none (usually the file stem)
 * @throws {RecipeError} Listing every schema or graph problem found
 */
export function loadRecipe(raw: unknown, fallbackName = 'workflow'): Recipe {
  if (!isRecord(raw)) {
    throw new RecipeError('Workflow recipe must be an object');
  }

  const normalized = normalizeRaw(raw);
  const parsed = RecipeFileSchema.safeParse(normalized);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    const [section, index] = parsed.error.issues[0]?.path ?? [];
    const stepId =
      section === 'steps' && typeof index === 'number' ? stepIdAt(normalized, index) : undefined;
    throw new RecipeError(`Invalid workflow recipe: ${issues[0]}`, issues, stepId);
  }

  const file = parsed.data;

  const steps: RecipeStep[] = file.steps.map((input, index) => {
    const step: RecipeStep = {
      id: input.id ?? defaultStepId(index),
      prompt: input.prompt,
      depends_on: Object.freeze([...new Set(input.depends_on)]),
      retry_max_attempts: input.retry_max_attempts,
      retry_backoff_ms: input.retry_backoff_ms,
      require_approval: input.require_approval,
      on_failure: input.on_failure,
      ...(input.description !== undefined ? { description: input.description } : {}),
      ...(input.agent !== undefined ? { agent: input.agent } : {}),
    };
    return Object.freeze(step);
  });

  const issues = collectRecipeIssues(steps);

  const mode: RecipeMode = file.mode ?? (steps.some((s) => s.depends_on.length > 0) ? 'dag' : 'linear');

  // Linear runs follow declaration order, so a dependency has to come first
  if (mode === 'linear' && issues.length === 0) {
    const position = new Map(steps.map((s, i) => [s.id, i]));
    steps.forEach((step, index) => {
      for (const dep of step.depends_on) {
        if ((position.get(dep) ?? -1) > index) {
          issues.push({
            stepId: step.id,
            message: `Step "${step.id}" depends on later step "${dep}", which a linear recipe cannot honor`,
          });
        }
      }
    });
  }

  if (issues.length > 0) {
    throw new RecipeError(
      issues[0].message,
      issues.map((i) => i.message),
      issues[0].stepId,
    );
  }

  return Object.freeze({
    name: file.name ?? fallbackName,
    mode,
    max_parallel: file.max_parallel,
    metadata: Object.freeze({ ...file.metadata }),
    steps: Object.freeze(steps),
    ...(file.description !== undefined ? { description: file.description } : {}),
  });
}

// ============================================================================
// Text and file parsing
// ============================================================================

/**
 * Parse recipe text.
 *
 * @throws {RecipeError} On a syntax error or any validation problem
 */
export function parseRecipeText(content: string, format: RecipeFormat, fallbackName?: string): Recipe {
  if (!content.trim()) {
    throw new RecipeError('Workflow recipe is empty');
  }

  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(content) : load(content, { schema: JSON_SCHEMA });
  } catch (err) {
    throw new RecipeError(`Invalid ${format.toUpperCase()} in workflow recipe: ${describeError(err)}`);
  }

  return loadRecipe(raw, fallbackName);
}

export function recipeFormatFor(filePath: string): RecipeFormat {
  return extname(filePath).toLowerCase() === '.json' ? 'json' : 'yaml';
}

/**
 * Read and parse a recipe file. The file stem is the fallback recipe name.
 *
 * @throws {RecipeError} On invalid content; filesystem errors propagate as-is
 */
export async function parseRecipeFile(filePath: string): Promise<Recipe> {
  const content = await readFile(filePath, 'utf-8');
  const stem = basename(filePath, extname(filePath));
  return parseRecipeText(content, recipeFormatFor(filePath), stem);
}
