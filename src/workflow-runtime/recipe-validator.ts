/**
 * Validates the step graph of a recipe.
 *
 * Checks, in this order:
 * 1. Step ids are unique
 * 2. No step depends on itself
 * 3. Every `depends_on` entry names a step in the recipe
 * 4. No circular dependencies between steps (via RecipeDAG)
 *
 * Returns every problem found, plus the topological execution order when
 * the graph is valid.
 */

import type { Recipe, RecipeStep, RecipeValidationResult } from './types.js';
import { RecipeDAG } from './recipe-dag.js';
import { findPlaceholders, outputReference } from './template-renderer.js';

export interface RecipeIssue {
  /** Step the problem is reported against */
  stepId: string;
  message: string;
}

type GraphStep = Pick<RecipeStep, 'id' | 'depends_on'>;

/**
 * Collect structural issues in declaration order. The first issue names
 * the first offending step.
 */
export function collectRecipeIssues(steps: readonly GraphStep[]): RecipeIssue[] {
  const issues: RecipeIssue[] = [];
  const seen = new Set<string>();

  for (const step of steps) {
    if (seen.has(step.id)) {
      issues.push({
        stepId: step.id,
        message: `Workflow step ids must be unique. Duplicate: "${step.id}"`,
      });
    }
    seen.add(step.id);
  }

  for (const step of steps) {
    for (const dep of step.depends_on) {
      if (dep === step.id) {
        issues.push({ stepId: step.id, message: `Step "${step.id}" cannot depend on itself` });
      } else if (!seen.has(dep)) {
        issues.push({ stepId: step.id, message: `Step "${step.id}" depends on unknown step "${dep}"` });
      }
    }
  }

  // Self edges would show up again as one-node cycles
  if (issues.length === 0) {
    const cycle = RecipeDAG.fromSteps(steps).detectCycles().cycle;
    if (cycle && cycle.length > 0) {
      issues.push({
        stepId: cycle[0],
        message: `Workflow recipe contains cyclic dependencies between steps: ${cycle.join(', ')}`,
      });
    }
  }

  return issues;
}

/**
 * Validate a recipe's step graph for structural and referential correctness.
 */
export function validateRecipe(recipe: { steps: readonly GraphStep[] }): RecipeValidationResult {
  const issues = collectRecipeIssues(recipe.steps);

  if (issues.length > 0) {
    return { valid: false, errors: issues.map((i) => i.message), executionOrder: null };
  }

  const result = RecipeDAG.fromSteps(recipe.steps).detectCycles();
  return { valid: true, errors: [], executionOrder: result.topologicalOrder ?? null };
}

/**
 * Warn about `{<id>_output}` placeholders naming a step that does not run
 * before the step using them. Such placeholders always render verbatim.
 * References to ids that are not steps are left alone; they may be vars.
 */
export function findTemplateWarnings(recipe: Pick<Recipe, 'mode' | 'steps'>): string[] {
  const ids = new Set(recipe.steps.map((s) => s.id));
  const dag = RecipeDAG.fromSteps(recipe.steps);
  const warnings: string[] = [];

  recipe.steps.forEach((step, index) => {
    const upstream = new Set(
      recipe.mode === 'linear'
        ? recipe.steps.slice(0, index).map((s) => s.id)
        : dag.transitivePredecessors(step.id),
    );

    for (const placeholder of findPlaceholders(step.prompt)) {
      const ref = outputReference(placeholder);
      if (ref === null || !ids.has(ref) || upstream.has(ref)) continue;
      warnings.push(
        `Step "${step.id}" uses {${placeholder}}, but step "${ref}" does not run before it`,
      );
    }
  });

  return warnings;
}
