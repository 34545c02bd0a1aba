/**
 * `{name}` placeholder substitution for step prompts.
 *
 * Resolution order for a placeholder `{name}`:
 * 1. `vars[name]` (caller vars, workflow_name, run_id)
 * 2. `<stepId>_output` looked up in the outputs of succeeded steps
 *
 * Placeholders that resolve to nothing are left exactly as written, so a
 * run with failed steps still produces a readable prompt. `{{` and `}}`
 * render as literal braces. Rendering is a pure function of its arguments.
 */

const OUTPUT_SUFFIX = '_output';

// Names may start with a digit so `{1_output}` reaches a step with id "1"
const TOKEN = /\{\{|\}\}|\{([A-Za-z0-9_][A-Za-z0-9_.-]*)\}/g;

export type TemplateVars = Readonly<Record<string, unknown>>;

function stringify(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return JSON.stringify(value);
}

function resolve(
  name: string,
  vars: TemplateVars,
  outputs: ReadonlyMap<string, string>,
): string | undefined {
  if (Object.prototype.hasOwnProperty.call(vars, name)) {
    const value = stringify(vars[name]);
    if (value !== undefined) return value;
  }
  if (name.endsWith(OUTPUT_SUFFIX)) {
    return outputs.get(name.slice(0, -OUTPUT_SUFFIX.length));
  }
  return undefined;
}

/**
 * Substitute placeholders in a prompt template.
 *
 * @param outputs - step id -> output text, for succeeded steps only
 */
export function renderTemplate(
  template: string,
  vars: TemplateVars,
  outputs: ReadonlyMap<string, string> = new Map(),
): string {
  return template.replace(TOKEN, (token: string, name: string | undefined) => {
    if (token === '{{') return '{';
    if (token === '}}') return '}';
    if (name === undefined) return token;
    return resolve(name, vars, outputs) ?? token;
  });
}

/**
 * Names of all placeholders in a template, in first-seen order.
 */
export function findPlaceholders(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(TOKEN)) {
    if (match[1] !== undefined) names.add(match[1]);
  }
  return [...names];
}

/**
 * Step id referenced by a `{<id>_output}` placeholder, or null.
 */
export function outputReference(placeholder: string): string | null {
  return placeholder.endsWith(OUTPUT_SUFFIX) && placeholder.length > OUTPUT_SUFFIX.length
    ? placeholder.slice(0, -OUTPUT_SUFFIX.length)
    : null;
}
