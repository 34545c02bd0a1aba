/**
 * Finds recipe files in the recipes directory.
 *
 * A recipe reference is either a bare name (`daily-digest`, looked up as
 * daily-digest.yaml, .yml, then .json) or a path to a recipe file. Names
 * never resolve outside the recipes directory.
 */

import { readdir, stat } from 'node:fs/promises';
import { basename, extname, isAbsolute, join, resolve } from 'node:path';
import type { Recipe } from './types.js';
import { RECIPE_EXTENSIONS, parseRecipeFile } from './recipe-parser.js';
import { RecipeNotFoundError } from './errors.js';

export interface RecipeEntry {
  name: string;
  path: string;
}

const SAFE_NAME = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return false;
    throw err;
  }
}

function hasRecipeExtension(file: string): boolean {
  return RECIPE_EXTENSIONS.some((ext) => ext === extname(file).toLowerCase());
}

export class RecipeRepository {
  readonly recipesDir: string;

  constructor(recipesDir: string) {
    this.recipesDir = resolve(recipesDir);
  }

  /**
   * Path of the recipe file a reference points at.
   *
   * @throws {RecipeNotFoundError} When no matching file exists
   */
  async resolve(reference: string): Promise<string> {
    const ref = reference.trim();

    if (hasRecipeExtension(ref) && (isAbsolute(ref) || ref.includes('/') || ref.includes('\\'))) {
      const path = resolve(ref);
      if (await isFile(path)) return path;
      throw new RecipeNotFoundError(reference);
    }

    if (!SAFE_NAME.test(ref)) {
      throw new RecipeNotFoundError(reference);
    }

    const candidates = hasRecipeExtension(ref)
      ? [join(this.recipesDir, ref)]
      : RECIPE_EXTENSIONS.map((ext) => join(this.recipesDir, `${ref}${ext}`));

    for (const candidate of candidates) {
      if (await isFile(candidate)) return candidate;
    }
    throw new RecipeNotFoundError(reference);
  }

  /**
   * Resolve and parse a recipe.
   *
   * @throws {RecipeNotFoundError} When no matching file exists
   * @throws {RecipeError} When the file does not hold a valid recipe
   */
  async load(reference: string): Promise<Recipe> {
    return parseRecipeFile(await this.resolve(reference));
  }

  /** Recipe files in the recipes directory, sorted by name. Missing dir = none. */
  async list(): Promise<RecipeEntry[]> {
    let files: string[];
    try {
      files = await readdir(this.recipesDir);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
      throw err;
    }

    const entries: RecipeEntry[] = [];
    const seen = new Set<string>();
    // Sorted so .yaml wins over .yml and .json for the same stem, as in resolve()
    const ordered = files
      .filter(hasRecipeExtension)
      .sort((a, b) => {
        const byStem = basename(a, extname(a)).localeCompare(basename(b, extname(b)));
        if (byStem !== 0) return byStem;
        return (
          RECIPE_EXTENSIONS.findIndex((ext) => ext === extname(a).toLowerCase()) -
          RECIPE_EXTENSIONS.findIndex((ext) => ext === extname(b).toLowerCase())
        );
      });

    for (const file of ordered) {
      const path = join(this.recipesDir, file);
      const name = basename(file, extname(file));
      if (seen.has(name) || !(await isFile(path))) continue;
      seen.add(name);
      entries.push({ name, path });
    }
    return entries;
  }
}
