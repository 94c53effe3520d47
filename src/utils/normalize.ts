import {
  CandidateRecipe,
  Recipe,
  UNTITLED_RECIPE,
} from "../types/recipe.js";
import {
  RecipeError,
  RecipeErrorType,
  Result,
  fail,
  ok,
} from "../types/errors.js";
import { matchSectionHeader, stripListMarker } from "./parser.js";

const HAS_CONTENT = /[\p{L}\p{N}]/u;

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function cleanLine(line: string): string {
  return collapseWhitespace(stripListMarker(collapseWhitespace(line)));
}

/**
 * A line left over from markup rather than recipe content: a lone bullet,
 * a rule of dashes, or a section header the model echoed into a list.
 */
function isArtifact(line: string): boolean {
  if (!HAS_CONTENT.test(line)) return true;
  const header = matchSectionHeader(line);
  return header !== null && header.remainder === "";
}

function cleanList(lines: readonly string[]): string[] {
  return lines.map(cleanLine).filter((line) => line && !isArtifact(line));
}

function cleanTitle(title: string | null): string {
  if (title === null) return UNTITLED_RECIPE;
  const cleaned = collapseWhitespace(title);
  return HAS_CONTENT.test(cleaned) ? cleaned : UNTITLED_RECIPE;
}

/**
 * Cleans a parsed (or hand-edited) recipe and enforces the minimal-field rule: a recipe
 * needs at least one ingredient or one step to be kept.
 *
 * @param raw - the model text the candidate came from, attached to the
 * error so the caller can offer it for manual correction
 */
export function normalizeRecipe(
  candidate: CandidateRecipe | Recipe,
  raw?: string
): Result<Recipe> {
  const recipe: Recipe = {
    title: cleanTitle(candidate.title),
    ingredients: cleanList(candidate.ingredients),
    steps: cleanList(candidate.steps),
    sourceKind: candidate.sourceKind,
  };

  if (recipe.ingredients.length === 0 && recipe.steps.length === 0) {
    return fail(
      new RecipeError(
        `"${recipe.title}" has no ingredients or steps`,
        RecipeErrorType.INSUFFICIENT_CONTENT,
        { title: recipe.title, sourceKind: recipe.sourceKind, raw }
      )
    );
  }

  return ok(recipe);
}
