import { z } from "zod";

export type SourceKind = "image" | "text";

export const UNTITLED_RECIPE = "Untitled Recipe";

/**
 * Core recipe representation used throughout the application. Accepted
 * recipes are never edited in place; review and normalization build new ones.
 */
export interface Recipe {
  readonly title: string;
  readonly ingredients: readonly string[];
  readonly steps: readonly string[];
  readonly sourceKind: SourceKind;
}

/**
 * What the parser pulls out of a model response, before cleanup.
 * `title` is null when no title line could be identified.
 */
export interface CandidateRecipe {
  title: string | null;
  ingredients: string[];
  steps: string[];
  sourceKind: SourceKind;
}

export const RecipeSchema = z.object({
  title: z.string(),
  ingredients: z.array(z.string()).default([]),
  steps: z.array(z.string()).default([]),
  sourceKind: z.enum(["image", "text"]).default("text"),
});

export const CookbookSchema = z.object({
  title: z.string(),
  recipes: z.array(RecipeSchema),
});

export interface Cookbook {
  title: string;
  recipes: readonly Recipe[];
}

export interface RecipeImportOptions {
  review: boolean;
  arrange: boolean;
}
