import { Recipe } from "../types/recipe.js";
import {
  RecipeError,
  RecipeErrorType,
  Result,
  fail,
  ok,
} from "../types/errors.js";

/**
 * Ordered, in-memory collection of the recipes accepted in one session.
 * Positions are plain indexes and shift on remove/reorder.
 */
export class RecipeStore {
  private recipes: Recipe[] = [];

  add(recipe: Recipe): number {
    this.recipes.push(
      Object.freeze({
        ...recipe,
        ingredients: Object.freeze([...recipe.ingredients]),
        steps: Object.freeze([...recipe.steps]),
      })
    );
    return this.recipes.length - 1;
  }

  remove(index: number): Result<Recipe> {
    const invalid = this.checkIndex(index, "remove");
    if (invalid) return fail(invalid);

    const [removed] = this.recipes.splice(index, 1);
    return ok(removed);
  }

  reorder(fromIndex: number, toIndex: number): Result<void> {
    const invalid =
      this.checkIndex(fromIndex, "reorder") ??
      this.checkIndex(toIndex, "reorder");
    if (invalid) return fail(invalid);

    const [moved] = this.recipes.splice(fromIndex, 1);
    this.recipes.splice(toIndex, 0, moved);
    return ok(undefined);
  }

  all(): readonly Recipe[] {
    return [...this.recipes];
  }

  count(): number {
    return this.recipes.length;
  }

  clear(): void {
    this.recipes = [];
  }

  private checkIndex(index: number, operation: string): RecipeError | null {
    if (Number.isInteger(index) && index >= 0 && index < this.recipes.length) {
      return null;
    }
    return new RecipeError(
      `Cannot ${operation} position ${index}: store holds ${this.recipes.length} recipe(s)`,
      RecipeErrorType.INDEX_OUT_OF_RANGE,
      { index, count: this.recipes.length }
    );
  }
}
