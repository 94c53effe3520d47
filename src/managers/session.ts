import { Recipe } from "../types/recipe.js";
import { Result, ok } from "../types/errors.js";
import {
  ExtractOptions,
  ExtractedRecipe,
  RecipeInput,
  RecipeReader,
  extractRecipe,
} from "../utils/extract.js";
import { RenderOptions, renderCookbook } from "../utils/render.js";
import { RecipeStore } from "./store.js";

export interface IngestResult extends ExtractedRecipe {
  index: number;
}

/**
 * One cookbook-building session: a reader for the external model and the
 * store that collects what it accepts. Inputs are taken one at a time.
 */
export class CookbookSession {
  constructor(
    private reader: RecipeReader,
    private options: ExtractOptions,
    readonly store: RecipeStore = new RecipeStore()
  ) {}

  /** Runs the pipeline for one input without touching the store. */
  extract(input: RecipeInput): Promise<Result<ExtractedRecipe>> {
    return extractRecipe(this.reader, input, this.options);
  }

  accept(recipe: Recipe): number {
    return this.store.add(recipe);
  }

  async ingest(input: RecipeInput): Promise<Result<IngestResult>> {
    const extracted = await this.extract(input);
    if (!extracted.ok) return extracted;

    const index = this.accept(extracted.value.recipe);
    return ok({ ...extracted.value, index });
  }

  ingestText(text: string, filename?: string): Promise<Result<IngestResult>> {
    return this.ingest({ kind: "text", text, filename });
  }

  recipes(): readonly Recipe[] {
    return this.store.all();
  }

  render(options: RenderOptions = {}): string {
    return renderCookbook(this.store.all(), options);
  }

  end(): void {
    this.store.clear();
  }
}
