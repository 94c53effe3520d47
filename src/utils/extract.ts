import * as fs from "fs/promises";
import path from "path";
import { Recipe } from "../types/recipe.js";
import {
  RecipeError,
  RecipeErrorType,
  Result,
  fail,
  ok,
} from "../types/errors.js";
import { ParseOutcome, parseResponse } from "./parser.js";
import { normalizeRecipe } from "./normalize.js";
import { prepareImage } from "./image.js";

export type ImageMediaType =
  | "image/jpeg"
  | "image/png"
  | "image/gif"
  | "image/webp";

export type RecipeInput =
  | { kind: "image"; data: Buffer; mediaType: ImageMediaType; filename: string }
  | { kind: "text"; text: string; filename?: string };

/**
 * The external model. Hands back whatever text the model produced for the
 * input; failures surface as rejections.
 */
export interface RecipeReader {
  read(input: RecipeInput, signal: AbortSignal): Promise<string>;
}

export interface ExtractOptions {
  timeoutMs: number;
  retries: number;
  retryDelayMs?: number;
}

export interface ExtractedRecipe {
  recipe: Recipe;
  raw: string;
  outcome: Exclude<ParseOutcome["kind"], "empty">;
}

const IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".gif", ".webp"];

const TEXT_EXTENSIONS = [".txt", ".text", ".md"];

export class TimeoutError extends Error {
  constructor(public timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export function describeInput(input: RecipeInput): string {
  return input.filename ?? "pasted text";
}

export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function errorStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("status" in error)) {
    return undefined;
  }
  return typeof error.status === "number" ? error.status : undefined;
}

/**
 * Timeouts, dropped connections, rate limits and server errors are worth
 * another attempt; a rejected request (bad key, bad input) is not.
 */
export function isRetryable(error: unknown): boolean {
  const status = errorStatus(error);
  if (status === undefined) return true;
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

export async function processWithRetry<T>(
  operation: () => Promise<T>,
  maxRetries = 3,
  delayMs = 1000,
  shouldRetry: (error: unknown) => boolean = () => true
): Promise<T> {
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (!shouldRetry(error)) break;
      if (attempt <= maxRetries && delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, attempt * delayMs));
      }
    }
  }

  throw lastError;
}

/**
 * Runs one input through the model, the parser and the normalizer. The
 * parser is never invoked when the model call fails or times out.
 */
export async function extractRecipe(
  reader: RecipeReader,
  input: RecipeInput,
  options: ExtractOptions
): Promise<Result<ExtractedRecipe>> {
  let raw: string;
  try {
    raw = await processWithRetry(
      () => withTimeout((signal) => reader.read(input, signal), options.timeoutMs),
      options.retries,
      options.retryDelayMs ?? 1000,
      isRetryable
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return fail(
      new RecipeError(
        `Extraction unavailable for ${describeInput(input)}: ${message}`,
        RecipeErrorType.EXTRACTION_UNAVAILABLE,
        { input: describeInput(input), timedOut: error instanceof TimeoutError }
      )
    );
  }

  const outcome = parseResponse(raw, input.kind);
  if (outcome.kind === "empty") return fail(outcome.error);

  const normalized = normalizeRecipe(outcome.recipe, raw);
  if (!normalized.ok) return normalized;

  return ok({ recipe: normalized.value, raw, outcome: outcome.kind });
}

export async function readInputFile(filePath: string): Promise<RecipeInput> {
  const ext = path.extname(filePath).toLowerCase();
  const filename = path.basename(filePath);

  if (IMAGE_EXTENSIONS.includes(ext)) {
    const original = await fs.readFile(filePath);
    try {
      return { kind: "image", ...(await prepareImage(original)), filename };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Unreadable image ${filename}: ${message}`);
    }
  }
  if (TEXT_EXTENSIONS.includes(ext)) {
    return { kind: "text", text: await fs.readFile(filePath, "utf-8"), filename };
  }

  throw new Error(
    `Unsupported input format: ${ext || filename}. Supported formats: ${[
      ...IMAGE_EXTENSIONS,
      ...TEXT_EXTENSIONS,
    ].join(", ")}`
  );
}
