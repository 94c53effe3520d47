export enum RecipeErrorType {
  EMPTY_EXTRACTION = "EMPTY_EXTRACTION",
  INSUFFICIENT_CONTENT = "INSUFFICIENT_CONTENT",
  INDEX_OUT_OF_RANGE = "INDEX_OUT_OF_RANGE",
  EXTRACTION_UNAVAILABLE = "EXTRACTION_UNAVAILABLE",
}

export class RecipeError extends Error {
  constructor(
    message: string,
    public type: RecipeErrorType,
    public details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "RecipeError";
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: RecipeError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: RecipeError): Result<T> {
  return { ok: false, error };
}
