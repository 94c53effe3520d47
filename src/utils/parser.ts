import { CandidateRecipe, SourceKind } from "../types/recipe.js";
import { RecipeError, RecipeErrorType } from "../types/errors.js";

/**
 * Every way a model response can come out of the parser. `structured` and
 * `sectioned` are confident reads, `fallback` is the best-effort guess made
 * when the text had no section headers at all.
 */
export type ParseOutcome =
  | { kind: "structured"; recipe: CandidateRecipe }
  | { kind: "sectioned"; recipe: CandidateRecipe }
  | { kind: "fallback"; recipe: CandidateRecipe }
  | { kind: "empty"; error: RecipeError };

type Section = "ingredients" | "steps";

const NEWLINE_PATTERN = /\r?\n/;
const CODE_FENCE = /^```/;
const HAS_CONTENT = /[\p{L}\p{N}]/u;

const SECTION_HEADER =
  /^[\s#*_>=~-]*(ingredients?|ingredient list|steps?|instructions?|directions?|method|preparation)[\s*_]*(?:\([^)]*\))?[\s*_]*(?::[\s*_]*(.*?))?[\s*_=~-]*$/i;

const LIST_MARKER =
  /^(?:[-*+•·▪◦‣–—](?=\s|$)|\d+\s*[.):](?=\s|$)|\(\d+\)|step\s+\d+\s*[.):-]?|\[[ xX✓✔]?\]|[☐☑☒✓✔])\s*/i;

const CHATTER = [
  /^here(?:'s| is| are)\b.*:$/i,
  /^(?:sure|certainly|of course|absolutely)\b[!,.]/i,
  /^(?:let me know|i hope|hope this|feel free|is there anything else)\b/i,
];

const MAX_INGREDIENT_LENGTH = 60;
const MAX_INGREDIENT_WORDS = 8;

const LEADING_QUANTITY =
  /^(?:\d|[½⅓⅔¼¾⅕⅖⅗⅘⅙⅚⅛⅜⅝⅞]|(?:one|two|three|four|five|six|seven|eight|nine|ten|eleven|twelve|half|dozen)\b)/i;

const UNITS =
  "cups?|tbsps?|tablespoons?|tsps?|teaspoons?|g|grams?|kg|kilograms?|ml|millilit(?:er|re)s?|l|lit(?:er|re)s?|oz|ounces?|lbs?|pounds?|pinch(?:es)?|cloves?|cans?|slices?|dash(?:es)?|handfuls?|sticks?|sprigs?|bunch(?:es)?";

const UNIT_WORD = new RegExp(`^(?:${UNITS})$`, "i");

// "olive oil, 2 tbsp", "butter (50 g)"
const TRAILING_AMOUNT = new RegExp(
  `[\\d½⅓⅔¼¾⅕⅖⅗⅘⅙⅚⅛⅜⅝⅞]\\s*(?:${UNITS})\\.?\\)?$`,
  "i"
);

export function matchSectionHeader(
  line: string
): { section: Section; remainder: string } | null {
  const match = SECTION_HEADER.exec(line.trim());
  if (!match) return null;
  return {
    section: match[1].toLowerCase().startsWith("ingredient")
      ? "ingredients"
      : "steps",
    remainder: (match[2] ?? "").trim(),
  };
}

export function isListItem(line: string): boolean {
  return LIST_MARKER.test(line.trim());
}

/**
 * Strips any stack of list markers ("- [ ] 2 eggs" -> "2 eggs").
 */
export function stripListMarker(line: string): string {
  let current = line.trim();
  let next = current.replace(LIST_MARKER, "");
  while (next !== current) {
    current = next;
    next = current.replace(LIST_MARKER, "");
  }
  return current.trim();
}

export function isQuantityLike(text: string): boolean {
  const words = text.split(/\s+/).filter(Boolean);
  if (text.length > MAX_INGREDIENT_LENGTH || words.length > MAX_INGREDIENT_WORDS)
    return false;
  if (LEADING_QUANTITY.test(text) || TRAILING_AMOUNT.test(text)) return true;

  // "pinch of salt", "a dash of vinegar"
  const [first = "", second = ""] = words.map((word) => word.replace(/[.,]$/, ""));
  return UNIT_WORD.test(first) || (/^an?$/i.test(first) && UNIT_WORD.test(second));
}

function isChatter(line: string): boolean {
  return CHATTER.some((pattern) => pattern.test(line));
}

function cleanTitle(line: string): string | null {
  const title = line
    .trim()
    .replace(/^#+\s*/, "")
    .replace(/^(?:title|recipe(?:\s+name)?)\s*:\s*/i, "")
    .replace(/^[*_]+|[*_]+$/g, "")
    .trim();
  return title.length > 0 ? title : null;
}

function splitLines(text: string): string[] {
  return text
    .split(NEWLINE_PATTERN)
    .map((line) => line.trim())
    .filter(Boolean);
}

// --- structured (JSON) replies ------------------------------------------

function stripCodeFence(text: string): string {
  const fenced = /^```(?:json)?\s*([\s\S]*?)(?:```|$)/i.exec(text);
  return fenced ? fenced[1].trim() : text;
}

/**
 * Index just past the brace that closes the object opened at `start`,
 * or -1 when the braces never balance.
 */
function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === "\\") escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === "{") depth++;
    else if (char === "}") {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function salvageFields(text: string): Record<string, unknown> | undefined {
  const title = /"title"\s*:\s*"([^"]*)"/i.exec(text);
  if (!title) return undefined;

  const quoted = (block: string | undefined) =>
    block ? Array.from(block.matchAll(/"([^"]*)"/g), (m) => m[1]) : [];
  const ingredients = /"ingredients"\s*:\s*\[([^\]]*)\]/i.exec(text);
  const steps = /"steps"\s*:\s*\[([^\]]*)\]/i.exec(text);

  return {
    title: title[1],
    ingredients: quoted(ingredients?.[1]),
    steps: quoted(steps?.[1]),
  };
}

export function extractJsonObject(
  text: string
): Record<string, unknown> | undefined {
  const body = stripCodeFence(text.trim());
  const start = body.indexOf("{");
  if (start === -1) return undefined;

  let end = findObjectEnd(body, start);
  if (end === -1) end = body.lastIndexOf("}") + 1;
  if (end <= start) return undefined;

  const json = body.slice(start, end);
  const parsed =
    tryParseJson(json) ?? tryParseJson(json.replace(/,\s*([}\]])/g, "$1"));
  if (isRecord(parsed)) return parsed;
  return salvageFields(json);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toStringList(value: unknown): string[] {
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) return value.flatMap(toStringList);
  if (typeof value === "number") return [String(value)];
  if (typeof value === "string") return splitLines(value);
  if (isRecord(value)) {
    if (typeof value.text === "string") return splitLines(value.text);
    if (typeof value.name === "string") {
      const quantity =
        typeof value.quantity === "string" || typeof value.quantity === "number"
          ? `${value.quantity} `
          : "";
      return [`${quantity}${value.name}`.trim()];
    }
  }
  return [];
}

function firstString(...values: unknown[]): string | null {
  for (const value of values) {
    if (typeof value === "string" && value.trim()) return value;
  }
  return null;
}

function fromStructured(
  data: Record<string, unknown>,
  sourceKind: SourceKind
): CandidateRecipe | null {
  const rawTitle = firstString(data.title, data.name);
  const recipe: CandidateRecipe = {
    title: rawTitle === null ? null : cleanTitle(rawTitle),
    ingredients: toStringList(data.ingredients).map(stripListMarker),
    steps: toStringList(data.steps ?? data.instructions ?? data.directions).map(
      stripListMarker
    ),
    sourceKind,
  };

  const hasContent =
    recipe.title !== null ||
    recipe.ingredients.length > 0 ||
    recipe.steps.length > 0;
  return hasContent ? recipe : null;
}

// --- free-text replies --------------------------------------------------

function parseSectioned(
  lines: string[],
  sourceKind: SourceKind
): CandidateRecipe {
  const recipe: CandidateRecipe = {
    title: null,
    ingredients: [],
    steps: [],
    sourceKind,
  };
  let section: Section | null = null;

  for (const line of lines) {
    const header = matchSectionHeader(line);
    if (header) {
      section = header.section;
      if (header.remainder) recipe[section].push(stripListMarker(header.remainder));
      continue;
    }
    if (CODE_FENCE.test(line)) continue;

    if (section === null) {
      // Anything else ahead of the first header is description, not recipe.
      if (recipe.title === null && !isListItem(line) && !isChatter(line)) {
        recipe.title = cleanTitle(line);
      }
      continue;
    }
    recipe[section].push(stripListMarker(line));
  }

  return recipe;
}

function parseFallback(
  lines: string[],
  sourceKind: SourceKind
): CandidateRecipe {
  const recipe: CandidateRecipe = {
    title: null,
    ingredients: [],
    steps: [],
    sourceKind,
  };
  const content = lines.filter(
    (line) => !CODE_FENCE.test(line) && !isChatter(line)
  );

  const titleIndex = content.findIndex(
    (line) => !isListItem(line) && !isQuantityLike(stripListMarker(line))
  );

  content.forEach((line, index) => {
    const text = stripListMarker(line);
    if (index === titleIndex) {
      recipe.title = cleanTitle(line);
      return;
    }
    if (isQuantityLike(text)) recipe.ingredients.push(text);
    else recipe.steps.push(text);
  });

  return recipe;
}

/**
 * Turns one raw model reply into a candidate recipe. Never throws; an input
 * with nothing extractable comes back as an `empty` outcome.
 */
export function parseResponse(
  rawText: string,
  sourceKind: SourceKind
): ParseOutcome {
  const lines = splitLines(rawText);
  const extractable = lines.filter(
    (line) => !CODE_FENCE.test(line) && HAS_CONTENT.test(stripListMarker(line))
  );

  if (extractable.length === 0) {
    return {
      kind: "empty",
      error: new RecipeError(
        "No usable text found in the extraction result",
        RecipeErrorType.EMPTY_EXTRACTION,
        { sourceKind, length: rawText.length }
      ),
    };
  }

  const data = rawText.includes("{") ? extractJsonObject(rawText) : undefined;
  const structured = data ? fromStructured(data, sourceKind) : null;
  if (structured) return { kind: "structured", recipe: structured };

  if (lines.some((line) => matchSectionHeader(line) !== null)) {
    return { kind: "sectioned", recipe: parseSectioned(lines, sourceKind) };
  }
  return { kind: "fallback", recipe: parseFallback(lines, sourceKind) };
}
