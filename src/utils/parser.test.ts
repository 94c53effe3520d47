import { describe, expect, it } from "vitest";
import {
  extractJsonObject,
  isQuantityLike,
  matchSectionHeader,
  parseResponse,
  stripListMarker,
} from "./parser.js";
import { RecipeErrorType } from "../types/errors.js";

const recipeOf = (outcome: ReturnType<typeof parseResponse>) => {
  if (outcome.kind === "empty") throw new Error("expected a recipe");
  return outcome.recipe;
};

describe("parseResponse", () => {
  it("reads a sectioned recipe", () => {
    const outcome = parseResponse(
      "Grandma's Soup\nIngredients:\n- 2 carrots\n- 1 onion\nSteps:\n1. Chop vegetables\n2. Simmer 20 minutes",
      "text"
    );

    expect(outcome.kind).toBe("sectioned");
    expect(recipeOf(outcome)).toEqual({
      title: "Grandma's Soup",
      ingredients: ["2 carrots", "1 onion"],
      steps: ["Chop vegetables", "Simmer 20 minutes"],
      sourceKind: "text",
    });
  });

  it("keeps every line under each header, in order", () => {
    for (const [n, m] of [
      [1, 1],
      [3, 5],
      [7, 2],
    ]) {
      const ingredients = Array.from({ length: n }, (_, i) => `${i + 1} cups flour`);
      const steps = Array.from({ length: m }, (_, i) => `Stir pot number ${i + 1}`);
      const raw = [
        "Ingredients:",
        ...ingredients.map((line) => `- ${line}`),
        "Steps:",
        ...steps.map((line, i) => `${i + 1}. ${line}`),
      ].join("\n");

      const recipe = recipeOf(parseResponse(raw, "image"));
      expect(recipe.ingredients).toEqual(ingredients);
      expect(recipe.steps).toEqual(steps);
      expect(recipe.title).toBeNull();
    }
  });

  it("skips preamble chatter and markdown decoration", () => {
    const raw = [
      "Sure! Here is the recipe you asked for:",
      "# Lemon Bars",
      "**Ingredients:**",
      "* 1 cup flour",
      "* [ ] 2 lemons",
      "## Instructions",
      "1) Mix the flour.",
      "2) Bake 25 minutes.",
    ].join("\n");

    expect(recipeOf(parseResponse(raw, "image"))).toEqual({
      title: "Lemon Bars",
      ingredients: ["1 cup flour", "2 lemons"],
      steps: ["Mix the flour.", "Bake 25 minutes."],
      sourceKind: "image",
    });
  });

  it("keeps conversational-sounding lines once a section has started", () => {
    const raw = [
      "Ingredients:",
      "1 baguette",
      "Feel free to add parsley",
      "Steps:",
      "Slice the bread",
      "Let me know when it is golden, then serve",
      "Here are the finishing touches:",
      "Sprinkle salt",
    ].join("\n");

    const recipe = recipeOf(parseResponse(raw, "text"));
    expect(recipe.ingredients).toEqual(["1 baguette", "Feel free to add parsley"]);
    expect(recipe.steps).toEqual([
      "Slice the bread",
      "Let me know when it is golden, then serve",
      "Here are the finishing touches:",
      "Sprinkle salt",
    ]);
  });

  it("treats a preparation header as the start of the steps", () => {
    const raw = "Stew\nIngredients:\n- 1 potato\nPreparation:\nBoil the potato.";

    expect(recipeOf(parseResponse(raw, "text"))).toEqual({
      title: "Stew",
      ingredients: ["1 potato"],
      steps: ["Boil the potato."],
      sourceKind: "text",
    });
  });

  it("takes content written on the header line", () => {
    const raw =
      "Pancakes\nIngredients: 2 eggs\n1 cup milk\nDirections: Whisk everything.\nFry in butter.";

    const recipe = recipeOf(parseResponse(raw, "text"));
    expect(recipe.ingredients).toEqual(["2 eggs", "1 cup milk"]);
    expect(recipe.steps).toEqual(["Whisk everything.", "Fry in butter."]);
  });

  it("does not treat a title mentioning steps as a header", () => {
    const raw = "Ten Steps Stew\nIngredients:\n- 1 potato\nSteps:\n- Boil it";

    const recipe = recipeOf(parseResponse(raw, "text"));
    expect(recipe.title).toBe("Ten Steps Stew");
    expect(recipe.ingredients).toEqual(["1 potato"]);
    expect(recipe.steps).toEqual(["Boil it"]);
  });

  it("falls back to quantity heuristics without headers", () => {
    const raw = [
      "Quick Omelette",
      "2 eggs",
      "1 tbsp butter",
      "Pinch of salt",
      "Whisk the eggs with the salt until frothy.",
      "Melt the butter and cook the eggs over low heat.",
    ].join("\n");

    const outcome = parseResponse(raw, "image");
    expect(outcome.kind).toBe("fallback");
    expect(recipeOf(outcome)).toEqual({
      title: "Quick Omelette",
      ingredients: ["2 eggs", "1 tbsp butter", "Pinch of salt"],
      steps: [
        "Whisk the eggs with the salt until frothy.",
        "Melt the butter and cook the eggs over low heat.",
      ],
      sourceKind: "image",
    });
  });

  it("takes the first line that is neither a list item nor an amount as the title", () => {
    const outcome = parseResponse("- 2 eggs\nPancakes\nWhisk everything together.", "text");

    expect(outcome.kind).toBe("fallback");
    expect(recipeOf(outcome)).toEqual({
      title: "Pancakes",
      ingredients: ["2 eggs"],
      steps: ["Whisk everything together."],
      sourceKind: "text",
    });
  });

  it("leaves the title unset when every fallback line is a list item or an amount", () => {
    const recipe = recipeOf(parseResponse("3 cups rice\n- Rinse the rice well.", "text"));
    expect(recipe.title).toBeNull();
    expect(recipe.ingredients).toEqual(["3 cups rice"]);
    expect(recipe.steps).toEqual(["Rinse the rice well."]);
  });

  it("counts a line ending in an amount as an ingredient", () => {
    const raw = "Dressing\nolive oil, 2 tbsp\nbutter (50 g)\nShake everything in a jar.";

    expect(recipeOf(parseResponse(raw, "text"))).toEqual({
      title: "Dressing",
      ingredients: ["olive oil, 2 tbsp", "butter (50 g)"],
      steps: ["Shake everything in a jar."],
      sourceKind: "text",
    });
  });

  it("reads a fenced JSON reply", () => {
    const raw =
      '```json\n{"title": "Toast", "ingredients": ["1 slice bread", "butter"], "steps": ["1. Toast the bread", "2. Spread butter"]}\n```';

    const outcome = parseResponse(raw, "image");
    expect(outcome.kind).toBe("structured");
    expect(recipeOf(outcome)).toEqual({
      title: "Toast",
      ingredients: ["1 slice bread", "butter"],
      steps: ["Toast the bread", "Spread butter"],
      sourceKind: "image",
    });
  });

  it("repairs trailing commas in JSON wrapped in prose", () => {
    const raw =
      'Here you go: {"title": "Tea", "ingredients": ["1 tea bag",], "steps": ["Steep 3 minutes",],}';

    const recipe = recipeOf(parseResponse(raw, "text"));
    expect(recipe.title).toBe("Tea");
    expect(recipe.ingredients).toEqual(["1 tea bag"]);
    expect(recipe.steps).toEqual(["Steep 3 minutes"]);
  });

  it("salvages fields from JSON that will not parse", () => {
    const raw =
      '{"title": "Broken", "ingredients": ["1 egg"], "steps": ["Fry it"] "extra": }';

    const outcome = parseResponse(raw, "text");
    expect(outcome.kind).toBe("structured");
    expect(recipeOf(outcome)).toMatchObject({
      title: "Broken",
      ingredients: ["1 egg"],
      steps: ["Fry it"],
    });
  });

  it("accepts name, instruction objects and ingredient objects", () => {
    const raw =
      '{"name": "Rice", "ingredients": [{"name": "rice", "quantity": "1 cup"}], "instructions": [{"text": "Boil water"}, {"text": "Add rice"}]}';

    expect(recipeOf(parseResponse(raw, "text"))).toEqual({
      title: "Rice",
      ingredients: ["1 cup rice"],
      steps: ["Boil water", "Add rice"],
      sourceKind: "text",
    });
  });

  it("ignores braces that are not a recipe object", () => {
    const raw = "Chili\nIngredients:\n- 1 can beans {drained}\nSteps:\n- Simmer";

    const outcome = parseResponse(raw, "text");
    expect(outcome.kind).toBe("sectioned");
    expect(recipeOf(outcome).ingredients).toEqual(["1 can beans {drained}"]);
  });

  it.each(["", "   \n\t \n", "-\n*\n---", "```\n```"])(
    "reports an empty extraction for %j",
    (raw) => {
      const outcome = parseResponse(raw, "text");
      expect(outcome.kind).toBe("empty");
      if (outcome.kind === "empty") {
        expect(outcome.error.type).toBe(RecipeErrorType.EMPTY_EXTRACTION);
      }
    }
  );
});

describe("matchSectionHeader", () => {
  it.each([
    ["Ingredients", "ingredients"],
    ["INGREDIENT:", "ingredients"],
    ["### Ingredients (serves 4)", "ingredients"],
    ["__Method__", "steps"],
    ["Instructions:", "steps"],
    ["- Directions -", "steps"],
    ["Preparation:", "steps"],
  ])("recognises %j", (line, section) => {
    expect(matchSectionHeader(line)).toEqual({ section, remainder: "" });
  });

  it("rejects ordinary lines", () => {
    expect(matchSectionHeader("Step 1: Chop")).toBeNull();
    expect(matchSectionHeader("Ingredients you will need today")).toBeNull();
  });
});

describe("stripListMarker", () => {
  it.each([
    ["- 2 eggs", "2 eggs"],
    ["• salt", "salt"],
    ["3) Stir", "Stir"],
    ["Step 4: Serve", "Serve"],
    ["- [x] 1 lime", "1 lime"],
    ["☐ 200 g sugar", "200 g sugar"],
    ["2.5 cups stock", "2.5 cups stock"],
    ["1 onion", "1 onion"],
  ])("%j -> %j", (line, expected) => {
    expect(stripListMarker(line)).toBe(expected);
  });
});

describe("isQuantityLike", () => {
  it.each([
    "2 eggs",
    "½ cup sugar",
    "a pinch of salt",
    "Cloves garlic",
    "one lemon",
    "olive oil, 2 tbsp",
    "flour (1½ cups)",
  ])(
    "accepts %j",
    (text) => expect(isQuantityLike(text)).toBe(true)
  );

  it.each([
    "A Simple Cake",
    "Stir until smooth",
    "Simmer 20 minutes",
    "Stir in the cup of stock slowly",
    "Preparation time is short",
    "2 cups of flour sifted twice through a fine sieve into the bowl",
  ])("rejects %j", (text) => expect(isQuantityLike(text)).toBe(false));
});

describe("extractJsonObject", () => {
  it("returns undefined when there is no object", () => {
    expect(extractJsonObject("no json here")).toBeUndefined();
    expect(extractJsonObject("{not json}")).toBeUndefined();
  });

  it("stops at the brace that closes the first object", () => {
    expect(extractJsonObject('{"title": "A {b}"} trailing }')).toEqual({
      title: "A {b}",
    });
  });
});
