import inquirer from "inquirer";
import chalk from "chalk";
import { Recipe } from "../types/recipe.js";
import { RecipeStore } from "../managers/store.js";
import { normalizeRecipe } from "./normalize.js";
import { logger } from "./logger.js";

export function printRecipe(recipe: Recipe): void {
  console.log("\nExtracted Recipe:");
  console.log(chalk.blue("Title:"), recipe.title);
  if (recipe.ingredients.length > 0) {
    console.log(chalk.blue("\nIngredients:"));
    recipe.ingredients.forEach((ing, i) =>
      console.log(chalk.gray(`${i + 1}.`), ing)
    );
  }
  if (recipe.steps.length > 0) {
    console.log(chalk.blue("\nSteps:"));
    recipe.steps.forEach((step, i) =>
      console.log(chalk.gray(`${i + 1}.`), step)
    );
  }
}

/**
 * Shows an extracted recipe and lets the user keep, edit or discard it.
 * Edits go back through the normalizer; an edit that leaves nothing to
 * cook counts as a discard.
 */
export async function reviewRecipe(recipe: Recipe): Promise<Recipe | null> {
  printRecipe(recipe);

  const { action } = await inquirer.prompt<{
    action: "keep" | "edit" | "discard";
  }>([
    {
      type: "list",
      name: "action",
      message: "Would you like to:",
      choices: [
        { name: "Keep as is", value: "keep" },
        { name: "Edit", value: "edit" },
        { name: "Discard", value: "discard" },
      ],
    },
  ]);

  if (action === "discard") return null;
  if (action === "keep") return recipe;

  const edited = await inquirer.prompt<{
    title: string;
    ingredients: string;
    steps: string;
  }>([
    {
      type: "input",
      name: "title",
      message: "Recipe title:",
      default: recipe.title,
    },
    {
      type: "editor",
      name: "ingredients",
      message: "Ingredients (one per line):",
      default: recipe.ingredients.join("\n"),
    },
    {
      type: "editor",
      name: "steps",
      message: "Steps (one per line):",
      default: recipe.steps.join("\n"),
    },
  ]);

  const result = normalizeRecipe({
    title: edited.title,
    ingredients: edited.ingredients.split("\n"),
    steps: edited.steps.split("\n"),
    sourceKind: recipe.sourceKind,
  });
  if (!result.ok) {
    logger.warn(`Discarded: ${result.error.message}`);
    return null;
  }
  return result.value;
}

/**
 * Interactive loop for moving and removing recipes before the cookbook
 * is written.
 */
export async function arrangeCookbook(store: RecipeStore): Promise<void> {
  while (store.count() > 0) {
    const recipes = store.all();
    console.log(chalk.blue("\nCookbook order:"));
    recipes.forEach((recipe, i) =>
      console.log(chalk.gray(`${i + 1}.`), recipe.title)
    );

    const { action } = await inquirer.prompt<{
      action: "move" | "remove" | "done";
    }>([
      {
        type: "list",
        name: "action",
        message: "Arrange cookbook:",
        choices: [
          { name: "Move a recipe", value: "move" },
          { name: "Remove a recipe", value: "remove" },
          { name: "Done", value: "done" },
        ],
      },
    ]);
    if (action === "done") return;

    const choices = recipes.map((recipe, i) => ({
      name: `${i + 1}. ${recipe.title}`,
      value: i,
    }));

    if (action === "remove") {
      const { index } = await inquirer.prompt<{ index: number }>([
        { type: "list", name: "index", message: "Remove which recipe?", choices },
      ]);
      const result = store.remove(index);
      if (!result.ok) logger.warn(result.error.message);
      else logger.info(chalk.gray(`Removed "${result.value.title}"`));
      continue;
    }

    const { from, to } = await inquirer.prompt<{ from: number; to: number }>([
      { type: "list", name: "from", message: "Move which recipe?", choices },
      {
        type: "list",
        name: "to",
        message: "To which position?",
        choices: recipes.map((_, i) => ({ name: `${i + 1}`, value: i })),
      },
    ]);
    const result = store.reorder(from, to);
    if (!result.ok) logger.warn(result.error.message);
  }
}
