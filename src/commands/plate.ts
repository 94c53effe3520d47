import { Command } from "commander";
import ora from "ora";
import fs from "fs/promises";
import path from "path";
import YAML from "yaml";
import { Cookbook, CookbookSchema } from "../types/recipe.js";
import { RecipeStore } from "../managers/store.js";
import { normalizeRecipe } from "../utils/normalize.js";
import {
  CookbookFormat,
  formatCookbook,
  parseCookbookFormat,
} from "../utils/render.js";
import { logger } from "../utils/logger.js";

export interface PlateOptions {
  input: string;
  output?: string;
  format: CookbookFormat;
  title?: string;
  timestamp?: boolean;
}

export interface PlateResult {
  outputPath: string;
  kept: number;
  dropped: string[];
}

async function loadCookbookFile(filePath: string): Promise<Cookbook> {
  const content = await fs.readFile(filePath, "utf-8");
  const data: unknown =
    path.extname(filePath).toLowerCase() === ".yaml" ||
    path.extname(filePath).toLowerCase() === ".yml"
      ? YAML.parse(content)
      : JSON.parse(content);

  const result = CookbookSchema.safeParse(data);
  if (!result.success) {
    throw new Error(`Invalid cookbook file: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Re-binds an exported cookbook (JSON or YAML) in another format. Every
 * recipe goes back through the normalizer, so hand-edited exports are
 * cleaned the same way extracted recipes are.
 */
export async function executePlate(options: PlateOptions): Promise<PlateResult> {
  const outputPath =
    options.output ??
    `${path.basename(options.input, path.extname(options.input))}.${options.format}`;
  if (path.resolve(outputPath) === path.resolve(options.input)) {
    throw new Error(
      `Refusing to overwrite ${options.input}; pass --output to choose another file`
    );
  }

  const spinner = ora("Loading cookbook").start();

  try {
    const cookbook = await loadCookbookFile(options.input);
    const store = new RecipeStore();
    const dropped: string[] = [];

    for (const recipe of cookbook.recipes) {
      const result = normalizeRecipe(recipe);
      if (result.ok) store.add(result.value);
      else dropped.push(result.error.message);
    }

    spinner.text = "Rendering cookbook";
    const output = formatCookbook(
      { title: options.title ?? cookbook.title, recipes: [...store.all()] },
      options.format,
      { generatedAt: options.timestamp ? new Date() : undefined }
    );

    await fs.writeFile(outputPath, output, "utf-8");

    spinner.succeed(`Cookbook exported to ${outputPath}`);
    dropped.forEach((reason) => logger.warn(`Dropped: ${reason}`));
    return { outputPath, kept: store.count(), dropped };
  } catch (error) {
    spinner.fail("Processing failed");
    throw error;
  }
}

export function registerPlateCommand(program: Command): void {
  program
    .command("plate <input>")
    .description("Render an exported cookbook (json/yaml) in another format")
    .option("-f, --format <format>", "Output format (html|json|yaml)", "html")
    .option("-o, --output <file>", "Output file")
    .option("--title <title>", "Override the cookbook title")
    .option("--timestamp", "Stamp the generation time into the cookbook", false)
    .action(
      async (
        input: string,
        cmdOptions: {
          format: string;
          output?: string;
          title?: string;
          timestamp: boolean;
        }
      ) => {
        try {
          await executePlate({
            input,
            output: cmdOptions.output,
            format: parseCookbookFormat(cmdOptions.format),
            title: cmdOptions.title,
            timestamp: cmdOptions.timestamp,
          });
        } catch (error) {
          logger.error("Error:", error);
          process.exit(1);
        }
      }
    );
}
