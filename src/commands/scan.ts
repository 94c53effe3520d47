import { Command } from "commander";
import * as fs from "fs/promises";
import ora from "ora";
import { Config } from "../types/config.js";
import { Recipe, RecipeImportOptions } from "../types/recipe.js";
import { ConfigManager } from "../managers/config.js";
import { AnthropicRecipeReader } from "../managers/anthropic.js";
import { CookbookSession } from "../managers/session.js";
import {
  RecipeInput,
  RecipeReader,
  describeInput,
  readInputFile,
} from "../utils/extract.js";
import {
  CookbookFormat,
  formatCookbook,
  parseCookbookFormat,
} from "../utils/render.js";
import { arrangeCookbook, reviewRecipe } from "../utils/prompts.js";
import { logger } from "../utils/logger.js";

export interface ScanCommandOptions extends RecipeImportOptions {
  files: string[];
  texts: string[];
  stdin: boolean;
  output: string;
  format: CookbookFormat;
  title: string;
  timestamp: boolean;
}

interface ProcessingLog {
  source: string;
  status: "success" | "error" | "skipped";
  detail: string;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

async function collectInputs(
  options: ScanCommandOptions
): Promise<RecipeInput[]> {
  const inputs: RecipeInput[] = [];
  for (const file of options.files) {
    inputs.push(await readInputFile(file));
  }
  for (const text of options.texts) {
    inputs.push({ kind: "text", text });
  }
  if (options.stdin) {
    inputs.push({ kind: "text", text: await readStdin(), filename: "stdin" });
  }
  return inputs;
}

function printSummary(processingLog: ProcessingLog[]): void {
  if (processingLog.length === 0) return;
  console.log("\nProcessing Summary:");
  processingLog.forEach((log) => {
    const icon =
      log.status === "success" ? "✅" : log.status === "error" ? "❌" : "⏭️ ";
    console.log(`${icon} ${log.source}: ${log.detail}`);
  });
}

export async function executeScan(
  options: ScanCommandOptions,
  config: Config,
  reader: RecipeReader
): Promise<CookbookSession> {
  const inputs = await collectInputs(options);
  const session = new CookbookSession(reader, {
    timeoutMs: config.ai.timeoutMs,
    retries: config.ai.retries,
  });
  const processingLog: ProcessingLog[] = [];
  const spinner = ora("Extracting recipes").start();

  try {
    // One input at a time; the store is never mutated concurrently.
    for (const [i, input] of inputs.entries()) {
      const source = describeInput(input);
      spinner.text = `Extracting ${i + 1}/${inputs.length}: ${source}`;

      const result = await session.extract(input);
      if (!result.ok) {
        spinner.fail(`${source}: ${result.error.message}`);
        logger.debug(`${result.error.type}`, result.error.details);
        processingLog.push({
          source,
          status: "error",
          detail: result.error.type,
        });
        spinner.start();
        continue;
      }

      logger.debug(`${source} parsed as ${result.value.outcome}`);
      let recipe: Recipe | null = result.value.recipe;

      if (options.review) {
        spinner.stop();
        recipe = await reviewRecipe(recipe);
        spinner.start();
      }
      if (!recipe) {
        spinner.info(`${source}: discarded`);
        processingLog.push({ source, status: "skipped", detail: "discarded" });
        spinner.start();
        continue;
      }

      session.accept(recipe);
      spinner.succeed(`${source}: ${recipe.title}`);
      processingLog.push({ source, status: "success", detail: recipe.title });
      spinner.start();
    }
    spinner.stop();

    if (options.arrange) {
      await arrangeCookbook(session.store);
    }

    const output = formatCookbook(
      { title: options.title, recipes: [...session.recipes()] },
      options.format,
      { generatedAt: options.timestamp ? new Date() : undefined }
    );
    await fs.writeFile(options.output, output, "utf-8");
    logger.success(
      `Wrote ${session.store.count()} recipe(s) to ${options.output}`
    );
    return session;
  } catch (error) {
    spinner.fail("Processing failed");
    throw error;
  } finally {
    printSummary(processingLog);
  }
}

interface ScanCliOptions {
  text: string[];
  stdin: boolean;
  output?: string;
  format: string;
  title?: string;
  review: boolean;
  arrange: boolean;
  timestamp: boolean;
}

const noTexts: string[] = [];

function collectText(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function registerScanCommand(program: Command): void {
  program
    .command("scan [files...]")
    .description("Extract recipes from photos and text and bind them into a cookbook")
    .option(
      "-t, --text <text>",
      "Recipe text to extract (repeatable)",
      collectText,
      noTexts
    )
    .option("--stdin", "Read one more recipe as text from stdin", false)
    .option("-o, --output <file>", "Output file")
    .option("-f, --format <format>", "Output format (html|json|yaml)", "html")
    .option("--title <title>", "Cookbook title")
    .option("-r, --review", "Review each recipe before adding it", false)
    .option("-a, --arrange", "Reorder or remove recipes before writing", false)
    .option("--timestamp", "Stamp the generation time into the cookbook", false)
    .action(async (files: string[], options: ScanCliOptions) => {
      try {
        const config = await ConfigManager.load();
        const reader = new AnthropicRecipeReader(config.ai);
        const scanOptions: ScanCommandOptions = {
          files,
          texts: options.text,
          stdin: options.stdin,
          output: options.output ?? config.cookbook.output,
          format: parseCookbookFormat(options.format),
          title: options.title ?? config.cookbook.title,
          review: options.review,
          arrange: options.arrange,
          timestamp: options.timestamp,
        };
        if (
          scanOptions.files.length === 0 &&
          scanOptions.texts.length === 0 &&
          !scanOptions.stdin
        ) {
          logger.warn("No inputs given; writing an empty cookbook.");
        }
        await executeScan(scanOptions, config, reader);
      } catch (error) {
        logger.error("Error:", error);
        process.exit(1);
      }
    });
}
