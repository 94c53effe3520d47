import { Command } from "commander";
import inquirer from "inquirer";
import { Config, ConfigSchema } from "../types/config.js";
import { ConfigManager } from "../managers/config.js";
import { logger } from "../utils/logger.js";

const MODEL_CHOICES = [
  { name: "Claude 3.5 Sonnet", value: "claude-3-5-sonnet-latest" },
  { name: "Claude 3.5 Haiku (faster, text only)", value: "claude-3-5-haiku-latest" },
  { name: "Claude 3 Opus", value: "claude-3-opus-latest" },
];

export async function executeInit(): Promise<string> {
  const defaults = ConfigSchema.parse({});
  const answers = await inquirer.prompt<{
    anthropicKey: string;
    model: string;
    title: string;
    output: string;
  }>([
    {
      type: "password",
      name: "anthropicKey",
      message: "Anthropic API key (leave empty to use ANTHROPIC_API_KEY):",
      mask: "*",
    },
    {
      type: "list",
      name: "model",
      message: "Model:",
      choices: MODEL_CHOICES,
      default: defaults.ai.model,
    },
    {
      type: "input",
      name: "title",
      message: "Cookbook title:",
      default: defaults.cookbook.title,
      validate: (input: string) => input.trim().length > 0,
    },
    {
      type: "input",
      name: "output",
      message: "Cookbook file:",
      default: defaults.cookbook.output,
      validate: (input: string) => input.trim().length > 0,
    },
  ]);

  const config: Config = {
    ai: {
      ...defaults.ai,
      anthropicKey: answers.anthropicKey || undefined,
      model: answers.model,
    },
    cookbook: { title: answers.title.trim(), output: answers.output.trim() },
  };

  const configPath = await ConfigManager.save(config);
  logger.success(`Configuration saved to ${configPath}`);
  return configPath;
}

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Initialize configuration")
    .action(async () => {
      try {
        await executeInit();
      } catch (error) {
        logger.error("Error:", error);
        process.exit(1);
      }
    });
}
