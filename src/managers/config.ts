import * as fs from "fs/promises";
import path from "path";
import { Config, ConfigSchema } from "../types/config.js";

export interface ConfigLocations {
  cwd: string;
  home: string;
}

export class ConfigManager {
  private static CONFIG_FILE_NAME = "config.json";
  private static CONFIG_DIR_NAME = ".potluck";

  static defaultLocations(): ConfigLocations {
    return {
      cwd: process.cwd(),
      home: process.env.HOME || process.env.USERPROFILE || "",
    };
  }

  private static async findConfigFile(
    locations: ConfigLocations
  ): Promise<string | null> {
    const candidates = [
      path.join(locations.cwd, this.CONFIG_FILE_NAME),
      path.join(locations.home, this.CONFIG_DIR_NAME, this.CONFIG_FILE_NAME),
    ];

    for (const candidate of candidates) {
      try {
        await fs.access(candidate);
        return candidate;
      } catch {
        // Not here, try the next location
      }
    }
    return null;
  }

  /**
   * Loads `config.json` from the working directory or `~/.potluck`, falling
   * back to defaults when neither exists. ANTHROPIC_API_KEY wins over the
   * key stored in the file.
   */
  static async load(
    locations: ConfigLocations = this.defaultLocations(),
    env: NodeJS.ProcessEnv = process.env
  ): Promise<Config> {
    try {
      const configPath = await this.findConfigFile(locations);
      const parsedConfig: unknown = configPath
        ? JSON.parse(await fs.readFile(configPath, "utf-8"))
        : {};

      // Validate the config against our schema
      const result = ConfigSchema.safeParse(parsedConfig);
      if (!result.success) {
        throw new Error(`Invalid configuration: ${result.error.message}`);
      }

      const config = result.data;
      if (env.ANTHROPIC_API_KEY) {
        config.ai.anthropicKey = env.ANTHROPIC_API_KEY;
      }
      return config;
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to load config: ${error.message}`);
      }
      throw error;
    }
  }

  static async save(
    config: Config,
    home: string = this.defaultLocations().home
  ): Promise<string> {
    try {
      // Validate the config before saving
      const result = ConfigSchema.safeParse(config);
      if (!result.success) {
        throw new Error(`Invalid configuration: ${result.error.message}`);
      }

      if (!home) {
        throw new Error("Could not determine home directory");
      }

      const configDir = path.join(home, this.CONFIG_DIR_NAME);
      const configPath = path.join(configDir, this.CONFIG_FILE_NAME);

      await fs.mkdir(configDir, { recursive: true });
      await fs.writeFile(
        configPath,
        JSON.stringify(result.data, null, 2),
        "utf-8"
      );
      return configPath;
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to save config: ${error.message}`);
      }
      throw error;
    }
  }

  static validate(config: unknown): boolean {
    return ConfigSchema.safeParse(config).success;
  }
}
