#!/usr/bin/env node
import { Command } from "commander";
import { registerInitCommand } from "./commands/init.js";
import { registerScanCommand } from "./commands/scan.js";
import { registerPlateCommand } from "./commands/plate.js";
import { logger } from "./utils/logger.js";

const program = new Command()
  .name("potluck")
  .description("Bind recipe photos and notes into one HTML cookbook")
  .version("0.1.0");

registerInitCommand(program);
registerScanCommand(program);
registerPlateCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error("Error:", error);
  process.exit(1);
});
