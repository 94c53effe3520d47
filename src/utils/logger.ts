import chalk from "chalk";

const DEBUG = process.env.DEBUG === "true";

export const logger = {
  info(message: string, ...rest: unknown[]): void {
    console.log(message, ...rest);
  },
  success(message: string): void {
    console.log(chalk.green(message));
  },
  warn(message: string): void {
    console.warn(chalk.yellow(message));
  },
  error(message: string, error?: unknown): void {
    const detail =
      error === undefined
        ? ""
        : ` ${error instanceof Error ? error.message : String(error)}`;
    console.error(chalk.red(`${message}${detail}`));
  },
  debug(message: string, ...rest: unknown[]): void {
    if (DEBUG) console.log(chalk.gray(`[debug] ${message}`), ...rest);
  },
};
