import chalk from "chalk";

export interface OutputOptions {
  json?: boolean;
  quiet?: boolean;
  debug?: boolean;
}

interface OutputHandlers {
  json?: () => unknown;
  quiet?: () => void;
  human: () => void;
}

export function jsonOutput(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Pick the handler matching the output mode. JSON wins over quiet, and a
 * missing handler falls back to the human one.
 */
export function output(options: OutputOptions, handlers: OutputHandlers): void {
  if (options.json && handlers.json) {
    jsonOutput(handlers.json());
    return;
  }

  if (options.quiet && handlers.quiet) {
    handlers.quiet();
    return;
  }

  handlers.human();
}

export function isHuman(options: OutputOptions): boolean {
  return !options.json && !options.quiet;
}

export function success(message: string): void {
  console.log(chalk.green("✓"), message);
}

export function info(message: string): void {
  console.log(chalk.blue("ℹ"), message);
}

export function warn(message: string): void {
  console.log(chalk.yellow("⚠"), message);
}

export function error(message: string): void {
  console.error(chalk.red("✗"), message);
}

export function hint(message: string): void {
  console.log(chalk.dim(`  ${message}`));
}

/**
 * Diagnostic line on stderr, shown only with --debug
 */
export function debug(options: OutputOptions, message: string): void {
  if (options.debug) {
    console.error(chalk.gray(`[debug] ${message}`));
  }
}
