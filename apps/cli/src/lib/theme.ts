import chalk from "chalk";

export const theme = {
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  muted: chalk.gray,
  emphasis: chalk.bold,
} as const;

/** Print a fatal command error in the standard style. */
export function printError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(theme.error(`\nError: ${message}`));
}
