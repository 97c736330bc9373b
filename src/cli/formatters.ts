import chalk from "chalk";

export function step(text: string): string {
  return chalk.green.bold(`=> ${text}`);
}

export function highlight(text: string): string {
  return chalk.cyan(text);
}

export function link(text: string): string {
  return chalk.blueBright(text);
}

export function success(text: string): string {
  return chalk.green(`✓ ${text}`);
}

export function error(text: string): string {
  return chalk.red(`Error: ${text}`);
}

export function warn(text: string): string {
  return chalk.yellow(`⚠ ${text}`);
}

export function info(text: string): string {
  return chalk.blue(`ℹ ${text}`);
}
