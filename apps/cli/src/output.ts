/**
 * chalk-based output formatting. Documents go to stdout untouched;
 * errors and warnings go to stderr.
 */

import chalk from 'chalk';
import type { UserStats } from '@brag/core';

// --- Formatting functions ---

export function formatRatio(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}

/** `Name: 3 done, 1 partial, 2 missed (60%)` */
export function formatStatsLine(name: string, stats: UserStats): string {
  const doneLabel = stats.done > 0 ? chalk.green(`${stats.done} done`) : chalk.dim('0 done');
  const partialLabel = stats.partial > 0 ? chalk.yellow(`${stats.partial} partial`) : chalk.dim('0 partial');
  const missedLabel = stats.missed > 0 ? chalk.red(`${stats.missed} missed`) : chalk.dim('0 missed');
  return `${chalk.bold(name)}: ${doneLabel}, ${partialLabel}, ${missedLabel} (${formatRatio(stats.completionRatio)})`;
}

// --- Basic output ---

export function heading(message: string): void {
  console.log(chalk.bold.underline(message));
}

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function warning(message: string): void {
  console.error(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

/** Raw document text, never coloured so it can be piped back in */
export function document(text: string): void {
  console.log(text);
}
