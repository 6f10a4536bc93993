/**
 * Terminal formatting helpers
 */

import chalk from 'chalk';
import type { MemoryItem, RetrievalResult } from '../memory/types.js';
import type { IndexListing, Recommendation, RecommendationStatus } from '../recommendations/types.js';
import { formulationSummary } from '../recommendations/performance.js';
import { ValidationError, errorMessage } from '../errors.js';

export const icons = {
  success: '\u{2705}',    // green check
  failure: '\u{274C}',    // red X
  warn: '\u{26A0}\u{FE0F}',     // warning sign
  search: '\u{1F50D}',    // magnifying glass
  brain: '\u{1F9E0}',     // brain - learning
  flask: '\u{2697}\u{FE0F}',    // alembic - experiments
  dot: '\u{2022}',        // bullet point
};

const statusColors: Record<RecommendationStatus, (text: string) => string> = {
  PENDING: chalk.yellow,
  PROCESSING: chalk.cyan,
  COMPLETED: chalk.green,
  FAILED: chalk.red,
  CANCELLED: chalk.gray,
};

export function formatStatus(status: RecommendationStatus): string {
  return statusColors[status](status.padEnd(10));
}

export function formatScore(score: number | null | undefined): string {
  if (score === null || score === undefined) return chalk.gray('-');
  const text = score.toFixed(1);
  if (score >= 7) return chalk.green(text);
  if (score >= 4) return chalk.yellow(text);
  return chalk.red(text);
}

/**
 * Format a memory item for display
 */
export function formatMemory(memory: MemoryItem, options: { full?: boolean } = {}): string {
  const icon = memory.isFromSuccess ? icons.success : icons.failure;
  const origin = memory.isFromSuccess ? chalk.green('[success]') : chalk.red('[failure]');

  let output = `${icon} ${origin} ${chalk.bold(memory.title)}`;
  output += `\n   ${chalk.white(memory.description)}`;

  if (options.full) {
    output += `\n\n${memory.content.split('\n').map((line) => `   ${line}`).join('\n')}\n`;
  }

  const details = [`created ${memory.createdAt.toISOString()}`];
  if (memory.sourceTaskId) details.push(`source ${memory.sourceTaskId}`);
  if (!memory.embedding) details.push('no embedding');
  output += `\n   ${chalk.dim(details.join(' | '))}`;

  return output;
}

/**
 * Format a search result with relevance
 */
export function formatSearchResult(result: RetrievalResult): string {
  const percentage = Math.round(result.similarity * 100);

  // Color the percentage based on relevance
  let percentColor = chalk.red;
  if (percentage >= 80) percentColor = chalk.green;
  else if (percentage >= 60) percentColor = chalk.yellow;
  else if (percentage >= 40) percentColor = chalk.cyan;

  return `${formatMemory(result.memory)}\n   ${percentColor(`${percentage}% match`)}`;
}

export function formatListing(entry: IndexListing): string {
  const summary = entry.formulationSummary ?? (entry.formulation ? formulationSummary(entry.formulation) : chalk.gray('(not migrated)'));
  return [
    formatStatus(entry.status),
    formatScore(entry.performanceScore).padStart(4),
    chalk.cyan(entry.id),
    `${entry.targetMaterial}: ${summary}`,
  ].join('  ');
}

export function formatRecommendation(rec: Recommendation): string {
  const lines = [
    keyValue('ID', chalk.cyan(rec.id)),
    keyValue('Status', formatStatus(rec.status)),
    keyValue('Material', rec.task.targetMaterial),
    keyValue('Task', rec.task.description),
  ];
  if (rec.task.targetTemperature !== undefined) {
    lines.push(keyValue('Temperature', `${rec.task.targetTemperature} °C`));
  }
  lines.push(keyValue('Formulation', formulationSummary(rec.formulation)));
  lines.push(keyValue('Confidence', rec.confidence.toFixed(2)));
  if (rec.reasoning) lines.push(keyValue('Reasoning', rec.reasoning));

  if (rec.experimentResult) {
    const r = rec.experimentResult;
    lines.push('');
    lines.push(chalk.bold(`${icons.flask} Experiment`));
    lines.push(keyValue('Liquid formed', r.isLiquidFormed ? 'yes' : 'no'));
    lines.push(keyValue('Solubility', r.solubility === null ? '-' : `${r.solubility} ${r.solubilityUnit}`));
    lines.push(keyValue('Score', formatScore(rec.performanceScore)));
    if (r.notes) lines.push(keyValue('Notes', r.notes));
  }

  if (rec.error) {
    lines.push(keyValue('Error', chalk.red(rec.error)));
  }

  lines.push(keyValue('Created', rec.createdAt.toISOString()));
  lines.push(keyValue('Updated', rec.updatedAt.toISOString()));
  return lines.join('\n');
}

/**
 * Print an empty state message
 */
export function emptyState(message: string, hint?: string): void {
  console.log();
  console.log(chalk.gray(`   ${message}`));
  if (hint) {
    console.log(chalk.gray.dim(`   ${hint}`));
  }
  console.log();
}

/**
 * Success message with green checkmark
 */
export function success(message: string): string {
  return chalk.green('✓') + ' ' + message;
}

/**
 * Warning message with yellow warning sign
 */
export function warning(message: string): string {
  return chalk.yellow('⚠') + ' ' + message;
}

/**
 * Styled header with decorative elements
 */
export function header(text: string, emoji?: string): string {
  const decoration = chalk.gray('─'.repeat(40));
  const prefix = emoji ? emoji + ' ' : '';
  return `\n${decoration}\n${prefix}${chalk.bold.cyan(text)}\n${decoration}\n`;
}

/**
 * Key-value pair display
 */
export function keyValue(key: string, value: string, keyWidth?: number): string {
  const width = keyWidth ?? 15;
  const paddedKey = key.padEnd(width);
  return `${chalk.cyan(paddedKey)} ${value}`;
}

/**
 * Print the error and exit with status 1
 */
export function exitWithError(error: unknown): never {
  const message = errorMessage(error);
  console.error(chalk.red(`Error: ${message}`));
  if (error instanceof ValidationError && error.issues.length > 1) {
    for (const issue of error.issues) {
      console.error(chalk.red(`  ${icons.dot} ${issue}`));
    }
  }
  process.exit(1);
}
