import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import type { ChunkFailure } from '../collector/types';
import type { PipelineResult } from '../pipeline/types';
import type { TokenUsageStats } from '../types/token-usage';

function plural(count: number, noun: string): string {
  return count === 1 ? `1 ${noun}` : `${count} ${noun}s`;
}

function failureLabel(failure: ChunkFailure): string {
  switch (failure.kind) {
    case 'GenerationError':
      return chalk.red('generation');
    case 'ParseError':
      return chalk.yellow('parse');
    case 'Cancelled':
      return chalk.dim('cancelled');
  }
}

export function printFailureRow(failure: ChunkFailure, labelWidth: number = 12) {
  const loc = `#${failure.chunkIndex}`.padEnd(6, ' ');
  const colored = failureLabel(failure);
  const pad = Math.max(0, labelWidth - stripAnsi(colored).length);
  console.log(`  ${loc} ${colored}${' '.repeat(pad)}${failure.message}`);
}

export function printTokenUsage(stats: TokenUsageStats) {
  console.log(chalk.bold('\nToken Usage:'));
  console.log(`  - Input tokens: ${stats.totalInputTokens.toLocaleString('en-US')}`);
  console.log(`  - Output tokens: ${stats.totalOutputTokens.toLocaleString('en-US')}`);
  if (stats.totalCost !== undefined) {
    console.log(`  - Total cost: $${stats.totalCost.toFixed(4)}`);
  }
}

/**
 * One-screen report of a pipeline run: outcome line, chunk failures,
 * rejection counts and token usage.
 */
export function printRunSummary(result: PipelineResult) {
  const { summary } = result;

  if (result.status === 'empty') {
    console.log(`${chalk.yellow('✖')} ${result.error.message}.`);
    return;
  }

  const okMark = result.status === 'completed' && summary.run.chunksFailed === 0
    ? chalk.green('✓')
    : chalk.yellow('!');
  const faqTxt = chalk.bold(plural(summary.entries, 'FAQ'));
  const chunkTxt = plural(summary.run.totalChunks, 'chunk');
  console.log(`${okMark} ${faqTxt} from ${plural(summary.candidates, 'candidate')} in ${chunkTxt} (${summary.source}).`);

  if (result.status === 'partial') {
    console.log(chalk.yellow(`  Run stopped early: ${plural(summary.run.chunksCancelled, 'chunk')} not processed.`));
  }

  const failures = summary.run.failures.filter((f) => f.kind !== 'Cancelled');
  if (failures.length > 0) {
    console.log(chalk.red(`✖ ${plural(failures.length, 'chunk failure')}`));
    for (const failure of failures) {
      printFailureRow(failure);
    }
  }

  const reasons = Object.entries(summary.rejectedByReason);
  if (reasons.length > 0) {
    console.log(chalk.bold('\nRejected candidates:'));
    for (const [reason, count] of reasons) {
      console.log(`  - ${reason}: ${count}`);
    }
  }

  if (summary.tokenUsage) {
    printTokenUsage(summary.tokenUsage);
  }
}
