/**
 * tdlearn CLI - Statistics Display
 *
 * Table summary of per-learner trial statistics.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { LearnerStatistics } from '../../rl/types';

const last = (values: readonly number[]): number | undefined => values[values.length - 1];

/**
 * Format an optional number, '-' when no trial has been recorded
 */
export function formatValue(value: number | undefined, digits = 3): string {
  return value === undefined ? '-' : value.toFixed(digits);
}

/**
 * Build the statistics table as a string
 */
export function renderStatistics(statistics: readonly LearnerStatistics[]): string {
  const table = new Table({
    head: [
      chalk.white.bold('Learner'),
      chalk.white.bold('Trials'),
      chalk.white.bold('Accumulated reward'),
      chalk.white.bold('Known states'),
      chalk.white.bold('Temperature'),
    ],
    style: {
      head: [],
      border: ['gray'],
    },
  });

  for (const stats of statistics) {
    const knownStates = last(stats.knownStates);
    table.push([
      stats.name,
      stats.trials.toString(),
      formatValue(last(stats.accumulatedRewards)),
      knownStates === undefined ? '-' : knownStates.toString(),
      formatValue(last(stats.temperatures), 4),
    ]);
  }

  return table.toString();
}

/**
 * Print statistics for every monitored learner
 */
export function displayStatistics(statistics: readonly LearnerStatistics[]): void {
  console.log(chalk.cyan.bold('\n📊 Learner Statistics\n'));

  if (statistics.length === 0) {
    console.log(chalk.gray('No learners monitored.\n'));
    return;
  }

  console.log(renderStatistics(statistics));
}
