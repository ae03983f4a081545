/**
 * Stats Command - gradekit stats
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { JsonScoreStore, mergeConfig } from 'gradekit-grader';
import { cliLogger, resolveConfig } from '../services/grader-setup.js';
import { formatStats, rule } from '../services/report-formatter.js';

export interface StatsOptions {
  assignment?: string;
  scoresDir?: string;
  format?: 'text' | 'json';
}

async function statsAction(options: StatsOptions): Promise<void> {
  const config = mergeConfig(resolveConfig({ scoresDir: options.scoresDir }));
  const store = new JsonScoreStore({ dir: config.scoresDir, logger: cliLogger(false) });
  const stats = await store.getStats(options.assignment);

  if (options.format === 'json') {
    console.log(JSON.stringify(stats, null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold(`📈 Score statistics${options.assignment ? ` for ${options.assignment}` : ''}`));
  console.log(rule());
  for (const line of formatStats(stats)) {
    console.log(`  ${line}`);
  }
  console.log();
}

export const statsCommand = new Command('stats')
  .description('Summarize stored scores')
  .option('-a, --assignment <code>', 'Restrict to one assignment')
  .option('--scores-dir <dir>', 'Directory of the JSON score store')
  .option('-f, --format <format>', 'Output format (text, json)', 'text')
  .action(statsAction);
