/**
 * Scores Command - gradekit scores
 *
 * Lists stored results for a student or an assignment.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { Errors } from 'gradekit-core';
import { JsonScoreStore, mergeConfig, type ScoreRecord } from 'gradekit-grader';
import { cliLogger, resolveConfig } from '../services/grader-setup.js';
import { formatScore, rule, statusBadge } from '../services/report-formatter.js';

export interface ScoresOptions {
  student?: string;
  assignment?: string;
  scoresDir?: string;
  format?: 'text' | 'json';
}

async function scoresAction(options: ScoresOptions): Promise<void> {
  if (!options.student && !options.assignment) {
    throw Errors.invalidArgument('scores', 'pass --student <id> or --assignment <code>');
  }

  const config = mergeConfig(resolveConfig({ scoresDir: options.scoresDir }));
  const store = new JsonScoreStore({ dir: config.scoresDir, logger: cliLogger(false) });

  const records: ScoreRecord[] = options.student
    ? await store.getStudentScores(options.student)
    : await store.getAssignmentScores(options.assignment ?? '');

  if (options.format === 'json') {
    console.log(JSON.stringify(records, null, 2));
    return;
  }

  const title = options.student ? `Student ${options.student}` : `Assignment ${options.assignment ?? ''}`;
  console.log();
  console.log(chalk.bold(`📊 ${title}`));
  console.log(rule());

  if (records.length === 0) {
    console.log(chalk.gray('  No scores recorded.'));
  }
  for (const record of records) {
    const when = record.submittedAt.slice(0, 10);
    console.log(
      `  #${String(record.id).padStart(3, '0')} ${statusBadge(record.status)} ${formatScore(record.totalScore).padEnd(8)}` +
        ` ${record.studentName} ${chalk.gray(`${record.filename} ${when}`)}`
    );
  }
  console.log();
}

export const scoresCommand = new Command('scores')
  .description('List stored scores for a student or an assignment')
  .option('--student <id>', 'Student id, as in "<id> - <name>"')
  .option('-a, --assignment <code>', 'Assignment code, highest score first')
  .option('--scores-dir <dir>', 'Directory of the JSON score store')
  .option('-f, --format <format>', 'Output format (text, json)', 'text')
  .action(scoresAction);
