/**
 * Grade Command - gradekit grade
 *
 * Grades Python sources from files or directories as one batch: static
 * analysis, rubric lookup, review, duplicate detection and persistence.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { Errors } from 'gradekit-core';
import {
  StaticRubricSource,
  WorkerPoolExecutor,
  createGradingService,
  type GradedResult,
  type GradingServiceOverrides,
  type Job,
} from 'gradekit-grader';
import { collectSourceUnits } from '../services/source-collector.js';
import { cliLogger, loadRubricFile, parsePositiveInt, resolveConfig } from '../services/grader-setup.js';
import { formatBreakdown, formatScore, formatSummary, rule, statusBadge } from '../services/report-formatter.js';

export interface GradeOptions {
  topic?: string;
  student?: string;
  assignment?: string;
  callback?: string;
  rubric?: string;
  scoresDir?: string;
  workers?: number;
  concurrency?: number;
  format?: 'text' | 'json';
  verbose?: boolean;
}

function printResult(result: GradedResult, verbose: boolean): void {
  const algorithms = result.algorithms.length > 0 ? chalk.gray(` (${result.algorithms.join(', ')})`) : '';
  console.log(`  ${statusBadge(result.status)} ${chalk.bold(result.name)}  ${formatScore(result.totalScore)}${algorithms}`);

  if (verbose && result.breakdown) {
    console.log(chalk.gray(`          ${formatBreakdown(result.breakdown)}`));
  }
  if (verbose && result.reasoning) {
    console.log(chalk.gray(`          ${result.reasoning}`));
  }
  for (const note of result.notes) {
    console.log(chalk.yellow(`          ! ${note}`));
  }
}

function printJob(job: Job, verbose: boolean): void {
  console.log();
  console.log(chalk.bold(`📝 gradekit - Job ${job.id}`));
  console.log(rule());

  if (job.status === 'failed') {
    console.log(chalk.red(`  Failed: ${job.error ?? 'unknown error'}`));
    console.log();
    return;
  }

  for (const result of job.results ?? []) {
    printResult(result, verbose);
  }

  console.log(rule());
  if (job.summary) {
    console.log(`  ${formatSummary(job.summary)}`);
  }
  console.log();
}

async function gradeAction(paths: string[], options: GradeOptions): Promise<void> {
  const verbose = options.verbose ?? false;
  const logger = cliLogger(verbose);

  const { units, skipped } = await collectSourceUnits(paths);
  for (const path of skipped) {
    logger.warn(`Skipping '${path}': not a Python source`);
  }

  const overrides: GradingServiceOverrides = { startReaper: false, logger };
  if (options.rubric) {
    overrides.rubrics = new StaticRubricSource(await loadRubricFile(options.rubric));
  }
  if (options.workers) {
    overrides.executor = new WorkerPoolExecutor({ size: options.workers, logger: logger.child('workers') });
  }

  const { orchestrator } = createGradingService(
    resolveConfig({ scoresDir: options.scoresDir, maxConcurrency: options.concurrency }),
    overrides
  );

  let job: Job;
  try {
    job = await orchestrator.gradeNow({
      units,
      topic: options.topic,
      student: options.student,
      assignmentCode: options.assignment,
      callbackUrl: options.callback,
    });
  } finally {
    await orchestrator.shutdown();
  }

  if (options.format === 'json') {
    console.log(JSON.stringify(job, null, 2));
  } else {
    printJob(job, verbose);
  }

  if (job.status === 'failed') {
    throw Errors.jobFailed(job.error ?? 'grading failed');
  }
}

export const gradeCommand = new Command('grade')
  .description('Grade Python sources as one submission')
  .argument('<paths...>', 'Python files or directories containing them')
  .option('-t, --topic <topic>', 'Problem key for the rubric lookup (defaults to each file name)')
  .option('-s, --student <name>', 'Submitter, e.g. "S01 - Alice Smith"')
  .option('-a, --assignment <code>', 'Assignment code stored with the scores')
  .option('--callback <url>', 'Webhook notified when grading completes')
  .option('-r, --rubric <file>', 'Grade against a rubric JSON file instead of the problem bank')
  .option('--scores-dir <dir>', 'Directory of the JSON score store')
  .option('-w, --workers <count>', 'Analyze on a pool of worker threads (compiled builds)', parsePositiveInt)
  .option('-c, --concurrency <count>', 'Files graded at once', parsePositiveInt)
  .option('-f, --format <format>', 'Output format (text, json)', 'text')
  .option('--verbose', 'Show score breakdowns, reviewer commentary and debug logs')
  .action(gradeAction);
