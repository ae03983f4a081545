#!/usr/bin/env node
/**
 * gradekit CLI Entry Point
 *
 * Sets up Commander.js with all available commands.
 */

import { Command } from 'commander';
import { isGradeKitError } from 'gradekit-core';
import { VERSION } from '../index.js';
import { analyzeCommand, gradeCommand, scoresCommand, statsCommand } from '../commands/index.js';

/**
 * Create and configure the main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('gradekit')
    .description('Static analysis and grading of Python submissions')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(gradeCommand);
  program.addCommand(analyzeCommand);
  program.addCommand(scoresCommand);
  program.addCommand(statsCommand);

  program.addHelpText(
    'after',
    `
Examples:
  $ gradekit grade submissions/              Grade every .py file in a directory
  $ gradekit grade a.py b.py -s "S01 - Alice" -a ALG01
  $ gradekit grade src/ --rubric rubric.json Grade against a local rubric
  $ gradekit grade src/ --workers 4          Analyze on worker threads
  $ gradekit grade src/ --format json        Print the finished job as JSON
  $ gradekit analyze solution.py             Static analysis of one file
  $ gradekit scores --student S01            Scores stored for a student
  $ gradekit scores --assignment ALG01       Ranking for an assignment
  $ gradekit stats --assignment ALG01        Score statistics

Environment:
  GEMINI_API_KEY            Enables the external reviewer
  GRADEKIT_RUBRIC_URL       Problem bank base URL
  GRADEKIT_LOG_LEVEL        error, warn, info or debug
`
  );

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      if (isGradeKitError(error) && error.recovery) {
        console.error(`Hint: ${error.recovery.suggestion}`);
      }
      if (process.env['DEBUG']) {
        console.error(error.stack);
      }
    } else {
      console.error('An unexpected error occurred');
    }
    process.exit(1);
  }
}

void main();
