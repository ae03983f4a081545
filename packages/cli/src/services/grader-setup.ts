/**
 * Grader Setup Service
 *
 * Configuration and logging shared by the commands that talk to the
 * grader. Every log line goes to stderr so JSON output on stdout stays
 * parseable.
 */

import * as fs from 'node:fs/promises';
import { InvalidArgumentError } from 'commander';
import { Errors, createLogger, errorMessage, type LogSink, type Logger } from 'gradekit-core';
import { RubricDataSchema, configFromEnv, type GraderConfig, type RubricData } from 'gradekit-grader';

export const stderrSink: LogSink = (_level, line) => {
  console.error(line);
};

export function cliLogger(verbose: boolean | undefined): Logger {
  return createLogger('gradekit', { minLevel: verbose ? 'debug' : 'warn', sink: stderrSink });
}

/**
 * Environment configuration with command-line values on top.
 */
export function resolveConfig(overrides: Partial<GraderConfig>): Partial<GraderConfig> {
  const config = configFromEnv();
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      continue;
    }
    Object.assign(config, { [key]: value });
  }
  return config;
}

/**
 * Commander parser for options that take a positive integer.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Load a rubric from a JSON file with the problem bank's shape.
 */
export async function loadRubricFile(filePath: string): Promise<RubricData> {
  let data: unknown;
  try {
    data = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw Errors.invalidArgument('rubric', `cannot read '${filePath}': ${errorMessage(error)}`);
  }

  const parsed = RubricDataSchema.safeParse(data);
  if (!parsed.success) {
    throw Errors.invalidArgument('rubric', `'${filePath}' is not a rubric object`);
  }
  return parsed.data;
}
