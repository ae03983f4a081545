/**
 * Analyze Command - gradekit analyze
 *
 * Static analysis of one file without review, rubric or persistence.
 */

import { Command } from 'commander';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import chalk from 'chalk';
import { StaticAnalyzer, type AnalysisResult } from 'gradekit-core';
import { formatBreakdown, rule, statusBadge } from '../services/report-formatter.js';

export interface AnalyzeOptions {
  format?: 'text' | 'json';
}

/**
 * JSON form of an analysis: the fingerprint is reduced to its size.
 */
export function analysisReport(result: AnalysisResult): Record<string, unknown> {
  const { fingerprint, ...rest } = result;
  return { ...rest, fingerprintSize: fingerprint?.size ?? 0 };
}

async function analyzeAction(file: string, options: AnalyzeOptions): Promise<void> {
  const text = await fs.readFile(file, 'utf-8');
  const result = new StaticAnalyzer().analyze({ name: path.basename(file), text });

  if (options.format === 'json') {
    console.log(JSON.stringify(analysisReport(result), null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold(`🔍 ${result.name}`) + `  ${statusBadge(result.status)}`);
  console.log(rule());

  if (!result.valid) {
    for (const note of result.notes) {
      console.log(chalk.red(`  ${note}`));
    }
    console.log();
    return;
  }

  const features = result.features;
  console.log(`  Algorithms:     ${result.algorithms.length > 0 ? result.algorithms.join(', ') : chalk.gray('none detected')}`);
  console.log(`  Complexity:     ${result.complexity}`);
  console.log(`  Loop depth:     ${result.maxLoopDepth}`);
  if (features) {
    console.log(`  Functions:      ${features.functions}${features.recursion ? chalk.cyan(' (recursive)') : ''}`);
    console.log(`  Classes:        ${features.classDefined ? 'yes' : 'no'}`);
    if (features.imports.length > 0) {
      console.log(`  Imports:        ${features.imports.join(', ')}`);
    }
  }
  if (result.fallbackScore) {
    console.log(`  Static score:   ${result.fallbackScore.total}/100`);
    console.log(chalk.gray(`                  ${formatBreakdown(result.fallbackScore)}`));
  }
  console.log(chalk.gray(`  Analyzed in ${result.runtimeMs.toFixed(1)} ms`));
  console.log();
}

export const analyzeCommand = new Command('analyze')
  .description('Run static analysis on a single Python file')
  .argument('<file>', 'Python source file')
  .option('-f, --format <format>', 'Output format (text, json)', 'text')
  .action(analyzeAction);
