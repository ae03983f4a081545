/**
 * Report Formatter
 *
 * Text rendering shared by the CLI commands.
 */

import chalk from 'chalk';
import type { AnalysisStatus, ScoreBreakdown } from 'gradekit-core';
import type { JobSummary, ScoreStats } from 'gradekit-grader';

export function formatScore(score: number | null): string {
  return score === null ? 'n/a' : `${score}/100`;
}

export function formatBreakdown(breakdown: ScoreBreakdown): string {
  return (
    `logic ${breakdown.logic}/40, algorithm ${breakdown.algorithm}/40, ` +
    `style ${breakdown.style}/10, optimization ${breakdown.optimization}/10`
  );
}

export function formatSummary(summary: JobSummary): string {
  const average = summary.avgScore === null ? 'no scores' : `avg ${summary.avgScore}`;
  return `${summary.fileCount} file(s), ${average}, ${summary.elapsedSeconds}s, ${summary.persistedCount} saved`;
}

export function formatStats(stats: ScoreStats): string[] {
  return [
    `Submissions: ${stats.totalSubmissions}`,
    `Average:     ${stats.avgScore}`,
    `Range:       ${stats.minScore} - ${stats.maxScore}`,
    `Passed:      ${stats.passed}`,
    `Failed:      ${stats.failed}`,
    `Flagged:     ${stats.flagged}`,
  ];
}

export function statusBadge(status: AnalysisStatus): string {
  const label = status.padEnd(7);
  switch (status) {
    case 'PASS':
      return chalk.green(label);
    case 'FAIL':
      return chalk.red(label);
    case 'FLAG':
      return chalk.yellow(label);
    case 'PENDING':
      return chalk.gray(label);
  }
}

export function rule(width = 50): string {
  return chalk.gray('─'.repeat(width));
}
