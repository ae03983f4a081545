import { describe, it, expect } from 'vitest';
import { formatBreakdown, formatScore, formatStats, formatSummary } from '../report-formatter.js';

describe('report formatter', () => {
  it('formats scores out of 100', () => {
    expect(formatScore(77)).toBe('77/100');
    expect(formatScore(null)).toBe('n/a');
  });

  it('formats a breakdown with each maximum', () => {
    expect(formatBreakdown({ total: 77, logic: 29, algorithm: 33, style: 8, optimization: 7 })).toBe(
      'logic 29/40, algorithm 33/40, style 8/10, optimization 7/10'
    );
  });

  it('formats a job summary', () => {
    expect(formatSummary({ fileCount: 3, avgScore: 68.5, elapsedSeconds: 1.2, persistedCount: 3 })).toBe(
      '3 file(s), avg 68.5, 1.2s, 3 saved'
    );
    expect(formatSummary({ fileCount: 1, avgScore: null, elapsedSeconds: 0, persistedCount: 0 })).toBe(
      '1 file(s), no scores, 0s, 0 saved'
    );
  });

  it('formats stats one per line', () => {
    const lines = formatStats({
      totalSubmissions: 4,
      avgScore: 54.8,
      maxScore: 100,
      minScore: 0,
      passed: 2,
      failed: 1,
      flagged: 1,
    });

    expect(lines[0]).toBe('Submissions: 4');
    expect(lines[2]).toBe('Range:       0 - 100');
    expect(lines).toHaveLength(6);
  });
});
