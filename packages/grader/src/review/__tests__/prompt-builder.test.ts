import { describe, it, expect } from 'vitest';
import { buildReviewPrompt, summarizeAnalysis } from '../prompt-builder.js';
import { makeAnalysis, makeFeatureSummary } from '../../__tests__/fixtures.js';

describe('summarizeAnalysis', () => {
  it('describes the detected structure on one line', () => {
    const analysis = makeAnalysis({
      algorithms: ['Binary Search', 'Recursion'],
      complexity: 4,
      features: makeFeatureSummary({ loops: 2, recursion: true, functions: 1 }),
    });

    expect(summarizeAnalysis(analysis)).toBe(
      'Algorithms: Binary Search, Recursion | Complexity: 4 | Loops: 2 | Recursion: true | Classes: false | Functions: 1'
    );
  });

  it('falls back to basic logic without algorithms or features', () => {
    const analysis = makeAnalysis({ algorithms: [], complexity: 1, features: null });

    expect(summarizeAnalysis(analysis)).toBe(
      'Algorithms: Basic Logic | Complexity: 1 | Loops: 0 | Recursion: false | Classes: false | Functions: 0'
    );
  });
});

describe('buildReviewPrompt', () => {
  it('includes the rubric text and asks for a score', () => {
    const prompt = buildReviewPrompt('print(1)', makeAnalysis(), { rubric: '  Score by correctness.  ' });

    expect(prompt).toContain('GRADING RUBRIC (from the problem bank):\nScore by correctness.');
    expect(prompt).toContain('"has_rubric": true');
    expect(prompt).toContain('```python\nprint(1)\n```');
  });

  it('renders structured requirements as JSON when there is no rubric', () => {
    const prompt = buildReviewPrompt('print(1)', makeAnalysis(), { requirements: ['sorted output'] });

    expect(prompt).toContain('PROBLEM REQUIREMENTS:\n[\n  "sorted output"\n]');
    expect(prompt).toContain('"has_rubric": true');
  });

  it('asks for commentary only without criteria', () => {
    const prompt = buildReviewPrompt('print(1)', makeAnalysis(), null);

    expect(prompt).toContain('Do NOT give a numeric score. Comment and suggest only.');
    expect(prompt).toContain('"has_rubric": false');
    expect(prompt).not.toContain('GRADING RUBRIC');
  });
});
