/**
 * Review Prompt Builder
 *
 * Assembles the reviewer prompt from the source, a one-line analysis
 * summary and whatever grading criteria the problem bank returned.
 */

import type { AnalysisResult } from 'gradekit-core';
import { criteriaText, hasContent, hasGradingCriteria, type RubricData } from './types.js';

export function summarizeAnalysis(analysis: AnalysisResult): string {
  const features = analysis.features;
  const algorithms = analysis.algorithms.length > 0 ? analysis.algorithms.join(', ') : 'Basic Logic';

  return [
    `Algorithms: ${algorithms}`,
    `Complexity: ${analysis.complexity}`,
    `Loops: ${features?.loops ?? 0}`,
    `Recursion: ${features?.recursion ?? false}`,
    `Classes: ${features?.classDefined ?? false}`,
    `Functions: ${features?.functions ?? 0}`,
  ].join(' | ');
}

function criteriaSection(rubric: RubricData | null): string {
  if (rubric && hasContent(rubric.rubric)) {
    return `GRADING RUBRIC (from the problem bank):\n${criteriaText(rubric.rubric)}`;
  }

  if (rubric && hasContent(rubric.requirements)) {
    return [
      `PROBLEM REQUIREMENTS:\n${criteriaText(rubric.requirements)}`,
      '',
      'GRADING CRITERIA: the problem bank has no specific rubric for this problem.',
      'Grade on correctness of the logic, fitness of the algorithm, code style and optimization.',
    ].join('\n');
  }

  return [
    'NOTE: no problem bank is connected, so there are NO grading criteria for this problem.',
    'Review the code for:',
    '- Is the logic correct?',
    '- Does the algorithm suit the data-structures problem?',
    '- Is the code clean and readable?',
    '- Is it efficient?',
    'Do NOT give a numeric score. Comment and suggest only.',
  ].join('\n');
}

const REVIEWER_BRIEF = `You are a senior developer reviewing a student's data structures and algorithms submission.
Grade it strictly, the way you would review a real pull request: working code is not the same as good code.

DEDUCTIONS:
- Runs but the logic is wrong: minus 15-20 points.
- Unhandled edge cases (empty input, null, negatives, duplicates): minus 5-10 points each.
- Hard-coded results: 0 points.
- Brute force O(n^2) where O(n log n) or O(n) exists: minus 15-20 points.
- Meaningless names such as "a", "x", "temp", "data1": minus 3-5 points.
- No comments or docstrings: minus 3 points.
- Copy-pasted repetition: minus 5 points.
- Unused imports, dead code, leftover debug prints: minus 2-3 points.

SCALE:
- 90-100: excellent, production quality, optimal complexity.
- 75-89: good idea and suitable algorithm, room to improve.
- 60-74: works but reads as junior code.
- 40-59: logic errors, unsuitable algorithm, hard to read.
- 0-39: fundamentally wrong or hard-coded.`;

export function buildReviewPrompt(code: string, analysis: AnalysisResult, rubric: RubricData | null): string {
  const criteriaPresent = hasGradingCriteria(rubric);

  return `${REVIEWER_BRIEF}

${criteriaSection(rubric)}

AUTOMATED ANALYSIS:
${summarizeAnalysis(analysis)}

SOURCE UNDER REVIEW:
\`\`\`python
${code}
\`\`\`

Reply with JSON only (no markdown, no extra text):
{
  "has_rubric": ${criteriaPresent ? 'true' : 'false'},
  "total_score": <0-100 when criteria exist, otherwise null>,
  "breakdown": {
    "logic_score": <0-40>,
    "algorithm_score": <0-40>,
    "style_score": <0-10>,
    "optimization_score": <0-10>
  },
  "detected_algo": "<algorithm name, e.g. Binary Search, BFS, Merge Sort>",
  "strengths": "<2-3 points that earned credit>",
  "weaknesses": "<2-4 concrete problems, with line references where possible>",
  "reasoning_feedback": "<5-7 sentences explaining the grade>",
  "improvement_feedback": "<prioritized, concrete suggestions>",
  "complexity_analysis": "<Time: O(?), Space: O(?) and why>"
}`;
}
