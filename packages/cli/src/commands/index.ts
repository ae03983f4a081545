/**
 * Commands module exports
 *
 * Exports all CLI commands for registration with Commander.js
 */

export { gradeCommand } from './grade.js';
export { analyzeCommand } from './analyze.js';
export { scoresCommand } from './scores.js';
export { statsCommand } from './stats.js';
