/**
 * gradekit-cli - Command-line interface for gradekit
 */

export const VERSION = '0.1.0';

export { collectSourceUnits, type CollectedSources } from './services/source-collector.js';
export {
  formatScore,
  formatBreakdown,
  formatSummary,
  formatStats,
} from './services/report-formatter.js';
