/**
 * Tree-sitter Loader
 *
 * Loads the tree-sitter binding and the Python grammar on first use and
 * remembers whether that worked, so callers can degrade instead of crash.
 */

import { createRequire } from 'node:module';
import { createLogger } from '../../infrastructure/logger.js';
import type { TreeSitterParser, TreeSitterLanguage } from './types.js';

// Create require function for ESM compatibility
const require = createRequire(import.meta.url);

const logger = createLogger('tree-sitter-loader');

// ============================================
// Module State
// ============================================

/** Whether tree-sitter is available */
let treeSitterAvailable: boolean | null = null;

/** Cached tree-sitter Parser constructor */
let cachedTreeSitter: (new () => TreeSitterParser) | null = null;

/** Cached Python language */
let cachedPythonLanguage: TreeSitterLanguage | null = null;

/** Loading error message if any */
let loadingError: string | null = null;

// ============================================
// Public API
// ============================================

/**
 * Check if tree-sitter and the Python grammar can be loaded.
 *
 * The first call attempts the load; the outcome is cached.
 */
export function isTreeSitterAvailable(): boolean {
  if (treeSitterAvailable !== null) {
    return treeSitterAvailable;
  }

  try {
    loadTreeSitter();
    treeSitterAvailable = true;
  } catch (error) {
    treeSitterAvailable = false;
    loadingError = error instanceof Error ? error.message : 'Unknown error loading tree-sitter';
    logger.debug(`tree-sitter not available: ${loadingError}`);
  }

  return treeSitterAvailable;
}

/**
 * Create a new tree-sitter parser configured for Python.
 *
 * @throws Error if tree-sitter is not available
 */
export function createPythonParser(): TreeSitterParser {
  if (!isTreeSitterAvailable() || !cachedTreeSitter || !cachedPythonLanguage) {
    throw new Error(`tree-sitter is not available: ${loadingError ?? 'unknown error'}`);
  }

  const parser = new cachedTreeSitter();
  parser.setLanguage(cachedPythonLanguage);
  return parser;
}

/**
 * Get the loading error message if tree-sitter failed to load.
 */
export function getLoadingError(): string | null {
  // Ensure we've attempted to load
  isTreeSitterAvailable();
  return loadingError;
}

// ============================================
// Internal Functions
// ============================================

function loadTreeSitter(): void {
  if (cachedTreeSitter && cachedPythonLanguage) {
    return;
  }

  try {
    // tree-sitter exports the Parser constructor directly
    cachedTreeSitter = require('tree-sitter') as new () => TreeSitterParser;
  } catch (error) {
    throw new Error(
      `Failed to load tree-sitter: ${error instanceof Error ? error.message : 'unknown error'}. ` +
        'Install with: npm install tree-sitter tree-sitter-python'
    );
  }

  try {
    cachedPythonLanguage = require('tree-sitter-python') as TreeSitterLanguage;
  } catch (error) {
    // Useless without the grammar
    cachedTreeSitter = null;
    throw new Error(
      `Failed to load tree-sitter-python: ${error instanceof Error ? error.message : 'unknown error'}. ` +
        'Install with: npm install tree-sitter-python'
    );
  }

  logger.debug('tree-sitter and tree-sitter-python loaded successfully');
}
