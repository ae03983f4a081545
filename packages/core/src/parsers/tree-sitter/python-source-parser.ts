/**
 * Python Source Parser
 *
 * Thin wrapper around tree-sitter-python that turns a malformed tree into
 * a located parse error instead of handing error-recovered nodes to the
 * analyzers.
 */

import { createPythonParser, getLoadingError, isTreeSitterAvailable } from './loader.js';
import type { TreeSitterNode, TreeSitterParser, TreeSitterTree } from './types.js';

/**
 * Location and description of the first syntax problem in a source.
 */
export interface SourceParseError {
  /** 1-based line number */
  line: number;
  message: string;
}

export type PythonParseResult =
  | { success: true; tree: TreeSitterTree }
  | { success: false; error: SourceParseError };

/** The node binding copies the source through a 32 KiB buffer by default */
const MIN_BUFFER_SIZE = 32 * 1024;

export class PythonSourceParser {
  private parser: TreeSitterParser | null = null;

  constructor(private readonly parseTimeoutMs: number = 5000) {}

  static isAvailable(): boolean {
    return isTreeSitterAvailable();
  }

  parse(source: string): PythonParseResult {
    if (!isTreeSitterAvailable()) {
      return {
        success: false,
        error: { line: 0, message: `Python parser unavailable: ${getLoadingError() ?? 'unknown error'}` },
      };
    }

    if (!this.parser) {
      this.parser = createPythonParser();
      if (this.parseTimeoutMs > 0) {
        this.parser.setTimeoutMicros(this.parseTimeoutMs * 1000);
      }
    }

    let tree: TreeSitterTree | null;
    try {
      tree = this.parser.parse(source, null, {
        bufferSize: Math.max(MIN_BUFFER_SIZE, source.length * 2),
      });
    } catch (error) {
      return {
        success: false,
        error: { line: 0, message: error instanceof Error ? error.message : 'Unknown parse error' },
      };
    }

    // The binding gives back no tree when setTimeoutMicros expires
    if (!tree) {
      return { success: false, error: { line: 0, message: 'parse timed out' } };
    }

    const problem = findFirstProblem(tree.rootNode);
    if (problem) {
      return { success: false, error: describeProblem(problem) };
    }

    return { success: true, tree };
  }
}

function findFirstProblem(node: TreeSitterNode): TreeSitterNode | null {
  if (node.type === 'ERROR' || node.isMissing === true) {
    return node;
  }
  for (const child of node.children) {
    const found = findFirstProblem(child);
    if (found) {
      return found;
    }
  }
  return null;
}

function describeProblem(node: TreeSitterNode): SourceParseError {
  const line = node.startPosition.row + 1;

  if (node.type !== 'ERROR') {
    return { line, message: `missing '${node.type}'` };
  }

  const snippet = node.text.split('\n')[0]?.trim().slice(0, 40) ?? '';
  return {
    line,
    message: snippet ? `invalid syntax near '${snippet}'` : 'invalid syntax',
  };
}
