/**
 * Node Kinds
 *
 * The closed set of tree-sitter-python node types the analyzers react to,
 * plus small helpers for walking a tree.
 */

import type { TreeSitterNode } from '../parsers/tree-sitter/types.js';

export const TRACKED_NODE_KINDS = [
  // Control flow
  'for_statement',
  'while_statement',
  'if_statement',
  'elif_clause',

  // Definitions
  'function_definition',
  'class_definition',

  // Imports
  'import_statement',
  'import_from_statement',

  // Expressions
  'assignment',
  'binary_operator',
  'subscript',
  'call',
  'identifier',

  // Collections
  'list',
  'list_comprehension',
  'dictionary',
  'dictionary_comprehension',
  'set',
  'set_comprehension',
  'tuple',
  'tuple_pattern',
  'pattern_list',
  'expression_list',
] as const;

export type TrackedNodeKind = (typeof TRACKED_NODE_KINDS)[number];

const TRACKED = new Set<string>(TRACKED_NODE_KINDS);

export function isTrackedNodeKind(type: string): type is TrackedNodeKind {
  return TRACKED.has(type);
}

/**
 * Nodes that only delimit scope and carry no structure of their own.
 */
export const SCOPE_MARKER_KINDS: ReadonlySet<string> = new Set(['module', 'block', 'comment']);

/**
 * Compile-time exhaustiveness guard for switches over TrackedNodeKind.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled node kind: ${String(value)}`);
}

/**
 * Pre-order traversal over named nodes, root included.
 */
export function* walkNamed(root: TreeSitterNode): Generator<TreeSitterNode> {
  const stack: TreeSitterNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) {
      break;
    }
    yield node;
    const children = node.namedChildren;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child) {
        stack.push(child);
      }
    }
  }
}

/**
 * Dotted module name of an import target (`os.path`, or the name behind
 * `import numpy as np`). Leading dots of relative imports are dropped.
 */
export function moduleNameOf(node: TreeSitterNode): string {
  if (node.type === 'aliased_import') {
    return node.childForFieldName('name')?.text ?? '';
  }
  return node.text.replace(/^\.+/, '');
}
