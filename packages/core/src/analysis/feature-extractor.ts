/**
 * Syntax Feature Extractor
 *
 * One pre-order walk over a Python tree that counts control flow, notes
 * which data structures and techniques show up, collects the names in
 * play and records the node-type sequence used for fingerprinting.
 */

import type { TreeSitterNode } from '../parsers/tree-sitter/types.js';
import type { FeatureRecord } from './types.js';
import {
  SCOPE_MARKER_KINDS,
  assertNever,
  isTrackedNodeKind,
  moduleNameOf,
  type TrackedNodeKind,
} from './node-kinds.js';

const MEMO_NAME_PARTS = ['dp', 'memo', 'cache', 'table'] as const;

const PAIR_TARGETS: ReadonlySet<string> = new Set(['pattern_list', 'tuple_pattern']);
const PAIR_VALUES: ReadonlySet<string> = new Set(['expression_list', 'tuple']);

/**
 * Extract the feature record of a parsed module.
 */
export function extractFeatures(root: TreeSitterNode): FeatureRecord {
  return new FeatureWalk().run(root);
}

/**
 * Decision-point count: one path plus one per loop and per conditional.
 */
export function cyclomaticComplexity(features: Pick<FeatureRecord, 'loops' | 'conditionals'>): number {
  return 1 + features.loops + features.conditionals;
}

function sameNode(a: TreeSitterNode, b: TreeSitterNode): boolean {
  return a.type === b.type && a.startIndex === b.startIndex && a.endIndex === b.endIndex;
}

function isHalving(node: TreeSitterNode): boolean {
  const operator = node.childForFieldName('operator')?.type;
  const right = node.childForFieldName('right');
  if (right?.type !== 'integer') {
    return false;
  }
  return (operator === '//' && right.text === '2') || (operator === '>>' && right.text === '1');
}

function isMemoName(name: string): boolean {
  return MEMO_NAME_PARTS.some(part => name.includes(part));
}

interface EnterOutcome {
  /** Child that is neither tokenized nor dispatched (a definition's name) */
  skip?: TreeSitterNode | null;
  /** Runs after the node's subtree has been walked */
  exit?: () => void;
}

class FeatureWalk {
  private readonly record: FeatureRecord = {
    loops: 0,
    conditionals: 0,
    functions: 0,
    maxLoopDepth: 0,
    nestedLoops: false,
    recursion: false,
    classDefined: false,
    dataStructures: { sequence: false, mapping: false, set: false, pair: false, deque: false },
    functionNames: [],
    referencedNames: [],
    imports: [],
    hints: { swap: false, halving: false, memo: false, matrix: false },
    nodeTokens: [],
  };

  private readonly imports = new Set<string>();
  private readonly enclosingFunctions: string[] = [];
  private loopDepth = 0;
  private whileDepth = 0;

  run(root: TreeSitterNode): FeatureRecord {
    this.visit(root);
    this.record.nestedLoops = this.record.maxLoopDepth > 1;
    this.record.imports = [...this.imports].sort();
    return this.record;
  }

  private visit(node: TreeSitterNode): void {
    if (!SCOPE_MARKER_KINDS.has(node.type)) {
      this.record.nodeTokens.push(node.type);
    }

    const outcome: EnterOutcome = isTrackedNodeKind(node.type) ? this.enter(node.type, node) : {};
    const skip = outcome.skip ?? null;

    for (const child of node.namedChildren) {
      if (skip && sameNode(child, skip)) {
        continue;
      }
      this.visit(child);
    }

    outcome.exit?.();
  }

  private enter(kind: TrackedNodeKind, node: TreeSitterNode): EnterOutcome {
    const ds = this.record.dataStructures;

    switch (kind) {
      case 'for_statement':
      case 'while_statement': {
        const isWhile = kind === 'while_statement';
        this.record.loops++;
        this.loopDepth++;
        if (isWhile) {
          this.whileDepth++;
        }
        this.record.maxLoopDepth = Math.max(this.record.maxLoopDepth, this.loopDepth);
        return {
          exit: () => {
            this.loopDepth--;
            if (isWhile) {
              this.whileDepth--;
            }
          },
        };
      }

      case 'if_statement':
      case 'elif_clause':
        this.record.conditionals++;
        return {};

      case 'function_definition': {
        const nameNode = node.childForFieldName('name');
        const name = nameNode?.text ?? '';
        this.record.functions++;
        this.record.functionNames.push(name.toLowerCase());
        this.enclosingFunctions.push(name);
        return {
          skip: nameNode,
          exit: () => {
            this.enclosingFunctions.pop();
          },
        };
      }

      case 'class_definition': {
        const nameNode = node.childForFieldName('name');
        this.record.classDefined = true;
        if (nameNode) {
          this.record.referencedNames.push(nameNode.text.toLowerCase());
        }
        return { skip: nameNode };
      }

      case 'import_statement':
        for (const target of node.namedChildren) {
          const name = moduleNameOf(target);
          if (name) {
            this.imports.add(name);
          }
        }
        return {};

      case 'import_from_statement': {
        const moduleNode = node.childForFieldName('module_name');
        const name = moduleNode ? moduleNameOf(moduleNode) : '';
        if (name) {
          this.imports.add(name);
          if (name.includes('collections')) {
            ds.deque = true;
          }
        }
        return {};
      }

      case 'assignment':
        this.inspectAssignment(node);
        return {};

      case 'binary_operator':
        // Halving only counts under a while loop, where a search range shrinks
        if (this.whileDepth > 0 && isHalving(node)) {
          this.record.hints.halving = true;
        }
        return {};

      case 'subscript':
        if (node.childForFieldName('value')?.type === 'subscript') {
          this.record.hints.matrix = true;
        }
        return {};

      case 'call': {
        const fn = node.childForFieldName('function');
        if (fn?.type === 'identifier' && this.enclosingFunctions.includes(fn.text)) {
          this.record.recursion = true;
        }
        return {};
      }

      case 'identifier':
        this.record.referencedNames.push(node.text.toLowerCase());
        return {};

      case 'list':
      case 'list_comprehension':
        ds.sequence = true;
        return {};

      case 'dictionary':
      case 'dictionary_comprehension':
        ds.mapping = true;
        return {};

      case 'set':
      case 'set_comprehension':
        ds.set = true;
        return {};

      case 'tuple':
      case 'tuple_pattern':
      case 'pattern_list':
      case 'expression_list':
        ds.pair = true;
        return {};

      default:
        return assertNever(kind);
    }
  }

  private inspectAssignment(node: TreeSitterNode): void {
    const left = node.childForFieldName('left');
    const right = node.childForFieldName('right');
    if (!left) {
      return;
    }

    if (
      PAIR_TARGETS.has(left.type) &&
      left.namedChildren.length === 2 &&
      right &&
      PAIR_VALUES.has(right.type) &&
      right.namedChildren.length === 2
    ) {
      this.record.hints.swap = true;
    }

    const targets = left.type === 'identifier' ? [left] : PAIR_TARGETS.has(left.type) ? left.namedChildren : [];
    for (const target of targets) {
      if (target.type === 'identifier' && isMemoName(target.text.toLowerCase())) {
        this.record.hints.memo = true;
      }
    }
  }
}
