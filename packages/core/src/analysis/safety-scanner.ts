/**
 * Safety Scanner
 *
 * Flags imports and calls that give submitted code access to the host:
 * the filesystem, processes, the network, object deserialization or raw
 * memory. A single match invalidates the submission.
 */

import type { TreeSitterNode } from '../parsers/tree-sitter/types.js';
import { moduleNameOf, walkNamed } from './node-kinds.js';

export const FORBIDDEN_MODULES: ReadonlySet<string> = new Set([
  'os',
  'sys',
  'subprocess',
  'shutil',
  'socket',
  'requests',
  'pickle',
  'urllib',
  'ctypes',
]);

export const FORBIDDEN_CALLS: ReadonlySet<string> = new Set(['exec', 'eval', 'compile', 'open', '__import__']);

function rootModule(name: string): string {
  return name.split('.')[0] ?? '';
}

/**
 * Collect one message per forbidden construct, in source order.
 */
export function scanForViolations(root: TreeSitterNode): string[] {
  const violations: string[] = [];

  for (const node of walkNamed(root)) {
    switch (node.type) {
      case 'import_statement':
        for (const target of node.namedChildren) {
          const name = moduleNameOf(target);
          if (FORBIDDEN_MODULES.has(rootModule(name))) {
            violations.push(`Forbidden import: ${name}`);
          }
        }
        break;

      case 'import_from_statement': {
        const moduleNode = node.childForFieldName('module_name');
        const name = moduleNode ? moduleNameOf(moduleNode) : '';
        if (name && FORBIDDEN_MODULES.has(rootModule(name))) {
          violations.push(`Forbidden module import: ${name}`);
        }
        break;
      }

      case 'call': {
        const fn = node.childForFieldName('function');
        if (fn?.type === 'identifier' && FORBIDDEN_CALLS.has(fn.text)) {
          violations.push(`Unsafe call: ${fn.text}()`);
        }
        break;
      }

      default:
        break;
    }
  }

  return violations;
}
