import { describe, it, expect, beforeAll } from 'vitest';
import { PythonSourceParser } from '../python-source-parser.js';

describe('PythonSourceParser', () => {
  let parser: PythonSourceParser;

  beforeAll(() => {
    parser = new PythonSourceParser();
  });

  it.skipIf(!PythonSourceParser.isAvailable())('returns the tree of a valid module', () => {
    const result = parser.parse('def add(a, b):\n    return a + b\n');

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.tree.rootNode.type).toBe('module');
      expect(result.tree.rootNode.namedChildren[0]?.type).toBe('function_definition');
    }
  });

  it.skipIf(!PythonSourceParser.isAvailable())('locates the first syntax problem by line', () => {
    const result = parser.parse('a = 1\nb = 2\nc = = 3\n');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.line).toBe(3);
      expect(result.error.message.length).toBeGreaterThan(0);
    }
  });

  it.skipIf(!PythonSourceParser.isAvailable())('parses an empty source', () => {
    const result = parser.parse('');

    expect(result.success).toBe(true);
  });

  it.skipIf(!PythonSourceParser.isAvailable())('handles sources larger than the default buffer', () => {
    const source = Array.from({ length: 3000 }, (_, i) => `value_${i} = ${i}`).join('\n') + '\n';

    const result = parser.parse(source);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.tree.rootNode.namedChildren).toHaveLength(3000);
    }
  });

  it.skipIf(!PythonSourceParser.isAvailable())('reports an expired parse timeout as a parse error', () => {
    const source = `x = [${Array.from({ length: 200000 }, (_, i) => i).join(', ')}]\n`;
    const hurried = new PythonSourceParser(0.001);

    const result = hurried.parse(source);

    expect(result).toEqual({ success: false, error: { line: 0, message: 'parse timed out' } });
  });
});
