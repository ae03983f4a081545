import { describe, it, expect } from 'vitest';
import { PythonSourceParser, StaticAnalyzer } from 'gradekit-core';
import { analysisReport } from '../analyze.js';

describe('analysisReport', () => {
  it.skipIf(!PythonSourceParser.isAvailable())('replaces the fingerprint with its size', () => {
    const result = new StaticAnalyzer().analyze({ name: 'three.py', text: 'x = 1\n' });
    const report = analysisReport(result);

    expect('fingerprint' in report).toBe(false);
    expect(report['fingerprintSize']).toBe(result.fingerprint?.size ?? 0);
    expect(report['name']).toBe('three.py');
  });

  it('reports zero for a file without a fingerprint', () => {
    const report = analysisReport({
      name: 'bad.py',
      valid: false,
      algorithms: [],
      complexity: 0,
      maxLoopDepth: 0,
      fingerprint: null,
      fallbackScore: null,
      notes: ['Syntax error at line 1: invalid syntax'],
      status: 'FAIL',
      features: null,
      runtimeMs: 0,
    });

    expect(report).toEqual({
      name: 'bad.py',
      valid: false,
      algorithms: [],
      complexity: 0,
      maxLoopDepth: 0,
      fallbackScore: null,
      notes: ['Syntax error at line 1: invalid syntax'],
      status: 'FAIL',
      features: null,
      runtimeMs: 0,
      fingerprintSize: 0,
    });
  });
});
