/**
 * Messages exchanged between the worker pool and analysis workers.
 */

import type { AnalysisResult, SourceUnit } from 'gradekit-core';

export interface WorkerRequest {
  id: number;
  unit: SourceUnit;
}

export type WorkerResponse =
  | { id: number; ok: true; result: AnalysisResult }
  | { id: number; ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isWorkerRequest(value: unknown): value is WorkerRequest {
  if (!isRecord(value) || typeof value['id'] !== 'number') return false;
  const unit = value['unit'];
  return isRecord(unit) && typeof unit['name'] === 'string' && typeof unit['text'] === 'string';
}

export function isWorkerResponse(value: unknown): value is WorkerResponse {
  if (!isRecord(value) || typeof value['id'] !== 'number') return false;
  if (value['ok'] === false) return typeof value['error'] === 'string';
  const result = value['result'];
  return (
    value['ok'] === true &&
    isRecord(result) &&
    typeof result['name'] === 'string' &&
    typeof result['valid'] === 'boolean' &&
    Array.isArray(result['algorithms']) &&
    Array.isArray(result['notes'])
  );
}
