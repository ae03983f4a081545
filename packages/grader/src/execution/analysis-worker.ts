/**
 * Worker thread entry point: analyzes one file per message.
 */

import { parentPort } from 'node:worker_threads';
import { StaticAnalyzer, errorMessage } from 'gradekit-core';
import { isWorkerRequest, type WorkerResponse } from './worker-protocol.js';

const analyzer = new StaticAnalyzer();

parentPort?.on('message', (message: unknown) => {
  if (!isWorkerRequest(message)) {
    return;
  }

  let response: WorkerResponse;
  try {
    response = { id: message.id, ok: true, result: analyzer.analyze(message.unit) };
  } catch (error) {
    response = { id: message.id, ok: false, error: errorMessage(error) };
  }
  parentPort?.postMessage(response);
});
