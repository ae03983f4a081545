/**
 * Worker Pool Executor
 *
 * Fixed pool of worker threads running the static analyzer. Requests
 * queue while every worker is busy. A worker that crashes fails its
 * in-flight request and is replaced.
 */

import { Worker } from 'node:worker_threads';
import { Errors, createLogger, type AnalysisResult, type Logger, type SourceUnit } from 'gradekit-core';
import type { AnalysisExecutor } from './analysis-executor.js';
import { isWorkerResponse, type WorkerRequest } from './worker-protocol.js';

export interface WorkerPoolOptions {
  size: number;
  /** Compiled worker script (default: analysis-worker.js beside this module) */
  workerUrl?: URL;
  logger?: Logger;
}

interface Task {
  request: WorkerRequest;
  resolve: (result: AnalysisResult) => void;
  reject: (error: Error) => void;
}

export class WorkerPoolExecutor implements AnalysisExecutor {
  private readonly workerUrl: URL;
  private readonly logger: Logger;
  private readonly idle: Worker[] = [];
  private readonly busy = new Map<Worker, Task>();
  private readonly queue: Task[] = [];
  private nextId = 0;
  private closed = false;

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw Errors.invalidArgument('size', 'must be a positive integer');
    }
    this.workerUrl = options.workerUrl ?? new URL('./analysis-worker.js', import.meta.url);
    this.logger = options.logger ?? createLogger('worker-pool');

    for (let i = 0; i < options.size; i++) {
      this.idle.push(this.spawn());
    }
  }

  get size(): number {
    return this.idle.length + this.busy.size;
  }

  analyze(unit: SourceUnit): Promise<AnalysisResult> {
    if (this.closed) {
      return Promise.reject(Errors.shutdown());
    }

    return new Promise<AnalysisResult>((resolve, reject) => {
      this.queue.push({ request: { id: this.nextId++, unit }, resolve, reject });
      this.dispatch();
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const task of this.queue.splice(0)) {
      task.reject(Errors.shutdown());
    }
    const workers = [...this.idle, ...this.busy.keys()];
    this.idle.length = 0;
    for (const [, task] of this.busy) {
      task.reject(Errors.shutdown());
    }
    this.busy.clear();
    await Promise.all(workers.map(worker => worker.terminate()));
  }

  private spawn(): Worker {
    const worker = new Worker(this.workerUrl);

    worker.on('message', (message: unknown) => {
      const task = this.busy.get(worker);
      if (!task) return;

      if (!isWorkerResponse(message) || message.id !== task.request.id) {
        this.logger.error(`Unexpected message from analysis worker for ${task.request.unit.name}`);
        return;
      }

      this.busy.delete(worker);
      this.idle.push(worker);

      if (message.ok) {
        task.resolve(message.result);
      } else {
        task.reject(Errors.jobFailed(`Analysis of ${task.request.unit.name} failed: ${message.error}`));
      }
      this.dispatch();
    });

    worker.on('error', (error: Error) => {
      this.logger.error('Analysis worker crashed', error);
      this.replace(worker, error);
    });

    worker.on('exit', code => {
      if (!this.closed && code !== 0) {
        this.replace(worker, new Error(`worker exited with code ${code}`));
      }
    });

    return worker;
  }

  private replace(worker: Worker, error: Error): void {
    // 'error' is followed by 'exit'; only the first retires the worker
    if (!this.busy.has(worker) && !this.idle.includes(worker)) {
      return;
    }

    const task = this.busy.get(worker);
    this.busy.delete(worker);
    const idleIndex = this.idle.indexOf(worker);
    if (idleIndex >= 0) {
      this.idle.splice(idleIndex, 1);
    }

    if (task) {
      task.reject(Errors.jobFailed(`Analysis of ${task.request.unit.name} failed: ${error.message}`));
    }

    if (!this.closed) {
      this.idle.push(this.spawn());
      this.dispatch();
    }
  }

  private dispatch(): void {
    while (this.idle.length > 0 && this.queue.length > 0) {
      const worker = this.idle.pop();
      const task = this.queue.shift();
      if (!worker || !task) break;
      this.busy.set(worker, task);
      worker.postMessage(task.request);
    }
  }
}
