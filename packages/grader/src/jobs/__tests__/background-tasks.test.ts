import { describe, it, expect } from 'vitest';
import { Logger } from 'gradekit-core';
import { BackgroundTaskRunner } from '../background-tasks.js';

const later = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

describe('BackgroundTaskRunner', () => {
  it('tracks tasks until they settle', async () => {
    const runner = new BackgroundTaskRunner(new Logger('test', { sink: () => undefined }));
    const done: string[] = [];

    runner.spawn('slow', async () => {
      await later(10);
      done.push('slow');
    });
    runner.spawn('fast', async () => {
      done.push('fast');
    });

    expect(runner.size).toBe(2);
    await runner.drain();

    expect(done).toEqual(['fast', 'slow']);
    expect(runner.size).toBe(0);
  });

  it('logs a failing task without rejecting drain', async () => {
    const lines: string[] = [];
    const runner = new BackgroundTaskRunner(new Logger('test', { sink: (_level, line) => lines.push(line) }));

    runner.spawn('doomed', async () => {
      throw new Error('boom');
    });
    await runner.drain();

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("[ERROR] [test] Background task 'doomed' failed boom");
  });

  it('waits for tasks spawned while draining', async () => {
    const runner = new BackgroundTaskRunner(new Logger('test', { sink: () => undefined }));
    const done: string[] = [];

    runner.spawn('parent', async () => {
      await later(5);
      runner.spawn('child', async () => {
        await later(5);
        done.push('child');
      });
      done.push('parent');
    });
    await runner.drain();

    expect(done).toEqual(['parent', 'child']);
  });
});
