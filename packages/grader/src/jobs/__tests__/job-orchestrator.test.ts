import { describe, it, expect } from 'vitest';
import { GradeKitErrorCode, createSilentLogger, isGradeKitError } from 'gradekit-core';
import { createGradingService, type GradingServiceOverrides } from '../../service.js';
import { StaticRubricSource } from '../../rubric/rubric-source.js';
import { NotificationDispatcher, type FetchFn } from '../notification-dispatcher.js';
import { EMPTY_SUBMISSION_ERROR, averageScore, decorateName } from '../job-orchestrator.js';
import {
  RecordingRepository,
  ScriptedReviewModel,
  TableExecutor,
  makeAnalysis,
  makeGraded,
} from '../../__tests__/fixtures.js';

const RUBRIC = new StaticRubricSource({ rubric: 'Use binary search.' });

type TestOverrides = Omit<GradingServiceOverrides, 'repository' | 'executor'> & {
  repository?: RecordingRepository;
  executor?: TableExecutor;
};

function service(overrides: TestOverrides = {}, maxConcurrency = 50) {
  const repository = overrides.repository ?? new RecordingRepository();
  const executor = overrides.executor ?? new TableExecutor({});
  const created = createGradingService(
    { maxConcurrency },
    {
      reviewModel: null,
      rubrics: RUBRIC,
      startReaper: false,
      logger: createSilentLogger(),
      ...overrides,
      repository,
      executor,
    }
  );
  return { ...created, repository, executor };
}

describe('decorateName', () => {
  it('prefixes the student unless the name already has one', () => {
    expect(decorateName('Alice', 'a.py')).toBe('Alice | a.py');
    expect(decorateName('Alice', 'S01 - Bob | a.py')).toBe('S01 - Bob | a.py');
  });
});

describe('averageScore', () => {
  it('averages numeric scores to one decimal', () => {
    const results = [makeGraded({ totalScore: 77 }), makeGraded({ totalScore: 60 }), makeGraded({ totalScore: null })];
    expect(averageScore(results)).toBe(68.5);
  });

  it('is null when nothing was scored', () => {
    expect(averageScore([makeGraded({ totalScore: null })])).toBeNull();
    expect(averageScore([])).toBeNull();
  });
});

describe('JobOrchestrator', () => {
  it('returns a pending snapshot before the run finishes', async () => {
    const { orchestrator } = service();

    const job = orchestrator.submit({ units: [{ name: 'a.py', text: 'x = 1' }], student: 'Alice' });

    expect(job.status).toBe('pending');
    expect(job.student).toBe('Alice');
    await orchestrator.drain();
    expect(orchestrator.requireJob(job.id).status).toBe('completed');
  });

  it('grades with the static score when the reviewer is unavailable', async () => {
    const { orchestrator, repository } = service({
      reviewModel: new ScriptedReviewModel(() => new Error('fetch failed')),
    });

    const job = await orchestrator.gradeNow({
      units: [{ name: 'search.py', text: 'x = 1' }],
      student: 'Alice',
      assignmentCode: 'ALG01',
    });

    expect(job.status).toBe('completed');
    const [result] = job.results ?? [];
    expect(result).toMatchObject({
      name: 'Alice | search.py',
      totalScore: 77,
      aiScored: false,
      hasRubric: true,
      status: 'PASS',
    });
    expect(job.summary).toMatchObject({ fileCount: 1, avgScore: 77, persistedCount: 1 });
    expect(repository.batches).toHaveLength(1);
    expect(repository.batches[0]?.assignmentCode).toBe('ALG01');
    expect(repository.batches[0]?.results.map(r => r.name)).toEqual(['Alice | search.py']);
  });

  it('leaves results pending with commentary when there is no rubric', async () => {
    const model = new ScriptedReviewModel(() =>
      JSON.stringify({ has_rubric: false, total_score: null, reasoning_feedback: 'Looks fine.' })
    );
    const { orchestrator } = service({ reviewModel: model, rubrics: new StaticRubricSource(null) });

    const job = await orchestrator.gradeNow({ units: [{ name: 'a.py', text: 'x = 1' }] });

    const [result] = job.results ?? [];
    expect(result?.totalScore).toBeNull();
    expect(result?.status).toBe('PENDING');
    expect(result?.aiScored).toBe(true);
    expect(result?.reasoning).toBe('Looks fine.');
    expect(job.summary?.avgScore).toBeNull();
    expect(job.student).toBe('Anonymous');
    expect(result?.name).toBe('Anonymous | a.py');
  });

  it('fails an empty submission', async () => {
    const { orchestrator, repository } = service();

    const job = await orchestrator.gradeNow({ units: [] });

    expect(job.status).toBe('failed');
    expect(job.error).toBe(EMPTY_SUBMISSION_ERROR);
    expect(job.results).toBeUndefined();
    expect(repository.batches).toEqual([]);
  });

  it('flags near-duplicate files in the same batch', async () => {
    const shared = new Set(['a-b-c', 'b-c-d', 'c-d-e']);
    const executor = new TableExecutor({
      'a.py': makeAnalysis({ name: 'a.py', fingerprint: shared }),
      'b.py': makeAnalysis({ name: 'b.py', fingerprint: new Set(shared) }),
      'c.py': makeAnalysis({ name: 'c.py', fingerprint: new Set(['x-y-z']) }),
    });
    const { orchestrator } = service({ executor });

    const job = await orchestrator.gradeNow({
      units: [
        { name: 'a.py', text: '' },
        { name: 'b.py', text: '' },
        { name: 'c.py', text: '' },
      ],
      student: 'Alice',
    });

    const byName = new Map((job.results ?? []).map(r => [r.name, r]));
    expect(byName.get('Alice | a.py')?.status).toBe('FLAG');
    expect(byName.get('Alice | a.py')?.notes).toEqual(['Possible duplicate: 100% structural overlap with b.py']);
    expect(byName.get('Alice | b.py')?.notes).toEqual(['Possible duplicate: 100% structural overlap with a.py']);
    expect(byName.get('Alice | c.py')?.status).toBe('PASS');
    expect(job.results?.every(r => !('fingerprint' in r))).toBe(true);
  });

  it('keeps invalid files in the batch with a zero score', async () => {
    const executor = new TableExecutor({
      'bad.py': makeAnalysis({
        name: 'bad.py',
        valid: false,
        status: 'FAIL',
        notes: ['Syntax error at line 1: missing \':\''],
        fingerprint: null,
        fallbackScore: null,
        features: null,
      }),
    });
    const { orchestrator } = service({ executor });

    const job = await orchestrator.gradeNow({
      units: [
        { name: 'bad.py', text: 'def f(' },
        { name: 'good.py', text: 'x = 1' },
      ],
    });

    expect(job.results?.map(r => [r.name, r.status, r.totalScore])).toEqual([
      ['Anonymous | bad.py', 'FAIL', 0],
      ['Anonymous | good.py', 'PASS', 77],
    ]);
    expect(job.summary?.avgScore).toBe(38.5);
  });

  it('completes with nothing persisted when the repository fails', async () => {
    const { orchestrator } = service({ repository: new RecordingRepository(new Error('disk full')) });

    const job = await orchestrator.gradeNow({ units: [{ name: 'a.py', text: 'x = 1' }] });

    expect(job.status).toBe('completed');
    expect(job.summary?.persistedCount).toBe(0);
  });

  it('fails the job with the message of an escaping error', async () => {
    const executor = new TableExecutor({ 'a.py': new Error('worker exited with code 1') });
    const { orchestrator } = service({ executor });

    const job = await orchestrator.gradeNow({ units: [{ name: 'a.py', text: 'x = 1' }] });

    expect(job.status).toBe('failed');
    expect(job.error).toBe('worker exited with code 1');
  });

  it('caps concurrent pipelines at the configured limit', async () => {
    const executor = new TableExecutor({});
    const { orchestrator } = service({ executor }, 2);

    const units = ['a', 'b', 'c', 'd', 'e'].map(n => ({ name: `${n}.py`, text: `${n} = 1` }));
    orchestrator.submit({ units });
    orchestrator.submit({ units });
    await orchestrator.drain();

    expect(executor.peak).toBe(2);
  });

  it('notifies the callback after completion', async () => {
    const posted: Array<{ url: string; body: unknown }> = [];
    const fetch: FetchFn = async (input, init) => {
      posted.push({ url: String(input), body: typeof init?.body === 'string' ? JSON.parse(init.body) : null });
      return new Response(null, { status: 200 });
    };
    const dispatcher = new NotificationDispatcher({ fetch, logger: createSilentLogger() });
    const { orchestrator } = service({ dispatcher });

    const job = await orchestrator.gradeNow({
      units: [{ name: 'a.py', text: 'x = 1' }],
      callbackUrl: 'http://hooks.test/graded',
    });

    expect(posted).toHaveLength(1);
    expect(posted[0]?.url).toBe('http://hooks.test/graded');
    expect(posted[0]?.body).toMatchObject({ event: 'grading_completed', job_id: job.id, summary: job.summary });
  });

  it('reports unknown jobs', () => {
    const { orchestrator } = service();

    expect(orchestrator.getJob('nope')).toBeNull();
    try {
      orchestrator.requireJob('nope');
      expect.unreachable();
    } catch (error) {
      expect(isGradeKitError(error, GradeKitErrorCode.JOB_NOT_FOUND)).toBe(true);
    }
  });

  it('drains, closes the executor and refuses work after shutdown', async () => {
    const { orchestrator, executor } = service();
    const job = orchestrator.submit({ units: [{ name: 'a.py', text: 'x = 1' }] });

    await orchestrator.shutdown();

    expect(orchestrator.requireJob(job.id).status).toBe('completed');
    expect(executor.closed).toBe(true);
    expect(orchestrator.accepting).toBe(false);
    expect(() => orchestrator.submit({ units: [] })).toThrow(/shutting down/);
  });
});

describe('createGradingService', () => {
  it('rejects an invalid configuration', () => {
    expect(() => createGradingService({ maxConcurrency: 0 }, { startReaper: false })).toThrow(
      /Invalid configuration: maxConcurrency must be an integer at least 1/
    );
  });
});
