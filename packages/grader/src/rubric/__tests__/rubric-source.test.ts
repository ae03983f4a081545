import { describe, it, expect } from 'vitest';
import { createSilentLogger } from 'gradekit-core';
import { HttpRubricSource, StaticRubricSource, problemIdOf, type FetchFn } from '../rubric-source.js';

interface Call {
  url: string;
  headers: RequestInit['headers'];
}

function fakeFetch(reply: () => Response | Error): { fetch: FetchFn; calls: Call[] } {
  const calls: Call[] = [];
  const fetch: FetchFn = async (input, init) => {
    calls.push({ url: String(input), headers: init?.headers });
    const response = reply();
    if (response instanceof Error) {
      throw response;
    }
    return response;
  };
  return { fetch, calls };
}

function source(fetch: FetchFn, apiKey: string | null = 'test-secret'): HttpRubricSource {
  return new HttpRubricSource({
    baseUrl: 'http://bank.test/',
    apiKey,
    timeoutMs: 1000,
    fetch,
    logger: createSilentLogger(),
  });
}

describe('problemIdOf', () => {
  it('drops the .py suffix and surrounding whitespace', () => {
    expect(problemIdOf(' bfs.py ')).toBe('bfs');
    expect(problemIdOf('two_sum')).toBe('two_sum');
  });
});

describe('HttpRubricSource', () => {
  it('requests the problem by id with the api key header', async () => {
    const body = { title: 'Two Sum', rubric: 'Use a hash map.', difficulty: 'easy' };
    const { fetch, calls } = fakeFetch(() => new Response(JSON.stringify(body), { status: 200 }));

    const rubric = await source(fetch).fetch('two_sum.py');

    expect(calls).toEqual([{ url: 'http://bank.test/problems/two_sum', headers: { 'x-api-key': 'test-secret' } }]);
    expect(rubric).toEqual(body);
  });

  it('encodes the id and omits the header without a key', async () => {
    const { fetch, calls } = fakeFetch(() => new Response('{}', { status: 200 }));

    await source(fetch, null).fetch('merge sort.py');

    expect(calls).toEqual([{ url: 'http://bank.test/problems/merge%20sort', headers: {} }]);
  });

  it('returns null for a missing problem', async () => {
    const { fetch } = fakeFetch(() => new Response('not found', { status: 404 }));
    expect(await source(fetch).fetch('unknown.py')).toBeNull();
  });

  it('returns null when the request fails', async () => {
    const { fetch } = fakeFetch(() => new Error('connect ECONNREFUSED'));
    expect(await source(fetch).fetch('bfs.py')).toBeNull();
  });

  it('returns null for a payload of the wrong shape', async () => {
    const { fetch } = fakeFetch(() => new Response(JSON.stringify({ title: 42 }), { status: 200 }));
    expect(await source(fetch).fetch('bfs.py')).toBeNull();
  });

  it('skips the request for an empty id', async () => {
    const { fetch, calls } = fakeFetch(() => new Response('{}', { status: 200 }));

    expect(await source(fetch).fetch('.py')).toBeNull();
    expect(calls).toEqual([]);
  });
});

describe('StaticRubricSource', () => {
  it('serves the same rubric for every key', async () => {
    const rubrics = new StaticRubricSource({ rubric: 'Any criteria' });

    expect(await rubrics.fetch('a.py')).toEqual({ rubric: 'Any criteria' });
    expect(await new StaticRubricSource().fetch('a.py')).toBeNull();
  });
});
