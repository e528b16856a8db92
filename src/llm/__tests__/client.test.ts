import { afterEach, describe, it, expect, vi } from 'vitest';
import { OllamaClient, disabledLanguageModel } from '../client.js';
import {
  parseJsonResponse,
  toAssignmentItems,
  toCourseListItems,
  toCoursePageVerdict,
} from '../prompts.js';

const options = { baseUrl: 'http://localhost:11434', model: 'llama3.1', timeoutMs: 1000 };

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OllamaClient', () => {
  it('probes availability once', async () => {
    const fetchMock = vi.fn(async () => new Response('{"models": []}', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const client = new OllamaClient(options);

    expect(await client.isAvailable()).toBe(true);
    expect(await client.isAvailable()).toBe(true);
    expect(fetchMock).toHaveBeenCalledOnce();
  });

  it('is unavailable when the server cannot be reached', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );
    expect(await new OllamaClient(options).isAvailable()).toBe(false);
  });

  it('returns the trimmed completion', async () => {
    const fetchMock = vi.fn(
      async (_url: string, _init?: RequestInit) =>
        new Response(JSON.stringify({ response: '  [{"name": "Algebra"}]\n' }), { status: 200 })
    );
    vi.stubGlobal('fetch', fetchMock);

    const output = await new OllamaClient(options).complete('List the courses');

    expect(output).toBe('[{"name": "Algebra"}]');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/generate');
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: 'llama3.1',
      prompt: 'List the courses',
      stream: false,
    });
  });

  it('returns an empty completion on HTTP errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('busy', { status: 503 })));
    expect(await new OllamaClient(options).complete('hello')).toBe('');
  });

  it('has a disabled stand-in', async () => {
    expect(await disabledLanguageModel.isAvailable()).toBe(false);
    expect(await disabledLanguageModel.complete('hello')).toBe('');
  });
});

describe('parseJsonResponse', () => {
  it('strips a Markdown fence', () => {
    expect(parseJsonResponse('```json\n{"is_course": true}\n```')).toEqual({ is_course: true });
    expect(parseJsonResponse('```\n[1, 2]\n```')).toEqual([1, 2]);
  });

  it('returns null for empty or invalid output', () => {
    expect(parseJsonResponse('')).toBeNull();
    expect(parseJsonResponse('Here are the courses: none')).toBeNull();
  });
});

describe('shape guards', () => {
  it('reads course list items', () => {
    expect(toCourseListItems([{ name: ' Algebra ', url: '/course/view.php?id=3' }, 7, { name: 1 }])).toEqual([
      { name: 'Algebra', url: '/course/view.php?id=3' },
      { name: '', url: '' },
    ]);
    expect(toCourseListItems({ name: 'Algebra' })).toEqual([]);
  });

  it('requires a boolean verdict', () => {
    expect(toCoursePageVerdict({ is_course: 'yes' })).toBeNull();
    expect(toCoursePageVerdict({ is_course: true })).toEqual({ is_course: true, course_name: '' });
    expect(toCoursePageVerdict(null)).toBeNull();
  });

  it('reads assignment items', () => {
    expect(toAssignmentItems([{ title: 'Essay', url: '/mod/assign/view.php?id=1' }])).toEqual([
      { title: 'Essay', due_date: '', url: '/mod/assign/view.php?id=1', type: '' },
    ]);
  });
});
