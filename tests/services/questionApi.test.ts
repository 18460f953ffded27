import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fetchQuestion, QUESTION_HEADERS } from '../../src/services/questionApi';
import { QUESTION_TITLE } from '../../src/data/question';

const payload = {
  title: 'Test question',
  community_prediction: { q2: 0.437 },
  prediction_count: 120,
  created_time: '2024-02-01T00:00:00Z',
  close_time: '2029-12-31T00:00:00Z',
  resolution_criteria: 'Resolves YES on a test declaration.',
  description: 'Test description',
};

function respondWith(response: Response) {
  return vi.fn(async (_input: string, _init?: RequestInit) => response);
}

describe('fetchQuestion', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('requests the question endpoint with fixed headers', async () => {
    const fetchImpl = respondWith(new Response(JSON.stringify(payload), { status: 200 }));

    await fetchQuestion(23387, { baseUrl: 'https://forecasts.test', fetchImpl });

    expect(fetchImpl).toHaveBeenCalledWith('https://forecasts.test/api2/questions/23387/', {
      method: 'GET',
      headers: QUESTION_HEADERS,
    });
  });

  it('returns the snapshot on success', async () => {
    const fetchImpl = respondWith(new Response(JSON.stringify(payload), { status: 200 }));

    const result = await fetchQuestion(23387, { baseUrl: '', fetchImpl });

    expect(result).toEqual({
      status: 'ok',
      snapshot: {
        title: 'Test question',
        probability: 0.437,
        predictionCount: 120,
        createdTime: '2024-02-01T00:00:00Z',
        closeTime: '2029-12-31T00:00:00Z',
        resolutionCriteria: 'Resolves YES on a test declaration.',
        description: 'Test description',
      },
    });
  });

  it('defaults missing fields to 0 and N/A', async () => {
    const fetchImpl = respondWith(new Response('{}', { status: 200 }));

    const result = await fetchQuestion(23387, { baseUrl: '', fetchImpl });

    expect(result).toEqual({
      status: 'ok',
      snapshot: {
        title: QUESTION_TITLE,
        probability: 0,
        predictionCount: 'N/A',
        createdTime: 'N/A',
        closeTime: 'N/A',
        resolutionCriteria: 'N/A',
        description: 'N/A',
      },
    });
  });

  it('reports a missing question', async () => {
    const fetchImpl = respondWith(new Response(null, { status: 404 }));

    expect(await fetchQuestion(7, { baseUrl: '', fetchImpl })).toEqual({ status: 'not-found', questionId: 7 });
  });

  it('reports other error statuses', async () => {
    const fetchImpl = respondWith(new Response('boom', { status: 500 }));

    expect(await fetchQuestion(23387, { baseUrl: '', fetchImpl })).toEqual({
      status: 'http-error',
      httpStatus: 500,
    });
    expect(console.warn).toHaveBeenCalledWith('[QuestionApi] Unexpected response from /api2/questions/23387/: 500');
  });

  it('reports transport failures', async () => {
    const fetchImpl = vi.fn(async () => {
      throw new TypeError('Failed to fetch');
    });

    expect(await fetchQuestion(23387, { baseUrl: '', fetchImpl })).toEqual({
      status: 'transport-error',
      message: 'Failed to fetch',
    });
  });

  it('reports a body that is not JSON', async () => {
    const fetchImpl = respondWith(new Response('<html>maintenance</html>', { status: 200 }));

    const result = await fetchQuestion(23387, { baseUrl: '', fetchImpl });

    expect(result.status).toBe('parse-error');
  });

  it('reports a payload with the wrong shape', async () => {
    const fetchImpl = respondWith(
      new Response(JSON.stringify({ community_prediction: { q2: 'high' } }), { status: 200 })
    );

    const result = await fetchQuestion(23387, { baseUrl: '', fetchImpl });

    expect(result.status).toBe('parse-error');
    if (result.status === 'parse-error') {
      expect(result.message).toMatch(/^community_prediction\.q2: /);
    }
  });
});
