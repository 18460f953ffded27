// @vitest-environment node
import { describe, it, expect, vi } from 'vitest';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import threeRows from '../fixtures/three_rows.csv?raw';
import { DataLoadError } from '../../src/lib/errors';
import {
  createDashboardLoader,
  createServerForecastApi,
  renderPayloadModule,
} from '../../src/server/dashboardData';

const fixturesDir = join(dirname(fileURLToPath(import.meta.url)), '..', 'fixtures');

const questionBody = {
  title: 'Test question',
  community_prediction: { q2: 0.437 },
  prediction_count: 120,
  created_time: '2024-02-01T00:00:00Z',
  close_time: '2029-12-31T00:00:00Z',
  resolution_criteria: 'Resolves YES on a test declaration.',
  description: 'Test description',
};

function steppingClock() {
  let tick = 0;
  return () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++));
}

describe('createDashboardLoader', () => {
  it('loads once and serves every caller the same payload', async () => {
    const fetchImpl = vi.fn(async (_input: string, _init?: RequestInit) =>
      new Response(JSON.stringify(questionBody), { status: 200 })
    );
    const load = createDashboardLoader({
      env: { VITE_DASHBOARD_VARIANT: 'live' },
      createApi: (config) =>
        createServerForecastApi({ publicDir: fixturesDir, apiBaseUrl: config.apiBaseUrl, fetchImpl }),
      now: steppingClock(),
    });

    const first = await load();
    const second = await load();

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(first).toMatchObject({
      status: 'ready',
      context: {
        generatedAt: '2024-01-01T00:00:00.000Z',
        current: { kind: 'estimate', percentage: 43.7, sampleCount: 120 },
      },
    });
  });

  it('sends the platform request with the full header set', async () => {
    const fetchImpl = vi.fn(async (_input: string, _init?: RequestInit) =>
      new Response(JSON.stringify(questionBody), { status: 200 })
    );
    const load = createDashboardLoader({
      env: { VITE_DASHBOARD_VARIANT: 'live' },
      createApi: (config) =>
        createServerForecastApi({ publicDir: fixturesDir, apiBaseUrl: config.apiBaseUrl, fetchImpl }),
    });

    await load();

    expect(fetchImpl).toHaveBeenCalledWith('https://www.metaculus.com/api2/questions/23387/', {
      method: 'GET',
      headers: {
        'User-Agent': 'Mozilla/5.0 (compatible; pheic-forecast-dashboard/0.1)',
        Accept: 'application/json',
      },
    });
  });

  it('logs API failures to the server console and keeps serving', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const fetchImpl = vi.fn(async (_input: string, _init?: RequestInit) => new Response('boom', { status: 500 }));
    const load = createDashboardLoader({
      env: { VITE_DASHBOARD_VARIANT: 'live' },
      createApi: (config) =>
        createServerForecastApi({ publicDir: fixturesDir, apiBaseUrl: config.apiBaseUrl, fetchImpl }),
      now: steppingClock(),
    });

    expect(await load()).toMatchObject({
      status: 'ready',
      context: { current: { kind: 'no-data', reason: { status: 'http-error', httpStatus: 500 } }, observations: [] },
    });
    expect(console.warn).toHaveBeenCalledWith(
      '[QuestionApi] Unexpected response from https://www.metaculus.com/api2/questions/23387/: 500'
    );
  });

  it('reports a start-up failure as a failed payload', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const load = createDashboardLoader({
      env: { VITE_CSV_URL: '/missing.csv' },
      createApi: (config) => createServerForecastApi({ publicDir: fixturesDir, apiBaseUrl: config.apiBaseUrl }),
    });

    const payload = await load();

    expect(payload.status).toBe('failed');
    if (payload.status !== 'failed') return;
    expect(payload.error).toMatch(/^Failed to read \/missing\.csv: /);
    expect(console.error).toHaveBeenCalledWith(`[DashboardData] Start-up failed: ${payload.error}`);
  });

  it('rejects invalid configuration without touching the data', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const createApi = vi.fn(() => createServerForecastApi({ publicDir: fixturesDir, apiBaseUrl: '' }));
    const load = createDashboardLoader({ env: { VITE_DASHBOARD_VARIANT: 'hourly' }, createApi });

    const payload = await load();

    expect(payload.status).toBe('failed');
    expect(createApi).not.toHaveBeenCalled();
  });
});

describe('createServerForecastApi', () => {
  it('reads forecast files from the public directory', async () => {
    const api = createServerForecastApi({ publicDir: fixturesDir, apiBaseUrl: 'https://forecasts.test' });

    const observations = await api.loadObservations('/three_rows.csv');

    expect(observations.map((observation) => observation.probability)).toEqual([0.2, 0.5, 0.8]);
  });

  it('raises DataLoadError for a missing file', async () => {
    const api = createServerForecastApi({ publicDir: fixturesDir, apiBaseUrl: 'https://forecasts.test' });

    await expect(api.loadObservations('/missing.csv')).rejects.toThrow(DataLoadError);
  });

  it('downloads remote forecast files', async () => {
    const fetchImpl = vi.fn(async (_input: string, _init?: RequestInit) => new Response(threeRows, { status: 200 }));
    const api = createServerForecastApi({ publicDir: fixturesDir, apiBaseUrl: 'https://forecasts.test', fetchImpl });

    const observations = await api.loadObservations('https://data.test/forecast.csv');

    expect(observations).toHaveLength(3);
    expect(fetchImpl).toHaveBeenCalledWith('https://data.test/forecast.csv', undefined);
  });
});

describe('renderPayloadModule', () => {
  it('exports the payload as the default export', () => {
    expect(renderPayloadModule({ status: 'failed', error: 'Invalid VITE_QUESTION_ID "abc"' })).toBe(
      'export default {"status":"failed","error":"Invalid VITE_QUESTION_ID \\"abc\\""};\n'
    );
  });
});
