import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { loadEnv, type Plugin } from 'vite';
import { pickDashboardEnv, resolveConfig, type DashboardConfig, type DashboardEnv } from '../config/dashboard';
import { buildDashboardContext } from '../lib/context';
import { DataLoadError, errorMessage } from '../lib/errors';
import { serializeContext, type DashboardPayload } from '../lib/payload';
import { createForecastApi, parseObservations, type FetchLike, type ForecastApi } from '../services';

export const DASHBOARD_MODULE_ID = 'virtual:dashboard-payload';
const RESOLVED_MODULE_ID = `\0${DASHBOARD_MODULE_ID}`;

const REMOTE_URL = /^https?:\/\//i;

export interface ServerApiOptions {
  publicDir: string;
  apiBaseUrl: string;
  fetchImpl?: FetchLike;
}

/**
 * Forecast access from the Node process: forecast files come straight from
 * the public directory, question lookups go to the platform with the full
 * header set.
 */
export function createServerForecastApi({ publicDir, apiBaseUrl, fetchImpl }: ServerApiOptions): ForecastApi {
  const remote = createForecastApi({ apiBaseUrl, fetchImpl });

  return {
    async loadObservations(url) {
      if (REMOTE_URL.test(url)) {
        return remote.loadObservations(url);
      }

      let text: string;
      try {
        text = await readFile(join(publicDir, url), 'utf8');
      } catch (error) {
        throw new DataLoadError(`Failed to read ${url}: ${errorMessage(error, 'file is unreadable')}`);
      }
      return parseObservations(text);
    },
    fetchQuestion: remote.fetchQuestion,
  };
}

export interface DashboardLoaderOptions {
  env: DashboardEnv;
  createApi: (config: DashboardConfig) => ForecastApi;
  now?: () => Date;
}

export type DashboardLoader = () => Promise<DashboardPayload>;

/**
 * Returns a loader that builds the dashboard on its first call and hands the
 * same payload to every later caller.
 */
export function createDashboardLoader({ env, createApi, now }: DashboardLoaderOptions): DashboardLoader {
  let pending: Promise<DashboardPayload> | undefined;

  return () => {
    if (!pending) {
      pending = loadPayload(env, createApi, now);
    }
    return pending;
  };
}

async function loadPayload(
  env: DashboardEnv,
  createApi: (config: DashboardConfig) => ForecastApi,
  now: (() => Date) | undefined
): Promise<DashboardPayload> {
  try {
    const config = resolveConfig(env);
    const context = await buildDashboardContext(config, createApi(config), now);
    return { status: 'ready', context: serializeContext(context) };
  } catch (error) {
    const message = errorMessage(error, 'Failed to load forecast data');
    console.error(`[DashboardData] Start-up failed: ${message}`);
    return { status: 'failed', error: message };
  }
}

export function renderPayloadModule(payload: DashboardPayload): string {
  return `export default ${JSON.stringify(payload)};\n`;
}

/**
 * Loads the dashboard once when the server (or build) starts and exposes
 * the result to the page as `virtual:dashboard-payload`.
 */
export function dashboardData(): Plugin {
  let loader: DashboardLoader | undefined;

  const payload = (): Promise<DashboardPayload> => {
    if (!loader) {
      throw new Error('dashboard-data: configuration has not been resolved yet');
    }
    return loader();
  };

  return {
    name: 'dashboard-data',

    configResolved(config) {
      const env = pickDashboardEnv(loadEnv(config.mode, config.envDir, 'VITE_'));
      loader = createDashboardLoader({
        env,
        createApi: (dashboard) =>
          createServerForecastApi({ publicDir: config.publicDir, apiBaseUrl: dashboard.apiBaseUrl }),
      });
    },

    async buildStart() {
      await payload();
    },

    resolveId(id) {
      return id === DASHBOARD_MODULE_ID ? RESOLVED_MODULE_ID : null;
    },

    async load(id) {
      if (id !== RESOLVED_MODULE_ID) return null;
      return renderPayloadModule(await payload());
    },
  };
}
