import { loadObservations } from './forecastFile';
import { fetchQuestion } from './questionApi';
import type { FetchLike, ForecastApi } from './api';

export interface ForecastApiOptions {
  apiBaseUrl: string;
  fetchImpl?: FetchLike;
}

export function createForecastApi({ apiBaseUrl, fetchImpl }: ForecastApiOptions): ForecastApi {
  // Resolved per call so tests can stub the global fetch after construction.
  const doFetch: FetchLike = (input, init) => (fetchImpl ?? globalThis.fetch)(input, init);

  return {
    loadObservations: (url) => loadObservations(url, doFetch),
    fetchQuestion: (questionId) => fetchQuestion(questionId, { baseUrl: apiBaseUrl, fetchImpl: doFetch }),
  };
}

export { parseObservations } from './forecastFile';
export type { FetchLike, ForecastApi };
