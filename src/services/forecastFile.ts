/**
 * Forecast history export (CSV) loading.
 *
 * The export comes from the forecasting platform's data download and lists one
 * row per aggregation snapshot. Header names are fixed upstream; rows that do
 * not parse abort loading.
 */

import { isValid, parseISO } from 'date-fns';
import { DataLoadError } from '../lib/errors';
import type { Observation } from '../types/forecast';
import type { FetchLike } from './api';
import { parseCsv } from './csvParser';

export const FORECAST_COLUMNS = {
  endTime: 'End Time',
  probability: 'Probability Yes',
  forecasterCount: 'Forecaster Count',
  scheme: 'Forecaster Username',
} as const;

const REQUIRED_COLUMNS = [
  FORECAST_COLUMNS.endTime,
  FORECAST_COLUMNS.probability,
  FORECAST_COLUMNS.forecasterCount,
];

function parseRow(record: Record<string, string>, rowNumber: number, hasScheme: boolean): Observation {
  const rawTime = record[FORECAST_COLUMNS.endTime];
  const endTime = parseISO(rawTime);
  if (!isValid(endTime)) {
    throw new DataLoadError(`Row ${rowNumber}: invalid ${FORECAST_COLUMNS.endTime} "${rawTime}"`);
  }

  const rawProbability = record[FORECAST_COLUMNS.probability];
  const probability = rawProbability === '' ? NaN : Number(rawProbability);
  if (!Number.isFinite(probability) || probability < 0 || probability > 1) {
    throw new DataLoadError(`Row ${rowNumber}: invalid ${FORECAST_COLUMNS.probability} "${rawProbability}"`);
  }

  const rawCount = record[FORECAST_COLUMNS.forecasterCount];
  const forecasterCount = rawCount === '' ? NaN : Number(rawCount);
  if (!Number.isInteger(forecasterCount) || forecasterCount < 0) {
    throw new DataLoadError(`Row ${rowNumber}: invalid ${FORECAST_COLUMNS.forecasterCount} "${rawCount}"`);
  }

  const scheme = hasScheme ? record[FORECAST_COLUMNS.scheme] || null : null;

  return Object.freeze({ endTime, probability, scheme, forecasterCount });
}

/** Parse the export into observations ordered by end time (ties keep file order). */
export function parseObservations(text: string): readonly Observation[] {
  const { headers, rows } = parseCsv(text);

  const missing = REQUIRED_COLUMNS.filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    throw new DataLoadError(`Forecast file is missing column(s): ${missing.join(', ')}`);
  }

  const hasScheme = headers.includes(FORECAST_COLUMNS.scheme);
  // Header is line 1, so data rows start at 2.
  const observations = rows.map((record, index) => parseRow(record, index + 2, hasScheme));

  observations.sort((a, b) => a.endTime.getTime() - b.endTime.getTime());
  return Object.freeze(observations);
}

export async function loadObservations(url: string, fetchImpl: FetchLike): Promise<readonly Observation[]> {
  const res = await fetchImpl(url);
  if (!res.ok) {
    throw new DataLoadError(`Failed to fetch ${url}: ${res.status} ${res.statusText}`);
  }
  return parseObservations(await res.text());
}
