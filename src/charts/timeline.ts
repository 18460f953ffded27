/**
 * Timeline chart specification: probability per weighting scheme on the
 * primary axis, forecaster count on the secondary axis.
 */

import { schemeLabel } from '../data/question';
import { roundTo, toPercentage } from '../lib/aggregate';
import type { CountSeriesStyle, Observation } from '../types/forecast';
import { DASHBOARD_COLORS, SERIES_DASHES, SERIES_PALETTE } from '../utils/colors';

const ALL_ROWS_KEY = 'all';

export interface TimelineOptions {
  countStyle: CountSeriesStyle;
  countHeadroom: number;
  annotatedScheme: string | null;
}

export interface TimelineSeries {
  key: string;
  scheme: string | null;
  label: string;
  color: string;
  strokeDasharray?: string;
  strokeWidth: number;
}

export interface TimelineRow {
  time: number;
  probabilities: Record<string, number>;
  count: number | null;
}

export interface TimelineAnnotation {
  seriesKey: string;
  time: number;
  value: number;
  label: string;
}

export interface CountSeriesSpec {
  style: CountSeriesStyle;
  label: string;
  color: string;
  axisMax: number;
}

export interface TimelineSpec {
  rows: TimelineRow[];
  series: TimelineSeries[];
  count: CountSeriesSpec;
  probabilityAxis: readonly [number, number];
  annotation: TimelineAnnotation | null;
}

/** Secondary axis bound: max(count) x headroom, rounded to 6 places (e.g. [10,20,30] x 1.1 -> 33). */
export function countAxisMax(counts: readonly number[], headroom: number): number {
  if (counts.length === 0) return 0;
  return roundTo(Math.max(...counts) * headroom, 6);
}

function seriesKey(scheme: string | null): string {
  return scheme ?? ALL_ROWS_KEY;
}

export function buildTimelineSpec(observations: readonly Observation[], options: TimelineOptions): TimelineSpec {
  const keys: string[] = [];
  const schemeByKey = new Map<string, string | null>();
  for (const observation of observations) {
    const key = seriesKey(observation.scheme);
    if (!schemeByKey.has(key)) {
      schemeByKey.set(key, observation.scheme);
      keys.push(key);
    }
  }

  // The count series follows the annotated scheme when present, otherwise the first one plotted.
  const countKey =
    options.annotatedScheme !== null && schemeByKey.has(options.annotatedScheme)
      ? options.annotatedScheme
      : keys[0];

  const rowsByTime = new Map<number, TimelineRow>();
  const counts: number[] = [];
  for (const observation of observations) {
    const time = observation.endTime.getTime();
    let row = rowsByTime.get(time);
    if (!row) {
      row = { time, probabilities: {}, count: null };
      rowsByTime.set(time, row);
    }

    const key = seriesKey(observation.scheme);
    row.probabilities[key] = toPercentage(observation.probability);
    if (key === countKey) {
      row.count = observation.forecasterCount;
      counts.push(observation.forecasterCount);
    }
  }

  const series: TimelineSeries[] = keys.map((key, index) => {
    const scheme = schemeByKey.get(key) ?? null;
    return {
      key,
      scheme,
      label: keys.length === 1 && scheme === null ? 'Probability' : schemeLabel(scheme),
      color: SERIES_PALETTE[index % SERIES_PALETTE.length],
      strokeDasharray: SERIES_DASHES[index % SERIES_DASHES.length],
      strokeWidth: scheme !== null && scheme === options.annotatedScheme ? 3 : 2,
    };
  });

  return {
    rows: [...rowsByTime.values()].sort((a, b) => a.time - b.time),
    series,
    count: {
      style: options.countStyle,
      label: 'Forecaster Count',
      color: DASHBOARD_COLORS.countSeries,
      axisMax: countAxisMax(counts, options.countHeadroom),
    },
    probabilityAxis: [0, 100],
    annotation: buildAnnotation(observations, options.annotatedScheme),
  };
}

function buildAnnotation(observations: readonly Observation[], scheme: string | null): TimelineAnnotation | null {
  if (scheme === null) return null;

  let latest: Observation | undefined;
  for (const observation of observations) {
    if (observation.scheme !== scheme) continue;
    if (!latest || observation.endTime.getTime() >= latest.endTime.getTime()) {
      latest = observation;
    }
  }
  if (!latest) return null;

  const value = toPercentage(latest.probability);
  return {
    seriesKey: scheme,
    time: latest.endTime.getTime(),
    value,
    label: `Latest: ${value.toFixed(1)}%`,
  };
}
