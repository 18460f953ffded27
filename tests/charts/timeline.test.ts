import { describe, it, expect } from 'vitest';
import threeRows from '../fixtures/three_rows.csv?raw';
import schemesCsv from '../fixtures/schemes.csv?raw';
import { buildTimelineSpec, countAxisMax } from '../../src/charts/timeline';
import { parseObservations } from '../../src/services/forecastFile';

describe('countAxisMax', () => {
  it('scales the largest count by the headroom factor', () => {
    expect(countAxisMax([10, 20, 30], 1.1)).toBe(33);
    expect(countAxisMax([10, 20, 30], 1.2)).toBe(36);
  });

  it('is zero without counts', () => {
    expect(countAxisMax([], 1.1)).toBe(0);
  });
});

describe('buildTimelineSpec', () => {
  it('plots a single probability line for unlabeled data', () => {
    const spec = buildTimelineSpec(parseObservations(threeRows), {
      countStyle: 'line',
      countHeadroom: 1.1,
      annotatedScheme: null,
    });

    expect(spec.series).toHaveLength(1);
    expect(spec.series[0]).toMatchObject({ key: 'all', label: 'Probability', color: '#4ade80' });
    expect(spec.rows.map((row) => row.probabilities.all)).toEqual([20, 50, 80]);
    expect(spec.rows.map((row) => row.count)).toEqual([10, 20, 30]);
    expect(spec.probabilityAxis).toEqual([0, 100]);
    expect(spec.count).toEqual({ style: 'line', label: 'Forecaster Count', color: '#94a3b8', axisMax: 33 });
    expect(spec.annotation).toBeNull();
  });

  it('gives each scheme its own line style', () => {
    const spec = buildTimelineSpec(parseObservations(schemesCsv), {
      countStyle: 'bar',
      countHeadroom: 1.2,
      annotatedScheme: 'recency_weighted',
    });

    expect(spec.series.map((series) => [series.label, series.color, series.strokeDasharray, series.strokeWidth])).toEqual([
      ['Community Prediction', '#4ade80', undefined, 2],
      ['Recency Weighted', '#60a5fa', '6 3', 3],
    ]);
  });

  it('merges schemes into one row per timestamp', () => {
    const spec = buildTimelineSpec(parseObservations(schemesCsv), {
      countStyle: 'bar',
      countHeadroom: 1.2,
      annotatedScheme: 'recency_weighted',
    });

    expect(spec.rows.map((row) => row.probabilities)).toEqual([
      { community: 30, recency_weighted: 35 },
      { community: 40, recency_weighted: 45 },
      { community: 42 },
    ]);
    expect(spec.rows.map((row) => row.time)).toEqual([
      new Date(2024, 2, 1).getTime(),
      new Date(2024, 2, 2).getTime(),
      new Date(2024, 2, 3).getTime(),
    ]);
  });

  it('takes counts from the annotated scheme', () => {
    const spec = buildTimelineSpec(parseObservations(schemesCsv), {
      countStyle: 'bar',
      countHeadroom: 1.2,
      annotatedScheme: 'recency_weighted',
    });

    expect(spec.rows.map((row) => row.count)).toEqual([12, 15, null]);
    expect(spec.count.style).toBe('bar');
    expect(spec.count.axisMax).toBe(18);
  });

  it('annotates the latest point of the designated scheme', () => {
    const spec = buildTimelineSpec(parseObservations(schemesCsv), {
      countStyle: 'bar',
      countHeadroom: 1.2,
      annotatedScheme: 'recency_weighted',
    });

    expect(spec.annotation).toEqual({
      seriesKey: 'recency_weighted',
      time: new Date(2024, 2, 2).getTime(),
      value: 45,
      label: 'Latest: 45.0%',
    });
  });

  it('skips the annotation when the scheme has no rows', () => {
    const spec = buildTimelineSpec(parseObservations(schemesCsv), {
      countStyle: 'line',
      countHeadroom: 1.1,
      annotatedScheme: 'unweighted',
    });

    expect(spec.annotation).toBeNull();
    expect(spec.rows.map((row) => row.count)).toEqual([12, 15, 18]);
  });
});
