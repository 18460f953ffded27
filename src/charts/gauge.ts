import type { CurrentValue, ProbabilityBand } from '../types/forecast';
import { BAND_COLORS, DASHBOARD_COLORS } from '../utils/colors';

export interface GaugeBand {
  band: ProbabilityBand;
  from: number;
  to: number;
  color: string;
}

export interface GaugeSpec {
  title: string;
  range: readonly [number, number];
  tickSuffix: string;
  value: number | null;
  barColor: string;
  trackColor: string;
  bands: readonly GaugeBand[];
}

export const GAUGE_BANDS: readonly GaugeBand[] = [
  { band: 'low', from: 0, to: 33, color: BAND_COLORS.low },
  { band: 'medium', from: 33, to: 66, color: BAND_COLORS.medium },
  { band: 'high', from: 66, to: 100, color: BAND_COLORS.high },
];

/** Band for a percentage: [0,33) low, [33,66) medium, [66,100] high. */
export function bandFor(percentage: number): ProbabilityBand {
  if (percentage < 33) return 'low';
  if (percentage < 66) return 'medium';
  return 'high';
}

export function clampPercentage(value: number): number {
  return Math.min(100, Math.max(0, value));
}

export function buildGaugeSpec(current: CurrentValue): GaugeSpec {
  return {
    title: 'Current Probability',
    range: [0, 100],
    tickSuffix: '%',
    value: current.kind === 'estimate' ? clampPercentage(current.percentage) : null,
    barColor: DASHBOARD_COLORS.accent,
    trackColor: DASHBOARD_COLORS.gaugeTrack,
    bands: GAUGE_BANDS,
  };
}
