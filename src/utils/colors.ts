import type { ProbabilityBand } from '../types/forecast';

export const DASHBOARD_COLORS = {
  bg: '#111827',
  panel: '#1f2937',
  border: '#374151',
  accent: '#4ade80',
  danger: '#ef4444',
  warning: '#eab308',
  success: '#4ade80',
  muted: '#6b7280',
  gaugeTrack: '#4b5563',
  countSeries: '#94a3b8',
  textPrimary: '#f3f4f6',
  textSecondary: '#9ca3af',
} as const;

export const BAND_COLORS: Record<ProbabilityBand, string> = {
  low: DASHBOARD_COLORS.danger,
  medium: DASHBOARD_COLORS.warning,
  high: DASHBOARD_COLORS.success,
};

export const SERIES_PALETTE = ['#4ade80', '#60a5fa', '#f472b6', '#f59e0b', '#a78bfa'] as const;

// Solid first, then progressively finer dashes.
export const SERIES_DASHES = [undefined, '6 3', '2 2', '8 3 2 3'] as const;

export function getBandClass(band: ProbabilityBand): string {
  return `band-${band}`;
}
