import { format } from 'date-fns';

/**
 * Format percentage points for display
 * @param value - Percentage (0-100)
 * @param decimals - Number of decimal places (default: 1)
 * @returns Formatted percentage string (e.g., "80.0%")
 */
export function formatPercentValue(value: number, decimals: number = 1): string {
  return `${value.toFixed(decimals)}%`;
}

/**
 * Format a large number with comma separators
 * @param value - The number to format
 * @returns Formatted number string (e.g., "1,429")
 */
export function formatNumber(value: number): string {
  return value.toLocaleString('en-US');
}

export function formatCount(value: number | 'N/A'): string {
  return value === 'N/A' ? value : formatNumber(value);
}

/** "2024-01-03 14:05:00", always in UTC. */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

// Axis ticks and tooltips follow the viewer's local time.
export function formatAxisDate(time: number): string {
  return format(time, 'yyyy-MM-dd');
}

export function formatTooltipDate(time: number): string {
  return format(time, 'yyyy-MM-dd HH:mm');
}
