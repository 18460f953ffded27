import {
  Bar,
  CartesianGrid,
  ComposedChart,
  Legend,
  Line,
  ReferenceDot,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import { LineChart as LineChartIcon } from 'lucide-react';
import { buildTimelineSpec, type TimelineRow } from '../../charts/timeline';
import type { CountSeriesStyle, Observation } from '../../types/forecast';
import { DASHBOARD_COLORS } from '../../utils/colors';
import { formatAxisDate, formatNumber, formatPercentValue, formatTooltipDate } from '../../utils/formatters';
import { EmptyState } from '../ui/EmptyState';

interface PredictionTimelineProps {
  observations: readonly Observation[];
  countStyle: CountSeriesStyle;
  countHeadroom: number;
  annotatedScheme: string | null;
}

const PROBABILITY_AXIS = 'probability';
const COUNT_AXIS = 'count';

export function PredictionTimeline({
  observations,
  countStyle,
  countHeadroom,
  annotatedScheme,
}: PredictionTimelineProps) {
  if (observations.length === 0) {
    return (
      <EmptyState
        icon={<LineChartIcon className="w-8 h-8" />}
        title="No prediction history"
        description="There are no observations to plot."
      />
    );
  }

  const spec = buildTimelineSpec(observations, { countStyle, countHeadroom, annotatedScheme });
  const annotatedSeries = spec.series.find((series) => series.key === spec.annotation?.seriesKey);

  return (
    <div data-testid="prediction-timeline" className="h-[360px] lg:h-[400px]">
      <ResponsiveContainer width="100%" height="100%">
        <ComposedChart data={spec.rows} margin={{ top: 20, right: 20, left: 0, bottom: 5 }}>
          <CartesianGrid stroke={DASHBOARD_COLORS.border} strokeDasharray="3 3" />
          <XAxis
            dataKey="time"
            type="number"
            scale="time"
            domain={['dataMin', 'dataMax']}
            tickFormatter={formatAxisDate}
            stroke={DASHBOARD_COLORS.muted}
            fontSize={12}
          />
          <YAxis
            yAxisId={PROBABILITY_AXIS}
            domain={[...spec.probabilityAxis]}
            tickFormatter={(value: number) => `${value}%`}
            stroke={DASHBOARD_COLORS.muted}
            fontSize={12}
            label={{ value: 'Probability (%)', angle: -90, position: 'insideLeft', fill: DASHBOARD_COLORS.textSecondary }}
          />
          <YAxis
            yAxisId={COUNT_AXIS}
            orientation="right"
            domain={[0, spec.count.axisMax]}
            allowDecimals={false}
            stroke={DASHBOARD_COLORS.muted}
            fontSize={12}
            label={{ value: 'Number of Forecasters', angle: 90, position: 'insideRight', fill: DASHBOARD_COLORS.textSecondary }}
          />
          <Tooltip
            labelFormatter={(label) => (typeof label === 'number' ? formatTooltipDate(label) : String(label))}
            formatter={(value, name) =>
              typeof value === 'number' && name !== spec.count.label
                ? formatPercentValue(value)
                : typeof value === 'number'
                ? formatNumber(value)
                : String(value)
            }
            contentStyle={{ backgroundColor: DASHBOARD_COLORS.panel, borderColor: DASHBOARD_COLORS.border }}
          />
          <Legend verticalAlign="top" align="left" />

          {spec.count.style === 'bar' ? (
            <Bar
              yAxisId={COUNT_AXIS}
              dataKey={(row: TimelineRow) => row.count}
              name={spec.count.label}
              fill={spec.count.color}
              fillOpacity={0.35}
            />
          ) : (
            <Line
              yAxisId={COUNT_AXIS}
              dataKey={(row: TimelineRow) => row.count}
              name={spec.count.label}
              stroke={spec.count.color}
              strokeDasharray="2 4"
              strokeWidth={2}
              dot={false}
              connectNulls
            />
          )}

          {spec.series.map((series) => (
            <Line
              key={series.key}
              yAxisId={PROBABILITY_AXIS}
              type="monotone"
              dataKey={(row: TimelineRow) => row.probabilities[series.key]}
              name={series.label}
              stroke={series.color}
              strokeDasharray={series.strokeDasharray}
              strokeWidth={series.strokeWidth}
              dot={false}
              connectNulls
            />
          ))}

          {spec.annotation && (
            <ReferenceDot
              yAxisId={PROBABILITY_AXIS}
              x={spec.annotation.time}
              y={spec.annotation.value}
              r={6}
              fill={annotatedSeries?.color ?? DASHBOARD_COLORS.accent}
              stroke={DASHBOARD_COLORS.textPrimary}
              label={{ value: spec.annotation.label, position: 'top', fill: DASHBOARD_COLORS.textPrimary }}
            />
          )}
        </ComposedChart>
      </ResponsiveContainer>
    </div>
  );
}
