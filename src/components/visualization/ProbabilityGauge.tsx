import { Cell, Pie, PieChart, ResponsiveContainer } from 'recharts';
import { Gauge } from 'lucide-react';
import { buildGaugeSpec } from '../../charts/gauge';
import type { CurrentValue } from '../../types/forecast';
import { formatPercentValue } from '../../utils/formatters';
import { EmptyState } from '../ui/EmptyState';

interface ProbabilityGaugeProps {
  current: CurrentValue;
}

interface Slice {
  name: string;
  value: number;
  color: string;
}

const ARC = { startAngle: 180, endAngle: 0, cx: '50%', cy: '78%' } as const;

export function ProbabilityGauge({ current }: ProbabilityGaugeProps) {
  const spec = buildGaugeSpec(current);

  if (spec.value === null) {
    return (
      <EmptyState
        icon={<Gauge className="w-8 h-8" />}
        title="No data available"
        description="The gauge is shown once a community prediction has loaded."
      />
    );
  }

  const [min, max] = spec.range;
  const bands: Slice[] = spec.bands.map((band) => ({
    name: band.band,
    value: band.to - band.from,
    color: band.color,
  }));
  const bar: Slice[] = [
    { name: 'value', value: spec.value - min, color: spec.barColor },
    { name: 'remainder', value: max - spec.value, color: spec.trackColor },
  ];

  return (
    <div
      data-testid="probability-gauge"
      role="img"
      aria-label={`${spec.title}: ${formatPercentValue(spec.value)}`}
      className="relative h-[260px]"
    >
      <ResponsiveContainer width="100%" height="100%">
        <PieChart>
          <Pie
            data={bands}
            dataKey="value"
            {...ARC}
            innerRadius="86%"
            outerRadius="96%"
            stroke="none"
            isAnimationActive={false}
          >
            {bands.map((slice) => (
              <Cell key={slice.name} fill={slice.color} />
            ))}
          </Pie>
          <Pie
            data={bar}
            dataKey="value"
            {...ARC}
            innerRadius="58%"
            outerRadius="82%"
            stroke="none"
          >
            {bar.map((slice) => (
              <Cell key={slice.name} fill={slice.color} />
            ))}
          </Pie>
        </PieChart>
      </ResponsiveContainer>

      <div className="absolute inset-x-0 bottom-[14%] text-center pointer-events-none">
        <div className="text-3xl font-mono font-bold text-dash-text-primary">
          {formatPercentValue(spec.value)}
        </div>
        <div className="text-caption uppercase tracking-wider text-dash-text-secondary">{spec.title}</div>
      </div>

      <div className="absolute inset-x-0 bottom-[6%] flex justify-between px-[12%] text-caption text-dash-muted">
        <span>{`${min}${spec.tickSuffix}`}</span>
        <span>{`${max}${spec.tickSuffix}`}</span>
      </div>
    </div>
  );
}
