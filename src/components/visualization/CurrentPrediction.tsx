import { AlertTriangle, CalendarClock, Users } from 'lucide-react';
import { bandFor } from '../../charts/gauge';
import { schemeLabel } from '../../data/question';
import { describeFailure } from '../../lib/aggregate';
import type { CurrentValue } from '../../types/forecast';
import { formatAxisDate, formatCount, formatPercentValue } from '../../utils/formatters';
import { EmptyState } from '../ui/EmptyState';
import { StatCard } from '../ui/StatCard';

interface CurrentPredictionProps {
  current: CurrentValue;
}

const bandStatus = {
  low: 'danger',
  medium: 'warning',
  high: 'success',
} as const;

export const NO_DATA_TITLE = 'Unable to load the community prediction';

export function CurrentPrediction({ current }: CurrentPredictionProps) {
  if (current.kind === 'no-data') {
    return (
      <div data-testid="current-prediction-error">
        <EmptyState
          tone="danger"
          icon={<AlertTriangle className="w-10 h-10" />}
          title={NO_DATA_TITLE}
          description={describeFailure(current.reason)}
        />
      </div>
    );
  }

  const percentage = formatPercentValue(current.percentage);
  const label = current.scheme === null ? 'Community Prediction' : schemeLabel(current.scheme);

  return (
    <div className="space-y-4">
      <div className="text-center space-y-2">
        <h2 className="text-2xl font-semibold text-dash-text-primary">
          {label}:{' '}
          <span className="text-dash-accent">
            <span data-testid="current-probability">{percentage}</span> probability
          </span>
        </h2>
        <p className="text-body text-dash-text-secondary">
          Based on {formatCount(current.sampleCount)} predictions from the Metaculus community
        </p>
      </div>

      <div className="grid grid-cols-1 sm:grid-cols-3 gap-3">
        <StatCard
          label="Probability"
          value={percentage}
          status={bandStatus[bandFor(current.percentage)]}
        />
        <StatCard
          icon={<Users className="w-4 h-4" />}
          label="Forecasters"
          value={formatCount(current.sampleCount)}
        />
        <StatCard
          icon={<CalendarClock className="w-4 h-4" />}
          label="As Of"
          value={current.observedAt ? formatAxisDate(current.observedAt.getTime()) : 'Live'}
        />
      </div>
    </div>
  );
}
