import { Activity } from 'lucide-react';
import { BandWidget } from '../status/BandWidget';
import { Badge, type BadgeVariant } from '../ui/Badge';
import { bandFor } from '../../charts/gauge';
import type { CurrentValue, DashboardVariant } from '../../types/forecast';

interface HeaderProps {
  title: string;
  variant: DashboardVariant;
  current: CurrentValue;
}

const sourceBadges: Record<DashboardVariant, { label: string; variant: BadgeVariant }> = {
  snapshot: { label: 'CSV Snapshot', variant: 'neutral' },
  weighted: { label: 'Weighted CSV', variant: 'neutral' },
  live: { label: 'Live API', variant: 'info' },
};

export function Header({ title, variant, current }: HeaderProps) {
  const source = sourceBadges[variant];

  return (
    <header className="panel rounded-none border-x-0 border-t-0">
      <div className="max-w-5xl mx-auto flex flex-col md:flex-row md:items-center justify-between gap-4 px-5 py-4">
        <div className="flex items-start gap-3">
          <Activity className="w-7 h-7 text-dash-accent flex-shrink-0 mt-1" />
          <div>
            <h1 className="text-display text-dash-text-primary">{title}</h1>
            <div className="flex items-center gap-2 mt-1">
              <span className="text-caption text-dash-muted uppercase tracking-widest">
                Forecast Dashboard
              </span>
              <Badge variant={source.variant}>{source.label}</Badge>
            </div>
          </div>
        </div>

        {current.kind === 'estimate' ? (
          <BandWidget band={bandFor(current.percentage)} label="LIKELIHOOD" />
        ) : (
          <Badge variant="danger">No Data</Badge>
        )}
      </div>
    </header>
  );
}
