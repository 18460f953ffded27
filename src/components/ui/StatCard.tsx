import type { ReactNode } from 'react';

interface StatCardProps {
  label: string;
  value: string;
  status?: 'success' | 'warning' | 'danger' | 'neutral';
  icon?: ReactNode;
}

const statusColors = {
  success: 'text-dash-success',
  warning: 'text-dash-warning',
  danger: 'text-dash-danger',
  neutral: 'text-dash-text-primary',
} as const;

export function StatCard({ label, value, status = 'neutral', icon }: StatCardProps) {
  return (
    <div className="panel p-4">
      <div className="flex items-center gap-2 mb-2">
        {icon && <span className="text-dash-text-secondary">{icon}</span>}
        <span className="text-caption uppercase tracking-wider text-dash-text-secondary">
          {label}
        </span>
      </div>
      <span className={`text-xl font-mono font-bold ${statusColors[status]}`}>
        {value}
      </span>
    </div>
  );
}
