import type { ReactNode } from 'react';

export type BadgeVariant = 'success' | 'warning' | 'danger' | 'info' | 'neutral';

interface BadgeProps {
  variant: BadgeVariant;
  children: ReactNode;
}

const variantStyles: Record<BadgeVariant, string> = {
  success: 'bg-dash-success/20 text-dash-success',
  warning: 'bg-dash-warning/20 text-dash-warning',
  danger: 'bg-dash-danger/20 text-dash-danger',
  info: 'bg-sky-400/20 text-sky-300',
  neutral: 'bg-dash-border text-dash-text-secondary',
};

export function Badge({ variant, children }: BadgeProps) {
  return (
    <span
      className={`inline-flex items-center px-2.5 py-0.5 rounded-lg text-caption font-medium uppercase tracking-wider ${variantStyles[variant]}`}
    >
      {children}
    </span>
  );
}
