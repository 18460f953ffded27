import type { ReactNode } from 'react';

interface PanelProps {
  title?: string;
  icon?: ReactNode;
  action?: ReactNode;
  children: ReactNode;
  accent?: 'green' | 'red';
}

export function Panel({ title, icon, action, children, accent }: PanelProps) {
  const accentBorder = accent === 'green'
    ? 'border-l-4 border-l-dash-success'
    : accent === 'red'
    ? 'border-l-4 border-l-dash-danger'
    : '';

  return (
    <section className={`panel p-5 space-y-3 ${accentBorder}`}>
      {(title || action) && (
        <div className="flex items-center justify-between">
          {title && (
            <h3 className="flex items-center gap-2 text-heading text-dash-text-primary">
              {icon && <span className="text-dash-text-secondary">{icon}</span>}
              {title}
            </h3>
          )}
          {action && <div className="flex-shrink-0">{action}</div>}
        </div>
      )}
      <div>{children}</div>
    </section>
  );
}
