import type { ReactNode } from 'react';
import { Inbox } from 'lucide-react';

interface EmptyStateProps {
  icon?: ReactNode;
  title: string;
  description?: string;
  tone?: 'muted' | 'danger';
}

export function EmptyState({ icon, title, description, tone = 'muted' }: EmptyStateProps) {
  return (
    <div className="flex flex-col items-center justify-center py-10 px-6 text-center">
      <div className={`${tone === 'danger' ? 'text-dash-danger' : 'text-dash-muted'} mb-4`}>
        {icon || <Inbox className="w-10 h-10" />}
      </div>
      <h3 className="text-heading text-dash-text-primary mb-1">{title}</h3>
      {description && (
        <p className="text-body text-dash-text-secondary max-w-md">{description}</p>
      )}
    </div>
  );
}
