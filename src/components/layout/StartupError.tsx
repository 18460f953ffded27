import { AlertTriangle } from 'lucide-react';
import { EmptyState } from '../ui/EmptyState';

interface StartupErrorProps {
  message: string;
}

export function StartupError({ message }: StartupErrorProps) {
  return (
    <div role="alert" className="max-w-3xl mx-auto p-8">
      <div className="panel border-l-4 border-l-dash-danger">
        <EmptyState
          tone="danger"
          icon={<AlertTriangle className="w-12 h-12" />}
          title="The dashboard could not start"
          description={message}
        />
      </div>
    </div>
  );
}
