import { ExternalLink } from 'lucide-react';
import type { QuestionDetails } from '../../types/forecast';

interface QuestionDetailsPanelProps {
  question: QuestionDetails;
}

function hasText(value: string): boolean {
  return value.trim() !== '' && value !== 'N/A';
}

export function QuestionDetailsPanel({ question }: QuestionDetailsPanelProps) {
  const timeline = [
    { label: 'Opened', value: question.createdTime },
    { label: 'Closes', value: question.closeTime },
  ].filter((entry) => hasText(entry.value));

  return (
    <div className="space-y-4">
      <div>
        <h4 className="text-heading text-dash-text-primary mb-2">Resolution Criteria</h4>
        <p className="text-body text-dash-text-secondary whitespace-pre-wrap">{question.resolutionCriteria}</p>
      </div>

      {hasText(question.description) && (
        <div>
          <h4 className="text-heading text-dash-text-primary mb-2">Description</h4>
          <p className="text-body text-dash-text-secondary whitespace-pre-wrap">{question.description}</p>
        </div>
      )}

      {timeline.length > 0 && (
        <dl className="grid grid-cols-2 gap-3">
          {timeline.map((entry) => (
            <div key={entry.label} className="p-3 bg-dash-bg/50 rounded-lg">
              <dt className="text-caption uppercase tracking-wider text-dash-muted">{entry.label}</dt>
              <dd className="font-mono text-body text-dash-text-primary">{entry.value}</dd>
            </div>
          ))}
        </dl>
      )}

      <a
        href={question.url}
        target="_blank"
        rel="noreferrer"
        className="inline-flex items-center gap-1 text-dash-accent hover:underline"
      >
        View on Metaculus <ExternalLink className="w-4 h-4" aria-hidden="true" />
      </a>
    </div>
  );
}
