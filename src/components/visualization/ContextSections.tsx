import { BookOpen, Info } from 'lucide-react';
import { METHODOLOGY, PHEIC_EXPLAINER } from '../../data/question';
import { Panel } from '../ui/Panel';

export function ContextSections() {
  return (
    <div className="grid grid-cols-1 lg:grid-cols-2 gap-4">
      <Panel title="What is a PHEIC?" icon={<Info className="w-4 h-4" />}>
        <div className="space-y-3">
          {PHEIC_EXPLAINER.map((paragraph) => (
            <p key={paragraph} className="text-body text-dash-text-secondary">{paragraph}</p>
          ))}
        </div>
      </Panel>

      <Panel title="About This Prediction" icon={<BookOpen className="w-4 h-4" />}>
        <div className="space-y-3">
          {METHODOLOGY.map((paragraph) => (
            <p key={paragraph} className="text-body text-dash-text-secondary">{paragraph}</p>
          ))}
        </div>
      </Panel>
    </div>
  );
}
