import { FileText, Gauge, LineChart } from 'lucide-react';
import type { DashboardContext } from '../../types/forecast';
import { formatUtcTimestamp } from '../../utils/formatters';
import { Badge } from '../ui/Badge';
import { Panel } from '../ui/Panel';
import { ContextSections } from '../visualization/ContextSections';
import { CurrentPrediction } from '../visualization/CurrentPrediction';
import { PredictionTimeline } from '../visualization/PredictionTimeline';
import { ProbabilityGauge } from '../visualization/ProbabilityGauge';
import { QuestionDetailsPanel } from '../visualization/QuestionDetailsPanel';
import { ErrorBoundary } from './ErrorBoundary';
import { Header } from './Header';

interface DashboardLayoutProps {
  context: DashboardContext;
}

export function DashboardLayout({ context }: DashboardLayoutProps) {
  const accent = context.current.kind === 'no-data' ? 'red' : 'green';

  return (
    <div className="min-h-screen bg-dash-bg">
      <ErrorBoundary section="Header">
        <Header title={context.question.title} variant={context.variant} current={context.current} />
      </ErrorBoundary>

      <main className="max-w-5xl mx-auto p-4 space-y-4">
        <ErrorBoundary section="Current prediction">
          <Panel accent={accent}>
            <CurrentPrediction current={context.current} />
          </Panel>
        </ErrorBoundary>

        <ErrorBoundary section="Probability gauge">
          <Panel title="Current Probability" icon={<Gauge className="w-4 h-4" />}>
            <ProbabilityGauge current={context.current} />
          </Panel>
        </ErrorBoundary>

        <ErrorBoundary section="Prediction timeline">
          <Panel
            title="Prediction Timeline"
            icon={<LineChart className="w-4 h-4" />}
            action={
              context.schemes.length > 1 ? (
                <Badge variant="neutral">{`${context.schemes.length} weighting schemes`}</Badge>
              ) : undefined
            }
          >
            <PredictionTimeline
              observations={context.observations}
              countStyle={context.countStyle}
              countHeadroom={context.countHeadroom}
              annotatedScheme={context.annotatedScheme}
            />
          </Panel>
        </ErrorBoundary>

        <ErrorBoundary section="Question details">
          <Panel title="Question Details" icon={<FileText className="w-4 h-4" />}>
            <QuestionDetailsPanel question={context.question} />
          </Panel>
        </ErrorBoundary>

        <ContextSections />

        <footer className="text-right text-caption text-dash-muted pt-2">
          Last updated: {formatUtcTimestamp(context.generatedAt)} UTC
        </footer>
      </main>
    </div>
  );
}
