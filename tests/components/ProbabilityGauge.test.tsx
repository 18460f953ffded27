import { describe, it, expect } from 'vitest';
import { render, screen } from '@testing-library/react';
import { ProbabilityGauge } from '../../src/components/visualization/ProbabilityGauge';

describe('ProbabilityGauge', () => {
  it('renders the gauge for an estimate', () => {
    render(
      <ProbabilityGauge
        current={{ kind: 'estimate', percentage: 80, sampleCount: 30, observedAt: null, scheme: null }}
      />
    );

    expect(screen.getByRole('img', { name: 'Current Probability: 80.0%' })).toBeInTheDocument();
    expect(document.querySelector('.recharts-responsive-container')).toBeInTheDocument();
    expect(screen.getByText('0%')).toBeInTheDocument();
    expect(screen.getByText('100%')).toBeInTheDocument();
  });

  it('shows message when no data is available', () => {
    render(<ProbabilityGauge current={{ kind: 'no-data', reason: { status: 'not-found', questionId: 7 } }} />);

    expect(screen.getByText('No data available')).toBeInTheDocument();
    expect(screen.queryByTestId('probability-gauge')).not.toBeInTheDocument();
  });
});
