import { describe, it, expect } from 'vitest';
import { render, screen } from '@testing-library/react';
import { CurrentPrediction } from '../../src/components/visualization/CurrentPrediction';
import type { CurrentEstimate } from '../../src/types/forecast';

const estimate: CurrentEstimate = {
  kind: 'estimate',
  percentage: 43.7,
  sampleCount: 120,
  observedAt: null,
  scheme: null,
};

describe('CurrentPrediction', () => {
  it('shows the probability headline', () => {
    render(<CurrentPrediction current={estimate} />);

    expect(screen.getByRole('heading', { level: 2 })).toHaveTextContent('Community Prediction: 43.7% probability');
    expect(screen.getByTestId('current-probability').textContent).toBe('43.7%');
    expect(screen.getByText('Based on 120 predictions from the Metaculus community')).toBeInTheDocument();
  });

  it('labels the weighting scheme in use', () => {
    render(<CurrentPrediction current={{ ...estimate, scheme: 'recency_weighted' }} />);

    expect(screen.getByRole('heading', { level: 2 })).toHaveTextContent('Recency Weighted: 43.7% probability');
  });

  it('shows N/A when the sample count is unknown', () => {
    render(<CurrentPrediction current={{ ...estimate, sampleCount: 'N/A' }} />);

    expect(screen.getByText('Based on N/A predictions from the Metaculus community')).toBeInTheDocument();
  });

  it('shows a valid zero probability', () => {
    render(<CurrentPrediction current={{ ...estimate, percentage: 0 }} />);

    expect(screen.getByTestId('current-probability').textContent).toBe('0.0%');
    expect(screen.queryByTestId('current-prediction-error')).not.toBeInTheDocument();
  });

  it('shows the error state for missing data', () => {
    render(<CurrentPrediction current={{ kind: 'no-data', reason: { status: 'http-error', httpStatus: 500 } }} />);

    expect(screen.getByText('Unable to load the community prediction')).toBeInTheDocument();
    expect(screen.getByText('The forecasting platform responded with HTTP 500')).toBeInTheDocument();
    expect(screen.queryByTestId('current-probability')).not.toBeInTheDocument();
  });
});
