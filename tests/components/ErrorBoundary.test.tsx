import { describe, it, expect, vi } from 'vitest';
import { render, screen } from '@testing-library/react';
import { ErrorBoundary } from '../../src/components/layout/ErrorBoundary';

function Broken(): never {
  throw new Error('chart exploded');
}

describe('ErrorBoundary', () => {
  it('replaces a failing section with an alert', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    render(
      <ErrorBoundary section="Prediction timeline">
        <Broken />
      </ErrorBoundary>
    );

    expect(screen.getByRole('alert')).toHaveTextContent('Prediction timeline is unavailable');
    expect(screen.getByRole('alert')).toHaveTextContent('chart exploded');
    expect(console.error).toHaveBeenCalledWith(
      '[ErrorBoundary] Prediction timeline failed to render: chart exploded',
      expect.any(String)
    );
  });

  it('renders children when nothing fails', () => {
    render(
      <ErrorBoundary section="Header">
        <p>fine</p>
      </ErrorBoundary>
    );

    expect(screen.getByText('fine')).toBeInTheDocument();
  });
});
