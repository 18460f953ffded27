import { useEffect } from 'react';
import { DashboardLayout } from './components/layout/DashboardLayout';
import { LoadingView } from './components/layout/LoadingView';
import { StartupError } from './components/layout/StartupError';
import type { DashboardPayload } from './lib/payload';
import { useDashboardStore } from './store/dashboardStore';

interface AppProps {
  payload: DashboardPayload;
}

export function App({ payload }: AppProps) {
  const status = useDashboardStore((state) => state.status);
  const context = useDashboardStore((state) => state.context);
  const error = useDashboardStore((state) => state.error);
  const hydrate = useDashboardStore((state) => state.hydrate);

  useEffect(() => {
    hydrate(payload);
  }, [hydrate, payload]);

  if (status === 'failed') {
    return <StartupError message={error ?? 'Failed to load forecast data'} />;
  }

  if (status !== 'ready' || !context) {
    return <LoadingView />;
  }

  return <DashboardLayout context={context} />;
}
