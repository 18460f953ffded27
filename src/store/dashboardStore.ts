import { create } from 'zustand';
import { reviveContext, type DashboardPayload } from '../lib/payload';
import type { DashboardContext } from '../types/forecast';

export type DashboardStatus = 'idle' | 'ready' | 'failed';

interface DashboardState {
  status: DashboardStatus;
  context: DashboardContext | null;
  error: string | null;
}

interface DashboardStore extends DashboardState {
  // Actions
  hydrate: (payload: DashboardPayload) => void;
}

export const initialDashboardState: DashboardState = {
  status: 'idle',
  context: null,
  error: null,
};

export const useDashboardStore = create<DashboardStore>((set, get) => ({
  ...initialDashboardState,

  // The payload is computed once by the server; later calls are no-ops.
  hydrate: (payload) => {
    if (get().status !== 'idle') return;

    if (payload.status === 'failed') {
      set({ status: 'failed', error: payload.error });
      return;
    }

    set({ status: 'ready', context: reviveContext(payload.context) });
  },
}));
