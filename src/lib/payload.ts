import type {
  CurrentEstimate,
  CurrentValue,
  DashboardContext,
  NoData,
  Observation,
} from '../types/forecast';

// =============================================================================
// WIRE SHAPE
// =============================================================================

export interface SerializedObservation extends Omit<Observation, 'endTime'> {
  endTime: string;
}

export interface SerializedEstimate extends Omit<CurrentEstimate, 'observedAt'> {
  observedAt: string | null;
}

export type SerializedCurrentValue = SerializedEstimate | NoData;

export interface SerializedContext extends Omit<DashboardContext, 'observations' | 'current' | 'generatedAt'> {
  readonly observations: readonly SerializedObservation[];
  readonly current: SerializedCurrentValue;
  readonly generatedAt: string;
}

/** What the dev server hands the page: the loaded context, or why loading failed. */
export type DashboardPayload =
  | { status: 'ready'; context: SerializedContext }
  | { status: 'failed'; error: string };

// =============================================================================
// CONVERSION
// =============================================================================

export function serializeContext(context: DashboardContext): SerializedContext {
  const { current } = context;

  return {
    ...context,
    observations: context.observations.map((observation) => ({
      ...observation,
      endTime: observation.endTime.toISOString(),
    })),
    current:
      current.kind === 'estimate'
        ? { ...current, observedAt: current.observedAt ? current.observedAt.toISOString() : null }
        : current,
    generatedAt: context.generatedAt.toISOString(),
  };
}

function reviveCurrent(current: SerializedCurrentValue): CurrentValue {
  if (current.kind === 'no-data') return current;
  return Object.freeze({
    ...current,
    observedAt: current.observedAt === null ? null : new Date(current.observedAt),
  });
}

export function reviveContext(serialized: SerializedContext): DashboardContext {
  return Object.freeze({
    ...serialized,
    observations: Object.freeze(
      serialized.observations.map((observation) =>
        Object.freeze({ ...observation, endTime: new Date(observation.endTime) })
      )
    ),
    current: reviveCurrent(serialized.current),
    schemes: Object.freeze([...serialized.schemes]),
    generatedAt: new Date(serialized.generatedAt),
  });
}
