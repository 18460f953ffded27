import { DataLoadError, SchemeNotFoundError } from './errors';
import type {
  CurrentEstimate,
  CurrentValue,
  MissingSchemePolicy,
  Observation,
  QuestionFailure,
  QuestionResult,
} from '../types/forecast';

export function roundTo(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}

/**
 * Scale a 0-1 probability to percentage points.
 * Rounded to 10 places so binary noise does not leak into the display (0.437 -> 43.7).
 */
export function toPercentage(probability: number): number {
  return roundTo(probability * 100, 10);
}

/** Scheme labels in first-seen order; unlabeled rows are skipped. */
export function listSchemes(observations: readonly Observation[]): string[] {
  const seen = new Set<string>();
  for (const observation of observations) {
    if (observation.scheme !== null) seen.add(observation.scheme);
  }
  return [...seen];
}

// Latest by end time; on equal times the later row wins.
function latestOf(observations: readonly Observation[]): Observation | undefined {
  let latest: Observation | undefined;
  for (const observation of observations) {
    if (!latest || observation.endTime.getTime() >= latest.endTime.getTime()) {
      latest = observation;
    }
  }
  return latest;
}

function toEstimate(observation: Observation): CurrentEstimate {
  return {
    kind: 'estimate',
    percentage: toPercentage(observation.probability),
    sampleCount: observation.forecasterCount,
    observedAt: observation.endTime,
    scheme: observation.scheme,
  };
}

export interface SelectCurrentOptions {
  scheme?: string | null;
  onMissingScheme?: MissingSchemePolicy;
}

export function selectCurrent(
  observations: readonly Observation[],
  { scheme = null, onMissingScheme = 'fail' }: SelectCurrentOptions = {}
): CurrentEstimate {
  const overall = latestOf(observations);
  if (!overall) {
    throw new DataLoadError('Forecast file contains no observations');
  }

  if (scheme === null) {
    return toEstimate(overall);
  }

  const matching = latestOf(observations.filter((observation) => observation.scheme === scheme));
  if (matching) {
    return toEstimate(matching);
  }

  if (onMissingScheme === 'fail') {
    throw new SchemeNotFoundError(scheme, listSchemes(observations));
  }

  console.warn(`[Aggregator] No rows for weighting scheme "${scheme}", using the latest observation overall`);
  return toEstimate(overall);
}

export function currentFromQuestionResult(result: QuestionResult): CurrentValue {
  if (result.status !== 'ok') {
    return { kind: 'no-data', reason: result };
  }

  const { snapshot } = result;
  return {
    kind: 'estimate',
    percentage: toPercentage(snapshot.probability),
    sampleCount: snapshot.predictionCount,
    observedAt: null,
    scheme: null,
  };
}

export function describeFailure(reason: QuestionFailure): string {
  switch (reason.status) {
    case 'not-found':
      return `Question ${reason.questionId} was not found`;
    case 'http-error':
      return `The forecasting platform responded with HTTP ${reason.httpStatus}`;
    case 'transport-error':
      return `Could not reach the forecasting platform (${reason.message})`;
    case 'parse-error':
      return `The forecasting platform returned an unreadable response (${reason.message})`;
  }
}
