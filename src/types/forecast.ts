export type DashboardVariant = 'snapshot' | 'weighted' | 'live';

export type MissingSchemePolicy = 'fail' | 'fallback';

export type CountSeriesStyle = 'line' | 'bar';

export interface Observation {
  endTime: Date;
  probability: number;
  scheme: string | null;
  forecasterCount: number;
}

export interface QuestionDetails {
  title: string;
  url: string;
  resolutionCriteria: string;
  description: string;
  createdTime: string;
  closeTime: string;
}

export interface CurrentEstimate {
  kind: 'estimate';
  percentage: number;
  sampleCount: number | 'N/A';
  observedAt: Date | null;
  scheme: string | null;
}

// =============================================================================
// QUESTION API RESULT
// =============================================================================

export interface QuestionSnapshot {
  probability: number;
  predictionCount: number | 'N/A';
  createdTime: string;
  closeTime: string;
  resolutionCriteria: string;
  description: string;
  title: string;
}

export type QuestionFailure =
  | { status: 'not-found'; questionId: number }
  | { status: 'http-error'; httpStatus: number }
  | { status: 'transport-error'; message: string }
  | { status: 'parse-error'; message: string };

export type QuestionResult = { status: 'ok'; snapshot: QuestionSnapshot } | QuestionFailure;

export interface NoData {
  kind: 'no-data';
  reason: QuestionFailure;
}

export type CurrentValue = CurrentEstimate | NoData;

// =============================================================================
// DASHBOARD CONTEXT
// =============================================================================

export interface DashboardContext {
  readonly variant: DashboardVariant;
  readonly question: QuestionDetails;
  readonly observations: readonly Observation[];
  readonly current: CurrentValue;
  readonly schemes: readonly string[];
  readonly annotatedScheme: string | null;
  readonly countStyle: CountSeriesStyle;
  readonly countHeadroom: number;
  readonly generatedAt: Date;
}

export type ProbabilityBand = 'low' | 'medium' | 'high';
