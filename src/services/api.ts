import type { Observation, QuestionResult } from '../types/forecast';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ForecastApi {
  loadObservations(url: string): Promise<readonly Observation[]>;
  fetchQuestion(questionId: number): Promise<QuestionResult>;
}
