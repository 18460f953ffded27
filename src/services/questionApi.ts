import { z } from 'zod';
import { QUESTION_TITLE } from '../data/question';
import { errorMessage } from '../lib/errors';
import type { QuestionResult, QuestionSnapshot } from '../types/forecast';
import type { FetchLike } from './api';

export const QUESTION_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (compatible; pheic-forecast-dashboard/0.1)',
  Accept: 'application/json',
} as const;

const QuestionPayload = z.object({
  title: z.string().nullish(),
  community_prediction: z
    .object({
      q2: z.number().min(0).max(1).nullish(),
    })
    .nullish(),
  prediction_count: z.number().int().nonnegative().nullish(),
  created_time: z.string().nullish(),
  close_time: z.string().nullish(),
  resolution_criteria: z.string().nullish(),
  description: z.string().nullish(),
});
type QuestionPayload = z.infer<typeof QuestionPayload>;

export interface QuestionApiOptions {
  baseUrl: string;
  fetchImpl: FetchLike;
}

export function questionEndpoint(baseUrl: string, questionId: number): string {
  return `${baseUrl}/api2/questions/${questionId}/`;
}

function toSnapshot(payload: QuestionPayload): QuestionSnapshot {
  return {
    title: payload.title ?? QUESTION_TITLE,
    probability: payload.community_prediction?.q2 ?? 0,
    predictionCount: payload.prediction_count ?? 'N/A',
    createdTime: payload.created_time ?? 'N/A',
    closeTime: payload.close_time ?? 'N/A',
    resolutionCriteria: payload.resolution_criteria ?? 'N/A',
    description: payload.description ?? 'N/A',
  };
}

/**
 * Look up the current community prediction for one question.
 *
 * Never rejects: every failure comes back as a tagged result so the page can
 * render its "no data" state. Missing numeric fields default to 0, missing
 * counts and text to "N/A".
 */
export async function fetchQuestion(questionId: number, options: QuestionApiOptions): Promise<QuestionResult> {
  const url = questionEndpoint(options.baseUrl, questionId);

  let res: Response;
  try {
    res = await options.fetchImpl(url, { method: 'GET', headers: QUESTION_HEADERS });
  } catch (error) {
    const message = errorMessage(error, 'Network request failed');
    console.warn(`[QuestionApi] Request to ${url} failed: ${message}`);
    return { status: 'transport-error', message };
  }

  if (res.status === 404) {
    console.warn(`[QuestionApi] Question ${questionId} not found`);
    return { status: 'not-found', questionId };
  }

  if (!res.ok) {
    console.warn(`[QuestionApi] Unexpected response from ${url}: ${res.status}`);
    return { status: 'http-error', httpStatus: res.status };
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (error) {
    const message = errorMessage(error, 'Response body is not JSON');
    console.warn(`[QuestionApi] Could not decode response: ${message}`);
    return { status: 'parse-error', message };
  }

  const parsed = QuestionPayload.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const message = issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'Invalid question payload';
    console.warn(`[QuestionApi] Unexpected payload shape: ${message}`);
    return { status: 'parse-error', message };
  }

  return { status: 'ok', snapshot: toSnapshot(parsed.data) };
}
