import type { DashboardConfig } from '../config/dashboard';
import { questionUrl, staticQuestion } from '../data/question';
import type { ForecastApi } from '../services/api';
import type {
  DashboardContext,
  Observation,
  QuestionDetails,
  QuestionResult,
  QuestionSnapshot,
} from '../types/forecast';
import { currentFromQuestionResult, listSchemes, selectCurrent } from './aggregate';

/** The API only reports today's figure, so the point is plotted at the time it was read. */
export function snapshotObservation(snapshot: QuestionSnapshot, readAt: Date): Observation {
  return Object.freeze({
    endTime: readAt,
    probability: snapshot.probability,
    scheme: null,
    forecasterCount: snapshot.predictionCount === 'N/A' ? 0 : snapshot.predictionCount,
  });
}

export function questionDetails(result: QuestionResult, questionId: number): QuestionDetails {
  const url = questionUrl(questionId);
  if (result.status !== 'ok') {
    return { ...staticQuestion, url };
  }

  const { snapshot } = result;
  return {
    title: snapshot.title,
    url,
    resolutionCriteria: snapshot.resolutionCriteria,
    description: snapshot.description,
    createdTime: snapshot.createdTime,
    closeTime: snapshot.closeTime,
  };
}

/**
 * Load the data for the configured variant and derive everything the page
 * shows. Runs once at start-up; the returned context is frozen.
 */
export async function buildDashboardContext(
  config: DashboardConfig,
  api: ForecastApi,
  now: () => Date = () => new Date()
): Promise<DashboardContext> {
  const generatedAt = now();
  const presentation = {
    variant: config.variant,
    annotatedScheme: config.annotatedScheme,
    countStyle: config.countStyle,
    countHeadroom: config.countHeadroom,
  };

  if (config.variant === 'live') {
    const result = await api.fetchQuestion(config.questionId);
    const observations = Object.freeze(
      result.status === 'ok' ? [snapshotObservation(result.snapshot, generatedAt)] : []
    );

    return Object.freeze({
      ...presentation,
      question: questionDetails(result, config.questionId),
      observations,
      current: currentFromQuestionResult(result),
      schemes: [],
      generatedAt,
    });
  }

  const observations = await api.loadObservations(config.csvUrl);
  const current = selectCurrent(observations, {
    scheme: config.scheme,
    onMissingScheme: config.missingSchemePolicy,
  });

  return Object.freeze({
    ...presentation,
    question: { ...staticQuestion, url: questionUrl(config.questionId) },
    observations,
    current,
    schemes: listSchemes(observations),
    generatedAt,
  });
}
