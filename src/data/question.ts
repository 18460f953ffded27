import type { QuestionDetails } from '../types/forecast';

export const QUESTION_ID = 23387;

export const PLATFORM_ORIGIN = 'https://www.metaculus.com';

export function questionUrl(questionId: number): string {
  return `${PLATFORM_ORIGIN}/questions/${questionId}/`;
}

export const QUESTION_TITLE =
  'Will an avian influenza virus in humans be declared a "Public Health Emergency of International Concern" by the WHO before 2030?';

export const RESOLUTION_CRITERIA = `This question will resolve as YES if the World Health Organization (WHO) declares a Public Health Emergency of International Concern (PHEIC) for any avian influenza virus strain in humans at any point before 2030.

The declaration must specifically cite an avian influenza virus (e.g. H5N1, H7N9) as the cause.`;

export const PHEIC_EXPLAINER = [
  'A Public Health Emergency of International Concern (PHEIC) is a formal declaration by the World Health Organization (WHO) of "an extraordinary event which is determined to constitute a public health risk to other States through the international spread of disease and to potentially require a coordinated international response."',
  'This declaration is made under the International Health Regulations (IHR) and represents the highest level of alert that the WHO can issue.',
];

export const METHODOLOGY = [
  'This dashboard displays the community prediction from Metaculus, a forecasting platform that aggregates predictions from thousands of forecasters. The prediction shown represents the community\'s estimated probability that an avian influenza virus will trigger a WHO PHEIC declaration before 2030.',
  'Metaculus uses a scoring system that rewards accurate predictions, and the community has a strong track record of forecasting various events and outcomes.',
];

const schemeLabels: Record<string, string> = {
  community: 'Community Prediction',
  recency_weighted: 'Recency Weighted',
  unweighted: 'Unweighted',
};

export function schemeLabel(scheme: string | null): string {
  if (scheme === null) return 'Probability';
  return schemeLabels[scheme] || scheme.replace(/_/g, ' ');
}

export const staticQuestion: QuestionDetails = {
  title: QUESTION_TITLE,
  url: questionUrl(QUESTION_ID),
  resolutionCriteria: RESOLUTION_CRITERIA,
  description: '',
  createdTime: 'N/A',
  closeTime: 'N/A',
};
