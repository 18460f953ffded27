import { z } from 'zod';
import { PLATFORM_ORIGIN, QUESTION_ID } from '../data/question';
import { ConfigError } from '../lib/errors';
import type {
  CountSeriesStyle,
  DashboardVariant,
  MissingSchemePolicy,
} from '../types/forecast';

export interface DashboardConfig {
  variant: DashboardVariant;
  csvUrl: string;
  questionId: number;
  apiBaseUrl: string;
  scheme: string | null;
  missingSchemePolicy: MissingSchemePolicy;
  countStyle: CountSeriesStyle;
  countHeadroom: number;
  annotatedScheme: string | null;
}

export interface DashboardEnv {
  VITE_DASHBOARD_VARIANT?: string;
  VITE_CSV_URL?: string;
  VITE_QUESTION_ID?: string;
  VITE_API_BASE_URL?: string;
  VITE_WEIGHTING_SCHEME?: string;
  VITE_MISSING_SCHEME_POLICY?: string;
}

const ENV_KEYS = [
  'VITE_DASHBOARD_VARIANT',
  'VITE_CSV_URL',
  'VITE_QUESTION_ID',
  'VITE_API_BASE_URL',
  'VITE_WEIGHTING_SCHEME',
  'VITE_MISSING_SCHEME_POLICY',
] as const satisfies readonly (keyof DashboardEnv)[];

/** Keep only the dashboard's own variables from a loaded env map. */
export function pickDashboardEnv(source: Record<string, string | undefined>): DashboardEnv {
  const env: DashboardEnv = {};
  for (const key of ENV_KEYS) {
    const value = source[key];
    if (value !== undefined) env[key] = value;
  }
  return env;
}

const VariantSchema = z.enum(['snapshot', 'weighted', 'live']);
const PolicySchema = z.enum(['fail', 'fallback']);
const QuestionIdSchema = z.coerce.number().int().positive();

type VariantPreset = Omit<DashboardConfig, 'variant' | 'questionId' | 'apiBaseUrl' | 'missingSchemePolicy'>;

const VARIANT_PRESETS: Record<DashboardVariant, VariantPreset> = {
  snapshot: {
    csvUrl: '/forecast_data.csv',
    scheme: null,
    countStyle: 'line',
    countHeadroom: 1.1,
    annotatedScheme: null,
  },
  weighted: {
    csvUrl: '/forecast_data_weighted.csv',
    scheme: 'recency_weighted',
    countStyle: 'bar',
    countHeadroom: 1.2,
    annotatedScheme: 'recency_weighted',
  },
  live: {
    csvUrl: '',
    scheme: null,
    countStyle: 'line',
    countHeadroom: 1.1,
    annotatedScheme: null,
  },
};

function parseOrThrow<T>(schema: z.ZodType<T>, value: string, name: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${name} "${value}": ${parsed.error.issues[0]?.message ?? 'unrecognised value'}`);
  }
  return parsed.data;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Resolve dashboard settings from Vite env variables.
 *
 * Every variable is optional; the variant preset fills in whatever is unset.
 * Throws ConfigError on values that do not validate.
 */
export function resolveConfig(env: DashboardEnv): DashboardConfig {
  const variantRaw = nonEmpty(env.VITE_DASHBOARD_VARIANT);
  const variant = variantRaw ? parseOrThrow(VariantSchema, variantRaw, 'VITE_DASHBOARD_VARIANT') : 'snapshot';
  const preset = VARIANT_PRESETS[variant];

  const policyRaw = nonEmpty(env.VITE_MISSING_SCHEME_POLICY);
  const questionIdRaw = nonEmpty(env.VITE_QUESTION_ID);
  const scheme = nonEmpty(env.VITE_WEIGHTING_SCHEME) ?? preset.scheme;

  return {
    ...preset,
    variant,
    csvUrl: nonEmpty(env.VITE_CSV_URL) ?? preset.csvUrl,
    questionId: questionIdRaw ? parseOrThrow(QuestionIdSchema, questionIdRaw, 'VITE_QUESTION_ID') : QUESTION_ID,
    apiBaseUrl: (nonEmpty(env.VITE_API_BASE_URL) ?? PLATFORM_ORIGIN).replace(/\/+$/, ''),
    scheme,
    annotatedScheme: preset.annotatedScheme === null ? null : scheme,
    missingSchemePolicy: policyRaw ? parseOrThrow(PolicySchema, policyRaw, 'VITE_MISSING_SCHEME_POLICY') : 'fail',
  };
}
