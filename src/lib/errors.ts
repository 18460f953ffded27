export type DashboardErrorCode = 'DATA_LOAD' | 'SCHEME_NOT_FOUND' | 'CONFIG';

export class DashboardError extends Error {
  readonly code: DashboardErrorCode;

  constructor(code: DashboardErrorCode, message: string) {
    super(message);
    this.name = 'DashboardError';
    this.code = code;
  }
}

/** Raised when the forecast file cannot be fetched or one of its rows is malformed. */
export class DataLoadError extends DashboardError {
  constructor(message: string) {
    super('DATA_LOAD', message);
    this.name = 'DataLoadError';
  }
}

export class SchemeNotFoundError extends DashboardError {
  readonly scheme: string;
  readonly available: readonly string[];

  constructor(scheme: string, available: readonly string[]) {
    const known = available.length > 0 ? available.join(', ') : 'none';
    super('SCHEME_NOT_FOUND', `No observations for weighting scheme "${scheme}" (available: ${known})`);
    this.name = 'SchemeNotFoundError';
    this.scheme = scheme;
    this.available = available;
  }
}

export class ConfigError extends DashboardError {
  constructor(message: string) {
    super('CONFIG', message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
