/**
 * Domain error types shared by the ETL run, the aggregator and the server.
 */

export class DataSourceError extends Error {
  code = "DATA_SOURCE_ERROR" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DataSourceError";
  }
}

export class MissingConfigurationError extends Error {
  code = "MISSING_CONFIGURATION" as const;
  key: string;

  constructor(key: string, message?: string) {
    super(message ?? `Missing required configuration: ${key}`);
    this.name = "MissingConfigurationError";
    this.key = key;
  }
}

export class ComputationError extends Error {
  code = "COMPUTATION_ERROR" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ComputationError";
  }
}

export type AnalyticsError = DataSourceError | ComputationError;

/**
 * Extract a readable message from anything that was thrown.
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
