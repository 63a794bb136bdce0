export type ForecastErrorCode = 'VALIDATION_ERROR' | 'CONSTRUCTION_ERROR';

/**
 * Base error for everything the forecast pipeline raises on purpose.
 * Carries a stable code and the offending values for the skip log.
 */
export class ForecastError extends Error {
  public readonly code: ForecastErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ForecastErrorCode,
    options?: { cause?: unknown; context?: Record<string, unknown> },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ForecastError';
    this.code = code;
    this.context = options?.context;
  }
}

// malformed date or amount reaching the cascade
export class ForecastValidationError extends ForecastError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', { context });
    this.name = 'ForecastValidationError';
  }
}

// a single candidate record could not be built
export class ForecastConstructionError extends ForecastError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message, 'CONSTRUCTION_ERROR', { context, cause });
    this.name = 'ForecastConstructionError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
