/**
 * Facility-specific error types.
 * Configuration problems are fatal to the call that hits them; request problems
 * reject the quantities supplied by the caller.
 */

export type FacilityErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'UNKNOWN_PRODUCT'
  | 'UNKNOWN_SEQUENCE'
  | 'INVALID_REQUEST';

export class FacilityError extends Error {
  constructor(
    message: string,
    public readonly code: FacilityErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FacilityError';
  }
}

export class ConfigurationError extends FacilityError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    code: Extract<FacilityErrorCode, 'INVALID_CONFIGURATION' | 'UNKNOWN_PRODUCT' | 'UNKNOWN_SEQUENCE'> = 'INVALID_CONFIGURATION'
  ) {
    super(message, code, context);
    this.name = 'ConfigurationError';
  }

  static unknownProduct(productKey: string): ConfigurationError {
    return new ConfigurationError(`Product '${productKey}' not found`, { productKey }, 'UNKNOWN_PRODUCT');
  }

  static unknownSequence(sequenceId: string): ConfigurationError {
    return new ConfigurationError(`Sequence '${sequenceId}' not found`, { sequenceId }, 'UNKNOWN_SEQUENCE');
  }
}

export class InvalidRequestError extends FacilityError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_REQUEST', context);
    this.name = 'InvalidRequestError';
  }
}

export function isFacilityError(error: unknown): error is FacilityError {
  return error instanceof FacilityError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Flattens zod-style issues into a single readable line
 */
export function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
