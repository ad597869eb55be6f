/**
 * Error types shared across services
 */

/**
 * Invalid environment or CLI configuration
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * PDF download or text extraction failure
 */
export class PdfProcessingError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PdfProcessingError';
  }
}

/**
 * Why a client operation came back empty. Only surfaces in diagnostics;
 * callers see `null` or an empty list either way.
 */
export type FailureReason = 'not_found' | 'rate_limited' | 'http_error' | 'transport' | 'malformed';

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
