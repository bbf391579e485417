/**
 * Error Taxonomy
 *
 * DATA_UNAVAILABLE is fatal and aborts a run before any journal is processed.
 * INDEX_SERVICE and EXTRACTION are absorbed per journal and surface as
 * FALSE / UNKNOWN fields in that journal's result.
 */

export type ErrorCode =
  | 'DATA_UNAVAILABLE'
  | 'INDEX_SERVICE'
  | 'EXTRACTION'
  | 'CONFIGURATION';

export class JournalPipelineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A reference source (journal table or registry) could not be read or parsed
 */
export class DataUnavailableError extends JournalPipelineError {
  readonly source: string;

  constructor(source: string, reason: string, options?: { cause?: unknown }) {
    super('DATA_UNAVAILABLE', `Reference data unavailable (${source}): ${reason}`, options);
    this.source = source;
  }
}

/**
 * The index verification service failed or returned a non-success status
 */
export class IndexServiceError extends JournalPipelineError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('INDEX_SERVICE', message, { cause: options?.cause });
    this.status = options?.status;
  }
}

/**
 * The metadata extraction call failed
 */
export class ExtractionError extends JournalPipelineError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super('EXTRACTION', message, options);
    this.provider = provider;
  }
}

export class ConfigurationError extends JournalPipelineError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
