/**
 * Pipeline Errors
 *
 * Table-level failures abort the current stage and are surfaced verbatim to the
 * driver. Row-level defects are never thrown; the cleaner counts them under a
 * {@link RowDropReason} instead.
 *
 * @module errors
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Stable error codes carried by every {@link PipelineError}.
 */
export type PipelineErrorCode =
  | 'SourceUnavailable'
  | 'EmptyResult'
  | 'InvalidSchema'
  | 'UnknownColumn'
  | 'UnsupportedFormat'
  | 'ArtifactMissing'
  | 'InvalidConfig';

/**
 * Reasons a row can be excluded by the cleaner. Recoverable: counted, not thrown.
 */
export type RowDropReason =
  | 'missingRequired'
  | 'invalidValue'
  | 'duplicates'
  | 'outliers'
  | 'outOfRange';

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Base class for fatal pipeline errors.
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

/**
 * The upstream data source (file, endpoint) could not be reached or read.
 */
export class SourceUnavailableError extends PipelineError {
  constructor(
    public readonly source: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Source unavailable: ${source} (${reason})`, 'SourceUnavailable', options);
    this.name = 'SourceUnavailableError';
  }
}

/**
 * Zero rows matched the requested year.
 */
export class EmptyResultError extends PipelineError {
  constructor(public readonly year: number, source: string) {
    super(`No rows for year ${year} in ${source}`, 'EmptyResult');
    this.name = 'EmptyResultError';
  }
}

/**
 * A table does not satisfy its declared schema (missing required columns,
 * mismatched row shape or mistyped values at construction).
 */
export class InvalidSchemaError extends PipelineError {
  constructor(message: string, public readonly columns: string[] = []) {
    super(message, 'InvalidSchema');
    this.name = 'InvalidSchemaError';
  }
}

/**
 * A feature spec or report option references a column the table lacks.
 */
export class UnknownColumnError extends PipelineError {
  constructor(public readonly column: string, context: string) {
    super(`Unknown column "${column}" referenced by ${context}`, 'UnknownColumn');
    this.name = 'UnknownColumnError';
  }
}

/**
 * Requested report format is not one of the supported formats.
 */
export class UnsupportedFormatError extends PipelineError {
  constructor(public readonly format: string, supported: readonly string[]) {
    super(
      `Unsupported report format "${format}" (expected one of: ${supported.join(', ')})`,
      'UnsupportedFormat'
    );
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * A stage's upstream artifact does not exist in the store.
 */
export class ArtifactMissingError extends PipelineError {
  constructor(public readonly artifact: string, location: string) {
    super(`Artifact not found: ${artifact} (${location})`, 'ArtifactMissing');
    this.name = 'ArtifactMissingError';
  }
}

/**
 * Pipeline configuration is structurally valid JSON but semantically wrong.
 */
export class InvalidConfigError extends PipelineError {
  constructor(message: string) {
    super(message, 'InvalidConfig');
    this.name = 'InvalidConfigError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Check whether a value is a {@link PipelineError}.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Extract a message from an unknown thrown value.
 */
export function stringifyError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One-line description used by the driver and the CLI: `<Code>: <message>`.
 */
export function describeError(error: unknown): string {
  if (isPipelineError(error)) {
    return `${error.code}: ${error.message}`;
  }
  return stringifyError(error);
}
