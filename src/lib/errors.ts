/**
 * Error hierarchy for Egeria client and format-set operations
 *
 * Format-set lookups never throw on a miss (they return tagged results).
 * These errors cover transport failures, server-reported failures and
 * misuse of the report runner or format-set files.
 */

export type EgeriaErrorContext = Record<string, string | number | boolean | undefined>;

export class EgeriaError extends Error {
  public readonly code: string;
  public readonly context: EgeriaErrorContext;

  constructor(message: string, code = 'EGERIA_ERROR', context: EgeriaErrorContext = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'EgeriaError';
    this.code = code;
    this.context = context;
  }
}

/** Network failure, refused connection or timeout */
export class EgeriaConnectionError extends EgeriaError {
  constructor(message: string, context: EgeriaErrorContext = {}, cause?: unknown) {
    super(message, 'CONNECTION_ERROR', context, cause);
    this.name = 'EgeriaConnectionError';
  }
}

/** HTTP status >= 400 */
export class EgeriaClientError extends EgeriaError {
  public readonly status: number;

  constructor(message: string, status: number, context: EgeriaErrorContext = {}, cause?: unknown, code = 'CLIENT_ERROR') {
    super(message, code, { ...context, status }, cause);
    this.name = 'EgeriaClientError';
    this.status = status;
  }
}

export class EgeriaUnauthorizedError extends EgeriaClientError {
  constructor(message: string, status: number, context: EgeriaErrorContext = {}, cause?: unknown) {
    super(message, status, context, cause, 'UNAUTHORIZED');
    this.name = 'EgeriaUnauthorizedError';
  }
}

export class EgeriaNotFoundError extends EgeriaClientError {
  constructor(message: string, context: EgeriaErrorContext = {}, cause?: unknown) {
    super(message, 404, context, cause, 'NOT_FOUND');
    this.name = 'EgeriaNotFoundError';
  }
}

/**
 * The server answered, but the body reported a failure
 * (relatedHTTPCode other than 200).
 */
export class EgeriaApiError extends EgeriaError {
  public readonly relatedHTTPCode: number;

  constructor(message: string, relatedHTTPCode: number, context: EgeriaErrorContext = {}) {
    super(message, 'API_ERROR', { ...context, relatedHTTPCode });
    this.name = 'EgeriaApiError';
    this.relatedHTTPCode = relatedHTTPCode;
  }
}

export class ReportSpecError extends EgeriaError {
  constructor(message: string, context: EgeriaErrorContext = {}) {
    super(message, 'REPORT_SPEC_ERROR', context);
    this.name = 'ReportSpecError';
  }
}

export class FormatSetFileError extends EgeriaError {
  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, 'FORMAT_SET_FILE_ERROR', { filePath }, cause);
    this.name = 'FormatSetFileError';
  }
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
