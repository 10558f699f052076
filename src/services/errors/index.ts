export type ErrorCode = 'CONNECTIVITY' | 'SCHEMA_MISMATCH' | 'PARSE' | 'VALIDATION' | 'WRITE';

export class CostSheetError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Store unreachable, credentials rejected or spreadsheet missing. */
export class ConnectivityError extends CostSheetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECTIVITY', message, options);
  }
}

export class SchemaMismatchError extends CostSheetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SCHEMA_MISMATCH', message, options);
  }
}

/** Raised by strict parsers; loaders coerce instead of propagating it. */
export class ParseError extends CostSheetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PARSE', message, options);
  }
}

export class ValidationError extends CostSheetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('VALIDATION', message, options);
  }
}

export class WriteError extends CostSheetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('WRITE', message, options);
  }
}

const CONNECTIVITY_STATUS = new Set([401, 403, 404]);
const CONNECTIVITY_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EAI_AGAIN']);

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function readProperty(error: unknown, name: string): unknown {
  if (typeof error === 'object' && error !== null && name in error) {
    return Reflect.get(error, name);
  }
  return undefined;
}

/**
 * Classify an error thrown by the Google client (or anything else behind the store).
 * HTTP auth/not-found statuses and network failures are connectivity problems;
 * everything else falls back to `fallback`.
 */
export function toStoreError(
  error: unknown,
  fallback: (message: string, options?: { cause?: unknown }) => CostSheetError
): CostSheetError {
  if (error instanceof CostSheetError) return error;

  const message = errorMessage(error);
  const status = readProperty(error, 'status') ?? readProperty(error, 'code');

  if (typeof status === 'number' && CONNECTIVITY_STATUS.has(status)) {
    return new ConnectivityError(message, { cause: error });
  }
  if (typeof status === 'string' && CONNECTIVITY_CODES.has(status)) {
    return new ConnectivityError(message, { cause: error });
  }

  return fallback(message, { cause: error });
}
