/**
 * Error taxonomy for the conversion pipeline
 *
 * ValidationError is raised before any external call. Fetch, size and tool
 * failures are wrapped into a ConversionError at the orchestrator boundary.
 */

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'UNSUPPORTED_FORMAT'
  | 'PAYLOAD_TOO_LARGE'
  | 'FETCH_FAILED'
  | 'RENDERING_FAILED'
  | 'CONVERSION_FAILED'
  | 'INTERNAL_ERROR';

export class ServiceError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    readonly statusCode: number
  ) {
    super(message);
    this.name = 'ServiceError';
  }
}

export class ValidationError extends ServiceError {
  constructor(message: string, code: ErrorCode = 'INVALID_REQUEST', statusCode = 400) {
    super(message, code, statusCode);
    this.name = 'ValidationError';
  }
}

export class FetchError extends ServiceError {
  /** Upstream HTTP status, absent for transport failures and timeouts */
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message, 'FETCH_FAILED', 500);
    this.name = 'FetchError';
    this.status = status;
  }
}

export class OversizeError extends ServiceError {
  constructor(
    readonly limitBytes: number,
    readonly receivedBytes: number
  ) {
    super(
      `content exceeds ${limitBytes} bytes (received at least ${receivedBytes})`,
      'PAYLOAD_TOO_LARGE',
      500
    );
    this.name = 'OversizeError';
  }
}

export class ExternalToolError extends ServiceError {
  constructor(
    readonly tool: string,
    message: string,
    readonly diagnostic = ''
  ) {
    super(diagnostic ? `${tool}: ${message}: ${diagnostic}` : `${tool}: ${message}`, 'CONVERSION_FAILED', 500);
    this.name = 'ExternalToolError';
  }
}

export type ConversionStage =
  | 'received'
  | 'validated'
  | 'resource-acquired'
  | 'converted'
  | 'post-processed'
  | 'succeeded'
  | 'failed';

export class ConversionError extends ServiceError {
  readonly cause: unknown;

  constructor(
    detail: string,
    readonly stage: ConversionStage,
    cause: unknown,
    code: ErrorCode = 'CONVERSION_FAILED'
  ) {
    super(`conversion failed: ${detail}`, code, 500);
    this.name = 'ConversionError';
    this.cause = cause;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
