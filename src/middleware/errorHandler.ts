import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ConversionError, ErrorCode, ServiceError } from '../errors';
import { ErrorResponse } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('HTTP');

export interface ErrorPolicy {
  /** Status for ConversionError; routes disagree on whether a failed conversion is the client's fault */
  conversionStatus: number;
}

const DEFAULT_POLICY: ErrorPolicy = { conversionStatus: 500 };

export function errorBody(code: ErrorCode, message: string): ErrorResponse {
  return { success: false, error: { code, message } };
}

/**
 * Map a thrown value to status and body, following the route's policy
 */
export function resolveError(error: unknown, policy: ErrorPolicy = DEFAULT_POLICY): { status: number; body: ErrorResponse } {
  if (error instanceof ConversionError) {
    return { status: policy.conversionStatus, body: errorBody(error.code, error.message) };
  }
  if (error instanceof ServiceError) {
    return { status: error.statusCode, body: errorBody(error.code, error.message) };
  }
  if (error instanceof multer.MulterError) {
    if (error.code === 'LIMIT_FILE_SIZE') {
      return { status: 413, body: errorBody('PAYLOAD_TOO_LARGE', 'Uploaded file exceeds the size limit') };
    }
    return { status: 400, body: errorBody('INVALID_REQUEST', error.message) };
  }

  // body-parser errors carry an HTTP status and a type tag
  const status = httpStatusOf(error);
  if (status === 413) {
    return { status, body: errorBody('PAYLOAD_TOO_LARGE', 'Request body too large') };
  }
  if (status !== null && status >= 400 && status < 500) {
    return { status, body: errorBody('INVALID_REQUEST', error instanceof Error ? error.message : 'Invalid request') };
  }

  return { status: 500, body: errorBody('INTERNAL_ERROR', 'Internal server error') };
}

export function sendError(res: Response, error: unknown, policy?: ErrorPolicy): void {
  const { status, body } = resolveError(error, policy);
  if (status >= 500) {
    logger.error(`${status} ${body.error.code}: ${body.error.message}`, error);
  } else {
    logger.warn(`${status} ${body.error.code}: ${body.error.message}`);
  }
  res.status(status).json(body);
}

/**
 * Last-resort handler for errors raised by middleware (body parsing, uploads)
 */
export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  sendError(res, err);
}

function httpStatusOf(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) return null;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return null;
}
