import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';

export interface ApiError {
  statusCode: number;
  error: string;
  message: string;
  code?: string;
  details?: unknown;
}

interface AppError extends Error {
  statusCode: number;
  code?: string;
  details?: unknown;
}

export class NotFoundError extends Error implements AppError {
  readonly statusCode = 404;
  readonly code = 'NOT_FOUND';

  constructor(resource: string, identifier: string) {
    super(`${resource} '${identifier}' not found`);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends Error implements AppError {
  readonly statusCode = 400;
  readonly code = 'VALIDATION_ERROR';
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

const FASTIFY_VALIDATION_CODE = 'FST_ERR_VALIDATION';
const JSON_PARSE_ERROR_CODES = [
  'FST_ERR_CTP_INVALID_CONTENT_LENGTH',
  'FST_ERR_CTP_INVALID_MEDIA_TYPE',
  'FST_ERR_CTP_BODY_TOO_LARGE',
  'FST_ERR_CTP_EMPTY_JSON_BODY',
  'FST_ERR_CTP_INVALID_JSON_BODY'
];

function isFastifyValidationError(error: FastifyError): boolean {
  return error.code === FASTIFY_VALIDATION_CODE || error.validation !== undefined;
}

function isSyntaxError(error: unknown): boolean {
  return error instanceof SyntaxError;
}

function isJsonParseError(error: FastifyError): boolean {
  return JSON_PARSE_ERROR_CODES.includes(error.code);
}

function toFieldPath(instancePath: string): string {
  // /facts/location -> facts.location
  return instancePath.replace(/^\//, '').replace(/\//g, '.');
}

function extractValidationDetails(error: FastifyError): unknown {
  if (!error.validation) {
    return undefined;
  }
  return error.validation.map((v) => ({
    field: toFieldPath(v.instancePath) || String(v.params['missingProperty'] ?? 'unknown'),
    message: v.message,
    keyword: v.keyword
  }));
}

function formatValidationMessage(error: FastifyError): string {
  if (!error.validation) {
    return 'Request validation failed';
  }

  const messages = error.validation.map((v) => {
    const field = toFieldPath(v.instancePath);

    if (v.keyword === 'required' && v.params['missingProperty'] !== undefined) {
      const missing = String(v.params['missingProperty']);
      return `Missing required field: ${field ? `${field}.${missing}` : missing}`;
    }
    if (v.keyword === 'type' || v.keyword === 'minimum' || v.keyword === 'enum') {
      return `Field ${field} ${v.message ?? 'is invalid'}`;
    }
    if (v.keyword === 'additionalProperties') {
      return `Unknown field: ${String(v.params['additionalProperty'])}`;
    }

    return v.message ?? 'Validation error';
  });

  return messages.join('; ');
}

function sanitizeErrorMessage(error: FastifyError): string {
  if (isFastifyValidationError(error)) {
    return formatValidationMessage(error);
  }

  if (isSyntaxError(error) || isJsonParseError(error)) {
    return 'Invalid JSON in request body';
  }

  return error.message;
}

export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  let statusCode = error.statusCode ?? 500;
  let code: string | undefined = error.code;
  let details: unknown = 'details' in error ? error.details : undefined;

  if (isFastifyValidationError(error)) {
    statusCode = 400;
    code = 'VALIDATION_ERROR';
    details = extractValidationDetails(error);
  } else if (isSyntaxError(error) || isJsonParseError(error)) {
    statusCode = 400;
    code = 'INVALID_JSON';
  }

  const response: ApiError = {
    statusCode,
    error: getErrorName(statusCode),
    message: sanitizeErrorMessage(error)
  };

  if (code) {
    response.code = code;
  }

  if (details) {
    response.details = details;
  }

  if (statusCode >= 500) {
    request.log.error({
      err: error,
      method: request.method,
      url: request.url,
      statusCode
    }, 'Internal server error');
  } else {
    request.log.warn({
      method: request.method,
      url: request.url,
      statusCode,
      code
    }, error.message);
  }

  void reply.status(statusCode).send(response);
}

function getErrorName(statusCode: number): string {
  const names: Record<number, string> = {
    400: 'Bad Request',
    404: 'Not Found',
    409: 'Conflict',
    415: 'Unsupported Media Type',
    500: 'Internal Server Error',
    503: 'Service Unavailable'
  };
  return names[statusCode] ?? 'Error';
}
