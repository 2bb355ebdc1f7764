// Common error classes and Fastify error mapping utilities

export type ErrorBody = {
  statusCode: number;
  code: string;
  message: string;
  details?: unknown;
};

export class AppError extends Error {
  statusCode: number;
  code: string;
  details?: unknown;
  constructor(message: string, statusCode = 400, options?: { code?: string; details?: unknown; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = options?.code ?? 'BAD_REQUEST';
    this.details = options?.details;
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(message, 404, { code: 'NOT_FOUND' });
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 409, { code: 'CONFLICT', details });
    this.name = 'ConflictError';
  }
}

export class StoreUnavailableError extends AppError {
  constructor(message = 'Partner store unavailable', cause?: unknown) {
    super(message, 503, { code: 'STORE_UNAVAILABLE', cause });
    this.name = 'StoreUnavailableError';
  }
}

const STATUS_CODES: Record<number, string> = {
  400: 'BAD_REQUEST',
  401: 'UNAUTHORIZED',
  403: 'FORBIDDEN',
  404: 'NOT_FOUND',
  405: 'METHOD_NOT_ALLOWED',
  406: 'NOT_ACCEPTABLE',
  409: 'CONFLICT',
  413: 'PAYLOAD_TOO_LARGE',
  415: 'UNSUPPORTED_MEDIA_TYPE',
  429: 'TOO_MANY_REQUESTS',
};

function statusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('statusCode' in err)) return undefined;
  const { statusCode } = err;
  return typeof statusCode === 'number' ? statusCode : undefined;
}

// AppErrors keep their status; other client errors raised by Fastify or its
// plugins (bad JSON, empty body, rate limit) keep theirs; anything else is a 500.
export function toErrorResponse(err: unknown): { statusCode: number; body: ErrorBody } {
  if (err instanceof AppError) {
    const body: ErrorBody = { statusCode: err.statusCode, code: err.code, message: err.message };
    if (err.details !== undefined) body.details = err.details;
    return { statusCode: err.statusCode, body };
  }
  const statusCode = statusOf(err);
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    const message = err instanceof Error ? err.message : 'Bad Request';
    return {
      statusCode,
      body: { statusCode, code: STATUS_CODES[statusCode] ?? 'BAD_REQUEST', message },
    };
  }
  return { statusCode: 500, body: { statusCode: 500, code: 'INTERNAL_ERROR', message: 'Internal Server Error' } };
}
