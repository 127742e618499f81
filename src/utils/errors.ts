// ============================================
// Error taxonomy
// ============================================

export class ValidationError extends Error {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends Error {
  constructor(message: string, public readonly resource: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export type AuthErrorCode = 'STATUS' | 'MALFORMED' | 'TIMEOUT' | 'NETWORK';

/**
 * Credential acquisition failed. Messages never include the API key.
 */
export class AuthError extends Error {
  constructor(
    message: string,
    public readonly code: AuthErrorCode,
    public readonly statusCode?: number,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'AuthError';
  }
}

export type UpstreamErrorCode = 'STATUS' | 'PARSE' | 'TIMEOUT' | 'NETWORK' | 'CANCELLED';

export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly code: UpstreamErrorCode,
    public readonly statusCode?: number,
    public readonly body?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'UpstreamError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[]) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Raised by the data-access layer when its backing store cannot answer.
 */
export class DataStoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DataStoreError';
  }
}

// ============================================
// HTTP mapping
// ============================================

export interface ErrorBody {
  error: string;
  detail?: string;
  upstreamStatus?: number;
  upstreamBody?: string;
}

export interface HttpError {
  status: number;
  body: ErrorBody;
}

const MAX_ECHOED_BODY_LENGTH = 2000;

function truncateBody(body: string, max = MAX_ECHOED_BODY_LENGTH): string {
  return body.length > max ? `${body.slice(0, max)}...` : body;
}

export function toHttpError(error: unknown): HttpError {
  if (error instanceof ValidationError) {
    return { status: 400, body: { error: 'Invalid request', detail: error.message } };
  }

  if (error instanceof NotFoundError) {
    return { status: 404, body: { error: `${error.resource} not found`, detail: error.message } };
  }

  if (error instanceof AuthError) {
    return {
      status: 502,
      body: { error: 'Upstream authentication failed', detail: error.message },
    };
  }

  if (error instanceof UpstreamError) {
    const body: ErrorBody = { error: 'Upstream model call failed', detail: error.message };
    if (error.statusCode !== undefined) {
      body.upstreamStatus = error.statusCode;
    }
    if (error.body) {
      body.upstreamBody = truncateBody(error.body);
    }
    return { status: 502, body };
  }

  if (error instanceof DataStoreError) {
    return { status: 502, body: { error: 'Data store unavailable', detail: error.message } };
  }

  return { status: 500, body: { error: 'Internal server error' } };
}
