export type ErrorKind =
  | 'configuration'
  | 'connection'
  | 'http'
  | 'parse'
  | 'provider'
  | 'cancelled'
  | 'token'
  | 'internal';

export class DispatchError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DispatchError';
    this.kind = kind;
  }
}

/** Missing credential, endpoint or model. Raised before any network call. */
export class ConfigurationError extends DispatchError {
  constructor(message: string) {
    super('configuration', message);
    this.name = 'ConfigurationError';
  }
}

export class ConnectionError extends DispatchError {
  readonly detail: string;

  constructor(message: string, detail: string) {
    super('connection', message);
    this.name = 'ConnectionError';
    this.detail = detail;
  }
}

export class HttpError extends DispatchError {
  readonly status: number;
  readonly body: string;

  constructor(message: string, status: number, body: string) {
    super('http', message);
    this.name = 'HttpError';
    this.status = status;
    this.body = body;
  }
}

/**
 * The response body could not be interpreted. `body` is kept for diagnostics
 * and is never part of the message shown to the host.
 */
export class ParseError extends DispatchError {
  readonly body: string;

  constructor(message: string, body: string) {
    super('parse', message);
    this.name = 'ParseError';
    this.body = body;
  }
}

export class ProviderError extends DispatchError {
  constructor(message: string) {
    super('provider', message);
    this.name = 'ProviderError';
  }
}

export class CancelledError extends DispatchError {
  constructor(message = 'Request cancelled') {
    super('cancelled', message);
    this.name = 'CancelledError';
  }
}

export class TokenExchangeError extends DispatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('token', message, options);
    this.name = 'TokenExchangeError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
