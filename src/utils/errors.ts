export class WeatherClientError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WeatherClientError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type ApiErrorKind =
  | 'authentication'
  | 'access_limitation'
  | 'not_found'
  | 'bad_request'
  | 'server'
  | 'transport';

export interface ApiErrorDetails {
  status?: number;
  providerMessage?: string;
}

/**
 * Failure of a single exchange with the provider. `status` is set whenever a
 * response arrived; `providerMessage` is the `message` field of the error body.
 */
export abstract class ApiError extends WeatherClientError {
  public abstract readonly kind: ApiErrorKind;
  public readonly status?: number;
  public readonly providerMessage?: string;

  constructor(message: string, code: string, details: ApiErrorDetails = {}, options?: ErrorOptions) {
    super(message, code, options);
    this.status = details.status;
    this.providerMessage = details.providerMessage;
  }
}

export class AuthenticationError extends ApiError {
  public readonly kind = 'authentication';

  constructor(message: string, details?: ApiErrorDetails, options?: ErrorOptions) {
    super(message, 'AUTHENTICATION', details, options);
    this.name = 'AuthenticationError';
  }
}

export class AccessLimitationError extends ApiError {
  public readonly kind = 'access_limitation';

  constructor(message: string, details?: ApiErrorDetails, options?: ErrorOptions) {
    super(message, 'ACCESS_LIMITATION', details, options);
    this.name = 'AccessLimitationError';
  }
}

export class NotFoundError extends ApiError {
  public readonly kind = 'not_found';

  constructor(message: string, details?: ApiErrorDetails, options?: ErrorOptions) {
    super(message, 'NOT_FOUND', details, options);
    this.name = 'NotFoundError';
  }
}

export class BadRequestError extends ApiError {
  public readonly kind = 'bad_request';

  constructor(message: string, details?: ApiErrorDetails, options?: ErrorOptions) {
    super(message, 'BAD_REQUEST', details, options);
    this.name = 'BadRequestError';
  }
}

export class ServerError extends ApiError {
  public readonly kind = 'server';

  constructor(message: string, details?: ApiErrorDetails, options?: ErrorOptions) {
    super(message, 'SERVER_ERROR', details, options);
    this.name = 'ServerError';
  }
}

export class TransportError extends ApiError {
  public readonly kind = 'transport';

  constructor(message: string, details?: ApiErrorDetails, options?: ErrorOptions) {
    super(message, 'TRANSPORT', details, options);
    this.name = 'TransportError';
  }
}

export class ValidationError extends WeatherClientError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'VALIDATION_ERROR', options);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends WeatherClientError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
