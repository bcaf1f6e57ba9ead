/**
 * Authentication Error Models
 *
 * Error taxonomy shared by the validator, the permission pipeline and the
 * plugin hooks. Every error carries a short machine-readable code that is
 * surfaced to the host when a request is rejected.
 */

/**
 * Error codes surfaced to the host
 */
export enum AuthErrorCode {
  AUTH_ERROR = 'AUTH_ERROR',
  INVALID_TOKEN = 'INVALID_TOKEN',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  TOKEN_NOT_YET_VALID = 'TOKEN_NOT_YET_VALID',
  INVALID_SIGNATURE = 'INVALID_SIGNATURE',
  INVALID_ISSUER = 'INVALID_ISSUER',
  INVALID_AUDIENCE = 'INVALID_AUDIENCE',
  KEY_SET_FETCH_ERROR = 'KEY_SET_FETCH_ERROR',
  KEY_NOT_FOUND = 'KEY_NOT_FOUND',
  DOWNSTREAM_API_ERROR = 'DOWNSTREAM_API_ERROR',
  DOWNSTREAM_API_TIMEOUT = 'DOWNSTREAM_API_TIMEOUT',
  PERMISSIONS_UNAVAILABLE = 'PERMISSIONS_UNAVAILABLE',
  CACHE_ERROR = 'CACHE_ERROR',
}

/**
 * Base authentication error
 */
export class AuthenticationError extends Error {
  constructor(
    message: string,
    public readonly code: string = AuthErrorCode.AUTH_ERROR
  ) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/**
 * Token could not be validated (401)
 */
export class TokenValidationError extends AuthenticationError {
  constructor(message: string, code: string = AuthErrorCode.INVALID_TOKEN) {
    super(message, code);
    this.name = 'TokenValidationError';
  }
}

export class TokenExpiredError extends TokenValidationError {
  constructor(message = 'Token has expired') {
    super(message, AuthErrorCode.TOKEN_EXPIRED);
    this.name = 'TokenExpiredError';
  }
}

/**
 * Token is not valid yet (`nbf` or `iat` ahead of the clock beyond tolerance)
 */
export class TokenNotYetValidError extends TokenValidationError {
  constructor(message = 'Token is not yet valid') {
    super(message, AuthErrorCode.TOKEN_NOT_YET_VALID);
    this.name = 'TokenNotYetValidError';
  }
}

export class InvalidSignatureError extends TokenValidationError {
  constructor(message = 'Invalid token signature') {
    super(message, AuthErrorCode.INVALID_SIGNATURE);
    this.name = 'InvalidSignatureError';
  }
}

export class InvalidIssuerError extends TokenValidationError {
  constructor(message = 'Invalid token issuer') {
    super(message, AuthErrorCode.INVALID_ISSUER);
    this.name = 'InvalidIssuerError';
  }
}

export class InvalidAudienceError extends TokenValidationError {
  constructor(message = 'Invalid token audience') {
    super(message, AuthErrorCode.INVALID_AUDIENCE);
    this.name = 'InvalidAudienceError';
  }
}

/**
 * Provider key set could not be fetched and no previous set is held
 */
export class KeySetFetchError extends AuthenticationError {
  constructor(message = 'Failed to fetch key set') {
    super(message, AuthErrorCode.KEY_SET_FETCH_ERROR);
    this.name = 'KeySetFetchError';
  }
}

/**
 * Token references a key id absent from the key set, even after a refresh
 */
export class KeyNotFoundError extends AuthenticationError {
  constructor(message = 'Signing key not found in key set') {
    super(message, AuthErrorCode.KEY_NOT_FOUND);
    this.name = 'KeyNotFoundError';
  }
}

/**
 * Permissions API request failed
 */
export class DownstreamAPIError extends AuthenticationError {
  public readonly statusCode?: number;
  public readonly timedOut: boolean;

  constructor(message: string, options: { statusCode?: number; timedOut?: boolean } = {}) {
    const code = options.timedOut
      ? AuthErrorCode.DOWNSTREAM_API_TIMEOUT
      : options.statusCode
      ? `${AuthErrorCode.DOWNSTREAM_API_ERROR}_${options.statusCode}`
      : AuthErrorCode.DOWNSTREAM_API_ERROR;
    super(message, code);
    this.name = 'DownstreamAPIError';
    this.statusCode = options.statusCode;
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * Cache store operation failed. Always recovered as a cache miss.
 */
export class CacheError extends AuthenticationError {
  constructor(message = 'Cache operation failed') {
    super(message, AuthErrorCode.CACHE_ERROR);
    this.name = 'CacheError';
  }
}

/**
 * Whether an error must abort the auth chain.
 *
 * Key-infrastructure failures deny the request too: the signature cannot
 * be proven without the key.
 */
export function isTokenRejection(
  error: unknown
): error is TokenValidationError | KeySetFetchError | KeyNotFoundError {
  return (
    error instanceof TokenValidationError ||
    error instanceof KeySetFetchError ||
    error instanceof KeyNotFoundError
  );
}
