/**
 * JWT Validation Middleware
 *
 * Validates bearer tokens issued by the identity provider and extracts
 * their claims. Signing keys come from the key set cache, which handles
 * provider key rotation.
 */

import * as jwt from 'jsonwebtoken';
import Ajv, { JSONSchemaType } from 'ajv';
import { TokenClaims } from '../models/auth';
import {
  InvalidAudienceError,
  InvalidIssuerError,
  InvalidSignatureError,
  TokenExpiredError,
  TokenNotYetValidError,
  TokenValidationError,
} from '../models/errors';
import { KeySetCache } from './key-set-cache';

/**
 * Claims as they appear in the token payload
 */
interface RawTokenClaims extends TokenClaims {
  'cognito:username'?: string;
}

const ajv = new Ajv({ allErrors: true, strict: true, coerceTypes: false });

const rawClaimsSchema: JSONSchemaType<RawTokenClaims> = {
  type: 'object',
  properties: {
    sub: { type: 'string', minLength: 1 },
    iss: { type: 'string' },
    token_use: { type: 'string', enum: ['access', 'id'] },
    exp: { type: 'number' },
    iat: { type: 'number' },
    client_id: { type: 'string', nullable: true },
    username: { type: 'string', nullable: true },
    email: { type: 'string', nullable: true },
    name: { type: 'string', nullable: true },
    'cognito:username': { type: 'string', nullable: true },
  },
  required: ['sub', 'iss', 'token_use', 'exp', 'iat'],
  additionalProperties: true,
};

const validateRawClaims = ajv.compile(rawClaimsSchema);

export interface TokenValidatorOptions {
  issuer: string;
  appClientId: string;
  clockSkewToleranceSeconds: number;
}

/**
 * Extract token from an Authorization header value
 *
 * @returns the token, or null when the header is absent or not `Bearer <token>`
 */
export function extractBearerToken(authHeader: string | null | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const parts = authHeader.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return null;
  }

  return parts[1];
}

/**
 * Map a jsonwebtoken failure onto the authentication error taxonomy
 */
function mapVerificationError(error: unknown): TokenValidationError {
  if (error instanceof jwt.TokenExpiredError) {
    return new TokenExpiredError();
  }

  if (error instanceof jwt.NotBeforeError) {
    return new TokenNotYetValidError(error.message);
  }

  if (error instanceof jwt.JsonWebTokenError) {
    const message = error.message.toLowerCase();
    if (message.includes('issuer')) {
      return new InvalidIssuerError(error.message);
    }
    if (message.includes('signature')) {
      return new InvalidSignatureError(error.message);
    }
    return new TokenValidationError(error.message);
  }

  return new TokenValidationError(
    `Token validation failed: ${error instanceof Error ? error.message : 'Unknown error'}`
  );
}

function toTokenClaims(raw: RawTokenClaims): TokenClaims {
  return {
    sub: raw.sub,
    iss: raw.iss,
    token_use: raw.token_use,
    exp: raw.exp,
    iat: raw.iat,
    client_id: raw.client_id ?? undefined,
    username: raw.username ?? raw['cognito:username'] ?? undefined,
    email: raw.email ?? undefined,
    name: raw.name ?? undefined,
  };
}

export class TokenValidator {
  constructor(
    private readonly keySetCache: KeySetCache,
    private readonly options: TokenValidatorOptions
  ) {}

  /**
   * Validate a token and return its claims
   *
   * This method:
   * 1. Decodes the token header without verification to get the key ID (kid)
   * 2. Resolves the signing key (refreshing the key set on a miss)
   * 3. Verifies the RS256 signature, expiry and issuer with clock-skew leeway
   * 4. Checks the claim shape, and for access tokens the app client id
   *
   * @param token - Raw token, without the `Bearer ` prefix
   * @throws TokenValidationError (or a subclass) for invalid tokens
   * @throws KeySetFetchError / KeyNotFoundError when the signing key cannot be resolved
   */
  async validate(token: string, signal?: AbortSignal): Promise<TokenClaims> {
    const decoded = jwt.decode(token, { complete: true });
    if (!decoded || typeof decoded === 'string') {
      throw new TokenValidationError('Invalid token format');
    }

    const kid = decoded.header.kid;
    if (!kid) {
      throw new TokenValidationError("Token header missing 'kid'");
    }

    const signingKey = await this.keySetCache.getKey(kid, signal);

    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, signingKey.publicKey, {
        algorithms: ['RS256'],
        issuer: this.options.issuer,
        clockTolerance: this.options.clockSkewToleranceSeconds,
      });
    } catch (error) {
      throw mapVerificationError(error);
    }

    if (!validateRawClaims(payload)) {
      throw new TokenValidationError(
        `Invalid token claims: ${ajv.errorsText(validateRawClaims.errors)}`
      );
    }

    const nowSeconds = Math.floor(Date.now() / 1000);
    if (payload.iat > nowSeconds + this.options.clockSkewToleranceSeconds) {
      throw new TokenNotYetValidError('Token issued in the future');
    }

    const claims = toTokenClaims(payload);

    if (claims.token_use === 'access' && claims.client_id !== this.options.appClientId) {
      throw new InvalidAudienceError(`Invalid client_id: ${claims.client_id ?? 'missing'}`);
    }

    return claims;
  }
}
