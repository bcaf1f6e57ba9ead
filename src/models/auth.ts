/**
 * Authentication Models
 *
 * Type definitions for verified token claims, the resolved identity and the
 * payload shapes exchanged with the host gateway.
 */

export type TokenUse = 'access' | 'id';

/**
 * Verified token claims from the identity provider
 */
export interface TokenClaims {
  sub: string;                    // Provider subject id
  iss: string;                    // Issuer (user pool URL)
  token_use: TokenUse;            // Token type (access or id)
  exp: number;                    // Expiration timestamp
  iat: number;                    // Issued at timestamp
  client_id?: string;             // App client id (access tokens)
  username?: string;              // Username, e.g. google_user@example.com
  email?: string;                 // Email (id tokens)
  name?: string;                  // Display name
}

/**
 * Email used as the identity key for a set of claims.
 *
 * Federated usernames look like `<provider>_<localpart>`; the part after
 * the first separator is taken when no email claim is present.
 */
export function resolvedEmail(claims: TokenClaims): string {
  if (claims.email) {
    return claims.email;
  }
  if (claims.username) {
    const separator = claims.username.indexOf('_');
    if (separator >= 0) {
      return claims.username.slice(separator + 1);
    }
    return claims.username;
  }
  return claims.sub;
}

export const AUTH_METHOD = 'cognito';

/**
 * Identity produced for one request
 */
export interface AuthenticatedIdentity {
  email: string;
  full_name?: string;
  cognito_sub: string;
  is_admin: boolean;
  is_active: boolean;
  customers: string[];
  roles: string[];
  permissions: string[];
  auth_method: string;
}

/**
 * User record handed to the gateway
 */
export interface GatewayUser {
  email: string;
  full_name: string;
  is_admin: boolean;
  is_active: boolean;
}

/**
 * Metadata attached to the request for later hooks
 */
export interface IdentityMetadata {
  auth_method: string;
  cognito_sub: string;
  customers: string[];
  roles: string[];
  permissions: string[];
}

export function toGatewayUser(identity: AuthenticatedIdentity): GatewayUser {
  return {
    email: identity.email,
    full_name: identity.full_name || identity.email,
    is_admin: identity.is_admin,
    is_active: identity.is_active,
  };
}

export function toMetadata(identity: AuthenticatedIdentity): IdentityMetadata {
  return {
    auth_method: identity.auth_method,
    cognito_sub: identity.cognito_sub,
    customers: identity.customers,
    roles: identity.roles,
    permissions: identity.permissions,
  };
}

/**
 * Credentials extracted by the host from the Authorization header
 */
export interface HttpCredentials {
  scheme?: string;
  credentials?: string;
}

/**
 * Payload of the resolve-identity hook
 */
export interface ResolveIdentityPayload {
  credentials?: HttpCredentials | null;
}

/**
 * Credentials after boundary normalization
 */
export interface BearerCredentials {
  scheme: string;
  token: string | null;
}

/**
 * Hook context supplied by the host
 */
export interface HookContext {
  metadata?: Partial<IdentityMetadata> & Record<string, unknown>;
  user?: { email?: string } | null;
  request_id?: string;
  signal?: AbortSignal;
}

export interface HookError {
  message: string;
  code: string;
}

export interface ResolveIdentityResult {
  modified_payload?: GatewayUser;
  metadata?: IdentityMetadata;
  error?: HookError;
  continue_processing: boolean;
}

/**
 * Payload of the header-injection hooks
 */
export interface InvokePayload {
  headers?: Record<string, string>;
  [key: string]: unknown;
}

export interface InjectHeadersResult {
  modified_payload?: InvokePayload & { headers: Record<string, string> };
  continue_processing: true;
}
