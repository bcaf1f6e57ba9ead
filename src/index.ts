/**
 * Gateway Identity Auth
 *
 * Bearer-token authentication plugin for an API gateway: validates
 * identity-provider tokens, resolves permissions through a Redis-backed
 * cache and propagates identity headers downstream.
 */

import {
  EnvironmentConfig,
  loadEnvironmentConfig,
  validateEnvironmentConfig,
} from './config/environment';
import { AuthPlugin, AuthPluginDependencies } from './handlers/auth-plugin';

export * from './config/environment';
export * from './models/auth';
export * from './models/errors';
export * from './models/permissions';
export * from './handlers/auth-plugin';
export { KeySetCache } from './middleware/key-set-cache';
export type { KeySet, KeySetFetcher, SigningKey } from './middleware/key-set-cache';
export { TokenValidator, extractBearerToken } from './middleware/jwt-validation';
export { RedisCacheStore } from './repositories/cache-store';
export type { CacheStore } from './repositories/cache-store';
export { PermissionCache } from './services/permission-cache';
export { PermissionsApiClient, normalizePermissions } from './services/permissions-api-client';
export { TokenResultCache } from './services/token-result-cache';

/**
 * Create a plugin instance. Without an explicit config, it is loaded from
 * the environment and validated.
 */
export function createPlugin(
  config?: EnvironmentConfig,
  dependencies?: AuthPluginDependencies
): AuthPlugin {
  const resolved = config ?? loadEnvironmentConfig();
  validateEnvironmentConfig(resolved);
  return new AuthPlugin(resolved, dependencies);
}
