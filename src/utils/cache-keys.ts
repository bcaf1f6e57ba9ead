import { createHash } from 'crypto';

/**
 * Cache key namespaces
 */
export enum CacheNamespace {
  PERMISSIONS = 'permissions',
  TOKEN = 'token',
}

/**
 * First 16 hex chars of SHA-256 over the lowercased identity.
 * Raw emails never appear in the key space.
 */
export function hashIdentity(identity: string): string {
  return createHash('sha256').update(identity.toLowerCase()).digest('hex').slice(0, 16);
}

/**
 * Full SHA-256 of a token string
 */
export function hashToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

export function makeCacheKey(prefix: string, namespace: CacheNamespace, digest: string): string {
  return `${prefix}${namespace}:${digest}`;
}
