/**
 * Permission Models
 *
 * Authorization snapshot resolved for one identity and its cached form.
 */

export interface UserPermissions {
  email: string;
  customers: string[];            // Customer/cloud ids, in API order
  roles: string[];
  permissions: string[];
  fetched_at: Date;
}

/**
 * JSON form stored in the cache
 */
export interface CachedUserPermissions {
  email: string;
  customers: string[];
  roles: string[];
  permissions: string[];
  fetched_at: string;             // ISO-8601
}

export function createUserPermissions(
  email: string,
  fields: Partial<Omit<UserPermissions, 'email'>> = {}
): UserPermissions {
  return {
    email,
    customers: fields.customers ?? [],
    roles: fields.roles ?? [],
    permissions: fields.permissions ?? [],
    fetched_at: fields.fetched_at ?? new Date(),
  };
}

export function toCacheRecord(permissions: UserPermissions): CachedUserPermissions {
  return {
    email: permissions.email,
    customers: permissions.customers,
    roles: permissions.roles,
    permissions: permissions.permissions,
    fetched_at: permissions.fetched_at.toISOString(),
  };
}

export function fromCacheRecord(record: CachedUserPermissions): UserPermissions {
  return {
    email: record.email,
    customers: record.customers,
    roles: record.roles,
    permissions: record.permissions,
    fetched_at: new Date(record.fetched_at),
  };
}
