/**
 * Permissions API Client
 *
 * Fetches the caller's customers, roles and permissions from the downstream
 * permissions API and normalizes the response into UserPermissions.
 *
 * Accepted response shapes:
 * - a bare list of customer entries
 * - an object with a `customers` (or `data`) list, plus optional top-level
 *   `roles` and `permissions` arrays
 *
 * Each entry contributes a customer id (`cloud_id`, `cloudId` or `id`), a role
 * (`role` or `permission_level`) and its `permissions` array.
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { DownstreamAPIError } from '../models/errors';
import { UserPermissions, createUserPermissions } from '../models/permissions';
import { LogLevel, log } from '../utils/logger';
import { MetricName, MetricsEmitter } from '../utils/metrics';

const CUSTOMER_PATH = '/customer';
const DEFAULT_TIMEOUT_MS = 30_000;

export interface PermissionsApiClientOptions {
  baseUrl: string;
  apiKey: string;
  defaultCustomerPermissions: string[];
  timeoutMs?: number;
  metrics?: MetricsEmitter;
}

type Entry = Record<string, unknown>;

function isEntry(value: unknown): value is Entry {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isPresent(value: unknown): value is string | number | boolean {
  return (
    value !== undefined &&
    value !== null &&
    value !== '' &&
    value !== false &&
    (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean')
  );
}

function firstPresent(entry: Entry, fields: string[]): string | undefined {
  for (const field of fields) {
    const value = entry[field];
    if (isPresent(value)) {
      return String(value);
    }
  }
  return undefined;
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isPresent).map((item) => String(item));
}

function customerEntries(data: unknown): Entry[] {
  if (Array.isArray(data)) {
    return data.filter(isEntry);
  }
  if (isEntry(data)) {
    const customers = Array.isArray(data.customers) && data.customers.length > 0
      ? data.customers
      : data.data;
    return Array.isArray(customers) ? customers.filter(isEntry) : [];
  }
  return [];
}

/**
 * Normalize a permissions API response body
 */
export function normalizePermissions(
  email: string,
  data: unknown,
  defaultCustomerPermissions: string[]
): UserPermissions {
  const entries = customerEntries(data);
  const customers: string[] = [];
  const roles = new Set<string>();
  const permissions = new Set<string>();

  for (const entry of entries) {
    const customerId = firstPresent(entry, ['cloud_id', 'cloudId', 'id']);
    if (customerId !== undefined) {
      customers.push(customerId);
    }
    const role = firstPresent(entry, ['role', 'permission_level']);
    if (role !== undefined) {
      roles.add(role);
    }
    stringList(entry.permissions).forEach((permission) => permissions.add(permission));
  }

  if (isEntry(data)) {
    stringList(data.roles).forEach((role) => roles.add(role));
    stringList(data.permissions).forEach((permission) => permissions.add(permission));
  }

  // Any customer access implies the default read-only grants.
  if (customers.length > 0) {
    defaultCustomerPermissions.forEach((permission) => permissions.add(permission));
  }

  return createUserPermissions(email, {
    customers,
    roles: [...roles],
    permissions: [...permissions],
  });
}

export class PermissionsApiClient {
  private http: AxiosInstance | null = null;

  constructor(private readonly options: PermissionsApiClientOptions) {}

  /**
   * Create the HTTP client. Called lazily by requests when needed.
   */
  initialize(): void {
    if (this.http) {
      return;
    }
    this.http = axios.create({
      baseURL: this.options.baseUrl,
      timeout: this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      headers: {
        'x-api-key': this.options.apiKey,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      // Status handling is done below, including 401/403.
      validateStatus: () => true,
    });
  }

  shutdown(): void {
    this.http = null;
  }

  /**
   * Fetch and normalize permissions for a user
   *
   * A 403 means authenticated with no access and yields empty permissions.
   *
   * @param email - Identity the permissions belong to
   * @param bearerToken - Caller's token, forwarded as `Authorization: Bearer`
   * @throws DownstreamAPIError for 401, other non-2xx statuses, timeouts and
   * transport failures
   */
  async getUserPermissions(
    email: string,
    bearerToken?: string,
    signal?: AbortSignal
  ): Promise<UserPermissions> {
    this.initialize();
    const http = this.http;
    if (!http) {
      throw new DownstreamAPIError('Permissions API client is not initialized');
    }

    const headers: Record<string, string> = {};
    if (bearerToken) {
      headers.Authorization = `Bearer ${bearerToken}`;
    }

    let response: AxiosResponse<unknown>;
    try {
      const request = () => http.get<unknown>(CUSTOMER_PATH, { headers, signal });
      response = this.options.metrics
        ? await this.options.metrics.measureDuration(request, MetricName.PERMISSIONS_FETCH_LATENCY)
        : await request();
    } catch (error) {
      throw this.mapTransportError(error);
    }

    if (response.status >= 200 && response.status < 300) {
      return normalizePermissions(email, response.data, this.options.defaultCustomerPermissions);
    }

    if (response.status === 403) {
      log(LogLevel.WARN, 'User has no customer permissions', { email });
      return createUserPermissions(email);
    }

    if (response.status === 401) {
      throw new DownstreamAPIError('Unauthorized access to permissions API', { statusCode: 401 });
    }

    throw new DownstreamAPIError(
      `Permissions API error: ${response.status} - ${describeBody(response.data)}`,
      { statusCode: response.status }
    );
  }

  private mapTransportError(error: unknown): DownstreamAPIError {
    if (axios.isCancel(error)) {
      return new DownstreamAPIError('Permissions API request was cancelled');
    }
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new DownstreamAPIError(`Permissions API timeout: ${error.message}`, {
          timedOut: true,
        });
      }
      return new DownstreamAPIError(`Permissions API request failed: ${error.message}`);
    }
    return new DownstreamAPIError(
      `Permissions API request failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function describeBody(data: unknown): string {
  if (data === undefined || data === null) {
    return '';
  }
  const text = typeof data === 'string' ? data : JSON.stringify(data);
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}
