/**
 * Gateway Authentication Plugin
 *
 * Composes token validation, permission resolution and header propagation
 * into the hooks consumed by the host gateway:
 * - resolveIdentity: bearer token -> gateway user + identity metadata
 * - injectHeaders / toolPreInvoke: identity -> downstream request headers
 *
 * Token failures abort the auth chain. Permission failures follow the
 * configured failure mode: `open` lets the request continue without an
 * identity, `closed` rejects it.
 */

import {
  EnvironmentConfig,
  issuerUrl,
  keySetUrl,
} from '../config/environment';
import {
  AUTH_METHOD,
  AuthenticatedIdentity,
  BearerCredentials,
  HookContext,
  InjectHeadersResult,
  InvokePayload,
  ResolveIdentityPayload,
  ResolveIdentityResult,
  TokenClaims,
  resolvedEmail,
  toGatewayUser,
  toMetadata,
} from '../models/auth';
import {
  AuthErrorCode,
  AuthenticationError,
  DownstreamAPIError,
  TokenExpiredError,
  isTokenRejection,
} from '../models/errors';
import { KeySetCache, KeySetFetcher } from '../middleware/key-set-cache';
import { TokenValidator } from '../middleware/jwt-validation';
import { CacheStore, RedisCacheStore } from '../repositories/cache-store';
import { PermissionCache } from '../services/permission-cache';
import { PermissionsApiClient } from '../services/permissions-api-client';
import { TokenResultCache } from '../services/token-result-cache';
import { LogLevel, errorDetails, log, logAuthentication, setLogLevel } from '../utils/logger';
import { MetricName, MetricsEmitter } from '../utils/metrics';

/**
 * Collaborators that can be swapped out, mainly for tests
 */
export interface AuthPluginDependencies {
  cacheStore?: CacheStore;
  keySetFetcher?: KeySetFetcher;
  metrics?: MetricsEmitter;
}

function readField(source: unknown, field: string): unknown {
  if (source instanceof Map) {
    return source.get(field);
  }
  if (source !== null && typeof source === 'object') {
    return Reflect.get(source, field);
  }
  return undefined;
}

/**
 * Extract `{ scheme, token }` from the host's credentials container, which
 * may be a plain object, a class instance or a Map.
 */
export function normalizeCredentials(payload: unknown): BearerCredentials {
  const credentials = readField(payload, 'credentials');
  const scheme = readField(credentials, 'scheme');
  const token = readField(credentials, 'credentials');

  return {
    scheme: typeof scheme === 'string' ? scheme.trim().toLowerCase() : '',
    token: typeof token === 'string' && token.length > 0 ? token : null,
  };
}

/**
 * Identity headers for downstream agents
 */
export function buildPropagatedHeaders(
  email: string,
  customers: string[],
  requestId?: string
): Record<string, string> {
  const headers: Record<string, string> = {
    'X-User-Email': email,
    'X-User-Customers': JSON.stringify(customers),
  };
  if (requestId) {
    headers['X-Request-ID'] = requestId;
  }
  return headers;
}

export class AuthPlugin {
  private readonly cacheStore: CacheStore;
  private readonly metrics: MetricsEmitter;
  private readonly keySetCache: KeySetCache;
  private readonly validator: TokenValidator;
  private readonly permissionsClient: PermissionsApiClient;
  private readonly permissionCache: PermissionCache;
  private readonly tokenCache: TokenResultCache;

  private initialized = false;
  private initializing: Promise<void> | null = null;

  constructor(
    private readonly config: EnvironmentConfig,
    dependencies: AuthPluginDependencies = {}
  ) {
    this.cacheStore =
      dependencies.cacheStore ??
      new RedisCacheStore(config.cacheUrl, {
        connectTimeoutMs: config.cacheConnectTimeoutMs,
        commandTimeoutMs: config.cacheCommandTimeoutMs,
      });
    this.metrics =
      dependencies.metrics ??
      new MetricsEmitter({
        enabled: config.enableMetrics,
        namespace: config.metricsNamespace,
        region: config.awsRegion,
      });

    this.keySetCache = new KeySetCache({
      uri: keySetUrl(config),
      ttlSeconds: config.keySetCacheTtlSeconds,
      minRefreshIntervalSeconds: config.keySetMinRefreshIntervalSeconds,
      fetcher: dependencies.keySetFetcher,
      metrics: this.metrics,
    });
    this.validator = new TokenValidator(this.keySetCache, {
      issuer: issuerUrl(config),
      appClientId: config.providerAppClientId,
      clockSkewToleranceSeconds: config.clockSkewToleranceSeconds,
    });
    this.permissionsClient = new PermissionsApiClient({
      baseUrl: config.permissionsApiUrl,
      apiKey: config.permissionsApiKey,
      defaultCustomerPermissions: config.defaultCustomerPermissions,
      metrics: this.metrics,
    });
    this.permissionCache = new PermissionCache(this.cacheStore, {
      keyPrefix: config.cacheKeyPrefix,
      ttlSeconds: config.permissionCacheTtlSeconds,
      singleFlight: config.permissionFetchSingleFlight,
      metrics: this.metrics,
    });
    this.tokenCache = new TokenResultCache(
      this.cacheStore,
      config.cacheKeyPrefix,
      config.tokenRejectionCacheTtlSeconds
    );
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  get permissions(): PermissionCache {
    return this.permissionCache;
  }

  /**
   * Connect the cache and fetch the first key set. Concurrent callers share
   * one initialization; a cache that cannot be reached is disabled, not fatal.
   *
   * @throws KeySetFetchError when the first key set cannot be fetched
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    if (!this.initializing) {
      this.initializing = this.runInitialize().finally(() => {
        this.initializing = null;
      });
    }
    await this.initializing;
  }

  private async runInitialize(): Promise<void> {
    setLogLevel(this.config.logLevel);
    log(LogLevel.INFO, 'Initializing gateway auth plugin', {
      issuer: issuerUrl(this.config),
      failure_mode: this.config.permissionsFailureMode,
    });

    try {
      await this.cacheStore.connect();
    } catch (error) {
      log(LogLevel.WARN, 'Permission cache unavailable, continuing without cache', {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    this.permissionsClient.initialize();
    await this.keySetCache.refresh();

    this.initialized = true;
    log(LogLevel.INFO, 'Gateway auth plugin initialized');
  }

  /**
   * Release connections. Safe to call repeatedly or before initialize.
   */
  async shutdown(): Promise<void> {
    if (this.initializing) {
      await this.initializing.catch(() => undefined);
    }
    await this.cacheStore.close();
    this.permissionsClient.shutdown();
    this.keySetCache.clear();
    this.metrics.destroy();

    if (this.initialized) {
      log(LogLevel.INFO, 'Gateway auth plugin shut down');
    }
    this.initialized = false;
  }

  /**
   * Resolve the caller's identity from the request credentials
   *
   * @param payload - `{ credentials: { scheme, credentials } }` from the host, or a Map
   * @param context - Optional hook context (request id, abort signal)
   */
  async resolveIdentity(
    payload: ResolveIdentityPayload | ReadonlyMap<string, unknown>,
    context?: HookContext
  ): Promise<ResolveIdentityResult> {
    const { scheme, token } = normalizeCredentials(payload);
    if (!token || scheme !== 'bearer') {
      log(LogLevel.DEBUG, 'No bearer token found, continuing auth chain');
      return { continue_processing: true };
    }

    const requestId = context?.request_id;
    const signal = context?.signal;

    let claims: TokenClaims;
    try {
      await this.initialize();
      claims = await this.validateToken(token, signal);
    } catch (error) {
      return this.rejectToken(error, requestId);
    }

    const email = resolvedEmail(claims);

    let identity: AuthenticatedIdentity;
    try {
      const permissions = await this.permissionCache.getOrFetch(email, () =>
        this.permissionsClient.getUserPermissions(email, token, signal)
      );
      identity = {
        email,
        full_name: claims.name,
        cognito_sub: claims.sub,
        is_admin: false,
        is_active: true,
        customers: permissions.customers,
        roles: permissions.roles,
        permissions: permissions.permissions,
        auth_method: AUTH_METHOD,
      };
    } catch (error) {
      return this.permissionsUnavailable(error, claims, requestId);
    }

    logAuthentication({
      requestId,
      success: true,
      userId: claims.sub,
      customerCount: identity.customers.length,
    });

    return {
      modified_payload: toGatewayUser(identity),
      metadata: toMetadata(identity),
      continue_processing: true,
    };
  }

  private async validateToken(token: string, signal?: AbortSignal): Promise<TokenClaims> {
    const cached = await this.tokenCache.getRejection(token);
    if (cached) {
      throw cached;
    }

    try {
      return await this.validator.validate(token, signal);
    } catch (error) {
      await this.tokenCache.recordRejection(token, error);
      throw error;
    }
  }

  private rejectToken(error: unknown, requestId?: string): ResolveIdentityResult {
    if (!isTokenRejection(error)) {
      log(LogLevel.ERROR, 'Unexpected auth error, continuing without identity', {
        request_id: requestId,
        ...errorDetails(error),
      });
      return { continue_processing: true };
    }

    logAuthentication({ requestId, success: false, reason: error.message, code: error.code });
    void this.metrics.count(MetricName.TOKEN_REJECTED, { error_code: error.code });

    if (error instanceof TokenExpiredError) {
      return {
        error: { message: 'Token expired', code: AuthErrorCode.TOKEN_EXPIRED },
        continue_processing: false,
      };
    }

    return {
      error: { message: error.message, code: error.code },
      continue_processing: false,
    };
  }

  private permissionsUnavailable(
    error: unknown,
    claims: TokenClaims,
    requestId?: string
  ): ResolveIdentityResult {
    if (error instanceof DownstreamAPIError) {
      log(LogLevel.ERROR, 'Permissions API error', {
        request_id: requestId,
        user_id: claims.sub,
        code: error.code,
        status_code: error.statusCode,
        error_message: error.message,
      });
    } else {
      log(LogLevel.ERROR, 'Unexpected error resolving permissions', {
        request_id: requestId,
        user_id: claims.sub,
        ...errorDetails(error),
      });
    }

    if (this.config.permissionsFailureMode === 'open') {
      return { continue_processing: true };
    }

    return {
      error: {
        message: 'User permissions are unavailable',
        code: error instanceof AuthenticationError ? error.code : AuthErrorCode.PERMISSIONS_UNAVAILABLE,
      },
      continue_processing: false,
    };
  }

  /**
   * Inject identity headers before an agent invocation
   *
   * Leaves the payload untouched when propagation is disabled or the
   * request was not authenticated by this plugin.
   */
  async injectHeaders(payload: InvokePayload, context?: HookContext): Promise<InjectHeadersResult> {
    if (!this.config.enableHeaderPropagation) {
      return { continue_processing: true };
    }

    const metadata = context?.metadata;
    if (!metadata || metadata.auth_method !== AUTH_METHOD) {
      return { continue_processing: true };
    }

    const email = context?.user?.email;
    if (!email) {
      return { continue_processing: true };
    }

    const customers = Array.isArray(metadata.customers)
      ? metadata.customers.filter((customer): customer is string => typeof customer === 'string')
      : [];
    const injected = buildPropagatedHeaders(email, customers, context?.request_id);

    log(LogLevel.DEBUG, 'Injecting identity headers', {
      request_id: context?.request_id,
      customer_count: customers.length,
    });

    return {
      modified_payload: { ...payload, headers: { ...(payload.headers ?? {}), ...injected } },
      continue_processing: true,
    };
  }

  /**
   * Inject identity headers before a tool invocation
   */
  async toolPreInvoke(payload: InvokePayload, context?: HookContext): Promise<InjectHeadersResult> {
    return this.injectHeaders(payload, context);
  }
}
