/**
 * Environment Configuration
 *
 * Centralized configuration management for environment variables.
 * The config object is built once at startup and handed to every
 * component constructor; nothing below reads process.env on its own.
 */

export type PermissionsFailureMode = 'open' | 'closed';

export interface EnvironmentConfig {
  // Identity provider configuration
  providerUserPoolId: string;
  providerRegion: string;
  providerAppClientId: string;

  // Permissions API configuration
  permissionsApiUrl: string;
  permissionsApiKey: string;
  defaultCustomerPermissions: string[];
  permissionsFailureMode: PermissionsFailureMode;

  // Cache configuration
  cacheUrl: string;
  cacheConnectTimeoutMs: number;
  cacheCommandTimeoutMs: number;
  cacheKeyPrefix: string;
  permissionCacheTtlSeconds: number;
  keySetCacheTtlSeconds: number;
  keySetMinRefreshIntervalSeconds: number;
  tokenRejectionCacheTtlSeconds: number;
  permissionFetchSingleFlight: boolean;

  // Plugin behavior
  enableHeaderPropagation: boolean;
  clockSkewToleranceSeconds: number;

  // Observability
  enableMetrics: boolean;
  metricsNamespace: string;
  awsRegion: string;
  logLevel: string;
}

const DEFAULT_REGION = 'us-east-2';

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined) {
    return fallback;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseFailureMode(value: string | undefined): PermissionsFailureMode {
  return value?.trim().toLowerCase() === 'closed' ? 'closed' : 'open';
}

/**
 * Load configuration from environment variables, applying defaults
 */
export function loadEnvironmentConfig(
  env: NodeJS.ProcessEnv = process.env
): EnvironmentConfig {
  const providerRegion = env.COGNITO_REGION || DEFAULT_REGION;

  return {
    providerUserPoolId: env.COGNITO_USER_POOL_ID || '',
    providerRegion,
    providerAppClientId: env.COGNITO_APP_CLIENT_ID || '',
    permissionsApiUrl: env.PERMISSIONS_API_URL || '',
    permissionsApiKey: env.PERMISSIONS_API_KEY || '',
    defaultCustomerPermissions: parseList(env.DEFAULT_CUSTOMER_PERMISSIONS, [
      'read:metrics',
      'read:logs',
    ]),
    permissionsFailureMode: parseFailureMode(env.PERMISSIONS_FAILURE_MODE),
    cacheUrl: env.REDIS_URL || 'redis://localhost:6379/0',
    cacheConnectTimeoutMs: parseInteger(env.REDIS_CONNECT_TIMEOUT_MS, 5000),
    cacheCommandTimeoutMs: parseInteger(env.REDIS_COMMAND_TIMEOUT_MS, 2000),
    cacheKeyPrefix: env.CACHE_KEY_PREFIX || 'gateway:auth:',
    permissionCacheTtlSeconds: parseInteger(env.PERMISSION_CACHE_TTL_SECONDS, 300),
    keySetCacheTtlSeconds: parseInteger(env.KEY_SET_CACHE_TTL_SECONDS, 3600),
    keySetMinRefreshIntervalSeconds: parseInteger(env.KEY_SET_MIN_REFRESH_INTERVAL_SECONDS, 30),
    tokenRejectionCacheTtlSeconds: parseInteger(env.TOKEN_REJECTION_CACHE_TTL_SECONDS, 60),
    permissionFetchSingleFlight: parseBoolean(env.PERMISSION_FETCH_SINGLE_FLIGHT, false),
    enableHeaderPropagation: parseBoolean(env.ENABLE_HEADER_PROPAGATION, true),
    clockSkewToleranceSeconds: parseInteger(env.CLOCK_SKEW_TOLERANCE_SECONDS, 300),
    enableMetrics: parseBoolean(env.ENABLE_METRICS, false),
    metricsNamespace: env.METRICS_NAMESPACE || 'Gateway/IdentityAuth',
    awsRegion: env.AWS_REGION || providerRegion,
    logLevel: env.LOG_LEVEL || 'info',
  };
}

/**
 * Validate that all required environment variables are set
 */
export function validateEnvironmentConfig(config: EnvironmentConfig): void {
  const requiredFields: (keyof EnvironmentConfig)[] = [
    'providerUserPoolId',
    'providerAppClientId',
    'permissionsApiUrl',
    'permissionsApiKey',
  ];

  const missingFields = requiredFields.filter((field) => !config[field]);

  if (missingFields.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missingFields.join(', ')}`
    );
  }

  const ttlFields: (keyof EnvironmentConfig)[] = [
    'permissionCacheTtlSeconds',
    'keySetCacheTtlSeconds',
    'keySetMinRefreshIntervalSeconds',
    'tokenRejectionCacheTtlSeconds',
    'clockSkewToleranceSeconds',
  ];

  const negativeFields = ttlFields.filter((field) => {
    const value = config[field];
    return typeof value === 'number' && value < 0;
  });

  if (negativeFields.length > 0) {
    throw new Error(
      `Configuration values must not be negative: ${negativeFields.join(', ')}`
    );
  }

  const timeoutFields: (keyof EnvironmentConfig)[] = [
    'cacheConnectTimeoutMs',
    'cacheCommandTimeoutMs',
  ];

  const nonPositiveFields = timeoutFields.filter((field) => {
    const value = config[field];
    return typeof value === 'number' && value <= 0;
  });

  if (nonPositiveFields.length > 0) {
    throw new Error(
      `Timeouts must be positive: ${nonPositiveFields.join(', ')}`
    );
  }
}

/**
 * Issuer URL of the configured user pool
 */
export function issuerUrl(config: EnvironmentConfig): string {
  return `https://cognito-idp.${config.providerRegion}.amazonaws.com/${config.providerUserPoolId}`;
}

/**
 * Published key-set document URL of the configured user pool
 */
export function keySetUrl(config: EnvironmentConfig): string {
  return `${issuerUrl(config)}/.well-known/jwks.json`;
}
