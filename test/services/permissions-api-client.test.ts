/**
 * Permissions API Client Tests
 */

import axios, { AxiosError, AxiosInstance, CanceledError } from 'axios';
import {
  PermissionsApiClient,
  normalizePermissions,
} from '../../src/services/permissions-api-client';
import { DownstreamAPIError } from '../../src/models/errors';

const DEFAULTS = ['read:metrics', 'read:logs'];

describe('normalizePermissions', () => {
  it('should read a bare list of customer entries', () => {
    const permissions = normalizePermissions(
      'user@example.com',
      [
        { cloud_id: 'cloud-001', role: 'admin', permissions: ['write:config'] },
        { cloudId: 'cloud-002', permission_level: 'viewer' },
        { id: 42 },
      ],
      DEFAULTS
    );

    expect(permissions.email).toBe('user@example.com');
    expect(permissions.customers).toEqual(['cloud-001', 'cloud-002', '42']);
    expect(permissions.roles).toEqual(['admin', 'viewer']);
    expect(permissions.permissions).toEqual(['write:config', 'read:metrics', 'read:logs']);
  });

  it('should merge top-level roles and permissions without duplicates', () => {
    const permissions = normalizePermissions(
      'user@example.com',
      {
        customers: [{ cloud_id: 'cloud-001', role: 'admin', permissions: ['read:metrics'] }],
        roles: ['admin', 'auditor'],
        permissions: ['read:audit'],
      },
      DEFAULTS
    );

    expect(permissions.customers).toEqual(['cloud-001']);
    expect(permissions.roles).toEqual(['admin', 'auditor']);
    expect(permissions.permissions).toEqual(['read:metrics', 'read:audit', 'read:logs']);
  });

  it('should fall back to the data list when customers is empty', () => {
    const permissions = normalizePermissions(
      'user@example.com',
      { customers: [], data: [{ id: 'cloud-009' }] },
      DEFAULTS
    );

    expect(permissions.customers).toEqual(['cloud-009']);
  });

  it('should not grant defaults without any customer', () => {
    const permissions = normalizePermissions('user@example.com', { roles: ['viewer'] }, DEFAULTS);

    expect(permissions.customers).toEqual([]);
    expect(permissions.roles).toEqual(['viewer']);
    expect(permissions.permissions).toEqual([]);
  });

  it('should return empty permissions for an unexpected body', () => {
    const permissions = normalizePermissions('user@example.com', 'unexpected', DEFAULTS);

    expect(permissions.customers).toEqual([]);
    expect(permissions.roles).toEqual([]);
    expect(permissions.permissions).toEqual([]);
  });
});

describe('PermissionsApiClient', () => {
  const mockHttp = { get: jest.fn() };
  let createSpy: jest.SpyInstance;
  let consoleLogSpy: jest.SpyInstance;
  let client: PermissionsApiClient;

  beforeEach(() => {
    mockHttp.get.mockReset();
    createSpy = jest
      .spyOn(axios, 'create')
      .mockReturnValue(mockHttp as unknown as AxiosInstance);
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    client = new PermissionsApiClient({
      baseUrl: 'https://permissions.test',
      apiKey: 'test-api-key',
      defaultCustomerPermissions: DEFAULTS,
    });
  });

  afterEach(() => {
    createSpy.mockRestore();
    consoleLogSpy.mockRestore();
  });

  it('should create one HTTP client with the API key', () => {
    client.initialize();
    client.initialize();

    expect(createSpy).toHaveBeenCalledTimes(1);
    expect(createSpy).toHaveBeenCalledWith(
      expect.objectContaining({
        baseURL: 'https://permissions.test',
        timeout: 30000,
        headers: {
          'x-api-key': 'test-api-key',
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
      })
    );
  });

  it('should forward the bearer token and normalize the response', async () => {
    mockHttp.get.mockResolvedValue({
      status: 200,
      data: [{ cloud_id: 'cloud-001', role: 'admin' }],
    });

    const permissions = await client.getUserPermissions('user@example.com', 'caller-token');

    expect(mockHttp.get).toHaveBeenCalledWith('/customer', {
      headers: { Authorization: 'Bearer caller-token' },
      signal: undefined,
    });
    expect(permissions.customers).toEqual(['cloud-001']);
    expect(permissions.roles).toEqual(['admin']);
    expect(permissions.permissions).toEqual(DEFAULTS);
  });

  it('should forward the abort signal', async () => {
    mockHttp.get.mockResolvedValue({ status: 200, data: [] });
    const controller = new AbortController();

    await client.getUserPermissions('user@example.com', undefined, controller.signal);

    expect(mockHttp.get).toHaveBeenCalledWith('/customer', {
      headers: {},
      signal: controller.signal,
    });
  });

  it('should return empty permissions for 403', async () => {
    mockHttp.get.mockResolvedValue({ status: 403, data: { message: 'Forbidden' } });

    const permissions = await client.getUserPermissions('user@example.com', 'caller-token');

    expect(permissions.email).toBe('user@example.com');
    expect(permissions.customers).toEqual([]);
    expect(permissions.permissions).toEqual([]);
  });

  it('should throw DownstreamAPIError for 401', async () => {
    mockHttp.get.mockResolvedValue({ status: 401, data: { message: 'Unauthorized' } });

    const request = client.getUserPermissions('user@example.com', 'caller-token');

    await expect(request).rejects.toThrow(DownstreamAPIError);
    await expect(request).rejects.toMatchObject({
      message: 'Unauthorized access to permissions API',
      statusCode: 401,
      code: 'DOWNSTREAM_API_ERROR_401',
    });
  });

  it('should throw DownstreamAPIError with the body for other statuses', async () => {
    mockHttp.get.mockResolvedValue({ status: 500, data: { error: 'boom' } });

    await expect(
      client.getUserPermissions('user@example.com', 'caller-token')
    ).rejects.toMatchObject({
      message: 'Permissions API error: 500 - {"error":"boom"}',
      statusCode: 500,
      code: 'DOWNSTREAM_API_ERROR_500',
    });
  });

  it('should map timeouts to DOWNSTREAM_API_TIMEOUT', async () => {
    mockHttp.get.mockRejectedValue(new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED'));

    await expect(
      client.getUserPermissions('user@example.com', 'caller-token')
    ).rejects.toMatchObject({
      message: 'Permissions API timeout: timeout of 30000ms exceeded',
      timedOut: true,
      code: 'DOWNSTREAM_API_TIMEOUT',
    });
  });

  it('should map transport failures to DownstreamAPIError', async () => {
    mockHttp.get.mockRejectedValue(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'));

    await expect(
      client.getUserPermissions('user@example.com', 'caller-token')
    ).rejects.toMatchObject({
      message: 'Permissions API request failed: connect ECONNREFUSED',
      code: 'DOWNSTREAM_API_ERROR',
    });
  });

  it('should report cancelled requests', async () => {
    mockHttp.get.mockRejectedValue(new CanceledError());

    await expect(
      client.getUserPermissions('user@example.com', 'caller-token')
    ).rejects.toThrow('Permissions API request was cancelled');
  });
});
