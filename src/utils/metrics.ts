/**
 * CloudWatch Metrics Utilities
 *
 * Emits custom CloudWatch metrics for the authentication pipeline: cache
 * effectiveness, key-set refreshes, token rejections and permissions API
 * latency. Emission never throws; metrics must not break request flow.
 */

import { CloudWatchClient, PutMetricDataCommand, MetricDatum } from '@aws-sdk/client-cloudwatch';
import { LogLevel, log } from './logger';

/**
 * Metric names
 */
export enum MetricName {
  PERMISSION_CACHE_HIT = 'PermissionCacheHit',
  PERMISSION_CACHE_MISS = 'PermissionCacheMiss',
  PERMISSIONS_FETCH_LATENCY = 'PermissionsFetchLatency',
  KEY_SET_REFRESH = 'KeySetRefresh',
  TOKEN_REJECTED = 'TokenRejected',
}

/**
 * Metric units
 */
export enum MetricUnit {
  MILLISECONDS = 'Milliseconds',
  COUNT = 'Count',
}

/**
 * Metric dimensions for filtering and grouping
 */
export interface MetricDimensions {
  operation_type?: string;
  outcome?: string;
  error_code?: string;
  [key: string]: string | undefined;
}

export interface MetricsOptions {
  enabled: boolean;
  namespace: string;
  region: string;
}

/**
 * Emits metrics to one CloudWatch namespace. A disabled emitter makes no calls.
 */
export class MetricsEmitter {
  private client: CloudWatchClient | null = null;

  constructor(private readonly options: MetricsOptions) {}

  get enabled(): boolean {
    return this.options.enabled;
  }

  private getClient(): CloudWatchClient {
    if (!this.client) {
      this.client = new CloudWatchClient({ region: this.options.region });
    }
    return this.client;
  }

  /**
   * Emit a custom CloudWatch metric
   */
  async emit(
    metricName: MetricName,
    value: number,
    unit: MetricUnit,
    dimensions?: MetricDimensions
  ): Promise<void> {
    if (!this.options.enabled) {
      return;
    }

    try {
      const metricData: MetricDatum = {
        MetricName: metricName,
        Value: value,
        Unit: unit,
        Timestamp: new Date(),
      };

      if (dimensions) {
        metricData.Dimensions = Object.entries(dimensions).flatMap(([name, dimensionValue]) =>
          dimensionValue === undefined ? [] : [{ Name: name, Value: dimensionValue }]
        );
      }

      await this.getClient().send(
        new PutMetricDataCommand({
          Namespace: this.options.namespace,
          MetricData: [metricData],
        })
      );
    } catch (error) {
      log(LogLevel.WARN, 'Failed to emit CloudWatch metric', {
        metric_name: metricName,
        value,
        unit,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  async count(metricName: MetricName, dimensions?: MetricDimensions): Promise<void> {
    await this.emit(metricName, 1, MetricUnit.COUNT, dimensions);
  }

  /**
   * Measure and emit duration for an async operation
   *
   * The metric is emitted on failure too, with an `outcome` of `error`.
   */
  async measureDuration<T>(
    operation: () => Promise<T>,
    metricName: MetricName,
    dimensions?: MetricDimensions
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await operation();
      void this.emit(metricName, Date.now() - startTime, MetricUnit.MILLISECONDS, {
        ...dimensions,
        outcome: 'success',
      });
      return result;
    } catch (error) {
      void this.emit(metricName, Date.now() - startTime, MetricUnit.MILLISECONDS, {
        ...dimensions,
        outcome: 'error',
      });
      throw error;
    }
  }

  /**
   * Release the underlying client
   */
  destroy(): void {
    if (this.client) {
      this.client.destroy();
      this.client = null;
    }
  }
}
