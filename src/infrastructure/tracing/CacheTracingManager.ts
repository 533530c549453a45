/**
 * Distributed Tracing Integration
 * OpenTelemetry spans and metrics around cache operations.
 * Without a registered SDK the API calls are no-ops.
 */

import { metrics, type Span, SpanStatusCode, trace, type Tracer } from '@opentelemetry/api';
import type { Counter, Histogram } from '@opentelemetry/api';

import type { TracingConfig } from '../../types';
import { toError } from '../error/CacheErrors';

export interface CacheSpanTags {
  operation: string;
  key?: unknown;
  hit?: boolean;
  error?: string;
}

export class CacheTracingManager {
  private readonly tracer: Tracer | undefined;
  private readonly enabled: boolean;

  // Metrics
  private readonly operationCounter: Counter | undefined;
  private readonly operationDuration: Histogram | undefined;
  private readonly cacheHitsCounter: Counter | undefined;
  private readonly cacheMissesCounter: Counter | undefined;
  private readonly expirationsCounter: Counter | undefined;

  constructor(config: TracingConfig = { enabled: false, serviceName: 'observable-cache' }) {
    this.enabled = config.enabled;

    if (this.enabled) {
      const version = config.serviceVersion ?? '1.0.0';
      this.tracer = trace.getTracer(config.serviceName, version);
      const meter = metrics.getMeter(config.serviceName, version);

      this.operationCounter = meter.createCounter('cache_operations_total', {
        description: 'Total number of cache operations',
      });
      this.operationDuration = meter.createHistogram('cache_operation_duration_ms', {
        description: 'Duration of cache operations in milliseconds',
      });
      this.cacheHitsCounter = meter.createCounter('cache_hits_total', {
        description: 'Total number of cache hits',
      });
      this.cacheMissesCounter = meter.createCounter('cache_misses_total', {
        description: 'Total number of cache misses',
      });
      this.expirationsCounter = meter.createCounter('cache_expirations_total', {
        description: 'Total number of expired cache elements',
      });
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  startSpan(operation: string, tags?: Partial<CacheSpanTags>): Span | undefined {
    if (!this.enabled || !this.tracer) return undefined;

    return this.tracer.startSpan(`cache.${operation}`, {
      attributes: {
        'cache.operation': operation,
        ...this.convertTagsToAttributes(tags),
      },
    });
  }

  endSpan(span: Span | undefined, error?: Error): void {
    if (!span) return;

    if (error) {
      span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    } else {
      span.setStatus({ code: SpanStatusCode.OK });
    }

    span.end();
  }

  /**
   * Wrap a cache operation with a span and duration metrics
   */
  async traceOperation<T>(
    operation: string,
    fn: (span?: Span) => Promise<T>,
    tags?: Partial<CacheSpanTags>
  ): Promise<T> {
    const span = this.startSpan(operation, tags);
    const startTime = Date.now();

    try {
      const result = await fn(span);
      this.recordMetrics(operation, Date.now() - startTime, tags);
      this.endSpan(span);
      return result;
    } catch (error) {
      const failure = toError(error);
      this.recordMetrics(operation, Date.now() - startTime, { ...tags, error: failure.message });
      this.endSpan(span, failure);
      throw error;
    }
  }

  recordHit(operation = 'get', count = 1): void {
    if (!this.enabled) return;
    this.cacheHitsCounter?.add(count, { operation });
  }

  recordMiss(operation = 'get', count = 1): void {
    if (!this.enabled) return;
    this.cacheMissesCounter?.add(count, { operation });
  }

  recordExpirations(expirationType: string, count: number): void {
    if (!this.enabled) return;
    this.expirationsCounter?.add(count, { expiration_type: expirationType });
  }

  private recordMetrics(operation: string, duration: number, tags?: Partial<CacheSpanTags>): void {
    if (!this.enabled) return;

    this.operationCounter?.add(1, {
      operation,
      error: tags?.error ? 'true' : 'false',
    });
    this.operationDuration?.record(duration, { operation });
  }

  private convertTagsToAttributes(tags?: Partial<CacheSpanTags>): Record<string, string | number | boolean> {
    if (!tags) return {};

    const attributes: Record<string, string | number | boolean> = {};

    if (tags.operation) attributes['cache.operation'] = tags.operation;
    if (tags.key !== undefined) attributes['cache.key'] = String(tags.key);
    if (tags.hit !== undefined) attributes['cache.hit'] = tags.hit;
    if (tags.error) attributes['cache.error'] = tags.error;

    return attributes;
  }
}
