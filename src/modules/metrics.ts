/**
 * Metrics Module
 *
 * CloudWatch metrics for stack operations and waits, written as EMF
 * (Embedded Metric Format) lines on stdout.
 */

import type { Logger } from './logger.js';

/**
 * Metric names
 */
export enum MetricName {
  // Wait metrics
  STACK_WAIT_DURATION = 'StackWaitDuration',
  STACK_POLL_COUNT = 'StackPollCount',
  STACK_TRANSPORT_RETRY = 'StackTransportRetry',

  // Outcome metrics
  STACK_OPERATION_SUCCESS = 'StackOperationSuccess',
  STACK_OPERATION_FAILURE = 'StackOperationFailure',
  STACK_OPERATION_TIMEOUT = 'StackOperationTimeout',
}

/**
 * Metric dimensions
 */
export interface MetricDimensions {
  /** create, update, delete, wait... */
  operation?: string;
  /** AWS region */
  region?: string;
  /** Error type if applicable */
  errorType?: string;
}

interface EMFMetric {
  Name: string;
  Unit: 'Milliseconds' | 'Count' | 'None';
}

interface EMFDirective {
  Namespace: string;
  Dimensions: string[][];
  Metrics: EMFMetric[];
}

/**
 * Metrics collector
 *
 * Values are held until `flush()`, which writes a single EMF document.
 * Recording the same metric twice keeps the latest value, except for counts,
 * which add up.
 *
 * @example
 * ```typescript
 * const metrics = new MetricsCollector(logger, 'StackLifecycle', { region: 'eu-west-2' });
 * const result = await tracker.wait('demo', 600_000);
 * metrics.recordDuration(MetricName.STACK_WAIT_DURATION, result.elapsedMs);
 * metrics.flush();
 * ```
 */
export class MetricsCollector {
  private readonly metrics: Map<string, { value: number; unit: EMFMetric['Unit'] }> = new Map();
  private readonly dimensions: MetricDimensions;

  constructor(
    private readonly logger: Logger,
    private readonly namespace: string = 'StackLifecycle',
    dimensions: MetricDimensions = {}
  ) {
    this.dimensions = { ...dimensions };
  }

  setDimensions(dimensions: Partial<MetricDimensions>): void {
    Object.assign(this.dimensions, dimensions);
  }

  recordDuration(name: MetricName, durationMs: number): void {
    this.record(name, durationMs, 'Milliseconds');
  }

  recordCount(name: MetricName, count: number = 1): void {
    const current = this.metrics.get(name);
    this.record(name, (current?.value ?? 0) + count, 'Count');
  }

  /**
   * Current value of a recorded metric
   */
  getValue(name: MetricName): number | undefined {
    return this.metrics.get(name)?.value;
  }

  private record(name: MetricName, value: number, unit: EMFMetric['Unit']): void {
    this.metrics.set(name, { value, unit });
    this.logger.debug('Metric recorded', { metric: name, value, unit, ...this.dimensions });
  }

  /**
   * Writes collected metrics as one EMF line and clears them
   */
  flush(): void {
    if (this.metrics.size === 0) {
      return;
    }

    const dimensionEntries = Object.entries(this.dimensions).filter(
      (entry): entry is [string, string] => typeof entry[1] === 'string'
    );

    const directive: EMFDirective = {
      Namespace: this.namespace,
      Dimensions: [dimensionEntries.map(([key]) => key)],
      Metrics: [],
    };

    const payload: Record<string, unknown> = {
      _aws: {
        Timestamp: Date.now(),
        CloudWatchMetrics: [directive],
      },
    };

    for (const [key, value] of dimensionEntries) {
      payload[key] = value;
    }

    for (const [name, { value, unit }] of this.metrics) {
      payload[name] = value;
      directive.Metrics.push({ Name: name, Unit: unit });
    }

    // eslint-disable-next-line no-console
    console.log(JSON.stringify(payload));

    this.metrics.clear();
  }
}
