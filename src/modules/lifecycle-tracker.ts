import type { StackDescription, StackIdentity } from '../types/index.js';
import {
  CompositeFailureError,
  ProviderError,
  StackNotFoundError,
  StackStatusError,
  TransportError,
  WaitCancelledError,
  WaitTimeoutError,
  sleep,
  toError,
} from './errors.js';
import { listFailures } from './failure-aggregator.js';
import { Logger } from './logger.js';
import { MetricName, type MetricsCollector } from './metrics.js';
import type { StackOperationClient } from './stack-client.js';
import { queryStatus, type StackStatusSnapshot } from './stack-queries.js';
import { classifyStackStatus, isCompleteStatus } from './stack-status.js';

/**
 * Default delay between polls
 */
export const DEFAULT_POLL_INTERVAL_MS = 5000;

/**
 * Default look-back before the wait started when collecting failure events
 */
export const DEFAULT_FAILURE_LOOKBACK_MS = 2000;

/**
 * Time source used by the tracker
 */
export interface Clock {
  now(): number;
  /** Resolves after `ms`, or early once `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

export interface LifecycleTrackerOptions {
  pollIntervalMs?: number;
  failureLookbackMs?: number;
  logger?: Logger;
  metrics?: MetricsCollector;
  clock?: Clock;
}

export interface WaitOptions {
  /** Aborting ends the wait with WaitCancelledError at the next sleep */
  signal?: AbortSignal;
}

/**
 * Outcome of a wait that reached its target status
 */
export interface WaitResult {
  identity: StackIdentity;
  status: string;
  statusReason: string;
  /** Number of status queries issued */
  polls: number;
  elapsedMs: number;
}

/**
 * Tracker states. `Polling` is the only non-terminal one.
 */
export type TrackerState =
  | 'Polling'
  | 'SuccessTerminal'
  | 'FailureTerminal'
  | 'TimedOut'
  | 'TransportError'
  | 'Cancelled';

function stateOf(error: unknown): TrackerState {
  if (error instanceof WaitTimeoutError) return 'TimedOut';
  if (error instanceof WaitCancelledError) return 'Cancelled';
  if (error instanceof TransportError) return 'TransportError';
  return 'FailureTerminal';
}

/**
 * Polls a stack until its create or update operation settles
 *
 * Each wait is a sequential loop: query the status, classify it, and either
 * stop or sleep a fixed interval. Nothing is cached between polls, and
 * separate waits share no state, so several stacks can be tracked at once.
 *
 * @example
 * ```typescript
 * const tracker = new LifecycleTracker(client, { logger });
 * try {
 *   const result = await tracker.wait('demo', 30 * 60_000);
 *   logger.info('Stack ready', { status: result.status });
 * } catch (error) {
 *   if (error instanceof CompositeFailureError) {
 *     error.failures.forEach((failure) => logger.error(failure));
 *   }
 * }
 * ```
 */
export class LifecycleTracker {
  private readonly pollIntervalMs: number;
  private readonly failureLookbackMs: number;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;
  private readonly clock: Clock;

  constructor(
    private readonly client: StackOperationClient,
    options: LifecycleTrackerOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.failureLookbackMs = options.failureLookbackMs ?? DEFAULT_FAILURE_LOOKBACK_MS;
    this.logger = options.logger ?? new Logger();
    this.metrics = options.metrics;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Waits for a create or update to succeed
   *
   * - CREATE_IN_PROGRESS / UPDATE_IN_PROGRESS, or the stack not visible yet: keep polling
   * - CREATE_COMPLETE / UPDATE_COMPLETE / UPDATE_COMPLETE_CLEANUP_IN_PROGRESS: resolve
   * - anything else: reject with the resource failures recorded since shortly
   *   before the wait started, or with the raw status and reason if there are none
   *
   * Transport errors are logged and retried until the deadline. Errors returned
   * by CloudFormation end the wait immediately.
   *
   * @param nameOrId - Stack name or id
   * @param timeoutMs - Overall deadline; checked before each sleep, so it can be
   *   overrun by up to one poll interval
   * @throws {CompositeFailureError} If failure events were found
   * @throws {StackStatusError} If the stack failed without failure events
   * @throws {ProviderError} If CloudFormation rejected the status query
   * @throws {WaitTimeoutError} If the deadline passed
   * @throws {WaitCancelledError} If the signal aborted
   */
  async wait(nameOrId: string, timeoutMs: number, options: WaitOptions = {}): Promise<WaitResult> {
    const log = this.logger.child({ stackName: nameOrId });
    const start = this.clock.now();
    const deadline = start + timeoutMs;
    let polls = 0;
    let lastStatus: string | undefined;

    log.info('Waiting for stack', { event: 'POLL', timeoutMs, pollIntervalMs: this.pollIntervalMs });

    try {
      for (;;) {
        polls++;
        const snapshot = await this.pollTolerant(nameOrId, log);

        if (snapshot?.found) {
          const { stack } = snapshot;
          lastStatus = stack.status;

          switch (classifyStackStatus(stack.status)) {
            case 'in-progress':
              log.debug('Stack in progress', { event: 'POLL', status: stack.status, polls });
              break;
            case 'succeeded':
              return this.succeed(stack, start, polls, log);
            case 'other':
              throw await this.describeFailure(stack, start, log);
          }
        } else if (snapshot) {
          log.debug('Stack not visible yet', { event: 'POLL', polls });
        }

        await this.pause(nameOrId, deadline, timeoutMs, lastStatus, options.signal);
      }
    } catch (error) {
      this.fail(error, start, polls, log);
      throw error;
    }
  }

  /**
   * Waits until the stack reaches any `_COMPLETE` status, rollbacks and
   * deletes included, without judging whether the operation succeeded
   *
   * Query errors and a missing stack end the wait immediately.
   *
   * @param nameOrId - Stack name or id; pass the id to follow a deleted stack
   * @throws {StackNotFoundError} If no such stack is visible
   * @throws {ProviderError | TransportError} If a status query fails
   * @throws {WaitTimeoutError} If the deadline passed
   * @throws {WaitCancelledError} If the signal aborted
   */
  async waitForComplete(
    nameOrId: string,
    timeoutMs: number,
    options: WaitOptions = {}
  ): Promise<WaitResult> {
    const log = this.logger.child({ stackName: nameOrId });
    const start = this.clock.now();
    const deadline = start + timeoutMs;
    let polls = 0;
    let lastStatus: string | undefined;

    log.info('Waiting for stack to complete', { event: 'POLL', timeoutMs });

    try {
      for (;;) {
        polls++;
        const snapshot = await queryStatus(this.client, nameOrId);
        if (!snapshot.found) {
          throw new StackNotFoundError(nameOrId);
        }

        const { stack } = snapshot;
        lastStatus = stack.status;
        if (isCompleteStatus(stack.status)) {
          return this.succeed(stack, start, polls, log);
        }
        log.debug('Stack not complete', { event: 'POLL', status: stack.status, polls });

        await this.pause(nameOrId, deadline, timeoutMs, lastStatus, options.signal);
      }
    } catch (error) {
      this.fail(error, start, polls, log);
      throw error;
    }
  }

  /**
   * One status query; provider errors propagate, anything else is logged and
   * reported as `undefined` so the caller sleeps and retries.
   */
  private async pollTolerant(nameOrId: string, log: Logger): Promise<StackStatusSnapshot | undefined> {
    try {
      return await queryStatus(this.client, nameOrId);
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      const cause = toError(error);
      log.error('DescribeStacks failed, retrying', {
        event: 'POLL',
        error: cause.message,
        errorType: cause.name,
      });
      this.metrics?.recordCount(MetricName.STACK_TRANSPORT_RETRY);
      return undefined;
    }
  }

  private async describeFailure(
    stack: StackDescription,
    start: number,
    log: Logger
  ): Promise<CompositeFailureError | StackStatusError> {
    const since = new Date(start - this.failureLookbackMs);
    let failures: string[] = [];

    try {
      failures = await listFailures(this.client, stack.stackId, since);
    } catch (error) {
      log.warn('Could not read stack events', {
        event: 'FAILURE',
        error: toError(error).message,
      });
    }

    if (failures.length > 0) {
      return new CompositeFailureError(stack.stackName, failures);
    }
    return new StackStatusError(stack.stackName, stack.status, stack.statusReason);
  }

  /**
   * Sleep step: deadline first, then cancellation, then the fixed interval
   */
  private async pause(
    nameOrId: string,
    deadline: number,
    timeoutMs: number,
    lastStatus: string | undefined,
    signal: AbortSignal | undefined
  ): Promise<void> {
    if (this.clock.now() > deadline) {
      throw new WaitTimeoutError(nameOrId, timeoutMs, lastStatus);
    }
    if (signal?.aborted) {
      throw new WaitCancelledError(nameOrId);
    }

    await this.clock.sleep(this.pollIntervalMs, signal);

    if (signal?.aborted) {
      throw new WaitCancelledError(nameOrId);
    }
  }

  private succeed(stack: StackDescription, start: number, polls: number, log: Logger): WaitResult {
    const elapsedMs = this.clock.now() - start;
    log.info('Stack reached terminal state', {
      event: 'COMPLETE',
      state: 'SuccessTerminal',
      status: stack.status,
      polls,
      elapsedMs,
    });

    this.metrics?.recordCount(MetricName.STACK_POLL_COUNT, polls);
    this.metrics?.recordDuration(MetricName.STACK_WAIT_DURATION, elapsedMs);
    this.metrics?.recordCount(MetricName.STACK_OPERATION_SUCCESS);

    return {
      identity: { name: stack.stackName, id: stack.stackId },
      status: stack.status,
      statusReason: stack.statusReason,
      polls,
      elapsedMs,
    };
  }

  private fail(error: unknown, start: number, polls: number, log: Logger): void {
    const elapsedMs = this.clock.now() - start;
    const state = stateOf(error);
    const cause = toError(error);

    log.error('Stack wait ended without success', {
      event: state === 'FailureTerminal' ? 'FAILURE' : 'COMPLETE',
      state,
      error: cause.message,
      errorType: cause.name,
      failures: error instanceof CompositeFailureError ? [...error.failures] : undefined,
      polls,
      elapsedMs,
    });

    this.metrics?.recordCount(MetricName.STACK_POLL_COUNT, polls);
    this.metrics?.recordDuration(MetricName.STACK_WAIT_DURATION, elapsedMs);
    this.metrics?.recordCount(
      state === 'TimedOut' ? MetricName.STACK_OPERATION_TIMEOUT : MetricName.STACK_OPERATION_FAILURE
    );
  }
}
