/**
 * Stack Lifecycle Lambda Handler
 *
 * Runs one stack operation per invocation and waits for it to settle.
 *
 * Flow:
 * 1. Parse and validate the incoming request (operation + stackName)
 * 2. Build the CloudFormation client, tracker and lifecycle from config
 * 3. Run the operation: deploy, destroy, wait, wait-for-complete or set-policy
 * 4. Flush metrics and map the outcome to a status code
 */

import { getConfig } from './modules/config.js';
import { CompositeFailureError, StackLifecycleError, toError } from './modules/errors.js';
import { LifecycleTracker, type Clock } from './modules/lifecycle-tracker.js';
import { Logger } from './modules/logger.js';
import { MetricsCollector } from './modules/metrics.js';
import { parseLifecycleRequest, type LifecycleRequest } from './modules/request-parser.js';
import { CloudFormationStackClient, type StackOperationClient } from './modules/stack-client.js';
import { StackLifecycle } from './modules/stack-lifecycle.js';
import type { Config } from './types/index.js';

/**
 * Lambda handler response type
 */
export interface HandlerResponse {
  statusCode: number;
  body: string;
}

/**
 * Overrides for the collaborators the handler builds from config
 */
export interface HandlerDependencies {
  config?: Config;
  client?: StackOperationClient;
  clock?: Clock;
}

async function run(
  request: LifecycleRequest,
  lifecycle: StackLifecycle,
  defaultTimeoutMs: number
): Promise<Record<string, unknown>> {
  switch (request.operation) {
    case 'deploy': {
      const result = await lifecycle.deploy({
        stackName: request.stackName,
        templateBody: request.templateBody,
        options: request.options,
        timeoutMs: toMs(request.timeoutSeconds),
      });
      return { action: result.action, stackId: result.identity.id, status: result.status };
    }
    case 'destroy': {
      const result = await lifecycle.destroy({
        stackName: request.stackName,
        timeoutMs: toMs(request.timeoutSeconds),
      });
      return { stackId: result.identity.id, status: result.status, polls: result.polls };
    }
    case 'wait':
    case 'wait-for-complete': {
      const timeoutMs = toMs(request.timeoutSeconds) ?? defaultTimeoutMs;
      const result =
        request.operation === 'wait'
          ? await lifecycle.tracker.wait(request.stackName, timeoutMs)
          : await lifecycle.tracker.waitForComplete(request.stackName, timeoutMs);
      return { stackId: result.identity.id, status: result.status, polls: result.polls };
    }
    case 'set-policy':
      await lifecycle.setPolicy(request.stackName, request.policyBody);
      return {};
  }
}

function toMs(seconds: number | undefined): number | undefined {
  return seconds === undefined ? undefined : seconds * 1000;
}

/**
 * Builds a Lambda handler; tests pass a fake client and clock
 */
export function createHandler(dependencies: HandlerDependencies = {}) {
  return async function handler(event: unknown): Promise<HandlerResponse> {
    const config = dependencies.config ?? getConfig();
    const logger = new Logger(config.logLevel);
    const metrics = new MetricsCollector(logger, config.metricsNamespace, { region: config.awsRegion });

    const client = dependencies.client ?? new CloudFormationStackClient({ region: config.awsRegion });
    const tracker = new LifecycleTracker(client, {
      pollIntervalMs: config.pollIntervalMs,
      failureLookbackMs: config.failureLookbackMs,
      logger,
      metrics,
      clock: dependencies.clock,
    });
    const lifecycle = new StackLifecycle(client, {
      capabilities: config.capabilities,
      defaultTimeoutMs: config.waitTimeoutMs,
      logger,
      metrics,
      tracker,
    });

    let stackName = 'unknown';
    let operation = 'unknown';

    try {
      const request = parseLifecycleRequest(event);
      stackName = request.stackName;
      operation = request.operation;
      logger.setContext({ stackName });
      metrics.setDimensions({ operation });

      logger.info('Stack operation requested', { event: 'SUBMIT', operation });
      const result = await run(request, lifecycle, config.waitTimeoutMs);

      return {
        statusCode: 200,
        body: JSON.stringify({ message: 'Stack operation succeeded', operation, stackName, ...result }),
      };
    } catch (error) {
      const cause = toError(error);
      const statusCode = error instanceof StackLifecycleError ? error.statusCode : 500;

      logger.error('Stack operation failed', {
        event: 'COMPLETE',
        operation,
        error: cause.message,
        errorType: cause.name,
      });

      return {
        statusCode,
        body: JSON.stringify({
          message: 'Stack operation failed',
          operation,
          stackName,
          error: cause.message,
          errorType: cause.name,
          failures: error instanceof CompositeFailureError ? error.failures : undefined,
        }),
      };
    } finally {
      metrics.flush();
    }
  };
}

/**
 * Lambda handler entry point
 */
export const handler = createHandler();
