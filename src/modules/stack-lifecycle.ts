import type { ParameterSet, StackIdentity } from '../types/index.js';
import {
  ProviderError,
  StackNotFoundError,
  StackStatusError,
  TransportError,
} from './errors.js';
import { LifecycleTracker, type WaitOptions, type WaitResult } from './lifecycle-tracker.js';
import { Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';
import {
  STACK_POLICY_DURING_UPDATE_KEY,
  encodeDeleteRequest,
  encodeSetPolicyRequest,
  encodeStackRequest,
  isTagKey,
} from './parameter-encoder.js';
import type { StackOperationClient } from './stack-client.js';
import { validateStackName } from './stack-name.js';
import { queryStatus } from './stack-queries.js';
import { StackStatus } from './stack-status.js';
import { validateTemplate } from './template-validator.js';

/**
 * Default deadline for deploy and destroy when none is given
 */
export const DEFAULT_WAIT_TIMEOUT_MS = 30 * 60 * 1000;

const NO_UPDATES_MESSAGE = 'No updates are to be performed';

export interface StackLifecycleOptions {
  /** Capabilities acknowledged on create and update */
  capabilities?: readonly string[];
  defaultTimeoutMs?: number;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Defaults to a tracker over the same client, logger and metrics */
  tracker?: LifecycleTracker;
}

/**
 * Result of an update request
 */
export type UpdateOutcome =
  | { changed: true; identity: StackIdentity }
  | { changed: false; identity: StackIdentity; status: string };

export interface DeployInput extends WaitOptions {
  stackName: string;
  templateBody: string;
  options?: ParameterSet;
  timeoutMs?: number;
}

/**
 * created: new stack; updated: changes applied; unchanged: template and
 * parameters matched the running stack
 */
export type DeployAction = 'created' | 'updated' | 'unchanged';

export interface DeployResult {
  action: DeployAction;
  identity: StackIdentity;
  status: string;
}

export interface DestroyInput extends WaitOptions {
  stackName: string;
  timeoutMs?: number;
}

function isNoUpdatesError(error: unknown): boolean {
  return error instanceof ProviderError && error.message.includes(NO_UPDATES_MESSAGE);
}

/**
 * Submits stack operations and tracks them to completion
 *
 * Single operations (`create`, `update`, `delete`, `setPolicy`) only submit
 * the request. `deploy` and `destroy` submit and then wait:
 * - deploy creates the stack if it does not exist, otherwise updates it.
 *   A stack left in ROLLBACK_COMPLETE cannot be updated, so it is deleted
 *   and created again.
 * - destroy deletes the stack and follows it by id until DELETE_COMPLETE.
 *
 * @example
 * ```typescript
 * const lifecycle = new StackLifecycle(new CloudFormationStackClient({ region: 'eu-west-2' }), {
 *   capabilities: ['CAPABILITY_NAMED_IAM'],
 *   logger,
 * });
 * const result = await lifecycle.deploy({
 *   stackName: 'demo',
 *   templateBody,
 *   options: { 'tag.env': 'prod', InstanceType: 't3.micro' },
 * });
 * logger.info(`Stack ${result.action}`, { status: result.status });
 * ```
 */
export class StackLifecycle {
  private readonly capabilities: readonly string[];
  private readonly defaultTimeoutMs: number;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;
  readonly tracker: LifecycleTracker;

  constructor(
    private readonly client: StackOperationClient,
    options: StackLifecycleOptions = {}
  ) {
    this.capabilities = options.capabilities ?? [];
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
    this.logger = options.logger ?? new Logger();
    this.metrics = options.metrics;
    this.tracker =
      options.tracker ?? new LifecycleTracker(client, { logger: this.logger, metrics: this.metrics });
  }

  /**
   * Submits CreateStack
   *
   * An update policy option has nothing to guard on a new stack; it is left
   * out of the request and logged.
   *
   * @returns Identity of the new stack
   * @throws {ValidationError} If the stack name or options are invalid
   * @throws {TemplateValidationError} If the template does not parse
   * @throws {ProviderError} If CloudFormation rejects the request (e.g. AlreadyExistsException)
   */
  async create(stackName: string, templateBody: string, options: ParameterSet = {}): Promise<StackIdentity> {
    const log = this.logger.child({ stackName });
    this.checkRequest(stackName, templateBody, options, log);

    const { [STACK_POLICY_DURING_UPDATE_KEY]: updatePolicy, ...createOptions } = options;
    if (updatePolicy !== undefined) {
      log.warn('Update policy applies to updates only; not sent on create', { event: 'SUBMIT' });
    }

    const request = encodeStackRequest('CreateStack', stackName, templateBody, createOptions, {
      capabilities: this.capabilities,
    });
    log.info('Creating stack', { event: 'SUBMIT', ...this.describeOptions(createOptions) });

    const response = await this.client.submit(request);
    if (!response.stackId) {
      throw new TransportError(`CreateStack succeeded but did not return a StackId for stack ${stackName}`);
    }

    log.info('Stack creation started', { event: 'SUBMIT', stackId: response.stackId, requestId: response.requestId });
    return { name: stackName, id: response.stackId };
  }

  /**
   * Submits UpdateStack. Tag options are ignored, since tags can't be changed.
   *
   * @returns `changed: false` when CloudFormation reports there is nothing to update
   */
  async update(stackName: string, templateBody: string, options: ParameterSet = {}): Promise<UpdateOutcome> {
    const log = this.logger.child({ stackName });
    this.checkRequest(stackName, templateBody, options, log);

    const request = encodeStackRequest('UpdateStack', stackName, templateBody, options, {
      capabilities: this.capabilities,
    });
    log.info('Updating stack', { event: 'SUBMIT', ...this.describeOptions(options) });

    try {
      const response = await this.client.submit(request);
      const identity = { name: stackName, id: response.stackId ?? (await this.resolve(stackName)).id };
      log.info('Stack update started', { event: 'SUBMIT', stackId: identity.id, requestId: response.requestId });
      return { changed: true, identity };
    } catch (error) {
      if (!isNoUpdatesError(error)) {
        throw error;
      }
      const snapshot = await queryStatus(this.client, stackName);
      if (!snapshot.found) {
        throw new StackNotFoundError(stackName);
      }
      log.info('Stack is already up to date', { event: 'SUBMIT', status: snapshot.stack.status });
      return {
        changed: false,
        identity: { name: stackName, id: snapshot.stack.stackId },
        status: snapshot.stack.status,
      };
    }
  }

  /**
   * Submits DeleteStack
   *
   * @returns Identity of the stack being deleted; its id stays queryable after deletion
   * @throws {StackNotFoundError} If no such stack exists
   */
  async delete(stackName: string): Promise<StackIdentity> {
    const identity = await this.resolve(stackName);
    await this.client.submit(encodeDeleteRequest(stackName));
    this.logger.info('Stack deletion started', { event: 'SUBMIT', stackName, stackId: identity.id });
    return identity;
  }

  /**
   * Replaces the stack policy
   *
   * @param policyBody - Stack policy document (JSON)
   */
  async setPolicy(stackName: string, policyBody: string): Promise<void> {
    validateStackName(stackName);
    await this.client.submit(encodeSetPolicyRequest(stackName, policyBody));
    this.logger.info('Stack policy set', { event: 'SUBMIT', stackName });
  }

  /**
   * Creates or updates a stack and waits until it settles
   *
   * @throws {CompositeFailureError | StackStatusError} If provisioning failed
   * @throws {WaitTimeoutError} If the stack did not settle in time
   */
  async deploy(input: DeployInput): Promise<DeployResult> {
    const { stackName, templateBody, options = {}, signal } = input;
    const timeoutMs = input.timeoutMs ?? this.defaultTimeoutMs;
    this.metrics?.setDimensions({ operation: 'deploy' });

    validateStackName(stackName);
    const current = await queryStatus(this.client, stackName);

    if (current.found && current.stack.status === StackStatus.ROLLBACK_COMPLETE) {
      this.logger.warn('Stack is in ROLLBACK_COMPLETE and cannot be updated; recreating it', {
        event: 'SUBMIT',
        stackName,
      });
      await this.deleteAndWait(stackName, timeoutMs, signal);
    } else if (current.found) {
      const outcome = await this.update(stackName, templateBody, options);
      if (!outcome.changed) {
        return { action: 'unchanged', identity: outcome.identity, status: outcome.status };
      }
      const result = await this.tracker.wait(outcome.identity.id, timeoutMs, { signal });
      return { action: 'updated', identity: outcome.identity, status: result.status };
    }

    const identity = await this.create(stackName, templateBody, options);
    const result = await this.tracker.wait(identity.id, timeoutMs, { signal });
    return { action: 'created', identity, status: result.status };
  }

  /**
   * Deletes a stack and waits for DELETE_COMPLETE
   *
   * @throws {StackStatusError} If deletion settled in any other `_COMPLETE` status
   */
  async destroy(input: DestroyInput): Promise<WaitResult> {
    this.metrics?.setDimensions({ operation: 'destroy' });
    return this.deleteAndWait(input.stackName, input.timeoutMs ?? this.defaultTimeoutMs, input.signal);
  }

  // Shared by destroy and the ROLLBACK_COMPLETE path of deploy; leaves the metric dimensions alone
  private async deleteAndWait(stackName: string, timeoutMs: number, signal?: AbortSignal): Promise<WaitResult> {
    const identity = await this.delete(stackName);
    const result = await this.tracker.waitForComplete(identity.id, timeoutMs, { signal });
    if (result.status !== StackStatus.DELETE_COMPLETE) {
      throw new StackStatusError(stackName, result.status, result.statusReason);
    }
    return result;
  }

  private async resolve(stackName: string): Promise<StackIdentity> {
    validateStackName(stackName);
    const snapshot = await queryStatus(this.client, stackName);
    if (!snapshot.found) {
      throw new StackNotFoundError(stackName);
    }
    return { name: snapshot.stack.stackName, id: snapshot.stack.stackId };
  }

  private checkRequest(stackName: string, templateBody: string, options: ParameterSet, log: Logger): void {
    validateStackName(stackName);
    const { parameters } = validateTemplate(templateBody);

    const declared = new Set(parameters);
    const undeclared = Object.keys(options).filter(
      (key) => key !== STACK_POLICY_DURING_UPDATE_KEY && !isTagKey(key) && !declared.has(key)
    );
    if (undeclared.length > 0) {
      log.warn('Options are not declared as template parameters', { undeclared: undeclared.sort() });
    }
  }

  /**
   * Option names for logs; values stay out since parameters can hold secrets
   */
  private describeOptions(options: ParameterSet): Record<string, unknown> {
    const keys = Object.keys(options).sort();
    return {
      parameters: keys.filter((key) => key !== STACK_POLICY_DURING_UPDATE_KEY && !isTagKey(key)),
      tags: keys.filter(isTagKey),
      hasUpdatePolicy: STACK_POLICY_DURING_UPDATE_KEY in options,
    };
  }
}
