import type { ParameterSet } from '../types/index.js';
import { ValidationError } from './errors.js';

/**
 * Operations the handler accepts
 */
export const LIFECYCLE_OPERATIONS = ['deploy', 'destroy', 'wait', 'wait-for-complete', 'set-policy'] as const;

export type LifecycleOperation = (typeof LIFECYCLE_OPERATIONS)[number];

/**
 * Validated handler request
 */
export type LifecycleRequest =
  | {
      operation: 'deploy';
      stackName: string;
      templateBody: string;
      options: ParameterSet;
      timeoutSeconds?: number;
    }
  | {
      operation: 'destroy' | 'wait' | 'wait-for-complete';
      stackName: string;
      timeoutSeconds?: number;
    }
  | {
      operation: 'set-policy';
      stackName: string;
      policyBody: string;
    };

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOperation(value: unknown): value is LifecycleOperation {
  return LIFECYCLE_OPERATIONS.some((operation) => operation === value);
}

function parseOptions(value: unknown): ParameterSet {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isObject(value)) {
    throw new ValidationError('options must be an object of string values', 'options');
  }

  const options: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'number' || typeof entry === 'boolean') {
      options[key] = String(entry);
    } else if (typeof entry === 'string') {
      options[key] = entry;
    } else {
      throw new ValidationError(`options.${key} must be a string`, `options.${key}`);
    }
  }
  return options;
}

function parseTimeout(value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ValidationError('timeoutSeconds must be a positive number', 'timeoutSeconds');
  }
  return value;
}

/**
 * Parses and validates a handler invocation event
 *
 * @param event - Raw invocation payload (unknown type for safety)
 * @throws {ValidationError} If the event structure is invalid or required fields are missing
 *
 * @example
 * ```typescript
 * const request = parseLifecycleRequest({
 *   operation: 'deploy',
 *   stackName: 'demo',
 *   templateBody: '{"Resources": {...}}',
 *   options: { 'tag.env': 'prod', InstanceType: 't3.micro' },
 *   timeoutSeconds: 900,
 * });
 * ```
 */
export function parseLifecycleRequest(event: unknown): LifecycleRequest {
  if (!isObject(event)) {
    throw new ValidationError('Event must be an object');
  }

  const { operation, stackName } = event;

  if (!isOperation(operation)) {
    throw new ValidationError(
      `Event must contain an operation, one of: ${LIFECYCLE_OPERATIONS.join(', ')}`,
      'operation'
    );
  }

  if (!isNonEmptyString(stackName)) {
    throw new ValidationError('Event must contain a non-empty stackName', 'stackName');
  }

  switch (operation) {
    case 'deploy': {
      if (!isNonEmptyString(event.templateBody)) {
        throw new ValidationError('deploy requires a non-empty templateBody', 'templateBody');
      }
      return {
        operation,
        stackName,
        templateBody: event.templateBody,
        options: parseOptions(event.options),
        timeoutSeconds: parseTimeout(event.timeoutSeconds),
      };
    }
    case 'set-policy': {
      if (!isNonEmptyString(event.policyBody)) {
        throw new ValidationError('set-policy requires a non-empty policyBody', 'policyBody');
      }
      return { operation, stackName, policyBody: event.policyBody };
    }
    default:
      return { operation, stackName, timeoutSeconds: parseTimeout(event.timeoutSeconds) };
  }
}
