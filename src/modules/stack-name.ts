/**
 * CloudFormation Stack Name Validation Module
 *
 * Stack names must follow the CloudFormation naming rules:
 * - Must match pattern: [a-zA-Z][-a-zA-Z0-9]*
 * - Must start with a letter
 * - Can contain letters, numbers, and hyphens
 * - Maximum length: 128 characters
 *
 * @module stack-name
 */

import { ValidationError } from './errors.js';

export const STACK_NAME_MAX_LENGTH = 128;

const STACK_NAME_PATTERN = /^[a-zA-Z][-a-zA-Z0-9]*$/;

/**
 * Checks a caller-supplied stack name before anything is submitted
 *
 * @throws {ValidationError} If the name is empty, too long, or has invalid characters
 *
 * @example
 * ```typescript
 * validateStackName('demo-app'); // ok
 * validateStackName('1-demo');   // throws: must start with a letter
 * ```
 */
export function validateStackName(name: string): void {
  if (!name || name.trim().length === 0) {
    throw new ValidationError('Stack name cannot be empty', 'stackName');
  }

  if (name.length > STACK_NAME_MAX_LENGTH) {
    throw new ValidationError(
      `Stack name "${name}" is ${name.length} characters long. Maximum allowed length is ${STACK_NAME_MAX_LENGTH}`,
      'stackName'
    );
  }

  if (!/^[a-zA-Z]/.test(name)) {
    throw new ValidationError(`Stack name "${name}" must start with a letter`, 'stackName');
  }

  if (!STACK_NAME_PATTERN.test(name)) {
    throw new ValidationError(
      `Stack name "${name}" contains invalid characters. Must match pattern: [a-zA-Z][-a-zA-Z0-9]*`,
      'stackName'
    );
  }
}
