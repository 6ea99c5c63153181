/**
 * CloudFormation Template Validation Module
 *
 * Checks a template body before it is submitted: it must parse (JSON is
 * valid YAML, so one parser covers both formats) and look like a
 * CloudFormation template. Declared parameter names are returned so callers
 * can spot options the template does not accept.
 */

import yaml from 'js-yaml';
import { ErrorCode, StackLifecycleError } from './errors.js';

/**
 * CloudFormation intrinsic function tags. Each one is loaded as
 * `{ FunctionName: value }`, the same shape as the JSON long form.
 */
const CF_INTRINSIC_TAGS = [
  '!Ref',
  '!Sub',
  '!GetAtt',
  '!Join',
  '!Select',
  '!Split',
  '!If',
  '!Not',
  '!Equals',
  '!And',
  '!Or',
  '!Condition',
  '!Base64',
  '!Cidr',
  '!FindInMap',
  '!GetAZs',
  '!ImportValue',
  '!Transform',
];

const KINDS = ['scalar', 'sequence', 'mapping'] as const;

const CF_SCHEMA = yaml.DEFAULT_SCHEMA.extend(
  CF_INTRINSIC_TAGS.flatMap((tag) => {
    const name = tag === '!Ref' || tag === '!Condition' ? tag.substring(1) : `Fn::${tag.substring(1)}`;
    return KINDS.map(
      (kind) =>
        new yaml.Type(tag, {
          kind,
          construct: (data: unknown) => ({ [name]: data }),
        })
    );
  })
);

/**
 * Template body could not be parsed or is not a CloudFormation template
 */
export class TemplateValidationError extends StackLifecycleError {
  declare readonly code: ErrorCode.TEMPLATE_INVALID;

  constructor(message: string, cause?: Error) {
    super(message, ErrorCode.TEMPLATE_INVALID, 400, cause, false);
    this.name = 'TemplateValidationError';
  }
}

/**
 * Result of template validation
 */
export interface ValidatedTemplate {
  /** Parsed template */
  template: Record<string, unknown>;
  /** Names declared in the Parameters section */
  parameters: string[];
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates a CloudFormation template body (JSON or YAML)
 *
 * @throws {TemplateValidationError} If the body is empty, unparseable, not an
 *   object, has neither AWSTemplateFormatVersion nor Resources, or has a
 *   Parameters section that is not an object
 *
 * @example
 * ```typescript
 * const { parameters } = validateTemplate(`
 * AWSTemplateFormatVersion: '2010-09-09'
 * Parameters:
 *   BucketName:
 *     Type: String
 * Resources:
 *   Bucket:
 *     Type: AWS::S3::Bucket
 *     Properties:
 *       BucketName: !Ref BucketName
 * `);
 * // parameters => ['BucketName']
 * ```
 */
export function validateTemplate(templateBody: string): ValidatedTemplate {
  if (!templateBody || templateBody.trim().length === 0) {
    throw new TemplateValidationError('Template content cannot be empty');
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(templateBody, { schema: CF_SCHEMA });
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new TemplateValidationError(`Failed to parse template: ${cause.message}`, cause);
  }

  if (parsed === null || parsed === undefined) {
    throw new TemplateValidationError('Template is empty or contains only comments');
  }

  if (!isObject(parsed)) {
    throw new TemplateValidationError(
      `Template must be an object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`
    );
  }

  if (!('AWSTemplateFormatVersion' in parsed) && !('Resources' in parsed)) {
    throw new TemplateValidationError(
      'Template must contain either AWSTemplateFormatVersion or Resources section'
    );
  }

  const section = parsed.Parameters;
  if (section !== undefined && section !== null && !isObject(section)) {
    throw new TemplateValidationError('Parameters section must be an object');
  }

  return {
    template: parsed,
    parameters: isObject(section) ? Object.keys(section) : [],
  };
}
