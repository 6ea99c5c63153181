import type { ParameterSet, StackRequest, WireParameters } from '../types/index.js';
import { ValidationError } from './errors.js';

/**
 * Option key sent as its own request field instead of a template parameter
 */
export const STACK_POLICY_DURING_UPDATE_KEY = 'StackPolicyDuringUpdateBody';

/**
 * Prefix marking an option as a stack tag (matched case-insensitively)
 */
export const TAG_PREFIX = 'tag.';

/**
 * Tag every created stack carries, valued with the stack name
 */
export const NAME_TAG_KEY = 'Name';

/**
 * Extra request fields that don't come from the ParameterSet
 */
export interface EncodeOptions {
  /** Acknowledged capabilities, e.g. CAPABILITY_NAMED_IAM; sent in the given order */
  capabilities?: readonly string[];
}

/**
 * A key/value pair recovered from indexed wire fields
 */
export interface KeyValue {
  key: string;
  value: string;
}

/**
 * Structured view of a flattened request
 */
export interface DecodedStackRequest {
  stackName?: string;
  templateBody?: string;
  stackPolicyBody?: string;
  stackPolicyDuringUpdateBody?: string;
  tags: KeyValue[];
  parameters: KeyValue[];
  capabilities: string[];
}

export function isTagKey(key: string): boolean {
  return key.toLowerCase().startsWith(TAG_PREFIX);
}

function requireNonEmpty(value: string, field: string): void {
  if (!value || value.trim().length === 0) {
    throw new ValidationError(`${field} cannot be empty`, field);
  }
}

/**
 * Flattens a create or update request into CloudFormation's indexed query fields
 *
 * Routing of the ParameterSet:
 * - `StackPolicyDuringUpdateBody` is emitted as a field of the same name and takes no index
 * - `tag.<Key>` entries become `Tags.member.N.Key/Value` on create, with the prefix stripped.
 *   Create always emits `Name=<stackName>` as tag 1, so caller tags start at 2.
 *   On update tags can't be changed and these entries are dropped.
 * - everything else becomes `Parameters.member.N.ParameterKey/ParameterValue`, N from 1
 *
 * Keys are visited in sorted order, so the same ParameterSet always yields the
 * same indices.
 *
 * @param action - CreateStack or UpdateStack
 * @param stackName - Name of the stack
 * @param templateBody - Template document (JSON or YAML)
 * @param options - Parameters, tags and update policy
 * @throws {ValidationError} If the stack name or template body is empty, or a tag key is empty
 *
 * @example
 * ```typescript
 * const request = encodeStackRequest('CreateStack', 'demo', template, {
 *   'tag.env': 'prod',
 *   region: 'us-east-1',
 * });
 * // request.parameters:
 * // {
 * //   StackName: 'demo',
 * //   TemplateBody: template,
 * //   'Tags.member.1.Key': 'Name',
 * //   'Tags.member.1.Value': 'demo',
 * //   'Parameters.member.1.ParameterKey': 'region',
 * //   'Parameters.member.1.ParameterValue': 'us-east-1',
 * //   'Tags.member.2.Key': 'env',
 * //   'Tags.member.2.Value': 'prod',
 * // }
 * ```
 */
export function encodeStackRequest(
  action: 'CreateStack' | 'UpdateStack',
  stackName: string,
  templateBody: string,
  options: ParameterSet = {},
  encodeOptions: EncodeOptions = {}
): StackRequest {
  requireNonEmpty(stackName, 'stackName');
  requireNonEmpty(templateBody, 'templateBody');

  const isCreate = action === 'CreateStack';
  const parameters: WireParameters = {
    StackName: stackName,
    TemplateBody: templateBody,
  };

  if (isCreate) {
    parameters['Tags.member.1.Key'] = NAME_TAG_KEY;
    parameters['Tags.member.1.Value'] = stackName;
  }

  let parameterIndex = 1;
  let tagIndex = 2;

  for (const key of Object.keys(options).sort()) {
    const value = options[key] ?? '';

    if (key === STACK_POLICY_DURING_UPDATE_KEY) {
      parameters[STACK_POLICY_DURING_UPDATE_KEY] = value;
      continue;
    }

    if (isTagKey(key)) {
      if (!isCreate) {
        continue;
      }
      const tagKey = key.slice(TAG_PREFIX.length);
      requireNonEmpty(tagKey, `tag key '${key}'`);
      parameters[`Tags.member.${tagIndex}.Key`] = tagKey;
      parameters[`Tags.member.${tagIndex}.Value`] = value;
      tagIndex++;
      continue;
    }

    parameters[`Parameters.member.${parameterIndex}.ParameterKey`] = key;
    parameters[`Parameters.member.${parameterIndex}.ParameterValue`] = value;
    parameterIndex++;
  }

  (encodeOptions.capabilities ?? []).forEach((capability, index) => {
    parameters[`Capabilities.member.${index + 1}`] = capability;
  });

  return { action, parameters };
}

/**
 * Encodes a DeleteStack request
 */
export function encodeDeleteRequest(stackName: string): StackRequest {
  requireNonEmpty(stackName, 'stackName');
  return { action: 'DeleteStack', parameters: { StackName: stackName } };
}

/**
 * Encodes a SetStackPolicy request
 *
 * @param policyBody - Stack policy document (JSON)
 */
export function encodeSetPolicyRequest(stackName: string, policyBody: string): StackRequest {
  requireNonEmpty(stackName, 'stackName');
  requireNonEmpty(policyBody, 'policyBody');
  return {
    action: 'SetStackPolicy',
    parameters: { StackName: stackName, StackPolicyBody: policyBody },
  };
}

const TAG_FIELD = /^Tags\.member\.(\d+)\.(Key|Value)$/;
const PARAMETER_FIELD = /^Parameters\.member\.(\d+)\.(ParameterKey|ParameterValue)$/;
const CAPABILITY_FIELD = /^Capabilities\.member\.(\d+)$/;

type PartialPairs = Map<number, Partial<KeyValue>>;

function setPair(pairs: PartialPairs, index: number, part: keyof KeyValue, value: string): void {
  const pair = pairs.get(index) ?? {};
  pair[part] = value;
  pairs.set(index, pair);
}

function collectPairs(pairs: PartialPairs, field: string): KeyValue[] {
  return [...pairs.entries()]
    .sort(([a], [b]) => a - b)
    .map(([index, pair]) => {
      if (pair.key === undefined || pair.value === undefined) {
        throw new ValidationError(`${field}.member.${index} is missing its key or value`, field);
      }
      return { key: pair.key, value: pair.value };
    });
}

/**
 * Turns flattened query fields back into structured values, ordered by index
 *
 * @throws {ValidationError} On an unrecognized field or a key without a value
 */
export function decodeWireParameters(parameters: WireParameters): DecodedStackRequest {
  const decoded: DecodedStackRequest = { tags: [], parameters: [], capabilities: [] };
  const tags: PartialPairs = new Map();
  const params: PartialPairs = new Map();
  const capabilities = new Map<number, string>();

  for (const [field, value] of Object.entries(parameters)) {
    switch (field) {
      case 'StackName':
        decoded.stackName = value;
        continue;
      case 'TemplateBody':
        decoded.templateBody = value;
        continue;
      case 'StackPolicyBody':
        decoded.stackPolicyBody = value;
        continue;
      case STACK_POLICY_DURING_UPDATE_KEY:
        decoded.stackPolicyDuringUpdateBody = value;
        continue;
    }

    const tagMatch = TAG_FIELD.exec(field);
    if (tagMatch) {
      setPair(tags, Number(tagMatch[1]), tagMatch[2] === 'Key' ? 'key' : 'value', value);
      continue;
    }

    const parameterMatch = PARAMETER_FIELD.exec(field);
    if (parameterMatch) {
      setPair(params, Number(parameterMatch[1]), parameterMatch[2] === 'ParameterKey' ? 'key' : 'value', value);
      continue;
    }

    const capabilityMatch = CAPABILITY_FIELD.exec(field);
    if (capabilityMatch) {
      capabilities.set(Number(capabilityMatch[1]), value);
      continue;
    }

    throw new ValidationError(`Unrecognized request field '${field}'`, field);
  }

  decoded.tags = collectPairs(tags, 'Tags');
  decoded.parameters = collectPairs(params, 'Parameters');
  decoded.capabilities = [...capabilities.entries()].sort(([a], [b]) => a - b).map(([, value]) => value);

  return decoded;
}
