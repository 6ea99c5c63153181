import {
  Capability,
  CloudFormationClient,
  CloudFormationServiceException,
  CreateStackCommand,
  DeleteStackCommand,
  DescribeStackEventsCommand,
  DescribeStacksCommand,
  GetTemplateCommand,
  ListStackResourcesCommand,
  ListStacksCommand,
  SetStackPolicyCommand,
  UpdateStackCommand,
  type Stack,
  type StackEvent as CfnStackEvent,
  type StackResourceSummary,
  type StackSummary as CfnStackSummary,
} from '@aws-sdk/client-cloudformation';
import type {
  StackDescription,
  StackEvent,
  StackRequest,
  StackResource,
  StackSummary,
  SubmitResponse,
} from '../types/index.js';
import { ProviderError, TransportError, ValidationError, toError } from './errors.js';
import { STACK_POLICY_DURING_UPDATE_KEY, decodeWireParameters, type KeyValue } from './parameter-encoder.js';

/**
 * What the lifecycle code needs from the CloudFormation control plane.
 *
 * Implementations throw ProviderError when CloudFormation rejected a call and
 * TransportError when no usable answer came back.
 */
export interface StackOperationClient {
  /**
   * Current state of one stack, or of all active stacks when no name is given.
   * A stack that does not exist yields an empty list.
   */
  describeStacks(nameOrId?: string): Promise<StackDescription[]>;

  /** Full event history of a stack, oldest first */
  describeStackEvents(nameOrId: string): Promise<StackEvent[]>;

  /** Every stack, including deleted ones */
  listStacks(): Promise<StackSummary[]>;

  /** Template body as stored by CloudFormation, in the format it was submitted in */
  getTemplate(nameOrId: string): Promise<string>;

  /** Resources of one stack */
  listStackResources(nameOrId: string): Promise<StackResource[]>;

  /** Executes an encoded mutating request */
  submit(request: StackRequest): Promise<SubmitResponse>;
}

/**
 * Options for the SDK-backed client
 */
export interface CloudFormationStackClientOptions {
  /** Region of the CloudFormation endpoint */
  region: string;
  /** Preconfigured SDK client; when set, `region` is informational */
  client?: CloudFormationClient;
}

const KNOWN_CAPABILITIES: ReadonlySet<string> = new Set(Object.values(Capability));

function isCapability(value: string): value is Capability {
  return KNOWN_CAPABILITIES.has(value);
}

function isStackMissing(error: unknown): boolean {
  return (
    error instanceof CloudFormationServiceException &&
    error.name === 'ValidationError' &&
    error.message.includes('does not exist')
  );
}

function toRecord(pairs: Array<{ key?: string; value?: string }>): Record<string, string> {
  const record: Record<string, string> = {};
  for (const { key, value } of pairs) {
    if (key !== undefined) {
      record[key] = value ?? '';
    }
  }
  return record;
}

function toDescription(stack: Stack): StackDescription {
  if (!stack.StackId || !stack.StackName || !stack.StackStatus) {
    throw new TransportError(
      `DescribeStacks returned incomplete data for stack ${stack.StackName ?? stack.StackId ?? '<unknown>'}`
    );
  }

  return {
    stackId: stack.StackId,
    stackName: stack.StackName,
    status: stack.StackStatus,
    statusReason: stack.StackStatusReason ?? '',
    parameters: toRecord((stack.Parameters ?? []).map((p) => ({ key: p.ParameterKey, value: p.ParameterValue }))),
    tags: toRecord((stack.Tags ?? []).map((t) => ({ key: t.Key, value: t.Value }))),
  };
}

function toEvent(event: CfnStackEvent): StackEvent {
  if (!event.EventId || !event.Timestamp || !event.ResourceStatus) {
    throw new TransportError(`DescribeStackEvents returned an incomplete event for stack ${event.StackName ?? '<unknown>'}`);
  }

  return {
    eventId: event.EventId,
    stackId: event.StackId ?? '',
    stackName: event.StackName ?? '',
    logicalResourceId: event.LogicalResourceId ?? '',
    physicalResourceId: event.PhysicalResourceId ?? '',
    resourceType: event.ResourceType ?? '',
    resourceStatus: event.ResourceStatus,
    resourceStatusReason: event.ResourceStatusReason ?? '',
    timestamp: event.Timestamp,
  };
}

function toSummary(summary: CfnStackSummary): StackSummary {
  return {
    stackId: summary.StackId ?? '',
    stackName: summary.StackName ?? '',
    status: summary.StackStatus ?? '',
    statusReason: summary.StackStatusReason ?? '',
    templateDescription: summary.TemplateDescription,
    creationTime: summary.CreationTime,
    lastUpdatedTime: summary.LastUpdatedTime,
    deletionTime: summary.DeletionTime,
  };
}

function toResource(summary: StackResourceSummary): StackResource {
  return {
    logicalResourceId: summary.LogicalResourceId ?? '',
    physicalResourceId: summary.PhysicalResourceId ?? '',
    resourceType: summary.ResourceType ?? '',
    resourceStatus: summary.ResourceStatus ?? '',
    resourceStatusReason: summary.ResourceStatusReason ?? '',
    lastUpdated: summary.LastUpdatedTimestamp,
  };
}

function toCfnParameters(pairs: KeyValue[]) {
  return pairs.length > 0
    ? pairs.map(({ key, value }) => ({ ParameterKey: key, ParameterValue: value }))
    : undefined;
}

function toCfnTags(pairs: KeyValue[]) {
  return pairs.length > 0 ? pairs.map(({ key, value }) => ({ Key: key, Value: value })) : undefined;
}

function toCfnCapabilities(values: string[]): Capability[] | undefined {
  if (values.length === 0) {
    return undefined;
  }
  return values.map((value) => {
    if (!isCapability(value)) {
      throw new ValidationError(`Unknown capability '${value}'`, 'capabilities');
    }
    return value;
  });
}

/**
 * StackOperationClient backed by the AWS SDK CloudFormation client
 *
 * Encoded requests are decoded back into command inputs; the SDK handles
 * signing, the query-protocol serialization and XML decoding.
 *
 * @example
 * ```typescript
 * const client = new CloudFormationStackClient({ region: 'eu-west-2' });
 * const stacks = await client.describeStacks('my-stack');
 * ```
 */
export class CloudFormationStackClient implements StackOperationClient {
  private readonly client: CloudFormationClient;
  readonly region: string;

  constructor(options: CloudFormationStackClientOptions) {
    this.region = options.region;
    this.client = options.client ?? new CloudFormationClient({ region: options.region });
  }

  async describeStacks(nameOrId?: string): Promise<StackDescription[]> {
    const stacks: Stack[] = [];
    let nextToken: string | undefined;

    try {
      do {
        const response = await this.client.send(
          new DescribeStacksCommand({ StackName: nameOrId, NextToken: nextToken })
        );
        stacks.push(...(response.Stacks ?? []));
        nextToken = response.NextToken;
      } while (nextToken);
    } catch (error) {
      if (nameOrId !== undefined && isStackMissing(error)) {
        return [];
      }
      throw translateError('DescribeStacks', error);
    }

    return stacks.map(toDescription);
  }

  async describeStackEvents(nameOrId: string): Promise<StackEvent[]> {
    const events: CfnStackEvent[] = [];
    let nextToken: string | undefined;

    try {
      do {
        const response = await this.client.send(
          new DescribeStackEventsCommand({ StackName: nameOrId, NextToken: nextToken })
        );
        events.push(...(response.StackEvents ?? []));
        nextToken = response.NextToken;
      } while (nextToken);
    } catch (error) {
      throw translateError('DescribeStackEvents', error);
    }

    // CloudFormation pages events newest first
    return events.map(toEvent).reverse();
  }

  async listStacks(): Promise<StackSummary[]> {
    const summaries: CfnStackSummary[] = [];
    let nextToken: string | undefined;

    try {
      do {
        const response = await this.client.send(new ListStacksCommand({ NextToken: nextToken }));
        summaries.push(...(response.StackSummaries ?? []));
        nextToken = response.NextToken;
      } while (nextToken);
    } catch (error) {
      throw translateError('ListStacks', error);
    }

    return summaries.map(toSummary);
  }

  async getTemplate(nameOrId: string): Promise<string> {
    try {
      const response = await this.client.send(new GetTemplateCommand({ StackName: nameOrId }));
      return response.TemplateBody ?? '';
    } catch (error) {
      throw translateError('GetTemplate', error);
    }
  }

  async listStackResources(nameOrId: string): Promise<StackResource[]> {
    const resources: StackResourceSummary[] = [];
    let nextToken: string | undefined;

    try {
      do {
        const response = await this.client.send(
          new ListStackResourcesCommand({ StackName: nameOrId, NextToken: nextToken })
        );
        resources.push(...(response.StackResourceSummaries ?? []));
        nextToken = response.NextToken;
      } while (nextToken);
    } catch (error) {
      throw translateError('ListStackResources', error);
    }

    return resources.map(toResource);
  }

  async submit(request: StackRequest): Promise<SubmitResponse> {
    const decoded = decodeWireParameters(request.parameters);
    const stackName = decoded.stackName;
    if (!stackName) {
      throw new ValidationError(`${request.action} request has no StackName`, 'StackName');
    }

    try {
      switch (request.action) {
        case 'CreateStack': {
          if (decoded.stackPolicyDuringUpdateBody !== undefined) {
            throw new ValidationError(
              `${STACK_POLICY_DURING_UPDATE_KEY} applies to UpdateStack only; CreateStack does not accept it`,
              STACK_POLICY_DURING_UPDATE_KEY
            );
          }
          const response = await this.client.send(
            new CreateStackCommand({
              StackName: stackName,
              TemplateBody: decoded.templateBody,
              Parameters: toCfnParameters(decoded.parameters),
              Tags: toCfnTags(decoded.tags),
              Capabilities: toCfnCapabilities(decoded.capabilities),
              StackPolicyBody: decoded.stackPolicyBody,
            })
          );
          return { requestId: response.$metadata.requestId, stackId: response.StackId };
        }
        case 'UpdateStack': {
          const response = await this.client.send(
            new UpdateStackCommand({
              StackName: stackName,
              TemplateBody: decoded.templateBody,
              Parameters: toCfnParameters(decoded.parameters),
              Capabilities: toCfnCapabilities(decoded.capabilities),
              StackPolicyDuringUpdateBody: decoded.stackPolicyDuringUpdateBody,
            })
          );
          return { requestId: response.$metadata.requestId, stackId: response.StackId };
        }
        case 'DeleteStack': {
          const response = await this.client.send(new DeleteStackCommand({ StackName: stackName }));
          return { requestId: response.$metadata.requestId };
        }
        case 'SetStackPolicy': {
          const response = await this.client.send(
            new SetStackPolicyCommand({ StackName: stackName, StackPolicyBody: decoded.stackPolicyBody })
          );
          return { requestId: response.$metadata.requestId };
        }
        default:
          throw new ValidationError(`Unsupported action '${String(request.action)}'`, 'action');
      }
    } catch (error) {
      if (error instanceof ValidationError) {
        throw error;
      }
      throw translateError(request.action, error);
    }
  }
}

/**
 * Maps an SDK failure onto the error taxonomy: service exceptions are
 * provider rejections, everything else is transport.
 */
export function translateError(operation: string, error: unknown): ProviderError | TransportError {
  if (error instanceof ProviderError || error instanceof TransportError) {
    return error;
  }

  if (error instanceof CloudFormationServiceException) {
    return new ProviderError(
      `${operation} failed: ${error.name} - ${error.message}`,
      {
        errorCode: error.name,
        requestId: error.$metadata.requestId,
        httpStatusCode: error.$metadata.httpStatusCode,
      },
      error
    );
  }

  const cause = toError(error);
  return new TransportError(`${operation} failed: ${cause.name} - ${cause.message}`, cause);
}
