/**
 * Configuration for the stack lifecycle tracker
 */
export interface Config {
  /** AWS region the CloudFormation client talks to */
  awsRegion: string;
  /** Fixed delay between status polls, in milliseconds */
  pollIntervalMs: number;
  /** Default overall deadline for a wait, in milliseconds */
  waitTimeoutMs: number;
  /** How far before the wait started failure events are still collected, in milliseconds */
  failureLookbackMs: number;
  /** Capabilities acknowledged on create and update */
  capabilities: string[];
  /** CloudWatch namespace for emitted metrics */
  metricsNamespace: string;
  /** Log level for structured logging */
  logLevel: LogLevel;
}

/**
 * Supported log levels
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Name/id pair identifying a stack. The name is chosen by the caller,
 * the id (stack ARN) is assigned by CloudFormation on creation.
 */
export interface StackIdentity {
  readonly name: string;
  readonly id: string;
}

/**
 * A single entry of the stack event history
 */
export interface StackEvent {
  eventId: string;
  stackId: string;
  stackName: string;
  logicalResourceId: string;
  physicalResourceId: string;
  resourceType: string;
  resourceStatus: string;
  resourceStatusReason: string;
  timestamp: Date;
}

/**
 * Current state of a stack as reported by DescribeStacks
 */
export interface StackDescription {
  stackId: string;
  stackName: string;
  status: string;
  statusReason: string;
  parameters: Record<string, string>;
  tags: Record<string, string>;
}

/**
 * Entry of the ListStacks response; includes deleted stacks
 */
export interface StackSummary {
  stackId: string;
  stackName: string;
  status: string;
  statusReason: string;
  templateDescription?: string;
  creationTime?: Date;
  lastUpdatedTime?: Date;
  deletionTime?: Date;
}

/**
 * Entry of the ListStackResources response
 */
export interface StackResource {
  logicalResourceId: string;
  /** Empty until the resource has been created */
  physicalResourceId: string;
  resourceType: string;
  resourceStatus: string;
  resourceStatusReason: string;
  lastUpdated?: Date;
}

/**
 * Caller-facing options for create and update.
 *
 * - `StackPolicyDuringUpdateBody` is sent as its own request field
 * - keys starting with `tag.` (any case) become stack tags on create
 * - everything else becomes a template parameter
 */
export type ParameterSet = Readonly<Record<string, string>>;

/**
 * Flattened request fields in the CloudFormation query format,
 * e.g. `Tags.member.1.Key` or `Parameters.member.2.ParameterValue`
 */
export type WireParameters = Record<string, string>;

/**
 * Remote actions that change a stack
 */
export type StackAction = 'CreateStack' | 'UpdateStack' | 'DeleteStack' | 'SetStackPolicy';

/**
 * An encoded request ready to be submitted
 */
export interface StackRequest {
  action: StackAction;
  parameters: WireParameters;
}

/**
 * Response to a submitted request
 */
export interface SubmitResponse {
  requestId?: string;
  /** Returned by CreateStack and UpdateStack */
  stackId?: string;
}
