import type { StackDescription, StackResource, StackSummary } from '../types/index.js';
import type { StackOperationClient } from './stack-client.js';

/**
 * Result of a single status query
 */
export type StackStatusSnapshot =
  | { found: false }
  | { found: true; stack: StackDescription };

/**
 * Picks the stack a name or id refers to out of a DescribeStacks response
 */
export function findStack(stacks: StackDescription[], nameOrId: string): StackDescription | undefined {
  return stacks.find((stack) => stack.stackName === nameOrId || stack.stackId === nameOrId);
}

/**
 * Gets the current state of one stack
 *
 * One DescribeStacks call; the result is never cached, so every call reflects
 * the control plane at the moment it answered.
 *
 * @param nameOrId - Stack name or stack ARN
 * @throws {ProviderError} If CloudFormation rejects the call
 * @throws {TransportError} If the call does not complete
 */
export async function queryStatus(
  client: StackOperationClient,
  nameOrId: string
): Promise<StackStatusSnapshot> {
  const stack = findStack(await client.describeStacks(nameOrId), nameOrId);
  return stack ? { found: true, stack } : { found: false };
}

/**
 * Whether a stack with this name is currently active
 */
export async function stackExists(client: StackOperationClient, name: string): Promise<boolean> {
  const stacks = await client.describeStacks();
  return stacks.some((stack) => stack.stackName === name);
}

/**
 * Names of all active stacks
 */
export async function listActiveStacks(client: StackOperationClient): Promise<string[]> {
  const stacks = await client.describeStacks();
  return stacks.map((stack) => stack.stackName);
}

/**
 * All stacks in the region, including deleted ones
 */
export async function listAllStacks(client: StackOperationClient): Promise<StackSummary[]> {
  return client.listStacks();
}

/**
 * Template body of a stack, exactly as CloudFormation stored it
 *
 * @throws {ProviderError} If the stack does not exist
 */
export async function getTemplate(client: StackOperationClient, name: string): Promise<string> {
  return client.getTemplate(name);
}

/**
 * Resources of a stack, in the order CloudFormation lists them
 */
export async function listStackResources(client: StackOperationClient, name: string): Promise<StackResource[]> {
  return client.listStackResources(name);
}

const VPC_RESOURCE_TYPE = 'AWS::EC2::VPC';

/**
 * Physical id of the first VPC a stack created, or undefined when it has none
 */
export async function getStackVpcId(client: StackOperationClient, name: string): Promise<string | undefined> {
  const resources = await client.listStackResources(name);
  return resources.find((resource) => resource.resourceType === VPC_RESOURCE_TYPE)?.physicalResourceId;
}
