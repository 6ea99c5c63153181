import { describe, it, expect, beforeEach } from 'vitest';
import {
  findStack,
  getStackVpcId,
  getTemplate,
  listActiveStacks,
  listAllStacks,
  listStackResources,
  queryStatus,
  stackExists,
} from './stack-queries.js';
import { ProviderError } from './errors.js';
import type { StackResource } from '../types/index.js';
import { FakeStackClient, STACK_ID, stack } from '../test/fakes.js';
import { rejectionOf } from '../test/logs.js';

function resource(logicalResourceId: string, resourceType: string, physicalResourceId: string): StackResource {
  return {
    logicalResourceId,
    physicalResourceId,
    resourceType,
    resourceStatus: 'CREATE_COMPLETE',
    resourceStatusReason: '',
  };
}

describe('stack-queries', () => {
  describe('findStack', () => {
    const stacks = [stack('CREATE_COMPLETE'), stack('UPDATE_COMPLETE', '', { stackName: 'other', stackId: 'other-id' })];

    it('should match by name', () => {
      expect(findStack(stacks, 'other')?.status).toBe('UPDATE_COMPLETE');
    });

    it('should match by id', () => {
      expect(findStack(stacks, STACK_ID)?.stackName).toBe('demo');
    });

    it('should return undefined for an unknown stack', () => {
      expect(findStack(stacks, 'missing')).toBeUndefined();
    });
  });

  describe('queryStatus', () => {
    it('should return the stack when it exists', async () => {
      const client = new FakeStackClient().queueDescribe([stack('CREATE_IN_PROGRESS')]);

      expect(await queryStatus(client, 'demo')).toEqual({ found: true, stack: stack('CREATE_IN_PROGRESS') });
      expect(client.describeCalls).toEqual(['demo']);
    });

    it('should report a missing stack as not found', async () => {
      const client = new FakeStackClient().queueDescribe([]);

      expect(await queryStatus(client, 'demo')).toEqual({ found: false });
    });

    it('should query again on every call', async () => {
      const client = new FakeStackClient().queueDescribe([stack('CREATE_IN_PROGRESS')], [stack('CREATE_COMPLETE')]);

      await queryStatus(client, 'demo');
      const second = await queryStatus(client, 'demo');

      expect(second).toEqual({ found: true, stack: stack('CREATE_COMPLETE') });
      expect(client.describeCalls).toHaveLength(2);
    });

    it('should propagate client errors', async () => {
      const client = new FakeStackClient().queueDescribe(
        new ProviderError('DescribeStacks failed: AccessDenied - denied', { errorCode: 'AccessDenied' })
      );

      await expect(queryStatus(client, 'demo')).rejects.toThrow(ProviderError);
    });
  });

  describe('stackExists and listActiveStacks', () => {
    const client = new FakeStackClient().queueDescribe([
      stack('CREATE_COMPLETE'),
      stack('UPDATE_IN_PROGRESS', '', { stackName: 'other', stackId: 'other-id' }),
    ]);

    it('should check names among all active stacks', async () => {
      expect(await stackExists(client, 'other')).toBe(true);
      expect(await stackExists(client, 'missing')).toBe(false);
      expect(client.describeCalls).toEqual([undefined, undefined]);
    });

    it('should list active stack names', async () => {
      expect(await listActiveStacks(client)).toEqual(['demo', 'other']);
    });
  });

  describe('listAllStacks', () => {
    it('should return every summary, deleted stacks included', async () => {
      const client = new FakeStackClient();
      client.summaries = [
        { stackId: STACK_ID, stackName: 'demo', status: 'CREATE_COMPLETE', statusReason: '' },
        {
          stackId: 'old-id',
          stackName: 'old',
          status: 'DELETE_COMPLETE',
          statusReason: '',
          deletionTime: new Date('2024-04-01T00:00:00Z'),
        },
      ];

      const summaries = await listAllStacks(client);

      expect(summaries.map((summary) => summary.status)).toEqual(['CREATE_COMPLETE', 'DELETE_COMPLETE']);
    });
  });

  describe('getTemplate', () => {
    it('should return the stored template body', async () => {
      const client = new FakeStackClient();
      client.templates = { demo: 'Resources: {}\n' };

      expect(await getTemplate(client, 'demo')).toBe('Resources: {}\n');
    });

    it('should propagate the rejection for a missing stack', async () => {
      const error = await rejectionOf(getTemplate(new FakeStackClient(), 'missing'));

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ errorCode: 'ValidationError' });
    });
  });

  describe('listStackResources and getStackVpcId', () => {
    let client: FakeStackClient;

    beforeEach(() => {
      client = new FakeStackClient();
      client.resources = [
        resource('Bucket', 'AWS::S3::Bucket', 'demo-bucket-1a2b'),
        resource('Network', 'AWS::EC2::VPC', 'vpc-0abc'),
        resource('Subnet', 'AWS::EC2::Subnet', 'subnet-0def'),
      ];
    });

    it('should list the resources of the named stack', async () => {
      const resources = await listStackResources(client, 'demo');

      expect(resources.map((r) => r.logicalResourceId)).toEqual(['Bucket', 'Network', 'Subnet']);
      expect(client.resourceCalls).toEqual(['demo']);
    });

    it('should find the VPC a stack created', async () => {
      expect(await getStackVpcId(client, 'demo')).toBe('vpc-0abc');
    });

    it('should return undefined when the stack has no VPC', async () => {
      client.resources = [resource('Bucket', 'AWS::S3::Bucket', 'demo-bucket-1a2b')];

      expect(await getStackVpcId(client, 'demo')).toBeUndefined();
    });
  });
});
