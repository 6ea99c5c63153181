import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  CompositeFailureError,
  ProviderError,
  StackNotFoundError,
  StackStatusError,
  TransportError,
  ValidationError,
  WaitTimeoutError,
} from './errors.js';
import { LifecycleTracker } from './lifecycle-tracker.js';
import { Logger } from './logger.js';
import { MetricsCollector } from './metrics.js';
import { StackLifecycle } from './stack-lifecycle.js';
import { TemplateValidationError } from './template-validator.js';
import { FakeStackClient, STACK_ID, T0, VirtualClock, stack, stackEvent } from '../test/fakes.js';
import { findLog, logEntries, rejectionOf } from '../test/logs.js';

const TEMPLATE = JSON.stringify({
  AWSTemplateFormatVersion: '2010-09-09',
  Parameters: { Size: { Type: 'String' } },
  Resources: { Bucket: { Type: 'AWS::S3::Bucket' } },
});

function noUpdates(): ProviderError {
  return new ProviderError('UpdateStack failed: ValidationError - No updates are to be performed.', {
    errorCode: 'ValidationError',
    httpStatusCode: 400,
  });
}

describe('stack-lifecycle', () => {
  let client: FakeStackClient;
  let lifecycle: StackLifecycle;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    client = new FakeStackClient();
    const logger = new Logger('INFO');
    const tracker = new LifecycleTracker(client, { pollIntervalMs: 5000, logger, clock: new VirtualClock() });
    lifecycle = new StackLifecycle(client, { capabilities: ['CAPABILITY_NAMED_IAM'], logger, tracker });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('create', () => {
    it('should submit CreateStack with the configured capabilities', async () => {
      const identity = await lifecycle.create('demo', TEMPLATE, { Size: 'small', 'tag.env': 'prod' });

      expect(identity).toEqual({ name: 'demo', id: STACK_ID });
      expect(client.submitted).toEqual([
        {
          action: 'CreateStack',
          parameters: {
            StackName: 'demo',
            TemplateBody: TEMPLATE,
            'Tags.member.1.Key': 'Name',
            'Tags.member.1.Value': 'demo',
            'Parameters.member.1.ParameterKey': 'Size',
            'Parameters.member.1.ParameterValue': 'small',
            'Tags.member.2.Key': 'env',
            'Tags.member.2.Value': 'prod',
            'Capabilities.member.1': 'CAPABILITY_NAMED_IAM',
          },
        },
      ]);
    });

    it('should log option names but not their values', async () => {
      await lifecycle.create('demo', TEMPLATE, { Size: 'small', 'tag.env': 'prod' });

      expect(findLog('Creating stack')).toMatchObject({
        stackName: 'demo',
        parameters: ['Size'],
        tags: ['tag.env'],
        hasUpdatePolicy: false,
      });
    });

    it('should warn about options the template does not declare', async () => {
      await lifecycle.create('demo', TEMPLATE, { Size: 'small', Extra: 'x', 'tag.env': 'prod' });

      expect(findLog('Options are not declared as template parameters')).toMatchObject({
        level: 'WARN',
        undeclared: ['Extra'],
      });
    });

    it('should leave the update policy out of a create request', async () => {
      await lifecycle.create('demo', TEMPLATE, { Size: 'small', StackPolicyDuringUpdateBody: '{"Statement":[]}' });

      expect(client.submitted[0]?.parameters).toEqual({
        StackName: 'demo',
        TemplateBody: TEMPLATE,
        'Tags.member.1.Key': 'Name',
        'Tags.member.1.Value': 'demo',
        'Parameters.member.1.ParameterKey': 'Size',
        'Parameters.member.1.ParameterValue': 'small',
        'Capabilities.member.1': 'CAPABILITY_NAMED_IAM',
      });
      expect(findLog('Update policy applies to updates only; not sent on create')).toMatchObject({
        level: 'WARN',
        stackName: 'demo',
      });
    });

    it('should reject an invalid stack name before submitting', async () => {
      await expect(lifecycle.create('1-demo', TEMPLATE)).rejects.toThrow(ValidationError);
      expect(client.submitted).toEqual([]);
    });

    it('should reject a template that does not parse', async () => {
      await expect(lifecycle.create('demo', '{ not json')).rejects.toThrow(TemplateValidationError);
      expect(client.submitted).toEqual([]);
    });

    it('should fail when CloudFormation returns no stack id', async () => {
      client.submitResponses = [{ requestId: 'req-1' }];

      const error = await rejectionOf(lifecycle.create('demo', TEMPLATE));

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ message: 'CreateStack succeeded but did not return a StackId for stack demo' });
    });
  });

  describe('update', () => {
    it('should submit UpdateStack without tags', async () => {
      const outcome = await lifecycle.update('demo', TEMPLATE, { Size: 'large', 'tag.env': 'prod' });

      expect(outcome).toEqual({ changed: true, identity: { name: 'demo', id: STACK_ID } });
      expect(client.submitted[0]?.parameters).toEqual({
        StackName: 'demo',
        TemplateBody: TEMPLATE,
        'Parameters.member.1.ParameterKey': 'Size',
        'Parameters.member.1.ParameterValue': 'large',
        'Capabilities.member.1': 'CAPABILITY_NAMED_IAM',
      });
    });

    it('should look the stack up when the response has no id', async () => {
      client.submitResponses = [{ requestId: 'req-1' }];
      client.queueDescribe([stack('UPDATE_IN_PROGRESS')]);

      const outcome = await lifecycle.update('demo', TEMPLATE);

      expect(outcome).toEqual({ changed: true, identity: { name: 'demo', id: STACK_ID } });
    });

    it('should report an unchanged stack with its current status', async () => {
      client.submitResponses = [noUpdates()];
      client.queueDescribe([stack('UPDATE_COMPLETE')]);

      const outcome = await lifecycle.update('demo', TEMPLATE);

      expect(outcome).toEqual({
        changed: false,
        identity: { name: 'demo', id: STACK_ID },
        status: 'UPDATE_COMPLETE',
      });
    });

    it('should propagate other provider errors', async () => {
      const rejection = new ProviderError('UpdateStack failed: ValidationError - Stack is in UPDATE_IN_PROGRESS', {
        errorCode: 'ValidationError',
        httpStatusCode: 400,
      });
      client.submitResponses = [rejection];

      await expect(lifecycle.update('demo', TEMPLATE)).rejects.toBe(rejection);
    });
  });

  describe('delete', () => {
    it('should resolve the stack id and submit DeleteStack', async () => {
      client.queueDescribe([stack('CREATE_COMPLETE')]);

      const identity = await lifecycle.delete('demo');

      expect(identity).toEqual({ name: 'demo', id: STACK_ID });
      expect(client.submitted).toEqual([{ action: 'DeleteStack', parameters: { StackName: 'demo' } }]);
    });

    it('should fail without submitting when the stack does not exist', async () => {
      client.queueDescribe([]);

      await expect(lifecycle.delete('demo')).rejects.toThrow(StackNotFoundError);
      expect(client.submitted).toEqual([]);
    });
  });

  describe('setPolicy', () => {
    it('should submit SetStackPolicy', async () => {
      await lifecycle.setPolicy('demo', '{"Statement":[]}');

      expect(client.submitted).toEqual([
        { action: 'SetStackPolicy', parameters: { StackName: 'demo', StackPolicyBody: '{"Statement":[]}' } },
      ]);
    });
  });

  describe('deploy', () => {
    it('should create a missing stack and wait for it', async () => {
      client.queueDescribe([], [stack('CREATE_IN_PROGRESS')], [stack('CREATE_COMPLETE')]);

      const result = await lifecycle.deploy({ stackName: 'demo', templateBody: TEMPLATE, options: { Size: 'small' } });

      expect(result).toEqual({
        action: 'created',
        identity: { name: 'demo', id: STACK_ID },
        status: 'CREATE_COMPLETE',
      });
      expect(client.describeCalls).toEqual(['demo', STACK_ID, STACK_ID]);
      expect(client.submitted.map((request) => request.action)).toEqual(['CreateStack']);
    });

    it('should update an existing stack and wait for it', async () => {
      client.queueDescribe([stack('CREATE_COMPLETE')], [stack('UPDATE_IN_PROGRESS')], [stack('UPDATE_COMPLETE')]);

      const result = await lifecycle.deploy({ stackName: 'demo', templateBody: TEMPLATE });

      expect(result).toEqual({
        action: 'updated',
        identity: { name: 'demo', id: STACK_ID },
        status: 'UPDATE_COMPLETE',
      });
      expect(client.submitted.map((request) => request.action)).toEqual(['UpdateStack']);
    });

    it('should return without waiting when nothing changed', async () => {
      client.submitResponses = [noUpdates()];
      client.queueDescribe([stack('UPDATE_COMPLETE')]);

      const result = await lifecycle.deploy({ stackName: 'demo', templateBody: TEMPLATE });

      expect(result).toEqual({
        action: 'unchanged',
        identity: { name: 'demo', id: STACK_ID },
        status: 'UPDATE_COMPLETE',
      });
      expect(client.describeCalls).toEqual(['demo', 'demo']);
    });

    it('should delete and recreate a stack left in ROLLBACK_COMPLETE', async () => {
      client.queueDescribe(
        [stack('ROLLBACK_COMPLETE')],
        [stack('ROLLBACK_COMPLETE')],
        [stack('DELETE_COMPLETE')],
        [stack('CREATE_COMPLETE')]
      );

      const result = await lifecycle.deploy({ stackName: 'demo', templateBody: TEMPLATE });

      expect(result.action).toBe('created');
      expect(client.submitted.map((request) => request.action)).toEqual(['DeleteStack', 'CreateStack']);
      expect(findLog('Stack is in ROLLBACK_COMPLETE and cannot be updated; recreating it')).toMatchObject({
        level: 'WARN',
      });
    });

    it('should keep the deploy metric dimension when recreating', async () => {
      const logger = new Logger('INFO');
      const metrics = new MetricsCollector(logger, 'StackLifecycle');
      const tracker = new LifecycleTracker(client, { pollIntervalMs: 5000, logger, metrics, clock: new VirtualClock() });
      lifecycle = new StackLifecycle(client, { logger, metrics, tracker });
      client.queueDescribe(
        [stack('ROLLBACK_COMPLETE')],
        [stack('ROLLBACK_COMPLETE')],
        [stack('DELETE_COMPLETE')],
        [stack('CREATE_COMPLETE')]
      );

      await lifecycle.deploy({ stackName: 'demo', templateBody: TEMPLATE });
      metrics.flush();

      expect(logEntries().find((entry) => '_aws' in entry)).toMatchObject({ operation: 'deploy' });
    });

    it('should send the update policy when updating an existing stack', async () => {
      client.queueDescribe([stack('CREATE_COMPLETE')], [stack('UPDATE_COMPLETE')]);

      await lifecycle.deploy({
        stackName: 'demo',
        templateBody: TEMPLATE,
        options: { StackPolicyDuringUpdateBody: '{"Statement":[]}' },
      });

      expect(client.submitted[0]?.parameters.StackPolicyDuringUpdateBody).toBe('{"Statement":[]}');
    });

    it('should surface resource failures from the wait', async () => {
      client.queueDescribe([], [stack('ROLLBACK_COMPLETE', 'The following resource(s) failed to create: [Bucket].')]);
      client.events = [stackEvent('CREATE_FAILED', 'Bucket already exists', T0 + 1000)];

      const error = await rejectionOf(lifecycle.deploy({ stackName: 'demo', templateBody: TEMPLATE }));

      expect(error).toBeInstanceOf(CompositeFailureError);
      expect(error).toMatchObject({ message: 'CREATE_FAILED: Bucket already exists' });
    });

    it('should use the default timeout when none is given', async () => {
      const tracker = new LifecycleTracker(client, { pollIntervalMs: 5000, clock: new VirtualClock() });
      lifecycle = new StackLifecycle(client, { defaultTimeoutMs: 10_000, tracker });
      client.queueDescribe([], [stack('CREATE_IN_PROGRESS')]);

      const error = await rejectionOf(lifecycle.deploy({ stackName: 'demo', templateBody: TEMPLATE }));

      expect(error).toBeInstanceOf(WaitTimeoutError);
      expect(error).toMatchObject({ timeoutMs: 10_000, lastStatus: 'CREATE_IN_PROGRESS' });
    });

    it('should validate the stack name before querying', async () => {
      await expect(lifecycle.deploy({ stackName: '', templateBody: TEMPLATE })).rejects.toThrow(
        'Stack name cannot be empty'
      );
      expect(client.describeCalls).toEqual([]);
    });
  });

  describe('destroy', () => {
    it('should delete the stack and follow it by id to DELETE_COMPLETE', async () => {
      client.queueDescribe([stack('CREATE_COMPLETE')], [stack('DELETE_IN_PROGRESS')], [stack('DELETE_COMPLETE')]);

      const result = await lifecycle.destroy({ stackName: 'demo' });

      expect(result.status).toBe('DELETE_COMPLETE');
      expect(result.polls).toBe(2);
      expect(client.describeCalls).toEqual(['demo', STACK_ID, STACK_ID]);
    });

    it('should fail when deletion settles in another status', async () => {
      client.queueDescribe([stack('CREATE_COMPLETE')], [stack('UPDATE_ROLLBACK_COMPLETE', 'Delete interrupted')]);

      const error = await rejectionOf(lifecycle.destroy({ stackName: 'demo' }));

      expect(error).toBeInstanceOf(StackStatusError);
      expect(error).toMatchObject({ message: 'UPDATE_ROLLBACK_COMPLETE: Delete interrupted' });
    });
  });
});
