import { describe, it, expect } from 'vitest';
import { parseLifecycleRequest } from './request-parser.js';
import { ValidationError } from './errors.js';

const TEMPLATE = '{"Resources":{}}';

describe('request-parser', () => {
  describe('parseLifecycleRequest', () => {
    it('should parse a deploy request', () => {
      expect(
        parseLifecycleRequest({
          operation: 'deploy',
          stackName: 'demo',
          templateBody: TEMPLATE,
          options: { Size: 'small', 'tag.env': 'prod' },
          timeoutSeconds: 900,
        })
      ).toEqual({
        operation: 'deploy',
        stackName: 'demo',
        templateBody: TEMPLATE,
        options: { Size: 'small', 'tag.env': 'prod' },
        timeoutSeconds: 900,
      });
    });

    it('should default deploy options to an empty set', () => {
      const request = parseLifecycleRequest({ operation: 'deploy', stackName: 'demo', templateBody: TEMPLATE });

      expect(request).toEqual({ operation: 'deploy', stackName: 'demo', templateBody: TEMPLATE, options: {} });
    });

    it('should turn numeric and boolean option values into strings', () => {
      const request = parseLifecycleRequest({
        operation: 'deploy',
        stackName: 'demo',
        templateBody: TEMPLATE,
        options: { Count: 3, Enabled: true },
      });

      expect(request).toMatchObject({ options: { Count: '3', Enabled: 'true' } });
    });

    it.each(['destroy', 'wait', 'wait-for-complete'])('should parse a %s request', (operation) => {
      expect(parseLifecycleRequest({ operation, stackName: 'demo', timeoutSeconds: 60 })).toEqual({
        operation,
        stackName: 'demo',
        timeoutSeconds: 60,
      });
    });

    it('should parse a set-policy request', () => {
      expect(parseLifecycleRequest({ operation: 'set-policy', stackName: 'demo', policyBody: '{}' })).toEqual({
        operation: 'set-policy',
        stackName: 'demo',
        policyBody: '{}',
      });
    });

    it.each([null, 'deploy', 42, ['deploy']])('should reject a non-object event: %s', (event) => {
      expect(() => parseLifecycleRequest(event)).toThrow('Event must be an object');
    });

    it('should reject an unknown operation', () => {
      expect(() => parseLifecycleRequest({ operation: 'rollback', stackName: 'demo' })).toThrow(
        'Event must contain an operation, one of: deploy, destroy, wait, wait-for-complete, set-policy'
      );
    });

    it('should reject a missing stack name', () => {
      expect(() => parseLifecycleRequest({ operation: 'wait', stackName: ' ' })).toThrow(
        'Event must contain a non-empty stackName'
      );
    });

    it('should require a template for deploy', () => {
      expect(() => parseLifecycleRequest({ operation: 'deploy', stackName: 'demo' })).toThrow(
        'deploy requires a non-empty templateBody'
      );
    });

    it('should require a policy for set-policy', () => {
      expect(() => parseLifecycleRequest({ operation: 'set-policy', stackName: 'demo' })).toThrow(
        'set-policy requires a non-empty policyBody'
      );
    });

    it('should reject options that are not an object', () => {
      expect(() =>
        parseLifecycleRequest({ operation: 'deploy', stackName: 'demo', templateBody: TEMPLATE, options: ['Size'] })
      ).toThrow('options must be an object of string values');
    });

    it('should reject nested option values', () => {
      try {
        parseLifecycleRequest({
          operation: 'deploy',
          stackName: 'demo',
          templateBody: TEMPLATE,
          options: { Size: { value: 'small' } },
        });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({ message: 'options.Size must be a string', field: 'options.Size' });
      }
    });

    it.each([0, -1, '60', Number.NaN])('should reject a timeout of %s', (timeoutSeconds) => {
      expect(() => parseLifecycleRequest({ operation: 'wait', stackName: 'demo', timeoutSeconds })).toThrow(
        'timeoutSeconds must be a positive number'
      );
    });
  });
});
