import { describe, it, expect } from 'vitest';
/**
 * Tests for the error hierarchy
 */

import {
  PassmithError,
  UnknownPlaceholderError,
  SubstitutionOverflowError,
  InvalidPolicyRequirementError,
  InvalidCaseFormError,
  ConfigError,
  ParseError,
  InternalError,
  isPassmithError,
  redactValue,
} from '../errors';
import { ErrorCode, getExitCode } from '../../errors/codes';

describe('Error Hierarchy', () => {
  describe('PassmithError base class', () => {
    class TestError extends PassmithError {
      constructor(message: string) {
        super({ message, errorCode: ErrorCode.INTERNAL_ERROR });
      }
    }

    it('creates error with params object', () => {
      const error = new TestError('Test message');

      expect(error.message).toBe('Test message');
      expect(error.errorCode).toBe(ErrorCode.INTERNAL_ERROR);
      expect(error.severity).toBe('error');
      expect(error.name).toBe('TestError');
      expect(error).toBeInstanceOf(Error);
    });

    it('serializes differently for dev and prod', () => {
      const error = new ConfigError({
        message: 'Serialize me',
        context: { value: { password: 'test-secret', safe: 'ok' } },
      });

      const devJson = error.toJSON('dev');
      const prodJson = error.toJSON('prod');

      expect(devJson.stack).toBeDefined();
      expect(devJson.context?.value).toEqual({
        password: 'test-secret',
        safe: 'ok',
      });

      expect(prodJson.stack).toBeUndefined();
      expect(prodJson.context?.value).toEqual({
        password: '[REDACTED]',
        safe: 'ok',
      });
    });

    it('serializes the cause by name and message', () => {
      const error = new InternalError('wrapped', new TypeError('boom'));
      expect(error.toJSON().cause).toEqual({ name: 'TypeError', message: 'boom' });
      expect(error.cause?.message).toBe('boom');
    });

    it('returns exit code mapping from ErrorCode', () => {
      const error = new ParseError({ message: 'Exit please' });
      expect(error.getExitCode()).toBe(getExitCode(ErrorCode.PARSE_ERROR));
    });

    it('builds a minimal user error', () => {
      const error = new ConfigError({
        message: 'Invalid maxlen',
        context: { setting: 'maxlen', value: -1 },
      });
      expect(error.toUserError()).toEqual({
        message: 'Invalid maxlen',
        code: ErrorCode.CONFIGURATION_ERROR,
        severity: 'error',
        setting: 'maxlen',
      });
    });
  });

  describe('generation errors', () => {
    it('UnknownPlaceholderError exposes slot and template', () => {
      const error = new UnknownPlaceholderError({
        slot: 'planet',
        template: '{planet}{year}',
      });
      expect(error.message).toBe('Unknown placeholder in pattern: planet');
      expect(error.slot).toBe('planet');
      expect(error.template).toBe('{planet}{year}');
      expect(error.getExitCode()).toBe(30);
    });

    it('SubstitutionOverflowError records which cap was hit', () => {
      const error = new SubstitutionOverflowError({
        word: 'abc',
        limit: 'rounds',
        bound: 64,
        reached: 65,
      });
      expect(error.message).toBe('Substitution closure exceeded 64 rounds');
      expect(error.limit).toBe('rounds');
      expect(error.bound).toBe(64);
      expect(error.context?.reached).toBe(65);
    });

    it('config problems that do not stop generation are warnings', () => {
      const policy = new InvalidPolicyRequirementError('length');
      const form = new InvalidCaseFormError('{word_xx}');
      expect(policy.severity).toBe('warn');
      expect(policy.context?.setting).toBe('policy_requirements');
      expect(form.severity).toBe('warn');
      expect(form.context?.setting).toBe('case_variants');
    });
  });

  describe('config and parse errors', () => {
    it('ConfigError exposes its setting', () => {
      const error = new ConfigError({
        message: 'bad',
        context: { setting: 'years' },
      });
      expect(error.setting).toBe('years');
      expect(error.errorCode).toBe(ErrorCode.CONFIGURATION_ERROR);
    });

    it('ParseError exposes its input', () => {
      const error = new ParseError({
        message: 'bad json',
        context: { input: 'conf.json' },
      });
      expect(error.input).toBe('conf.json');
    });

    it('InternalError falls back to a default message', () => {
      expect(new InternalError('').message).toBe('Unexpected error');
    });
  });

  describe('helpers', () => {
    it('isPassmithError distinguishes our errors', () => {
      expect(isPassmithError(new ConfigError({ message: 'x' }))).toBe(true);
      expect(isPassmithError(new Error('x'))).toBe(false);
      expect(isPassmithError('x')).toBe(false);
    });

    it('redactValue walks arrays and nested objects', () => {
      expect(
        redactValue({ list: [{ token: 't', keep: 1 }], nested: { word: 'w' } })
      ).toEqual({
        list: [{ token: '[REDACTED]', keep: 1 }],
        nested: { word: '[REDACTED]' },
      });
    });

    it('redactValue leaves primitives alone', () => {
      expect(redactValue('plain')).toBe('plain');
      expect(redactValue(null)).toBeNull();
    });
  });
});
