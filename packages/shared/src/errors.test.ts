import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  UsageError,
  ProviderError,
  RateLimitError,
  TimeoutError,
  ParseError,
  CompilerError,
  IndexError,
  errorMessage,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('ProviderError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('ParseError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('error subclasses', () => {
  it.each([
    [new ConfigError('m'), 'ConfigError', 'ConfigError'],
    [new UsageError('m'), 'UsageError', 'UsageError'],
    [new ProviderError('m'), 'ProviderError', 'ProviderError'],
    [new TimeoutError('m'), 'TimeoutError', 'TimeoutError'],
    [new ParseError('m'), 'ParseError', 'ParseError'],
    [new CompilerError('m'), 'CompilerError', 'CompilerError'],
    [new IndexError('m'), 'IndexError', 'IndexError'],
  ])('%s carries code %s', (error, code, name) => {
    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe(code);
    expect(error.name).toBe(name);
  });

  it('RateLimitError keeps retryAfter', () => {
    const error = new RateLimitError('slow down', { retryAfter: 30 });
    expect(error.code).toBe('RateLimitError');
    expect(error.retryAfter).toBe(30);
  });
});

describe('errorMessage', () => {
  it('uses the message of Error instances', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });

  it('stringifies anything else', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
