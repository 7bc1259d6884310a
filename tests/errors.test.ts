// tests/errors.test.ts
import { describe, it, expect } from 'vitest';
import { CredentialsError, ConfigurationError, DeserializationError, ParseError } from '../src/errors.js';

describe('errors', () => {
  it('ConfigurationError is instanceof CredentialsError', () => {
    const err = new ConfigurationError('AccessKeyId: Required');
    expect(err).toBeInstanceOf(CredentialsError);
    expect(err).toBeInstanceOf(Error);
    expect(err.message).toBe('Invalid credential fields: AccessKeyId: Required');
    expect(err.name).toBe('ConfigurationError');
  });

  it('DeserializationError is instanceof CredentialsError', () => {
    const err = new DeserializationError('not a base64 string');
    expect(err).toBeInstanceOf(CredentialsError);
    expect(err.message).toBe('Cannot deserialize credentials: not a base64 string');
    expect(err.name).toBe('DeserializationError');
  });

  it('ParseError is instanceof CredentialsError', () => {
    const err = new ParseError('Token: Required');
    expect(err).toBeInstanceOf(CredentialsError);
    expect(err.message).toBe('Cannot parse credentials JSON: Token: Required');
    expect(err.name).toBe('ParseError');
  });
});
