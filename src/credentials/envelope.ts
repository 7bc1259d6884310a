// src/credentials/envelope.ts
import { DeserializationError } from '../errors.js';
import { ENVELOPE_FORMAT, ENVELOPE_VERSION, envelopeSchema, describeIssues } from './schema.js';
import type { CredentialFields } from '../types.js';

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

/** Format: base64(JSON{format, version, fields}) */
export function encodeEnvelope(fields: CredentialFields): string {
  const envelope = { format: ENVELOPE_FORMAT, version: ENVELOPE_VERSION, fields };
  return Buffer.from(JSON.stringify(envelope), 'utf8').toString('base64');
}

export function decodeEnvelope(blob: string): CredentialFields {
  // Line-wrapped base64 from mail or PEM-style transports is accepted
  const compact = blob.replace(/\s+/g, '');
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64.test(compact)) {
    throw new DeserializationError('not a base64 string');
  }

  let json: string;
  try {
    json = new TextDecoder('utf-8', { fatal: true }).decode(Buffer.from(compact, 'base64'));
  } catch {
    throw new DeserializationError('payload is not UTF-8 text');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw new DeserializationError('payload is not JSON');
  }

  const result = envelopeSchema.safeParse(parsed);
  if (!result.success) {
    throw new DeserializationError(describeIssues(result.error));
  }
  return result.data.fields;
}
