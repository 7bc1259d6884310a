// src/credentials/schema.ts
import { z } from 'zod';

export const ENVELOPE_FORMAT = 'ec2-security-credentials';
export const ENVELOPE_VERSION = 1;

const field = z.string().min(1, 'must be a non-empty string');

export const credentialFieldsSchema = z
  .object({
    AccessKeyId: field,
    SecretAccessKey: field,
    SessionToken: field,
    Expiration: field,
  })
  .strict();

export const envelopeSchema = z
  .object({
    format: z.literal(ENVELOPE_FORMAT),
    version: z.literal(ENVELOPE_VERSION),
    fields: credentialFieldsSchema,
  })
  .strict();

export type Envelope = z.infer<typeof envelopeSchema>;

// Metadata responses also carry Code, LastUpdated and Type; those are stripped.
export const instanceMetadataSchema = z.object({
  AccessKeyId: field,
  SecretAccessKey: field,
  Token: field,
  Expiration: field,
});

/** Flatten zod issues into "Path: message; Path: message" */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      if (issue.code === 'unrecognized_keys') return `unknown field(s) ${issue.keys.join(', ')}`;
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
