// src/client.ts
import { EC2Client, type EC2ClientConfig } from '@aws-sdk/client-ec2';
import type { CredentialSource, NewClientOptions } from './types.js';

const DEFAULT_REGION = 'us-east-1';

export function resolveRegion(region?: EC2ClientConfig['region']): NonNullable<EC2ClientConfig['region']> {
  // Empty variables count as unset
  return region ?? (process.env['AWS_REGION'] || process.env['AWS_DEFAULT_REGION'] || DEFAULT_REGION);
}

/**
 * Build an EC2 client that signs with the given temporary credentials.
 * Credentials passed in `options` are dropped in favour of the source's.
 */
export function createEc2Client(source: CredentialSource, options: NewClientOptions = {}): EC2Client {
  const { endpoint, region, ...rest } = options;
  const config: EC2ClientConfig = {
    ...rest,
    region: resolveRegion(region),
    ...(endpoint !== undefined ? { endpoint } : {}),
    credentials: {
      accessKeyId: source.accessKeyId(),
      secretAccessKey: source.secretAccessKey(),
      sessionToken: source.sessionToken(),
    },
  };
  return new EC2Client(config);
}
