// src/types.ts
import type { EC2ClientConfig } from '@aws-sdk/client-ec2';

/** The four fields returned by GetFederationToken / GetSessionToken */
export interface CredentialFields {
  AccessKeyId: string;
  SecretAccessKey: string;
  SessionToken: string;
  Expiration: string; // provider-formatted, never parsed by the bundle
}

export type CredentialFieldName = keyof CredentialFields;

// Instance metadata names the session token `Token`
export interface InstanceMetadataCredentials {
  AccessKeyId: string;
  SecretAccessKey: string;
  Token: string;
  Expiration: string;
  Code?: string;
  LastUpdated?: string;
  Type?: string;
}

/** Anything that can hand its keys to an EC2 client */
export interface CredentialSource {
  accessKeyId(): string;
  secretAccessKey(): string;
  sessionToken(): string;
}

/** EC2 client options; any `credentials` given here are overridden by the bundle */
export type NewClientOptions = EC2ClientConfig;

export interface ExpirationCheck {
  isValid: boolean;
  isExpired: boolean;
  expiresAt: Date | null;
  minutesUntilExpiry: number | null;
}
