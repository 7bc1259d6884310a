// src/index.ts
export { SecurityCredentials } from './credentials/index.js';
export { createEc2Client, resolveRegion } from './client.js';
export { checkExpiration } from './expiry/index.js';
export type { CredentialFields, CredentialFieldName, InstanceMetadataCredentials, CredentialSource, NewClientOptions, ExpirationCheck } from './types.js';
export { CredentialsError, ConfigurationError, DeserializationError, ParseError } from './errors.js';
