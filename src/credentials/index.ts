// src/credentials/index.ts
import type { EC2Client } from '@aws-sdk/client-ec2';
import { createEc2Client } from '../client.js';
import { ConfigurationError, ParseError } from '../errors.js';
import { credentialFieldsSchema, instanceMetadataSchema, describeIssues } from './schema.js';
import { encodeEnvelope, decodeEnvelope } from './envelope.js';
import type { CredentialFields, CredentialSource, NewClientOptions } from '../types.js';

/**
 * Temporary EC2 credentials as issued by GetFederationToken or GetSessionToken.
 *
 * The bundle is opaque: key formats and expiration are not checked here, the
 * EC2 API does that on first use. See `checkExpiration` for a caller-side check.
 *
 * Every accessor is also available under its snake_case name.
 */
export class SecurityCredentials implements CredentialSource {
  private readonly data: Readonly<CredentialFields>;
  private attached: EC2Client | undefined;

  constructor(fields: CredentialFields | Record<string, unknown>, client?: EC2Client) {
    const result = credentialFieldsSchema.safeParse(fields);
    if (!result.success) throw new ConfigurationError(describeIssues(result.error));
    this.data = Object.freeze({ ...result.data });
    this.attached = client;
  }

  /**
   * Rebuild credentials from `serialize()` output.
   * @throws {DeserializationError} if the blob is not a serialized bundle
   */
  static deserialize(blob: string): SecurityCredentials {
    return new SecurityCredentials(decodeEnvelope(blob));
  }

  /**
   * Build credentials from an instance-metadata response
   * (`/latest/meta-data/iam/security-credentials/<role>`) and attach a client
   * bound to `endpoint`.
   * @throws {ParseError} on invalid JSON or a missing field
   */
  static fromJSON(json: string, endpoint?: string): SecurityCredentials {
    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (err) {
      throw new ParseError(err instanceof Error ? err.message : String(err));
    }

    const result = instanceMetadataSchema.safeParse(parsed);
    if (!result.success) throw new ParseError(describeIssues(result.error));

    const { AccessKeyId, SecretAccessKey, Token, Expiration } = result.data;
    const credentials = new SecurityCredentials({
      AccessKeyId,
      SecretAccessKey,
      SessionToken: Token,
      Expiration,
    });
    credentials.attach(credentials.newClient(endpoint !== undefined ? { endpoint } : {}));
    return credentials;
  }

  accessKeyId(): string { return this.data.AccessKeyId; }
  secretAccessKey(): string { return this.data.SecretAccessKey; }
  sessionToken(): string { return this.data.SessionToken; }
  expiration(): string { return this.data.Expiration; }

  access_key_id(): string { return this.accessKeyId(); }
  secret_access_key(): string { return this.secretAccessKey(); }
  session_token(): string { return this.sessionToken(); }

  /** Display label; the access key id */
  shortName(): string { return this.accessKeyId(); }
  short_name(): string { return this.shortName(); }

  /** Copy of the raw fields, for handing to a peer field by field */
  fields(): CredentialFields {
    return { ...this.data };
  }

  /** The client attached at construction or by `fromJSON`, if any */
  get client(): EC2Client | undefined {
    return this.attached;
  }

  /**
   * Base64 text suitable for SSL or S/MIME transport. The secret key and
   * session token are NOT encrypted. Any attached client is left out.
   */
  serialize(): string {
    return encodeEnvelope(this.fields());
  }

  /** New EC2 client authorized by these credentials. Does not attach it. */
  newClient(options?: NewClientOptions): EC2Client {
    return createEc2Client(this, options);
  }
  new_client(options?: NewClientOptions): EC2Client {
    return this.newClient(options);
  }

  /** The session token, for places that need the credentials as one string */
  display(): string {
    return this.sessionToken();
  }

  toString(): string {
    return `SecurityCredentials(${this.accessKeyId()})`;
  }

  toJSON(): { accessKeyId: string; expiration: string } {
    return { accessKeyId: this.accessKeyId(), expiration: this.expiration() };
  }

  private attach(client: EC2Client): void {
    // An existing client wins
    if (!this.attached) this.attached = client;
  }
}
