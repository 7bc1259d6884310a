// src/errors.ts
export class CredentialsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ConfigurationError extends CredentialsError {
  constructor(detail: string) {
    super(`Invalid credential fields: ${detail}`);
  }
}

export class DeserializationError extends CredentialsError {
  constructor(detail: string) {
    super(`Cannot deserialize credentials: ${detail}`);
  }
}

export class ParseError extends CredentialsError {
  constructor(detail: string) {
    super(`Cannot parse credentials JSON: ${detail}`);
  }
}
