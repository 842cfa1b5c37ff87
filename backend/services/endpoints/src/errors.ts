// backend/services/endpoints/src/errors.ts

/**
 * Registry failure taxonomy. Each error carries the HTTP status the shared
 * error tail answers with; responses never include a body.
 */

export abstract class RegistryError extends Error {
  public abstract readonly status: number;
}

export class InvalidIdentifierError extends RegistryError {
  public readonly status = 400;
  public readonly path: string;
  public readonly pattern: string;

  constructor(path: string, pattern: string) {
    super(`endpoint "${path}" does not match pattern "${pattern}"`);
    this.name = "InvalidIdentifierError";
    this.path = path;
    this.pattern = pattern;
  }
}

export class MalformedPayloadError extends RegistryError {
  public readonly status = 400;
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`malformed endpoint payload: ${issues.join("; ")}`);
    this.name = "MalformedPayloadError";
    this.issues = issues;
  }
}

export class IdentifierMismatchError extends RegistryError {
  public readonly status = 400;
  public readonly pathIdentifier: string;
  public readonly bodyIdentifier: string;

  constructor(pathIdentifier: string, bodyIdentifier: string) {
    super(
      `identifier mismatch (resource: ${pathIdentifier}, body: ${bodyIdentifier})`
    );
    this.name = "IdentifierMismatchError";
    this.pathIdentifier = pathIdentifier;
    this.bodyIdentifier = bodyIdentifier;
  }
}

export class NotFoundError extends RegistryError {
  public readonly status = 404;
  public readonly identifier: string;

  constructor(identifier: string) {
    super(`no such endpoint "${identifier}"`);
    this.name = "NotFoundError";
    this.identifier = identifier;
  }
}

export class CorruptRecordError extends RegistryError {
  public readonly status = 500;
  public readonly key: string;

  constructor(key: string, detail: string) {
    super(`parse endpoint from ${key}: ${detail}`);
    this.name = "CorruptRecordError";
    this.key = key;
  }
}

export class StoreUnavailableError extends RegistryError {
  public readonly status = 500;
  public readonly op: string;
  public readonly key: string;

  constructor(op: string, key: string, cause: unknown) {
    super(
      `${op} ${key}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "StoreUnavailableError";
    this.op = op;
    this.key = key;
  }
}
