// ---------------------------------------------------------------------------
// clanker-guard error taxonomy
// Each error carries a stable code and the HTTP status it maps to
// ---------------------------------------------------------------------------

export abstract class CredentialError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingCredentialError extends CredentialError {
  readonly code = "missing_credential";
  readonly status = 401;
}

export class InvalidCredentialError extends CredentialError {
  readonly code = "invalid_credential";
  readonly status = 401;
}

export class ProjectScopeError extends CredentialError {
  readonly code = "project_scope_mismatch";
  readonly status = 403;
}

export class DuplicateIdentityError extends CredentialError {
  readonly code = "duplicate_identity";
  readonly status = 409;

  constructor(readonly identity: string) {
    super(`Credential "${identity}" already exists`);
  }
}

export class NotFoundError extends CredentialError {
  readonly code = "not_found";
  readonly status = 404;

  constructor(readonly identity: string) {
    super(`Credential "${identity}" not found`);
  }
}

export class InvalidInputError extends CredentialError {
  readonly code = "invalid_input";
  readonly status = 400;
}

/** A stored digest that the hasher cannot parse. Fatal when loading a store. */
export class MalformedDigestError extends CredentialError {
  readonly code = "malformed_digest";
  readonly status = 500;
}

export class CorruptStoreError extends CredentialError {
  readonly code = "corrupt_store";
  readonly status = 500;
}

export class UpstreamError extends CredentialError {
  readonly code = "upstream_error";
  readonly status = 502;
}

export interface ErrorResponse {
  status: number;
  body: { error: string; code?: string };
}

/**
 * Map any thrown value to an HTTP status and JSON body.
 *
 * Missing and invalid credentials share one body so callers cannot tell
 * which case occurred.
 */
export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof MissingCredentialError || err instanceof InvalidCredentialError) {
    return { status: 401, body: { error: "Unauthorized" } };
  }
  if (err instanceof MalformedDigestError || err instanceof CorruptStoreError) {
    return { status: 500, body: { error: "Internal server error" } };
  }
  if (err instanceof CredentialError) {
    return { status: err.status, body: { error: err.message, code: err.code } };
  }
  return { status: 500, body: { error: "Internal server error" } };
}
