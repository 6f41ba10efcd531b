/* ================================
   DOMAIN ERRORS
================================ */

export type AccessTokenFailure =
  | "Malformed"
  | "InvalidSignature"
  | "Expired"
  | "InvalidIssuer"
  | "InvalidSubject";

/**
 * Raised by the access token codec. The reason is for server-side diagnostics
 * only; the HTTP layer always answers a plain 401.
 */
export class AccessTokenError extends Error {
  readonly reason: AccessTokenFailure;

  constructor(reason: AccessTokenFailure, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AccessTokenError";
    this.reason = reason;
  }
}

export type CredentialFailure = "MissingCredential" | "MalformedCredential";

export class CredentialError extends Error {
  readonly reason: CredentialFailure;

  constructor(reason: CredentialFailure, message: string) {
    super(message);
    this.name = "CredentialError";
    this.reason = reason;
  }
}

export class HashingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HashingError";
  }
}

export class EntropyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EntropyError";
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/* ================================
   HTTP ERRORS
================================ */

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HttpError";
    this.status = status;
  }
}

export class BadRequestError extends HttpError {
  constructor(message = "Bad request") {
    super(400, message);
    this.name = "BadRequestError";
  }
}

// wrong email or password; never says which
export class AuthenticationFailedError extends HttpError {
  constructor(message = "Incorrect email or password") {
    super(401, message);
    this.name = "AuthenticationFailedError";
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = "Unauthorized", options?: { cause?: unknown }) {
    super(401, message, options);
    this.name = "UnauthorizedError";
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = "Forbidden") {
    super(403, message);
    this.name = "ForbiddenError";
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "Not found") {
    super(404, message);
    this.name = "NotFoundError";
  }
}

export class ConflictError extends HttpError {
  constructor(message = "Conflict") {
    super(409, message);
    this.name = "ConflictError";
  }
}
