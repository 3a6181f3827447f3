import type { Roles } from "./types.js";

export class BlobtufError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BlobtufError";
  }
}

/**
 * The registry or the auth server refused the supplied credentials or token.
 */
export class UnauthorizedError extends BlobtufError {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "UnauthorizedError";
  }
}

export type TrustFailure =
  | "bad-signature"
  | "threshold"
  | "expired"
  | "rollback"
  | "inconsistent"
  | "malformed";

/**
 * A metadata document failed verification. Nothing from the run in which it
 * was raised has been committed.
 */
export class TrustChainError extends BlobtufError {
  constructor(
    readonly role: Roles,
    readonly reason: TrustFailure,
    detail: string,
  ) {
    super(`${role}: ${reason}: ${detail}`);
    this.name = "TrustChainError";
  }
}

export class MissingMetadataError extends BlobtufError {
  constructor(readonly document: string) {
    super(`Metadata document ${document} is missing from the registry`);
    this.name = "MissingMetadataError";
  }
}

/**
 * Streamed blob content disagrees with the trusted digest or length. Every byte
 * already handed out for this blob must be discarded.
 */
export class DigestMismatchError extends BlobtufError {
  constructor(
    readonly expected: string,
    readonly actual: string,
    detail?: string,
  ) {
    super(
      detail ??
        `Blob digest mismatch: expected ${expected}, received ${actual}`,
    );
    this.name = "DigestMismatchError";
  }
}

export class KeyExistsError extends BlobtufError {
  constructor(readonly role: Roles) {
    super(`A ${role} key already exists for this repository`);
    this.name = "KeyExistsError";
  }
}

export class MissingRootKeyError extends BlobtufError {
  constructor() {
    super("No root key exists for this repository; create it first");
    this.name = "MissingRootKeyError";
  }
}

export class MissingMetadataKeysError extends BlobtufError {
  constructor(readonly roles: Roles[]) {
    super(`Missing keys for role(s): ${roles.join(", ")}`);
    this.name = "MissingMetadataKeysError";
  }
}

export class KeyPasswordError extends BlobtufError {
  constructor(readonly role: Roles, detail: string) {
    super(`Cannot unlock ${role} key: ${detail}`);
    this.name = "KeyPasswordError";
  }
}

export class InvalidArgumentError extends BlobtufError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class UnknownTargetError extends BlobtufError {
  constructor(readonly target: string) {
    super(`Target ${target} is not listed in the trusted targets metadata`);
    this.name = "UnknownTargetError";
  }
}

/**
 * Network level failure talking to the registry. Eligible for a retry by the
 * caller.
 */
export class TransportError extends BlobtufError {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "TransportError";
  }
}
