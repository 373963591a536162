/*
Purpose: error taxonomy shared by the registry, the template catalog and the asset registry.
Assumptions: every RegistryError message names the entity; UserFacingError instances are safe to display.
Usage: throw new NotFoundError("Brand 'acme' not found", "acme"); throw wrapInternalError(err, "Failed to update brand 'acme'", "acme").
*/

// =============================================================================
// REGISTRY ERRORS
// =============================================================================

export class RegistryError extends Error {
  constructor(
    message: string,
    public readonly entity?: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "RegistryError";
  }
}

export class NotFoundError extends RegistryError {
  constructor(message: string, entity?: string, cause?: unknown) {
    super(message, entity, cause);
    this.name = "NotFoundError";
  }
}

export class AlreadyExistsError extends RegistryError {
  constructor(message: string, entity?: string, cause?: unknown) {
    super(message, entity, cause);
    this.name = "AlreadyExistsError";
  }
}

export class ValidationError extends RegistryError {
  constructor(message: string, entity?: string, cause?: unknown) {
    super(message, entity, cause);
    this.name = "ValidationError";
  }
}

export class ProtectionError extends RegistryError {
  constructor(message: string, entity?: string, cause?: unknown) {
    super(message, entity, cause);
    this.name = "ProtectionError";
  }
}

export class InvalidArgumentError extends RegistryError {
  constructor(message: string, entity?: string, cause?: unknown) {
    super(message, entity, cause);
    this.name = "InvalidArgumentError";
  }
}

export class InternalError extends RegistryError {
  constructor(message: string, entity?: string, cause?: unknown) {
    super(message, entity, cause);
    this.name = "InternalError";
  }
}

// Taxonomy errors pass through; anything else is an unexpected failure.
export function wrapInternalError(error: unknown, message: string, entity?: string): RegistryError {
  if (error instanceof RegistryError) {
    return error;
  }

  const detail = error instanceof Error ? error.message : String(error);
  return new InternalError(`${message}: ${detail}`, entity, error);
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  notFound: "NOT_FOUND",
  alreadyExists: "ALREADY_EXISTS",
  validation: "VALIDATION_ERROR",
  protection: "PROTECTION_ERROR",
  invalidArgument: "INVALID_ARGUMENT",
  internal: "INTERNAL_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
