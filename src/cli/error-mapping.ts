import {
  AlreadyExistsError,
  InternalError,
  InvalidArgumentError,
  NotFoundError,
  ProtectionError,
  RegistryError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  ValidationError,
} from "../core/errors.js";

// Maps registry errors onto the CLI's user-facing shape; other errors pass through for the generic formatter.
export function toUserFacingError(error: unknown): unknown {
  if (error instanceof UserFacingError || !(error instanceof RegistryError)) {
    return error;
  }

  if (error instanceof NotFoundError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.notFound,
      title: "Not found.",
      message: error.message,
      hint: "Run `brand-registry brands list` or `brand-registry templates list` to see what exists.",
      cause: error,
    });
  }

  if (error instanceof AlreadyExistsError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.alreadyExists,
      title: "Already exists.",
      message: error.message,
      hint: "Pick another name or delete the existing entry first.",
      cause: error,
    });
  }

  if (error instanceof ValidationError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.validation,
      title: "Validation failed.",
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof ProtectionError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.protection,
      title: "Brand is protected.",
      message: error.message,
      hint: "Unlock the brand with `brand-registry brands unlock <name> --by <actor>` or pass --force.",
      cause: error,
    });
  }

  if (error instanceof InvalidArgumentError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.invalidArgument,
      title: "Invalid argument.",
      message: error.message,
      hint: "Run the command with --help to see the accepted options.",
      cause: error,
    });
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.internal,
    title: "Registry operation failed.",
    message: error.message,
    hint: error instanceof InternalError ? "Rerun with --debug to see the underlying error." : undefined,
    cause: error,
  });
}
