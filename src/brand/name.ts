import { ValidationError } from "../core/errors.js";

const MAX_NAME_LENGTH = 50;
const NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export type EntityKind = "brand" | "template";

export function assertValidEntityName(name: string, kind: EntityKind = "brand"): void {
  const label = kind === "brand" ? "Brand" : "Template";

  if (name.length === 0) {
    throw new ValidationError(`${label} name must not be empty`, name);
  }
  if (name.length > MAX_NAME_LENGTH) {
    throw new ValidationError(
      `${label} name '${name}' is longer than ${MAX_NAME_LENGTH} characters`,
      name,
    );
  }
  if (!NAME_PATTERN.test(name)) {
    throw new ValidationError(
      `${label} name '${name}' may only contain letters, digits, '_' and '-'`,
      name,
    );
  }
  if (/^[0-9._]/.test(name)) {
    throw new ValidationError(
      `${label} name '${name}' must not start with a digit, '.' or '_'`,
      name,
    );
  }
}

// Lookups accept any existing directory name but never a path.
export function assertSafePathSegment(name: string, kind: EntityKind = "brand"): void {
  if (name.length === 0 || name === "." || name === ".." || /[\\/]/.test(name)) {
    throw new ValidationError(`Invalid ${kind} name '${name}'`, name);
  }
}

// "acme_widgets" -> "Acme Widgets"; a letter after any non-letter is capitalised.
export function displayNameFromId(name: string): string {
  const lowered = name.replace(/_/g, " ").toLowerCase();
  let result = "";
  let previousIsLetter = false;

  for (const char of lowered) {
    const isLetter = char.toLowerCase() !== char.toUpperCase();
    result += isLetter && !previousIsLetter ? char.toUpperCase() : char;
    previousIsLetter = isLetter;
  }
  return result;
}
