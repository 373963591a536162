// Structured document model shared by brands, templates and backups.
// Purpose: a JSON/YAML-compatible tree with type guards, so untyped parser output is narrowed once.

import { z } from "zod";

// =============================================================================
// TYPES
// =============================================================================

export type DocumentScalar = string | number | boolean | null;

export type DocumentValue = DocumentScalar | DocumentValue[] | DocumentMap;

export type DocumentMap = { [key: string]: DocumentValue };

export const DocumentValueSchema: z.ZodType<DocumentValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(DocumentValueSchema),
    z.record(z.string(), DocumentValueSchema),
  ]),
);

export const DocumentMapSchema = z.record(z.string(), DocumentValueSchema);

// =============================================================================
// GUARDS
// =============================================================================

export function isDocumentMap(value: DocumentValue | undefined): value is DocumentMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// =============================================================================
// CONVERSION
// =============================================================================

/** Narrows parser output to a document tree; returns null for anything that is not a mapping. */
export function toDocumentMap(raw: unknown): DocumentMap | null {
  if (!isPlainRecord(raw)) return null;

  const result: DocumentMap = {};
  for (const [key, value] of Object.entries(raw)) {
    setEntry(result, key, toDocumentValue(value));
  }
  return result;
}

function toDocumentValue(raw: unknown): DocumentValue {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean") return raw;
  if (Array.isArray(raw)) return raw.map(toDocumentValue);
  if (raw instanceof Date) return raw.toISOString();
  return toDocumentMap(raw) ?? String(raw);
}

// Keys such as `__proto__` stay ordinary own entries.
export function setEntry(document: DocumentMap, key: string, value: DocumentValue): void {
  Object.defineProperty(document, key, { value, enumerable: true, writable: true, configurable: true });
}

export function ownEntry(document: DocumentMap, key: string): DocumentValue | undefined {
  return Object.hasOwn(document, key) ? document[key] : undefined;
}

export function documentSection(document: DocumentMap, key: string): DocumentMap {
  const value = ownEntry(document, key);
  return isDocumentMap(value) ? value : {};
}

export function omitKeys(document: DocumentMap, keys: readonly string[]): DocumentMap {
  const excluded = new Set(keys);
  const result: DocumentMap = {};
  for (const [key, value] of Object.entries(document)) {
    if (!excluded.has(key)) {
      setEntry(result, key, value);
    }
  }
  return result;
}
