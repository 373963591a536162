/*
Purpose: decide whether a guarded mutation may proceed against a brand's protection state.
Assumptions: protection lives in top-level document fields; `strict` blocks, `warn` allows with a warning.
Usage: const decision = checkProtection("acme", readProtection(config), "update").
*/

import { InvalidArgumentError, ProtectionError } from "../core/errors.js";
import type { DocumentMap } from "../store/document.js";

import { ProtectionLevelSchema, type BrandDocument, type ProtectionLevel } from "./schema.js";

// =============================================================================
// TYPES
// =============================================================================

export const PROTECTION_KEYS = [
  "is_protected",
  "protection_level",
  "protected_by",
  "protected_at",
  "protection_reason",
] as const;

export type GuardedOperation = "update" | "delete";

export type ProtectionRecord = {
  isProtected: boolean;
  level: ProtectionLevel;
  protectedBy: string | null;
  protectedAt: string | null;
  reason: string;
};

export type ProtectionDecision = {
  allowed: true;
  warning?: string;
};

export type LockFields = {
  is_protected: boolean;
  protection_level: ProtectionLevel;
  protected_by: string;
  protected_at: string;
  protection_reason: string;
};

export type ProtectionStatus = ProtectionRecord & {
  canUpdate: boolean;
  canDelete: boolean;
};

// =============================================================================
// READING
// =============================================================================

export function isProtectionLevel(value: string): value is ProtectionLevel {
  return ProtectionLevelSchema.safeParse(value).success;
}

export function readProtection(config: BrandDocument): ProtectionRecord {
  return {
    isProtected: config.is_protected ?? false,
    level: config.protection_level ?? "none",
    protectedBy: config.protected_by ?? null,
    protectedAt: config.protected_at ?? null,
    reason: config.protection_reason ?? "",
  };
}

export function protectionStatus(record: ProtectionRecord): ProtectionStatus {
  const blocked = record.isProtected && record.level === "strict";
  return { ...record, canUpdate: !blocked, canDelete: !blocked };
}

// =============================================================================
// GUARD
// =============================================================================

export function checkProtection(
  brand: string,
  record: ProtectionRecord,
  operation: GuardedOperation,
): ProtectionDecision {
  if (!record.isProtected || record.level === "none") {
    return { allowed: true };
  }

  const reason = record.reason || "Brand is marked as protected";
  const actor = record.protectedBy ?? "system";

  if (record.level === "strict") {
    throw new ProtectionError(
      `Cannot ${operation} protected brand '${brand}': ${reason}. ` +
        `Protected by ${actor} on ${record.protectedAt ?? "unknown date"}. Use force to override.`,
      brand,
    );
  }

  return {
    allowed: true,
    warning: `Attempting to ${operation} protected brand '${brand}': ${reason}. Protected by ${actor}`,
  };
}

// =============================================================================
// OVERRIDES
// =============================================================================

export function assertActor(actor: string, brand: string): string {
  const trimmed = actor.trim();
  if (trimmed.length === 0) {
    throw new InvalidArgumentError(
      `Protection changes on brand '${brand}' require a non-empty actor`,
      brand,
    );
  }
  return trimmed;
}

export function buildLockFields(
  level: ProtectionLevel,
  reason: string,
  actor: string,
  now: Date,
): LockFields {
  return {
    is_protected: level !== "none",
    protection_level: level,
    protected_by: actor,
    protected_at: now.toISOString(),
    protection_reason: reason || `Brand locked at ${level} level`,
  };
}

export function buildUnlockFields(): DocumentMap {
  return {
    is_protected: false,
    protection_level: "none",
    protected_by: null,
    protected_at: null,
    protection_reason: "",
  };
}

export function stripProtection(document: DocumentMap): DocumentMap {
  const result: DocumentMap = { ...document };
  for (const key of PROTECTION_KEYS) {
    delete result[key];
  }
  return result;
}
