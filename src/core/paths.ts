import path from "node:path";

import { ValidationError } from "./errors.js";

// =============================================================================
// FILE NAMES
// =============================================================================

export const BRAND_DOCUMENT_FILE = "brand_config.yaml";
export const TEMPLATE_DOCUMENT_FILE = "template_config.yaml";
export const ASSET_INDEX_FILE = "asset_registry.json";

export const ASSETS_DIR = "assets";
export const TEMPLATES_DIR = "templates";
export const BACKUPS_DIR = "backups";

// Created for every new brand.
export const BRAND_LAYOUT_DIRS = [
  path.join(ASSETS_DIR, "images"),
  path.join(ASSETS_DIR, "fonts"),
  TEMPLATES_DIR,
  BACKUPS_DIR,
] as const;

// =============================================================================
// PATHS
// =============================================================================

export function entityDir(root: string, name: string): string {
  return path.join(root, name);
}

export function brandDocumentPath(brandDir: string): string {
  return path.join(brandDir, BRAND_DOCUMENT_FILE);
}

export function templateDocumentPath(templateDir: string): string {
  return path.join(templateDir, TEMPLATE_DOCUMENT_FILE);
}

export function assetIndexPath(brandDir: string): string {
  return path.join(brandDir, ASSET_INDEX_FILE);
}

// Deletion archives sit one level above the registry root.
export function deletionArchivePath(brandsRoot: string, brand: string, timestamp: string): string {
  return path.join(path.dirname(path.resolve(brandsRoot)), `${brand}_deleted_${timestamp}.tar.gz`);
}

export function isInside(parent: string, candidate: string): boolean {
  const relative = path.relative(parent, candidate);
  if (relative === "") return true;
  const escapes = relative === ".." || relative.startsWith(`..${path.sep}`);
  return !escapes && !path.isAbsolute(relative);
}

/**
 * Resolve a caller-supplied path against a base directory.
 * Absolute inputs are accepted only when they already point inside the base.
 */
export function resolveInside(baseDir: string, input: string, entity?: string): string {
  const base = path.resolve(baseDir);
  const resolved = path.resolve(base, input);
  if (!isInside(base, resolved)) {
    throw new ValidationError(`Path escapes ${base}: ${input}`, entity);
  }
  return resolved;
}
