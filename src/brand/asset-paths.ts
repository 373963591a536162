import path from "node:path";

import fse from "fs-extra";

import type { DocumentMap, DocumentValue } from "../store/document.js";

export type AssetResolution = {
  role: string;
  path: string;
  resolved: boolean;
};

export type ResolvedAssets = {
  assets: Record<string, string | string[]>;
  resolution: AssetResolution[];
  warnings: string[];
};

// Non-empty string values of an asset entry; lists are flattened, everything else ignored.
export function assetEntryPaths(value: DocumentValue | undefined): string[] {
  if (typeof value === "string") {
    return value.length > 0 ? [value] : [];
  }
  if (Array.isArray(value)) {
    return value.filter((entry): entry is string => typeof entry === "string" && entry.length > 0);
  }
  return [];
}

export function referencedAssetPaths(brandDir: string, assets: DocumentMap): Set<string> {
  const referenced = new Set<string>();
  for (const value of Object.values(assets)) {
    for (const entry of assetEntryPaths(value)) {
      referenced.add(path.resolve(brandDir, entry));
    }
  }
  return referenced;
}

/**
 * Resolve every asset path against the brand directory.
 * Missing files keep their absolute path and are flagged `resolved: false`.
 */
export async function resolveAssetPaths(
  brandDir: string,
  assets: DocumentMap,
): Promise<ResolvedAssets> {
  const result: ResolvedAssets = { assets: {}, resolution: [], warnings: [] };

  for (const [role, value] of Object.entries(assets)) {
    const entries = assetEntryPaths(value);
    if (entries.length === 0) {
      result.warnings.push(`Empty asset path for ${role}`);
      continue;
    }

    const absolutePaths: string[] = [];
    for (const entry of entries) {
      const absolutePath = path.resolve(brandDir, entry);
      const resolved = await fse.pathExists(absolutePath);
      if (!resolved) {
        result.warnings.push(`Asset not found ${role}: ${absolutePath}`);
      }
      result.resolution.push({ role, path: absolutePath, resolved });
      absolutePaths.push(absolutePath);
    }

    result.assets[role] = Array.isArray(value) ? absolutePaths : absolutePaths[0];
  }

  return result;
}
