/*
Purpose: the advisory per-brand asset index (asset_registry.json), keyed by filename.
Assumptions: the filesystem is authoritative; callers serialize writes per brand and treat failures as warnings.
*/

import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { ValidationError } from "../core/errors.js";
import { assetIndexPath } from "../core/paths.js";
import { writeJsonFileAtomic } from "../core/utils.js";
import { DocumentMapSchema } from "../store/document.js";

export const AssetIndexEntrySchema = z.object({
  asset_type: z.string(),
  file_size: z.number().int().nonnegative(),
  checksum: z.string(),
  uploaded_at: z.string(),
  metadata: DocumentMapSchema.default({}),
});

export const AssetIndexSchema = z.record(z.string(), AssetIndexEntrySchema);

export type AssetIndexEntry = z.infer<typeof AssetIndexEntrySchema>;
export type AssetIndex = z.infer<typeof AssetIndexSchema>;

export async function readAssetIndex(brandDir: string): Promise<AssetIndex> {
  const indexPath = assetIndexPath(brandDir);
  if (!(await fse.pathExists(indexPath))) return {};

  const raw: unknown = JSON.parse(await fse.readFile(indexPath, "utf8"));
  const parsed = AssetIndexSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Malformed asset index ${indexPath}: ${parsed.error.message}`, indexPath);
  }
  return parsed.data;
}

export async function upsertAssetIndexEntry(
  brandDir: string,
  filename: string,
  entry: AssetIndexEntry,
): Promise<void> {
  const index = await readAssetIndex(brandDir);
  index[filename] = entry;
  await writeJsonFileAtomic(assetIndexPath(brandDir), index);
}

// Returns false when the index had no entry for the file.
export async function removeAssetIndexEntry(brandDir: string, assetPath: string): Promise<boolean> {
  const indexPath = assetIndexPath(brandDir);
  if (!(await fse.pathExists(indexPath))) return false;

  const index = await readAssetIndex(brandDir);
  const filename = path.basename(assetPath);
  if (!Object.hasOwn(index, filename)) return false;

  delete index[filename];
  await writeJsonFileAtomic(indexPath, index);
  return true;
}
