/*
Purpose: snapshots taken before a brand or one of its assets changes.
Assumptions: timestamps have one-second granularity; same-second snapshots overwrite each other; nothing is pruned.
Usage: await snapshotDocument(brandDir, document, now); await archiveDirectory(brandDir, archivePath).
*/

import fs from "node:fs";
import path from "node:path";

import archiver from "archiver";
import fse from "fs-extra";

import { BACKUPS_DIR } from "../core/paths.js";
import { formatBackupTimestamp } from "../core/utils.js";
import { saveDocument } from "../store/document-store.js";
import type { DocumentMap } from "../store/document.js";

export function backupsDir(brandDir: string): string {
  return path.join(brandDir, BACKUPS_DIR);
}

export async function snapshotDocument(
  brandDir: string,
  document: DocumentMap,
  now: Date = new Date(),
): Promise<string> {
  const backupPath = path.join(backupsDir(brandDir), `backup_${formatBackupTimestamp(now)}.yaml`);
  await saveDocument(backupPath, document);
  return backupPath;
}

// logo.png -> backups/logo_20250102_030405.png
export async function backupAssetFile(
  brandDir: string,
  assetPath: string,
  now: Date = new Date(),
): Promise<string> {
  const parsed = path.parse(assetPath);
  const backupPath = path.join(
    backupsDir(brandDir),
    `${parsed.name}_${formatBackupTimestamp(now)}${parsed.ext}`,
  );
  await fse.ensureDir(backupsDir(brandDir));
  await fse.copy(assetPath, backupPath, { overwrite: true, preserveTimestamps: true });
  return backupPath;
}

/**
 * Gzip-compressed tar of the whole directory, rooted at the directory's own name.
 * A partial archive is removed when writing fails.
 */
export async function archiveDirectory(sourceDir: string, archivePath: string): Promise<string> {
  await fse.ensureDir(path.dirname(archivePath));

  try {
    await new Promise<void>((resolve, reject) => {
      const output = fs.createWriteStream(archivePath);
      const archive = archiver("tar", { gzip: true, gzipOptions: { level: 9 } });

      output.on("close", () => resolve());
      output.on("error", reject);
      archive.on("error", reject);
      archive.on("warning", reject);

      archive.pipe(output);
      archive.directory(sourceDir, path.basename(sourceDir));
      archive.finalize().catch(reject);
    });
  } catch (err) {
    await fse.remove(archivePath);
    throw err;
  }

  return archivePath;
}
