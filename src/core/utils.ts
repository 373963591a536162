import { randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

// =============================================================================
// TIME
// =============================================================================

export function isoNow(now: Date = new Date()): string {
  return now.toISOString();
}

// YYYYMMDD_HHMMSS in UTC. Sortable by name; one-second granularity.
export function formatBackupTimestamp(now: Date = new Date()): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${date}_${time}`;
}

// =============================================================================
// FILES
// =============================================================================

export async function ensureDir(dir: string): Promise<void> {
  await fse.ensureDir(dir);
}

/**
 * Write through a sibling temp file, fsync it, then rename over the target so
 * readers see either the old or the new contents.
 */
export async function writeFileAtomic(filePath: string, contents: string | Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;

  try {
    const handle = await fs.open(tempPath, "w");
    try {
      await handle.writeFile(contents);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fse.remove(tempPath);
    throw err;
  }
}

export async function writeJsonFileAtomic(filePath: string, value: unknown): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`);
}

const TRANSIENT_IO_CODES = new Set(["EBUSY", "EAGAIN", "EMFILE", "ENFILE"]);

export function isTransientIoError(err: unknown): boolean {
  const code = errnoCode(err);
  return code !== undefined && TRANSIENT_IO_CODES.has(code);
}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// Lock-free reads may race a writer; one retry covers the transient cases.
export async function withReadRetry<T>(read: () => Promise<T>): Promise<T> {
  try {
    return await read();
  } catch (err) {
    if (!isTransientIoError(err)) {
      throw err;
    }
    return read();
  }
}

// =============================================================================
// STRINGS
// =============================================================================

export function toPosixPath(input: string): string {
  return input.split(path.sep).join("/");
}

// Code-point order, independent of locale.
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
