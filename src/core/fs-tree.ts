import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import { compareStrings, toPosixPath } from "./utils.js";

export type TreeFile = {
  absolutePath: string;
  relativePath: string; // posix, relative to the walked root
  size: number;
  modifiedAt: Date;
};

export type TreeInventory = {
  files: TreeFile[];
  directories: string[]; // absolute, parents before children
  totalBytes: number;
};

export async function walkTree(root: string): Promise<TreeInventory> {
  const inventory: TreeInventory = { files: [], directories: [], totalBytes: 0 };
  if (!(await fse.pathExists(root))) {
    return inventory;
  }

  await walkInto(root, root, inventory);
  return inventory;
}

async function walkInto(root: string, dir: string, inventory: TreeInventory): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => compareStrings(a.name, b.name));

  for (const entry of entries) {
    const absolutePath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      inventory.directories.push(absolutePath);
      await walkInto(root, absolutePath, inventory);
      continue;
    }
    if (!entry.isFile()) continue;

    const stat = await fs.stat(absolutePath);
    inventory.files.push({
      absolutePath,
      relativePath: toPosixPath(path.relative(root, absolutePath)),
      size: stat.size,
      modifiedAt: stat.mtime,
    });
    inventory.totalBytes += stat.size;
  }
}

// Removes empty directories below root (root itself is kept), deepest first.
export async function removeEmptyDirectories(root: string): Promise<string[]> {
  const { directories } = await walkTree(root);
  const removed: string[] = [];

  for (const dir of [...directories].reverse()) {
    const remaining = await fs.readdir(dir);
    if (remaining.length === 0) {
      await fs.rmdir(dir);
      removed.push(dir);
    }
  }

  return removed;
}
