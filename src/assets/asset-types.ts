import path from "node:path";

import fse from "fs-extra";

import { ASSETS_DIR, TEMPLATES_DIR } from "../core/paths.js";

export { DEFAULT_MAX_ASSET_BYTES } from "../core/config.js";

export const ALLOWED_IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  ".png",
  ".jpg",
  ".jpeg",
  ".svg",
  ".gif",
]);
export const ALLOWED_FONT_EXTENSIONS: ReadonlySet<string> = new Set([
  ".woff",
  ".woff2",
  ".ttf",
  ".otf",
  ".eot",
]);
export const ALLOWED_OTHER_EXTENSIONS: ReadonlySet<string> = new Set([".css", ".js", ".html"]);

export const MAX_FILENAME_LENGTH = 255;

export type InferredAssetType = "image" | "font" | "css" | "misc";

export function fileExtension(filename: string): string {
  return path.extname(filename).toLowerCase();
}

export function isAllowedExtension(ext: string): boolean {
  return (
    ALLOWED_IMAGE_EXTENSIONS.has(ext) ||
    ALLOWED_FONT_EXTENSIONS.has(ext) ||
    ALLOWED_OTHER_EXTENSIONS.has(ext)
  );
}

const TYPE_DIRECTORIES: Record<string, string> = {
  logo: path.join(ASSETS_DIR, "images"),
  image: path.join(ASSETS_DIR, "images"),
  font: path.join(ASSETS_DIR, "fonts"),
  css: ASSETS_DIR,
  template: TEMPLATES_DIR,
};

// Relative to the brand directory; unknown types go to assets/misc.
export function assetDirectoryFor(assetType: string): string {
  return Object.hasOwn(TYPE_DIRECTORIES, assetType)
    ? TYPE_DIRECTORIES[assetType]
    : path.join(ASSETS_DIR, "misc");
}

// `relativePath` is posix and relative to assets/.
export function inferAssetType(relativePath: string): InferredAssetType {
  const parts = relativePath.split("/");
  if (parts.includes("images")) return "image";
  if (parts.includes("fonts")) return "font";
  if (fileExtension(relativePath) === ".css") return "css";
  return "misc";
}

// logo.png, logo_1.png, logo_2.png, ...
export async function uniqueFilename(directory: string, filename: string): Promise<string> {
  const { name, ext } = path.parse(filename);
  let candidate = filename;
  let counter = 1;

  while (await fse.pathExists(path.join(directory, candidate))) {
    candidate = `${name}_${counter}${ext}`;
    counter += 1;
  }
  return candidate;
}
