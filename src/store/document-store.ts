/*
Purpose: read and write one YAML document per file for brands, templates and backups.
Assumptions: documents use the YAML core schema (no implicit timestamps), keys keep insertion order.
Usage: const doc = await loadDocument(configPath); await saveDocument(configPath, doc).
*/

import { CORE_SCHEMA, dump, load } from "js-yaml";
import fse from "fs-extra";

import { InternalError, NotFoundError, ValidationError } from "../core/errors.js";
import { errnoCode, writeFileAtomic } from "../core/utils.js";

import { toDocumentMap, type DocumentMap } from "./document.js";

// =============================================================================
// PARSING
// =============================================================================

export function parseDocument(text: string, source: string): DocumentMap {
  let raw: unknown;
  try {
    raw = load(text, { schema: CORE_SCHEMA, filename: source });
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Malformed document ${source}: ${detail}`, source, err);
  }

  if (raw === undefined || raw === null) {
    throw new ValidationError(`Malformed document ${source}: document is empty`, source);
  }

  const document = toDocumentMap(raw);
  if (!document) {
    throw new ValidationError(`Malformed document ${source}: top level must be a mapping`, source);
  }
  return document;
}

export function serializeDocument(document: DocumentMap): string {
  return dump(document, {
    schema: CORE_SCHEMA,
    noRefs: true,
    lineWidth: -1,
    sortKeys: false,
  });
}

// =============================================================================
// FILE I/O
// =============================================================================

export async function loadDocument(filePath: string): Promise<DocumentMap> {
  let text: string;
  try {
    text = await fse.readFile(filePath, "utf8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new NotFoundError(`Document not found: ${filePath}`, filePath, err);
    }
    throw err;
  }

  return parseDocument(text, filePath);
}

export async function saveDocument(filePath: string, document: DocumentMap): Promise<void> {
  let text: string;
  try {
    text = serializeDocument(document);
  } catch (err) {
    throw new InternalError(`Cannot serialize document for ${filePath}`, filePath, err);
  }
  await writeFileAtomic(filePath, text);
}

export async function documentExists(filePath: string): Promise<boolean> {
  return fse.pathExists(filePath);
}
