import { isDocumentMap, ownEntry, setEntry, type DocumentMap } from "../store/document.js";

/**
 * Deep merge of two documents.
 * Nested mappings merge key by key; any other overlay value (scalar, list, null)
 * replaces the base value whole. Neither input is mutated.
 */
export function mergeDocuments(base: DocumentMap, overlay: DocumentMap): DocumentMap {
  const result: DocumentMap = structuredClone(base);

  for (const [key, value] of Object.entries(overlay)) {
    const current = ownEntry(result, key);
    if (isDocumentMap(current) && isDocumentMap(value)) {
      setEntry(result, key, mergeDocuments(current, value));
    } else {
      setEntry(result, key, structuredClone(value));
    }
  }

  return result;
}
