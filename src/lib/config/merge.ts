/**
 * Overlay a local override document on the base desired-state document.
 *
 * - Mappings merge recursively, so a host can tweak one field of one unit
 * - null removes the key (drop a unit, or fall back to a default)
 * - Sequences and scalars replace the base value
 */

export type DocumentValue =
  | string
  | number
  | boolean
  | null
  | DocumentValue[]
  | { [key: string]: DocumentValue };

export type DocumentMap = { [key: string]: DocumentValue };

export function isDocumentMap(value: unknown): value is DocumentMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function mergeOverrides(base: DocumentMap, override: DocumentMap): DocumentMap {
  const result: DocumentMap = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === null) {
      delete result[key];
      continue;
    }

    const current = result[key];
    if (isDocumentMap(current) && isDocumentMap(value)) {
      result[key] = mergeOverrides(current, value);
      continue;
    }

    result[key] = value;
  }

  return result;
}
