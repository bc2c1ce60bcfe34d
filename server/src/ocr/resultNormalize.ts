import type { JsonObject, RecognitionResult } from './types';

type KeyMap = ReadonlyArray<readonly [legacy: string, canonical: string]>;

export const RESULT_KEY_MAP: KeyMap = [
  ['resolvedPath', 'resolved_path'],
  ['lineCount', 'line_count'],
  ['fullText', 'full_text'],
];

export const BBOX_KEY_MAP: KeyMap = [
  ['minX', 'min_x'],
  ['minY', 'min_y'],
];

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function has(obj: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

// Returns a copy; a canonical key that is already present always wins.
export function renameKeys(source: JsonObject, map: KeyMap): JsonObject {
  const out: JsonObject = { ...source };
  for (const [legacy, canonical] of map) {
    if (!has(out, legacy) || has(out, canonical)) continue;
    out[canonical] = out[legacy];
    delete out[legacy];
  }
  return out;
}

function normalizeLine(line: JsonObject): JsonObject {
  const out: JsonObject = { ...line };
  if (isJsonObject(out.bbox)) out.bbox = renameKeys(out.bbox, BBOX_KEY_MAP);
  return out;
}

/**
 * Maps either key convention the helper may emit onto the snake_case schema.
 * Never fails: non-object entries in `lines` are dropped, every other key is
 * carried over as-is, and the input is left untouched.
 */
export function normalizeHelperPayload(payload: JsonObject): RecognitionResult {
  const normalized = renameKeys(payload, RESULT_KEY_MAP);

  const lines = normalized.lines;
  if (Array.isArray(lines)) {
    normalized.lines = lines.filter(isJsonObject).map(normalizeLine);
  }

  return normalized;
}
