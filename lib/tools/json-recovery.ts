/**
 * Recovers a JSON object from model output that may be wrapped in code
 * fences or surrounded by prose.
 */

export type JsonObject = Record<string, unknown>;

export type Extractor = (raw: string) => string | null;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const direct: Extractor = raw => raw.trim();

const fencedBlock: Extractor = raw => {
  const match = raw.match(/```(?:json)?\s*(\{[\s\S]*\})\s*```/);
  return match ? match[1] : null;
};

const bareBraces: Extractor = raw => {
  const match = raw.match(/\{[\s\S]*\}/);
  return match ? match[0] : null;
};

export const DEFAULT_EXTRACTORS: Extractor[] = [direct, fencedBlock, bareBraces];

function tryParse(candidate: string | null): JsonObject | null {
  if (candidate === null) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Tries each extractor in order and returns the first candidate that parses
 * to a JSON object, or null.
 */
export function recoverJsonObject(raw: string, extractors: Extractor[] = DEFAULT_EXTRACTORS): JsonObject | null {
  for (const extract of extractors) {
    const parsed = tryParse(extract(raw));
    if (parsed) {
      return parsed;
    }
  }
  return null;
}

export function stringField(obj: JsonObject, key: string): string {
  const value = obj[key];
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return '';
}

export function objectArrayField(obj: JsonObject, key: string): JsonObject[] {
  const value = obj[key];
  return Array.isArray(value) ? value.filter(isJsonObject) : [];
}
