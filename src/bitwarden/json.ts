import { ParseError } from './errors.js';
import { jsonObjectSchema, jsonValueSchema, type JsonObject, type JsonValue } from './types.js';

type Parsed = { ok: true; value: unknown } | { ok: false; error: unknown };

function tryParse(text: string): Parsed {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Parse JSON printed by bw.
 *
 * bw sometimes prints warnings (update notices, deprecations) on stdout
 * before the payload, so when the whole text is not JSON, parsing restarts
 * at each later line that opens an object or array until one parses.
 */
export function parseJsonOutput(stdout: string, context: string): JsonValue {
  const text = stdout.trim();
  let parsed = tryParse(text);

  if (!parsed.ok) {
    const lines = text.split(/\r?\n/);
    for (let start = 1; start < lines.length && !parsed.ok; start++) {
      if (/^\s*[[{]/.test(lines[start])) {
        const retry = tryParse(lines.slice(start).join('\n'));
        if (retry.ok) parsed = retry;
      }
    }
  }

  if (!parsed.ok) {
    // Output may contain secrets, so only its size is reported
    throw new ParseError(`Expected JSON from ${context}, got ${text.length} characters of other output`, text.length, {
      cause: parsed.error,
    });
  }

  const result = jsonValueSchema.safeParse(parsed.value);
  if (!result.success) {
    throw new ParseError(`Unexpected JSON value from ${context}`, text.length);
  }
  return result.data;
}

export function parseJsonObject(stdout: string, context: string): JsonObject {
  const value = parseJsonOutput(stdout, context);
  const result = jsonObjectSchema.safeParse(value);
  if (!result.success) {
    throw new ParseError(`Expected a JSON object from ${context}, got ${describe(value)}`, stdout.trim().length);
  }
  return result.data;
}

export function parseJsonObjectArray(stdout: string, context: string): JsonObject[] {
  const value = parseJsonOutput(stdout, context);
  if (!Array.isArray(value)) {
    throw new ParseError(`Expected a JSON array from ${context}, got ${describe(value)}`, stdout.trim().length);
  }
  return value.map((entry, index) => {
    const result = jsonObjectSchema.safeParse(entry);
    if (!result.success) {
      throw new ParseError(
        `Expected a JSON object at index ${index} from ${context}, got ${describe(entry)}`,
        stdout.trim().length,
      );
    }
    return result.data;
  });
}

function describe(value: JsonValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value === 'object' ? 'an object' : `a ${typeof value}`;
}
