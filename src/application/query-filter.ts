import type { JsonObject, JsonValue } from '../domain/index.js';

/** Raw query parameters as Fastify's querystring parser yields them. */
export type QueryParams = Record<string, string | string[] | undefined>;

/**
 * Converts open-ended query parameters into a containment filter for
 * log data.
 *
 * Each value is parsed as JSON when it can be (`"5"` → 5, `"true"` → true,
 * `'{"a":1}'` → `{ a: 1 }`), otherwise kept as the raw string. A repeated
 * key keeps its last value. No parameters means no filter.
 *
 * Keys are not checked against any schema; an unknown key simply matches
 * nothing.
 */
export function translateQueryFilter(params: QueryParams): JsonObject | null {
  const filter: JsonObject = {};

  for (const [key, raw] of Object.entries(params)) {
    const value = Array.isArray(raw) ? raw.at(-1) : raw;
    if (value === undefined) continue;
    filter[key] = parseFilterValue(value);
  }

  return Object.keys(filter).length > 0 ? filter : null;
}

function parseFilterValue(value: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(value);
    return parsed;
  } catch {
    return value;
  }
}
