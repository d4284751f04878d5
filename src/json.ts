export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return value != null && typeof value === 'object' && !Array.isArray(value);
}

export function readArray(body: unknown, key: string): unknown[] {
  if (!isJsonObject(body)) {
    return [];
  }

  const value = body[key];
  return Array.isArray(value) ? value : [];
}

export function readObject(body: unknown, key: string): JsonObject | undefined {
  if (!isJsonObject(body)) {
    return undefined;
  }

  const value = body[key];
  return isJsonObject(value) ? value : undefined;
}

export function readString(source: JsonObject, key: string, fallback = ''): string {
  const value = source[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }

  return fallback;
}

export function readBoolean(source: JsonObject, key: string, fallback = false): boolean {
  const value = source[key];
  return typeof value === 'boolean' ? value : fallback;
}

/** Returns the value when it is a scalar a table cell can hold, else the fallback. */
export function readScalar(source: JsonObject, key: string, fallback: string | number): string | number | boolean {
  const value = source[key];
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  return fallback;
}
