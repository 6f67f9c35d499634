export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export function parseJson(input: Uint8Array | string): JsonValue {
  const s = typeof input === 'string' ? input : Buffer.from(input).toString('utf8');
  return JSON.parse(s);
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Own-property lookup; never walks the prototype chain */
export function getField(obj: JsonObject, name: string): JsonValue | undefined {
  return Object.prototype.hasOwnProperty.call(obj, name) ? obj[name] : undefined;
}
