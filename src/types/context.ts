/**
 * JSON-shaped values threaded through plans and tool calls
 */

export type ContextValue =
  | string
  | number
  | boolean
  | null
  | ContextValue[]
  | { [key: string]: ContextValue };

export type ContextMap = { [key: string]: ContextValue };

export function isContextMap(value: unknown): value is ContextMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Store an entry as an own property. Plain assignment would treat a key such
 * as "__proto__" as a prototype change and drop the value.
 */
export function setContextEntry(map: ContextMap, key: string, value: ContextValue): void {
  Object.defineProperty(map, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Narrow an arbitrary value (e.g. parsed JSON) to a ContextValue.
 * Returns undefined for functions, symbols, bigints, undefined and non-finite numbers.
 */
export function toContextValue(value: unknown): ContextValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (Array.isArray(value)) {
    const items: ContextValue[] = [];
    for (const item of value) {
      const converted = toContextValue(item);
      if (converted === undefined) {
        return undefined;
      }
      items.push(converted);
    }
    return items;
  }
  if (typeof value === 'object') {
    const map: ContextMap = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry === undefined) {
        continue;
      }
      const converted = toContextValue(entry);
      if (converted === undefined) {
        return undefined;
      }
      setContextEntry(map, key, converted);
    }
    return map;
  }
  return undefined;
}

/**
 * Deep copy so the copy shares no mutable storage with the source
 */
export function cloneContext(context: ContextMap): ContextMap {
  return structuredClone(context);
}
