/**
 * A parsed configuration mapping (a YAML mapping, a JSON object, or a
 * document built in code).
 */
export type ConfigMapping = { [key: string]: unknown };

export function isMapping(value: unknown): value is ConfigMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a nested mapping, or undefined when the key is absent or holds
 * something else.
 */
export function getMapping(
  source: ConfigMapping | undefined,
  key: string,
): ConfigMapping | undefined {
  const value = source?.[key];
  return isMapping(value) ? value : undefined;
}

/**
 * Own entry of `source`, never an inherited one such as `__proto__`.
 */
export function getEntry(source: ConfigMapping, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(source, key)
    ? source[key]
    : undefined;
}

/**
 * Define `key` as an own entry. Plain assignment would route `__proto__`
 * to the prototype setter.
 */
export function setEntry(
  target: ConfigMapping,
  key: string,
  value: unknown,
): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

export function toStringList(value: unknown): string[] {
  if (typeof value === 'string') return [value];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}
