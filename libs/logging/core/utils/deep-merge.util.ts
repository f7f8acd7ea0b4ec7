import {
  ConfigMapping,
  getEntry,
  isMapping,
  setEntry,
} from './config-mapping.util';

/**
 * Right-biased deep merge.
 *
 * Mappings present on both sides are merged recursively; any other value in
 * `override` (lists included) replaces the one in `base`. Neither input is
 * mutated, and an empty or missing override returns `base` itself.
 */
export function deepMerge(
  base: ConfigMapping,
  override?: ConfigMapping | null,
): ConfigMapping {
  if (!override || Object.keys(override).length === 0) {
    return base;
  }

  const result: ConfigMapping = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const current = getEntry(result, key);
    setEntry(
      result,
      key,
      isMapping(current) && isMapping(value) ? deepMerge(current, value) : value,
    );
  }

  return result;
}
