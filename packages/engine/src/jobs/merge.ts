/**
 * Defaults Merge
 *
 * Expands YAML merge keys (`<<: *defaults`) after parsing. Unlike the
 * parser-level merge of YAML 1.1, nested mappings are merged key by key,
 * so a task can override one credential field without restating the rest.
 *
 * @module @jobgraph/engine/jobs/merge
 */

export const MERGE_KEY = '<<';

export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Merge task-local fields over defaults.
 *
 * - a field present locally wins, otherwise the default is used
 * - when both sides hold a mapping, they are merged recursively
 * - sequences and scalars are replaced wholesale
 *
 * Neither argument is mutated.
 */
export function mergeDefaults(defaults: PlainObject, local: PlainObject): PlainObject {
  const merged: PlainObject = { ...defaults };

  for (const [key, localValue] of Object.entries(local)) {
    const defaultValue = merged[key];
    merged[key] = isPlainObject(defaultValue) && isPlainObject(localValue)
      ? mergeDefaults(defaultValue, localValue)
      : localValue;
  }

  return merged;
}

/**
 * Recursively expand merge keys in a parsed document value.
 *
 * The merge key may hold one mapping or a sequence of mappings; with a
 * sequence, earlier entries take precedence over later ones.
 *
 * @throws {TypeError} If a merge key holds anything other than mappings
 */
export function expandMergeKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(item => expandMergeKeys(item));
  }

  if (!isPlainObject(value)) {
    return value;
  }

  const local: PlainObject = {};
  for (const [key, child] of Object.entries(value)) {
    if (key !== MERGE_KEY) {
      local[key] = expandMergeKeys(child);
    }
  }

  if (!(MERGE_KEY in value)) {
    return local;
  }

  const sources = collectMergeSources(value[MERGE_KEY]);

  // Fold from the last source to the first so earlier sources win
  let defaults: PlainObject = {};
  for (let i = sources.length - 1; i >= 0; i--) {
    defaults = mergeDefaults(defaults, sources[i]);
  }

  return mergeDefaults(defaults, local);
}

function collectMergeSources(mergeValue: unknown): PlainObject[] {
  const candidates = Array.isArray(mergeValue) ? mergeValue : [mergeValue];

  return candidates.map((candidate, index) => {
    const expanded = expandMergeKeys(candidate);
    if (!isPlainObject(expanded)) {
      const where = Array.isArray(mergeValue) ? ` (entry ${index})` : '';
      throw new TypeError(`Merge key "${MERGE_KEY}" must reference a mapping${where}`);
    }
    return expanded;
  });
}
