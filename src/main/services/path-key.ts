import path from "node:path";

/**
 * Older builds persisted keys in other shapes. Each transform maps a canonical key to one of
 * those historical forms; lookups try them in this order after the canonical key.
 */
const LEGACY_KEY_FORMATS: ReadonlyArray<(canonical: string) => string> = [
  (canonical) => canonical.toLowerCase(),
  (canonical) => canonical.normalize("NFD")
];

/**
 * Stable identity for a track path: NFC-composed, `.`/`..` segments folded, no trailing
 * separator. Case is preserved. Never throws; the empty path maps to the empty key.
 */
export function canonicalKey(filePath: string): string {
  if (typeof filePath !== "string" || filePath.length === 0) {
    return "";
  }

  let normalized = path.normalize(filePath.normalize("NFC"));
  while (normalized.length > 1 && normalized.endsWith(path.sep)) {
    normalized = normalized.slice(0, -1);
  }
  return normalized;
}

export function legacyKeys(filePath: string): string[] {
  const canonical = canonicalKey(filePath);
  return LEGACY_KEY_FORMATS.map((transform) => transform(canonical));
}

/** Canonical key first, then legacy variants, without duplicates. */
export function lookupKeys(filePath: string): string[] {
  const canonical = canonicalKey(filePath);
  const keys = [canonical];
  for (const transform of LEGACY_KEY_FORMATS) {
    const variant = transform(canonical);
    if (!keys.includes(variant)) {
      keys.push(variant);
    }
  }
  return keys;
}

export interface KeyedLookup<T> {
  value: T;
  matchedKey: string;
  canonical: string;
  /** True when the hit came from a legacy key and the entry should be rewritten. */
  needsMigration: boolean;
}

/**
 * Two-phase lookup: canonical key, then each legacy variant in priority order.
 * Pure; callers decide whether to apply the migration.
 */
export function findByLookupKeys<T>(map: ReadonlyMap<string, T>, filePath: string): KeyedLookup<T> | null {
  const keys = lookupKeys(filePath);
  const canonical = keys[0] ?? "";

  for (const key of keys) {
    const value = map.get(key);
    if (value !== undefined) {
      return {
        value,
        matchedKey: key,
        canonical,
        needsMigration: key !== canonical
      };
    }
  }

  return null;
}

/** Moves a legacy-keyed entry onto its canonical key. Returns whether the map changed. */
export function migrateLookupHit<T>(map: Map<string, T>, hit: KeyedLookup<T>): boolean {
  if (!hit.needsMigration) {
    return false;
  }
  map.delete(hit.matchedKey);
  map.set(hit.canonical, hit.value);
  return true;
}

/** Removes the canonical and every legacy variant of a path. */
export function deleteKeyVariants<T>(map: Map<string, T>, filePath: string): boolean {
  let removed = false;
  for (const key of lookupKeys(filePath)) {
    if (map.delete(key)) {
      removed = true;
    }
  }
  return removed;
}
