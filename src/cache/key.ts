import { createHash } from "node:crypto";

export type CacheParams = Record<string, unknown>;

/**
 * Sort object keys recursively so logically equal params serialize identically.
 */
export function canonicalize(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }

  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    const entry: unknown = Reflect.get(value, key);
    if (entry === undefined) continue;
    sorted[key] = canonicalize(entry);
  }
  return sorted;
}

/** SHA-256 of the canonical `{namespace, params}` document. */
export function cacheKey(namespace: string, params: CacheParams): string {
  const raw = JSON.stringify(canonicalize({ namespace, params }));
  return createHash("sha256").update(raw).digest("hex");
}
