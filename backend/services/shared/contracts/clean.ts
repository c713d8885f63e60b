// backend/services/shared/contracts/clean.ts

/** Strip undefined fields so wire bodies stay compact. */
export function clean<T extends Record<string, unknown>>(obj: T): T {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) if (v !== undefined) out[k] = v;
  return out as T;
}
