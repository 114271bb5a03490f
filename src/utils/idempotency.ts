import crypto from "node:crypto";

import { LRUCache } from "lru-cache";

import type { ParameterSet, TokenomicsSimulationResult } from "../types.js";

interface StoredEntry {
  value: TokenomicsSimulationResult;
  fingerprint: string;
}

export type IdempotencyLookup =
  | { status: "miss" }
  | { status: "hit"; value: TokenomicsSimulationResult }
  | { status: "conflict" };

const ttlMs = Number(process.env.IDEMPOTENCY_TTL_MS ?? 10 * 60 * 1000);
const maxEntries = Number(process.env.IDEMPOTENCY_CACHE_MAX ?? 512);

const cache = new LRUCache<string, StoredEntry>({ ttl: ttlMs, max: maxEntries });

export function fingerprintParameters(params: ParameterSet): string {
  return crypto
    .createHash("sha256")
    .update(JSON.stringify(params))
    .digest("hex");
}

export function lookupResult(
  key: string,
  fingerprint: string,
): IdempotencyLookup {
  const entry = cache.get(key);
  if (!entry) {
    return { status: "miss" };
  }
  if (entry.fingerprint !== fingerprint) {
    return { status: "conflict" };
  }
  return { status: "hit", value: entry.value };
}

export function storeResult(
  key: string,
  fingerprint: string,
  value: TokenomicsSimulationResult,
): void {
  cache.set(key, { value, fingerprint });
}

export function clearIdempotencyCache(): void {
  cache.clear();
}
