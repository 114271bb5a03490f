import { HTTPException } from "hono/http-exception";
import { LRUCache } from "lru-cache";

interface BucketState {
  count: number;
  reset: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  retryAfter: number;
}

const windowMs = Number(process.env.RATE_LIMIT_WINDOW_MS ?? 60_000);
const maxRequests = Number(process.env.RATE_LIMIT_MAX ?? 30);
const maxClients = Number(process.env.RATE_LIMIT_MAX_CLIENTS ?? 10_000);
const logBuckets = process.env.LOG_RATE_LIMIT === "1";

const buckets = new LRUCache<string, BucketState>({
  ttl: windowMs,
  max: maxClients,
});

function getKey(ip: string | null, entrypoint: string): string {
  return `${ip ?? "unknown"}:${entrypoint}`;
}

export function consumeRateLimit(
  ip: string | null,
  entrypoint: string,
  now = Date.now(),
): RateLimitDecision {
  const key = getKey(ip, entrypoint);
  const bucket = buckets.get(key);

  if (!bucket || bucket.reset <= now) {
    buckets.set(key, { count: 1, reset: now + windowMs });
    if (logBuckets) {
      console.info(
        JSON.stringify({
          event: "rate_limit_reset",
          timestamp: new Date(now).toISOString(),
          ip,
          entrypoint,
          windowMs,
          maxRequests,
        }),
      );
    }
    return { allowed: true, remaining: maxRequests - 1, retryAfter: 0 };
  }

  if (bucket.count >= maxRequests) {
    return {
      allowed: false,
      remaining: 0,
      retryAfter: Math.ceil((bucket.reset - now) / 1000),
    };
  }

  bucket.count += 1;
  if (logBuckets) {
    console.info(
      JSON.stringify({
        event: "rate_limit_increment",
        timestamp: new Date(now).toISOString(),
        ip,
        entrypoint,
        count: bucket.count,
        maxRequests,
      }),
    );
  }
  return {
    allowed: true,
    remaining: maxRequests - bucket.count,
    retryAfter: 0,
  };
}

export function enforceRateLimit(ip: string | null, entrypoint: string): void {
  const decision = consumeRateLimit(ip, entrypoint);
  if (decision.allowed) return;

  console.warn(
    JSON.stringify({
      event: "rate_limit_block",
      timestamp: new Date().toISOString(),
      ip,
      entrypoint,
      retryAfter: decision.retryAfter,
    }),
  );
  throw new HTTPException(429, {
    message: `Rate limit exceeded. Try again in ${decision.retryAfter}s`,
  });
}

export function trackedRateLimitBuckets(): number {
  return buckets.size;
}

export function clearRateLimitBuckets(): void {
  buckets.clear();
}
