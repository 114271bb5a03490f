import { beforeEach, describe, expect, test } from "vitest";

import app from "../src/app.js";
import { TokenomicsSimulationResultSchema } from "../src/schema.js";
import { clearIdempotencyCache } from "../src/utils/idempotency.js";
import { clearRateLimitBuckets } from "../src/utils/quota.js";

const invokePath = "/entrypoints/simulateTokenomics/invoke";

function invoke(body: unknown, headers: Record<string, string> = {}) {
  return app.request(invokePath, {
    method: "POST",
    headers: {
      "content-type": "application/json",
      ...headers,
    },
    body: JSON.stringify(body),
  });
}

interface InvokeResponse {
  output: {
    time_series: Array<{ month: number; token_price: number; supply: number }>;
    summary: { final_price: number };
    healthy?: boolean;
  };
}

describe("simulateTokenomics API", () => {
  beforeEach(() => {
    clearRateLimitBuckets();
    clearIdempotencyCache();
  });

  test("reports health", async () => {
    const response = await app.request("/health");

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      ok: true,
      name: "token-economy-sim",
      version: "1.0.0",
    });
  });

  test("lists entrypoints", async () => {
    const response = await app.request("/entrypoints");
    const body = (await response.json()) as {
      entrypoints: Array<{ key: string; path: string }>;
    };

    expect(body.entrypoints.map((entrypoint) => entrypoint.key)).toEqual([
      "simulateTokenomics",
    ]);
    expect(body.entrypoints[0].path).toBe(invokePath);
  });

  test("runs a simulation with defaults filled in", async () => {
    const response = await invoke({ input: { horizon_months: 2 } });

    expect(response.status).toBe(200);
    const body = (await response.json()) as InvokeResponse;
    expect(body.output.time_series).toHaveLength(2);
    expect(body.output.time_series[0].token_price).toBe(0.5125);
    expect(body.output.time_series[0].supply).toBe(99_975_000);
    expect(body.output.healthy).toBe(true);
    expect(TokenomicsSimulationResultSchema.safeParse(body.output).success).toBe(
      true,
    );
  });

  test("rejects out-of-range input with field names", async () => {
    const response = await invoke({ input: { initial_price: 0 } });

    expect(response.status).toBe(400);
    const body = (await response.json()) as { error: string; issues: string[] };
    expect(body.error).toBe("Invalid input");
    expect(body.issues).toHaveLength(1);
    expect(body.issues[0].startsWith("input.initial_price:")).toBe(true);
  });

  test("rejects growth rates below -100% before running", async () => {
    const response = await invoke({
      input: { monthly_growth_rate_pct: -500, horizon_months: 4 },
    });

    expect(response.status).toBe(400);
    const body = (await response.json()) as { error: string; issues: string[] };
    expect(body.issues).toHaveLength(1);
    expect(body.issues[0].startsWith("input.monthly_growth_rate_pct:")).toBe(
      true,
    );
  });

  test("rejects a body that is not JSON", async () => {
    const response = await app.request(invokePath, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "not json",
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "Request body must be JSON",
    });
  });

  test("responds 404 for unknown entrypoints", async () => {
    const response = await app.request("/entrypoints/nope/invoke", {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ input: {} }),
    });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: "Unknown entrypoint: nope",
    });
  });

  test("replays cached output for a repeated idempotency key", async () => {
    const headers = { "idempotency-key": "replay-test" };
    const first = await invoke({ input: { horizon_months: 3 } }, headers);
    const firstBody = await first.json();

    expect(first.headers.get("x-idempotent-replay")).toBeNull();

    const second = await invoke({ input: { horizon_months: 3 } }, headers);

    expect(second.status).toBe(200);
    expect(second.headers.get("x-idempotent-replay")).toBe("true");
    expect(await second.json()).toEqual(firstBody);
  });

  test("refuses to reuse an idempotency key for a different input", async () => {
    const headers = { "idempotency-key": "reused-key" };
    const first = await invoke({ input: { horizon_months: 3 } }, headers);
    expect(first.status).toBe(200);

    const second = await invoke({ input: { horizon_months: 4 } }, headers);

    expect(second.status).toBe(409);
    expect(second.headers.get("x-idempotent-replay")).toBeNull();
    expect(await second.json()).toEqual({
      output: {
        error: "Idempotency-Key was already used with a different input",
      },
    });
  });

  test("responds 429 once the client exceeds the rate limit", async () => {
    const headers = { "x-forwarded-for": "10.0.0.9" };

    for (let i = 0; i < 30; i += 1) {
      const ok = await invoke({ input: { horizon_months: 1 } }, headers);
      expect(ok.status).toBe(200);
    }

    const blocked = await invoke({ input: { horizon_months: 1 } }, headers);
    expect(blocked.status).toBe(429);
    const body = (await blocked.json()) as { error: string };
    expect(body.error).toMatch(/Rate limit exceeded/);
  });
});
