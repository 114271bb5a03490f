import { randomUUID } from "node:crypto";

import type { TokenomicsSimulationInput } from "../src/types.js";

const DEFAULT_ENDPOINT =
  "http://localhost:8787/entrypoints/simulateTokenomics/invoke";

const args = new Set(process.argv.slice(2));
const endpoint =
  [...args].find((arg) => arg.startsWith("http")) ?? DEFAULT_ENDPOINT;

const idempotencyKey = `sim-${randomUUID()}`;

const payload: TokenomicsSimulationInput = {
  monthly_new_aum_musd: 10,
  monthly_growth_rate_pct: 1,
  initial_supply: 100_000_000,
  fee_bps: 25,
  burn_pct: 50,
  initial_price: 0.5,
  liquidity_depth: 500_000,
  observer_holdings: 1_000_000,
  horizon_months: 24,
};

async function main() {
  console.log("Calling simulateTokenomics entrypoint");
  console.log(`   Endpoint: ${endpoint}`);
  console.log(`   Idempotency-Key: ${idempotencyKey}`);
  console.log("   Payload:");
  console.log(JSON.stringify(payload, null, 2));

  const headers: Record<string, string> = {
    "content-type": "application/json",
    "idempotency-key": idempotencyKey,
  };

  const response = await fetch(endpoint, {
    method: "POST",
    headers,
    body: JSON.stringify({ input: payload }),
  });

  const raw = await response.text();
  console.log(`\nHTTP ${response.status} ${response.statusText}`);

  if (response.status >= 400) {
    console.error("Error response:");
    try {
      console.error(JSON.stringify(JSON.parse(raw), null, 2));
    } catch {
      console.error(raw);
    }
    process.exitCode = 1;
    return;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    console.error("Failed to parse JSON response", error);
    console.log(raw);
    process.exitCode = 1;
    return;
  }

  console.log("\nSimulation result:");
  console.log(JSON.stringify(json, null, 2));

  console.log("\nReplaying request with same Idempotency-Key...");
  const replay = await fetch(endpoint, {
    method: "POST",
    headers,
    body: JSON.stringify({ input: payload }),
  });
  const replayHeader = replay.headers.get("x-idempotent-replay");
  console.log(
    `   Replay status: ${replay.status} ${replay.statusText} (X-Idempotent-Replay=${replayHeader})`,
  );
}

main().catch((error) => {
  console.error("call-simulation failed", error);
  process.exitCode = 1;
});
