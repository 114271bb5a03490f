import { runTokenomicsSimulation } from "../core/tokenomics.js";
import {
  isBelowCriticalSupply,
  postSimulationCheck,
  preSimulationCheck,
} from "../risk/checks.js";
import { TokenomicsSimulationInputSchema, toParameterSet } from "../schema.js";
import {
  fingerprintParameters,
  lookupResult,
  storeResult,
} from "../utils/idempotency.js";
import { enforceRateLimit } from "../utils/quota.js";
import type { EntrypointDef } from "./types.js";

function debugLog(message: Record<string, unknown>): void {
  if (process.env.DEBUG_SIM !== "1") return;
  console.debug(JSON.stringify({ level: "debug", ...message }));
}

function resolveClientIp(headers: Headers): string | null {
  const ipHeader =
    headers.get("x-forwarded-for") ||
    headers.get("cf-connecting-ip") ||
    headers.get("true-client-ip") ||
    headers.get("x-real-ip") ||
    null;
  return ipHeader?.split(",")[0]?.trim() ?? null;
}

export function createSimulateTokenomicsEntrypoint(): EntrypointDef<
  typeof TokenomicsSimulationInputSchema
> {
  return {
    key: "simulateTokenomics",
    description:
      "Project token price, supply, revenue and holder value month by month",
    input: TokenomicsSimulationInputSchema,
    async handler(ctx) {
      const clientIp = resolveClientIp(ctx.headers);

      enforceRateLimit(clientIp, ctx.key);
      debugLog({ event: "request_received", key: ctx.key, clientIp });

      const params = toParameterSet(ctx.input);
      debugLog({ event: "parameters_resolved", params });

      const idempotencyKey = ctx.headers.get("idempotency-key")?.trim();
      const fingerprint = fingerprintParameters(params);
      if (idempotencyKey) {
        const cached = lookupResult(idempotencyKey, fingerprint);
        if (cached.status === "conflict") {
          console.warn(
            JSON.stringify({
              event: "idempotency_conflict",
              timestamp: new Date().toISOString(),
              key: idempotencyKey,
            }),
          );
          return {
            status: 409,
            output: {
              error: "Idempotency-Key was already used with a different input",
            },
          };
        }
        if (cached.status === "hit") {
          console.info(
            JSON.stringify({
              event: "idempotency_hit",
              timestamp: new Date().toISOString(),
              key: idempotencyKey,
            }),
          );
          return {
            output: cached.value,
            headers: { "x-idempotent-replay": "true" },
          };
        }
      }

      const pre = preSimulationCheck(params);
      if (!pre.ok) {
        console.warn(
          JSON.stringify({
            event: "parameters_rejected",
            timestamp: new Date().toISOString(),
            reasons: pre.reasons,
          }),
        );
        return {
          status: 400,
          output: { error: `Invalid request: ${pre.reasons.join(", ")}` },
        };
      }

      try {
        const { result, records } = runTokenomicsSimulation(params);

        const post = postSimulationCheck(records);
        if (!post.ok) {
          result.healthy = false;
          result.reason = post.reasons.join("; ");
          console.warn(
            JSON.stringify({
              event: "simulation_unhealthy",
              timestamp: new Date().toISOString(),
              reasons: post.reasons,
            }),
          );
        } else {
          result.healthy = true;
        }

        console.info(
          JSON.stringify({
            event: "simulation_run",
            timestamp: new Date().toISOString(),
            ip: clientIp,
            horizon_months: params.horizonMonths,
            final_price: result.summary.final_price,
            ending_supply: result.summary.ending_supply,
            portfolio_change_pct: result.summary.portfolio_change_pct,
            critical_supply_months: records.filter(isBelowCriticalSupply)
              .length,
            provenance_hash: result.receipt.provenance_hash,
            healthy: result.healthy,
          }),
        );

        if (idempotencyKey) {
          storeResult(idempotencyKey, fingerprint, result);
          console.info(
            JSON.stringify({
              event: "idempotency_store",
              timestamp: new Date().toISOString(),
              key: idempotencyKey,
            }),
          );
        }

        debugLog({
          event: "response_ready",
          idempotency: idempotencyKey ?? null,
          healthy: result.healthy,
        });

        return { output: result };
      } catch (error) {
        console.error(
          JSON.stringify({
            event: "unexpected_error",
            timestamp: new Date().toISOString(),
            error: error instanceof Error ? error.message : String(error),
          }),
        );
        return {
          status: 500,
          output: {
            error: error instanceof Error ? error.message : "Unknown error",
          },
        };
      }
    },
  };
}

export { resolveClientIp };
