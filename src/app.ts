import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { z } from "zod";

import { SIM_ENGINE_VERSION } from "./core/tokenomics.js";
import { createSimulateTokenomicsEntrypoint } from "./entrypoints/simulateTokenomics.js";
import type { EntrypointDef } from "./entrypoints/types.js";
import { formatIssues } from "./schema.js";

export const SERVICE_INFO = {
  name: "token-economy-sim",
  version: SIM_ENGINE_VERSION,
  description:
    "Deterministic monthly projection of token price, supply and revenue under fee buyback and burn",
};

const entrypoints = new Map<string, EntrypointDef>();

function addEntrypoint(entrypoint: EntrypointDef): void {
  entrypoints.set(entrypoint.key, entrypoint);
}

const simulateTokenomicsEntrypoint = createSimulateTokenomicsEntrypoint();
addEntrypoint(simulateTokenomicsEntrypoint);

const app = new Hono();

app.get("/health", (c) =>
  c.json({ ok: true, name: SERVICE_INFO.name, version: SERVICE_INFO.version }),
);

app.get("/entrypoints", (c) =>
  c.json({
    entrypoints: [...entrypoints.values()].map((entrypoint) => ({
      key: entrypoint.key,
      description: entrypoint.description,
      path: `/entrypoints/${entrypoint.key}/invoke`,
    })),
  }),
);

app.post("/entrypoints/:key/invoke", async (c) => {
  const key = c.req.param("key");
  const entrypoint = entrypoints.get(key);
  if (!entrypoint) {
    return c.json({ error: `Unknown entrypoint: ${key}` }, 404);
  }

  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return c.json({ error: "Request body must be JSON" }, 400);
  }

  const parsed = z.object({ input: entrypoint.input }).safeParse(body);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    console.warn(
      JSON.stringify({
        event: "input_rejected",
        timestamp: new Date().toISOString(),
        entrypoint: key,
        issues,
      }),
    );
    return c.json({ error: "Invalid input", issues }, 400);
  }

  const result = await entrypoint.handler({
    key,
    input: parsed.data.input,
    headers: c.req.raw.headers,
  });

  for (const [name, value] of Object.entries(result.headers ?? {})) {
    c.header(name, value);
  }

  return c.json({ output: result.output }, result.status ?? 200);
});

app.onError((error, c) => {
  if (error instanceof HTTPException) {
    return c.json({ error: error.message }, error.status);
  }

  console.error(
    JSON.stringify({
      event: "unexpected_error",
      timestamp: new Date().toISOString(),
      path: c.req.path,
      error: error.message,
    }),
  );
  return c.json({ error: "Internal server error" }, 500);
});

const start = () => {
  console.log(`${SERVICE_INFO.name} ${SERVICE_INFO.version} ready`);
  console.log(`   Entrypoints: ${[...entrypoints.keys()].join(", ")}`);
};

const appWithStart = Object.assign(app, {
  start,
  simulateTokenomicsEntrypoint,
});

export default appWithStart;
export { simulateTokenomicsEntrypoint };
