import { serve } from "@hono/node-server";

import app from "../src/app.js";

const args = new Set(process.argv.slice(2));
const debugEnabled = args.has("--debug");

if (debugEnabled) {
  process.env.DEBUG_SIM = "1";
}

const port = Number(process.env.PORT) || 8787;
const windowMs = Number(process.env.RATE_LIMIT_WINDOW_MS ?? 60_000);
const maxRequests = Number(process.env.RATE_LIMIT_MAX ?? 30);

console.log("Starting token economy simulator");
console.log(`   Rate limit: ${maxRequests}/${windowMs}ms`);
console.log(`   Debug logging: ${debugEnabled ? "enabled" : "disabled"}`);

app.start();

console.log(`   Listening on http://localhost:${port}`);

serve({ fetch: app.fetch, port });
