import { formatIssues, TokenomicsSimulationInputSchema } from "../schema.js";
import type { TokenomicsSimulationInputValidated } from "../schema.js";

export interface SimulateCliOptions {
  input: TokenomicsSimulationInputValidated;
  json: boolean;
}

export type SimulateCliParse =
  | { ok: true; options: SimulateCliOptions }
  | { ok: false; issues: string[] };

/**
 * Parses `--field=value` flags named after the wire input fields, e.g.
 * `--fee_bps=40 --horizon_months=36`. `--json` switches output to JSON.
 */
export function parseSimulateArgs(argv: string[]): SimulateCliParse {
  const raw: Record<string, number> = {};
  const issues: string[] = [];
  let json = false;

  for (const arg of argv) {
    if (arg === "--json") {
      json = true;
      continue;
    }

    const match = /^--([a-z_]+)=(.*)$/.exec(arg);
    if (!match) {
      issues.push(`${arg}: expected --<field>=<number>`);
      continue;
    }

    const [, field, value] = match;
    const parsed = Number(value);
    if (value.trim() === "" || Number.isNaN(parsed)) {
      issues.push(`${field}: "${value}" is not a number`);
      continue;
    }
    raw[field] = parsed;
  }

  const validated = TokenomicsSimulationInputSchema.safeParse(raw);
  if (!validated.success) {
    issues.push(...formatIssues(validated.error));
  }

  if (issues.length > 0 || !validated.success) {
    return { ok: false, issues };
  }

  return { ok: true, options: { input: validated.data, json } };
}
