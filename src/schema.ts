import { z } from "zod";

import type { ParameterSet } from "./types.js";

export const MAX_HORIZON_MONTHS = 600;
// new AUM shrinks to zero at -100% and would turn negative below it
export const MIN_GROWTH_RATE_PCT = -100;

export const DEFAULT_SIMULATION_INPUT = {
  monthly_new_aum_musd: 10,
  monthly_growth_rate_pct: 1,
  initial_supply: 100_000_000,
  fee_bps: 25,
  burn_pct: 50,
  initial_price: 0.5,
  liquidity_depth: 500_000,
  observer_holdings: 1_000_000,
  horizon_months: 24,
} as const;

const finite = () => z.number().finite();

export const ParameterSetSchema = z.object({
  monthlyNewAUM: finite().nonnegative(),
  monthlyGrowthRatePct: finite().min(MIN_GROWTH_RATE_PCT),
  initialSupply: finite().positive(),
  feeBps: finite().min(0).max(10_000),
  burnPct: finite().min(0).max(100),
  initialPrice: finite().positive(),
  liquidityDepth: finite().positive(),
  observerHoldings: finite().nonnegative(),
  horizonMonths: z.number().int().positive().max(MAX_HORIZON_MONTHS),
});

export const TokenomicsSimulationInputSchema = z
  .object({
    monthly_new_aum_musd: finite().nonnegative().optional(),
    monthly_growth_rate_pct: finite().min(MIN_GROWTH_RATE_PCT).optional(),
    initial_supply: finite().positive().optional(),
    fee_bps: finite().min(0).max(10_000).optional(),
    burn_pct: finite().min(0).max(100).optional(),
    initial_price: finite().positive().optional(),
    liquidity_depth: finite().positive().optional(),
    observer_holdings: finite().nonnegative().optional(),
    horizon_months: z
      .number()
      .int()
      .positive()
      .max(MAX_HORIZON_MONTHS)
      .optional(),
  })
  .strict();

export type TokenomicsSimulationInputValidated = z.infer<
  typeof TokenomicsSimulationInputSchema
>;

const TimeSeriesPointSchema = z.object({
  month: z.number().int().positive(),
  total_aum: z.number(),
  new_aum: z.number(),
  revenue: z.number(),
  token_price: z.number(),
  supply: z.number(),
  total_token_value: z.number(),
  tokens_burned: z.number(),
  market_depth: z.number(),
  portfolio_value: z.number(),
});

export const TokenomicsSimulationResultSchema = z.object({
  summary: z.object({
    final_price: z.number(),
    ending_supply: z.number(),
    portfolio_start: z.number(),
    portfolio_end: z.number(),
    portfolio_change_pct: z.number(),
    total_revenue: z.number(),
    total_tokens_burned: z.number(),
  }),
  time_series: z.array(TimeSeriesPointSchema),
  params_used: ParameterSetSchema,
  receipt: z.object({
    engine_version: z.string().min(1),
    provenance_hash: z.string().min(1),
  }),
  healthy: z.boolean().optional(),
  reason: z.string().optional(),
});

export class InvalidParameterError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid parameters: ${issues.join("; ")}`);
    this.name = "InvalidParameterError";
    this.issues = issues;
  }
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.join(".") || "input";
    return `${field}: ${issue.message}`;
  });
}

export function parseParameterSet(raw: unknown): ParameterSet {
  const parsed = ParameterSetSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidParameterError(formatIssues(parsed.error));
  }
  return parsed.data;
}

export function toParameterSet(
  input: TokenomicsSimulationInputValidated,
): ParameterSet {
  const defaults = DEFAULT_SIMULATION_INPUT;
  const newAumMillions =
    input.monthly_new_aum_musd ?? defaults.monthly_new_aum_musd;

  return {
    monthlyNewAUM: newAumMillions * 1_000_000,
    monthlyGrowthRatePct:
      input.monthly_growth_rate_pct ?? defaults.monthly_growth_rate_pct,
    initialSupply: input.initial_supply ?? defaults.initial_supply,
    feeBps: input.fee_bps ?? defaults.fee_bps,
    burnPct: input.burn_pct ?? defaults.burn_pct,
    initialPrice: input.initial_price ?? defaults.initial_price,
    liquidityDepth: input.liquidity_depth ?? defaults.liquidity_depth,
    observerHoldings: input.observer_holdings ?? defaults.observer_holdings,
    horizonMonths: input.horizon_months ?? defaults.horizon_months,
  };
}
