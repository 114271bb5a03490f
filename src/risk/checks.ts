import { CRITICAL_SUPPLY_THRESHOLD } from "../models/burn.js";
import { formatIssues, ParameterSetSchema } from "../schema.js";
import type { ParameterSet, PeriodRecord } from "../types.js";

export interface CheckResult {
  ok: boolean;
  reasons: string[];
}

const MAX_REPRESENTABLE_LOG10 = Math.log10(Number.MAX_VALUE);

export function preSimulationCheck(params: ParameterSet): CheckResult {
  const parsed = ParameterSetSchema.safeParse(params);
  if (!parsed.success) {
    return { ok: false, reasons: formatIssues(parsed.error) };
  }

  const reasons: string[] = [];
  const { monthlyNewAUM, monthlyGrowthRatePct, horizonMonths } = parsed.data;

  if (monthlyNewAUM > 0) {
    const finalNewAumLog10 =
      Math.log10(monthlyNewAUM) +
      horizonMonths * Math.log10(1 + monthlyGrowthRatePct / 100);
    if (finalNewAumLog10 >= MAX_REPRESENTABLE_LOG10) {
      reasons.push(
        `monthlyGrowthRatePct ${monthlyGrowthRatePct} compounds new AUM past the representable range within ${horizonMonths} months`,
      );
    }
  }

  return {
    ok: reasons.length === 0,
    reasons,
  };
}

export function postSimulationCheck(records: PeriodRecord[]): CheckResult {
  const reasons: string[] = [];

  for (const record of records) {
    const nonFinite = Object.entries(record)
      .filter(([, value]) => !Number.isFinite(value))
      .map(([field]) => field);

    if (nonFinite.length > 0) {
      reasons.push(
        `month ${record.month}: non-finite ${nonFinite.join(", ")}`,
      );
      continue;
    }

    if (record.supply < 0) {
      reasons.push(`month ${record.month}: supply ${record.supply} is negative`);
    }

    if (record.tokenPrice <= 0) {
      reasons.push(
        `month ${record.month}: token price ${record.tokenPrice} is not positive`,
      );
    }
  }

  return {
    ok: reasons.length === 0,
    reasons,
  };
}

export function isBelowCriticalSupply(record: PeriodRecord): boolean {
  return record.supply < CRITICAL_SUPPLY_THRESHOLD;
}
