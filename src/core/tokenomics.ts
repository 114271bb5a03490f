import crypto from "node:crypto";

import BigNumber from "bignumber.js";

import { computeTokenBurn } from "../models/burn.js";
import { getDepthAdjustedPriceImpact } from "../models/priceImpact.js";
import type {
  ParameterSet,
  PeriodRecord,
  SimulationSummary,
  TimeSeriesPoint,
  TokenomicsSimulationResult,
} from "../types.js";

const BPS_DENOMINATOR = 10_000;

export const SIM_ENGINE_VERSION = "1.0.0";

export interface EngineState {
  currentSupply: BigNumber;
  currentPrice: BigNumber;
  cumulativeAUM: BigNumber;
  pendingNewAUM: BigNumber;
}

export interface SimulationArtifacts {
  result: TokenomicsSimulationResult;
  records: PeriodRecord[];
}

const REPORTED_SIGNIFICANT_DIGITS = 15;

function bigToNumber(value: BigNumber): number {
  return value
    .precision(REPORTED_SIGNIFICANT_DIGITS, BigNumber.ROUND_HALF_UP)
    .toNumber();
}

export function createInitialState(params: ParameterSet): EngineState {
  return {
    currentSupply: new BigNumber(params.initialSupply),
    currentPrice: new BigNumber(params.initialPrice),
    cumulativeAUM: new BigNumber(0),
    pendingNewAUM: new BigNumber(params.monthlyNewAUM),
  };
}

/**
 * One month of the model. Revenue is earned on new AUM only; the price move
 * is computed from the supply and price at the start of the month, before
 * the burn lands.
 */
export function advancePeriod(
  state: EngineState,
  params: ParameterSet,
  month: number,
): { state: EngineState; record: PeriodRecord } {
  const newAUM = state.pendingNewAUM;
  const cumulativeAUM = state.cumulativeAUM.plus(newAUM);

  const revenue = newAUM.multipliedBy(params.feeBps).dividedBy(BPS_DENOMINATOR);

  const burn = computeTokenBurn({
    revenue,
    price: state.currentPrice,
    burnPct: params.burnPct,
    supply: state.currentSupply,
  });

  const impact = getDepthAdjustedPriceImpact({
    revenue,
    price: state.currentPrice,
    supply: state.currentSupply,
    liquidityDepth: params.liquidityDepth,
  });

  const remaining = state.currentSupply.minus(burn.tokensBurned);
  const currentSupply = remaining.isNegative() ? new BigNumber(0) : remaining;
  const currentPrice = impact.nextPrice;

  const pendingNewAUM = newAUM.multipliedBy(
    new BigNumber(params.monthlyGrowthRatePct).dividedBy(100).plus(1),
  );

  const next: EngineState = {
    currentSupply,
    currentPrice,
    cumulativeAUM,
    pendingNewAUM,
  };

  const record: PeriodRecord = {
    month,
    cumulativeAUM: bigToNumber(cumulativeAUM),
    newAUM: bigToNumber(pendingNewAUM),
    revenue: bigToNumber(revenue),
    tokenPrice: bigToNumber(currentPrice),
    supply: bigToNumber(currentSupply),
    totalTokenValue: bigToNumber(currentSupply.multipliedBy(currentPrice)),
    tokensBurned: bigToNumber(burn.tokensBurned),
    marketDepth: bigToNumber(impact.dynamicDepth),
    observerPortfolioValue: bigToNumber(
      currentPrice.multipliedBy(params.observerHoldings),
    ),
  };

  return { state: next, record };
}

export function simulateTokenomics(params: ParameterSet): PeriodRecord[] {
  const records: PeriodRecord[] = [];
  let state = createInitialState(params);

  for (let month = 1; month <= params.horizonMonths; month += 1) {
    const step = advancePeriod(state, params, month);
    state = step.state;
    records.push(step.record);
  }

  return records;
}

export function summarizeSimulation(
  params: ParameterSet,
  records: PeriodRecord[],
): SimulationSummary {
  const last = records[records.length - 1];
  const finalPrice = last?.tokenPrice ?? params.initialPrice;
  const endingSupply = last?.supply ?? params.initialSupply;

  const portfolioStart = new BigNumber(params.observerHoldings).multipliedBy(
    params.initialPrice,
  );
  const portfolioEnd = new BigNumber(params.observerHoldings).multipliedBy(
    finalPrice,
  );
  const changePct = portfolioStart.isZero()
    ? new BigNumber(0)
    : portfolioEnd
        .minus(portfolioStart)
        .dividedBy(portfolioStart)
        .multipliedBy(100);

  const totalRevenue = records.reduce(
    (acc, record) => acc.plus(record.revenue),
    new BigNumber(0),
  );
  const totalBurned = records.reduce(
    (acc, record) => acc.plus(record.tokensBurned),
    new BigNumber(0),
  );

  return {
    final_price: finalPrice,
    ending_supply: endingSupply,
    portfolio_start: bigToNumber(portfolioStart),
    portfolio_end: bigToNumber(portfolioEnd),
    portfolio_change_pct: bigToNumber(changePct),
    total_revenue: bigToNumber(totalRevenue),
    total_tokens_burned: bigToNumber(totalBurned),
  };
}

export function toTimeSeriesPoint(record: PeriodRecord): TimeSeriesPoint {
  return {
    month: record.month,
    total_aum: record.cumulativeAUM,
    new_aum: record.newAUM,
    revenue: record.revenue,
    token_price: record.tokenPrice,
    supply: record.supply,
    total_token_value: record.totalTokenValue,
    tokens_burned: record.tokensBurned,
    market_depth: record.marketDepth,
    portfolio_value: record.observerPortfolioValue,
  };
}

export function runTokenomicsSimulation(
  params: ParameterSet,
): SimulationArtifacts {
  const records = simulateTokenomics(params);
  const timeSeries = records.map(toTimeSeriesPoint);
  const summary = summarizeSimulation(params, records);

  const provenancePayload = {
    version: SIM_ENGINE_VERSION,
    params,
    time_series: timeSeries,
  };

  const provenance_hash = crypto
    .createHash("sha256")
    .update(JSON.stringify(provenancePayload))
    .digest("hex");

  const result: TokenomicsSimulationResult = {
    summary,
    time_series: timeSeries,
    params_used: { ...params },
    receipt: {
      engine_version: SIM_ENGINE_VERSION,
      provenance_hash,
    },
  };

  return { result, records };
}
