export interface ParameterSet {
  monthlyNewAUM: number;
  monthlyGrowthRatePct: number;
  initialSupply: number;
  feeBps: number;
  burnPct: number;
  initialPrice: number;
  liquidityDepth: number;
  observerHoldings: number;
  horizonMonths: number;
}

export interface PeriodRecord {
  month: number;
  cumulativeAUM: number;
  newAUM: number;
  revenue: number;
  tokenPrice: number;
  supply: number;
  totalTokenValue: number;
  tokensBurned: number;
  marketDepth: number;
  observerPortfolioValue: number;
}

export interface TokenomicsSimulationInput {
  monthly_new_aum_musd?: number;
  monthly_growth_rate_pct?: number;
  initial_supply?: number;
  fee_bps?: number;
  burn_pct?: number;
  initial_price?: number;
  liquidity_depth?: number;
  observer_holdings?: number;
  horizon_months?: number;
}

export interface TimeSeriesPoint {
  month: number;
  total_aum: number;
  new_aum: number;
  revenue: number;
  token_price: number;
  supply: number;
  total_token_value: number;
  tokens_burned: number;
  market_depth: number;
  portfolio_value: number;
}

export interface SimulationSummary {
  final_price: number;
  ending_supply: number;
  portfolio_start: number;
  portfolio_end: number;
  portfolio_change_pct: number;
  total_revenue: number;
  total_tokens_burned: number;
}

export interface TokenomicsSimulationResult {
  summary: SimulationSummary;
  time_series: TimeSeriesPoint[];
  params_used: ParameterSet;
  receipt: {
    engine_version: string;
    provenance_hash: string;
  };
  healthy?: boolean;
  reason?: string;
}
