import type { PeriodRecord, SimulationSummary } from "../types.js";

const wholeNumber = new Intl.NumberFormat("en-US", {
  maximumFractionDigits: 0,
});

const twoDecimals = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatUsd(value: number, decimals: 0 | 2 = 0): string {
  const formatter = decimals === 2 ? twoDecimals : wholeNumber;
  const sign = value < 0 ? "-" : "";
  return `${sign}$${formatter.format(Math.abs(value))}`;
}

export function formatCount(value: number): string {
  return wholeNumber.format(value);
}

export type PeriodTableRow = Record<string, string | number>;

export function formatPeriodTable(records: PeriodRecord[]): PeriodTableRow[] {
  return records.map((record) => ({
    Month: record.month,
    "Total AUM ($)": formatUsd(record.cumulativeAUM),
    "New AUM ($)": formatUsd(record.newAUM),
    "Revenue ($)": formatUsd(record.revenue),
    "Token Price ($)": formatUsd(record.tokenPrice, 2),
    Supply: formatCount(record.supply),
    "TTV ($)": formatUsd(record.totalTokenValue),
    "Tokens Burned": formatCount(record.tokensBurned),
    "Market Depth ($)": formatUsd(record.marketDepth),
    "Portfolio Value ($)": formatUsd(record.observerPortfolioValue),
  }));
}

export function formatSummaryLines(summary: SimulationSummary): string[] {
  const change = summary.portfolio_change_pct;
  const changeLabel = `${change >= 0 ? "+" : "-"}${formatCount(Math.abs(change))}%`;

  return [
    `Target token price: ${formatUsd(summary.final_price, 2)}`,
    `Ending supply: ${formatCount(summary.ending_supply)}`,
    `Portfolio start: ${formatUsd(summary.portfolio_start)}`,
    `Portfolio end: ${formatUsd(summary.portfolio_end)} (${changeLabel})`,
  ];
}
