import BigNumber from "bignumber.js";

// share of market cap counted as extra depth on top of the base liquidity
export const MARKET_CAP_DEPTH_SHARE = 0.01;

export interface PriceImpactParams {
  revenue: BigNumber;
  price: BigNumber;
  supply: BigNumber;
  liquidityDepth: number;
}

export interface PriceImpactQuote {
  marketCap: BigNumber;
  dynamicDepth: BigNumber;
  priceMovePct: BigNumber;
  nextPrice: BigNumber;
}

export function getDepthAdjustedPriceImpact(
  params: PriceImpactParams,
): PriceImpactQuote {
  const { revenue, price, supply, liquidityDepth } = params;

  if (liquidityDepth <= 0) {
    throw new Error("liquidityDepth must be positive");
  }

  const marketCap = supply.multipliedBy(price);
  const dynamicDepth = new BigNumber(liquidityDepth).plus(
    marketCap.multipliedBy(MARKET_CAP_DEPTH_SHARE),
  );
  const priceMovePct = revenue.dividedBy(dynamicDepth);
  const nextPrice = price.multipliedBy(priceMovePct.plus(1));

  return {
    marketCap,
    dynamicDepth,
    priceMovePct,
    nextPrice,
  };
}
