import BigNumber from "bignumber.js";

export const CRITICAL_SUPPLY_THRESHOLD = 1_000_000;
export const CIRCUIT_BREAKER_DAMPENING = 0.01;

export interface TokenBurnParams {
  revenue: BigNumber;
  price: BigNumber;
  burnPct: number;
  supply: BigNumber;
}

export interface TokenBurnQuote {
  tokensBought: BigNumber;
  tokensBurned: BigNumber;
  throttled: boolean;
}

/**
 * Tokens bought back with fee revenue at the current price, and the share of
 * them burned. Below {@link CRITICAL_SUPPLY_THRESHOLD} the burn is scaled by
 * `supply / threshold * 0.01` so the supply never runs down to zero.
 */
export function computeTokenBurn(params: TokenBurnParams): TokenBurnQuote {
  const { revenue, price, burnPct, supply } = params;

  if (price.lte(0)) {
    throw new Error("price must be positive");
  }

  const tokensBought = revenue.dividedBy(price);
  let tokensBurned = tokensBought.multipliedBy(burnPct).dividedBy(100);

  const throttled = supply.lt(CRITICAL_SUPPLY_THRESHOLD);
  if (throttled) {
    const supplyFactor = supply.dividedBy(CRITICAL_SUPPLY_THRESHOLD);
    tokensBurned = tokensBurned
      .multipliedBy(supplyFactor)
      .multipliedBy(CIRCUIT_BREAKER_DAMPENING);
  }

  return {
    tokensBought,
    tokensBurned,
    throttled,
  };
}
