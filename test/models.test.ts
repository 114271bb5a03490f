import BigNumber from "bignumber.js";
import { describe, expect, test } from "vitest";

import {
  CIRCUIT_BREAKER_DAMPENING,
  CRITICAL_SUPPLY_THRESHOLD,
  computeTokenBurn,
} from "../src/models/burn.js";
import { getDepthAdjustedPriceImpact } from "../src/models/priceImpact.js";

describe("token burn model", () => {
  test("burns the configured share of bought-back tokens", () => {
    const quote = computeTokenBurn({
      revenue: new BigNumber(25_000),
      price: new BigNumber(0.5),
      burnPct: 50,
      supply: new BigNumber(100_000_000),
    });

    expect(quote.tokensBought.toNumber()).toBe(50_000);
    expect(quote.tokensBurned.toNumber()).toBe(25_000);
    expect(quote.throttled).toBe(false);
  });

  test("scales the burn linearly with supply below the threshold", () => {
    const quote = computeTokenBurn({
      revenue: new BigNumber(4_000),
      price: new BigNumber(2),
      burnPct: 25,
      supply: new BigNumber(250_000),
    });

    // 2,000 bought, 500 burned before the breaker
    expect(quote.tokensBought.toNumber()).toBe(2_000);
    expect(quote.tokensBurned.toNumber()).toBe(1.25);
    expect(quote.throttled).toBe(true);
  });

  test("leaves supply exactly at the threshold unthrottled", () => {
    const quote = computeTokenBurn({
      revenue: new BigNumber(1_000),
      price: new BigNumber(1),
      burnPct: 100,
      supply: new BigNumber(CRITICAL_SUPPLY_THRESHOLD),
    });

    expect(quote.throttled).toBe(false);
    expect(quote.tokensBurned.toNumber()).toBe(1_000);
    expect(CIRCUIT_BREAKER_DAMPENING).toBe(0.01);
  });

  test("rejects a non-positive price", () => {
    expect(() =>
      computeTokenBurn({
        revenue: new BigNumber(1),
        price: new BigNumber(0),
        burnPct: 50,
        supply: new BigNumber(1),
      }),
    ).toThrowError("price must be positive");
  });
});

describe("depth-adjusted price impact", () => {
  test("adds one percent of market cap to the base depth", () => {
    const quote = getDepthAdjustedPriceImpact({
      revenue: new BigNumber(25_000),
      price: new BigNumber(0.5),
      supply: new BigNumber(100_000_000),
      liquidityDepth: 500_000,
    });

    expect(quote.marketCap.toNumber()).toBe(50_000_000);
    expect(quote.dynamicDepth.toNumber()).toBe(1_000_000);
    expect(quote.priceMovePct.toNumber()).toBe(0.025);
    expect(quote.nextPrice.toNumber()).toBe(0.5125);
  });

  test("leaves the price unchanged without revenue", () => {
    const quote = getDepthAdjustedPriceImpact({
      revenue: new BigNumber(0),
      price: new BigNumber(3),
      supply: new BigNumber(1_000),
      liquidityDepth: 10,
    });

    expect(quote.priceMovePct.toNumber()).toBe(0);
    expect(quote.nextPrice.toNumber()).toBe(3);
  });

  test("rejects non-positive liquidity depth", () => {
    expect(() =>
      getDepthAdjustedPriceImpact({
        revenue: new BigNumber(1),
        price: new BigNumber(1),
        supply: new BigNumber(1),
        liquidityDepth: 0,
      }),
    ).toThrowError("liquidityDepth must be positive");
  });
});
