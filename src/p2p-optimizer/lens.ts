import { BigNumber, constants } from "ethers";

import { PercentMath, WadRayMath } from "@morpho-labs/ethers-utils/lib/maths";
import { minBN } from "@morpho-labs/ethers-utils/lib/utils";

import { ValidationError } from "./errors";
import { getProportionIdle } from "./interestRates";
import { P2POptimizer } from "./optimizer";
import { P2PRateComputeParams } from "./types";
import { getWeightedAvg, getWeightedRate, zeroFloorSub } from "./utils";

const marketState = (optimizer: P2POptimizer, underlying: string) => {
  const market = optimizer.market(underlying);
  if (!market) throw new ValidationError("MarketNotCreated", underlying);

  return {
    market,
    indexes: optimizer.updatedIndexes(underlying),
    totals: optimizer.scaledTotals(underlying),
  };
};

/** Converts an amount of `underlying` to the oracle's base currency. */
const toBaseCurrency = (optimizer: P2POptimizer, underlying: string, amount: BigNumber) => {
  const { price, tokenUnit } = optimizer.assetLiquidityData(underlying);

  return amount.mul(price).div(tokenUnit);
};

/**
 * This function get the total supply over one of the markets and returns the result.
 *
 * @param underlying The address of the market's underlying asset.
 * @returns The P2P amount (net of delta and idle supply), the pool amount (collateral and supply
 * delta included), the idle supply amount and the total supply amount of this market, in
 * underlying.
 */
export const getTotalMarketSupply = (optimizer: P2POptimizer, underlying: string) => {
  const { market, indexes, totals } = marketState(optimizer, underlying);

  const p2pSupplyAmount = zeroFloorSub(
    zeroFloorSub(
      WadRayMath.rayMul(market.deltas.supply.scaledP2PTotal, indexes.supply.p2pIndex),
      WadRayMath.rayMul(market.deltas.supply.scaledDelta, indexes.supply.poolIndex)
    ),
    market.idleSupply
  );
  const poolSupplyAmount = WadRayMath.rayMul(
    totals.poolSupply.add(totals.collateral).add(market.deltas.supply.scaledDelta),
    indexes.supply.poolIndex
  );
  const idleSupply = market.idleSupply;

  return {
    p2pSupplyAmount,
    poolSupplyAmount,
    idleSupply,
    totalSupplyAmount: p2pSupplyAmount.add(poolSupplyAmount).add(idleSupply),
  };
};

/**
 * This function get the total borrow over one of the markets and returns the result.
 *
 * @param underlying The address of the market's underlying asset.
 * @returns The P2P amount (net of delta), the pool amount (borrow delta included) and the total
 * borrow amount of this market, in underlying.
 */
export const getTotalMarketBorrow = (optimizer: P2POptimizer, underlying: string) => {
  const { market, indexes, totals } = marketState(optimizer, underlying);

  const p2pBorrowAmount = zeroFloorSub(
    WadRayMath.rayMul(market.deltas.borrow.scaledP2PTotal, indexes.borrow.p2pIndex),
    WadRayMath.rayMul(market.deltas.borrow.scaledDelta, indexes.borrow.poolIndex)
  );
  const poolBorrowAmount = WadRayMath.rayMul(
    totals.poolBorrow.add(market.deltas.borrow.scaledDelta),
    indexes.borrow.poolIndex
  );

  return {
    p2pBorrowAmount,
    poolBorrowAmount,
    totalBorrowAmount: p2pBorrowAmount.add(poolBorrowAmount),
  };
};

/**
 * This function retrieve the total supply over all the markets and returns the result.
 *
 * @returns The P2P amount, the pool amount, the idle supply amount and the total supply amount,
 * in base currency.
 */
export const getTotalSupply = (optimizer: P2POptimizer) => {
  let p2pSupplyAmount = constants.Zero;
  let poolSupplyAmount = constants.Zero;
  let idleSupply = constants.Zero;

  for (const underlying of optimizer.marketsCreated) {
    const market = getTotalMarketSupply(optimizer, underlying);

    p2pSupplyAmount = p2pSupplyAmount.add(
      toBaseCurrency(optimizer, underlying, market.p2pSupplyAmount)
    );
    poolSupplyAmount = poolSupplyAmount.add(
      toBaseCurrency(optimizer, underlying, market.poolSupplyAmount)
    );
    idleSupply = idleSupply.add(toBaseCurrency(optimizer, underlying, market.idleSupply));
  }

  return {
    p2pSupplyAmount,
    poolSupplyAmount,
    idleSupply,
    totalSupplyAmount: p2pSupplyAmount.add(poolSupplyAmount).add(idleSupply),
  };
};

/**
 * This function retrieve the total borrow over all the markets and returns the result.
 *
 * @returns The P2P amount, the pool amount and the total borrow amount, in base currency.
 */
export const getTotalBorrow = (optimizer: P2POptimizer) => {
  let p2pBorrowAmount = constants.Zero;
  let poolBorrowAmount = constants.Zero;

  for (const underlying of optimizer.marketsCreated) {
    const market = getTotalMarketBorrow(optimizer, underlying);

    p2pBorrowAmount = p2pBorrowAmount.add(
      toBaseCurrency(optimizer, underlying, market.p2pBorrowAmount)
    );
    poolBorrowAmount = poolBorrowAmount.add(
      toBaseCurrency(optimizer, underlying, market.poolBorrowAmount)
    );
  }

  return {
    p2pBorrowAmount,
    poolBorrowAmount,
    totalBorrowAmount: p2pBorrowAmount.add(poolBorrowAmount),
  };
};

/**
 * This function retrieves the matchable supply of a given user and returns the result.
 *
 * @param underlying The market to retrieve the supplied liquidity.
 * @param user The user address.
 * @returns The P2P amount, the pool amount and the total supply amount of this user, in underlying.
 */
export const getCurrentSupplyBalanceInOf = (
  optimizer: P2POptimizer,
  underlying: string,
  user: string
) => {
  const { indexes } = marketState(optimizer, underlying);
  const { scaledP2PSupply, scaledPoolSupply } = optimizer.balanceOf(underlying, user);

  const balanceInP2P = WadRayMath.rayMul(scaledP2PSupply, indexes.supply.p2pIndex);
  const balanceOnPool = WadRayMath.rayMul(scaledPoolSupply, indexes.supply.poolIndex);

  return { balanceInP2P, balanceOnPool, totalBalance: balanceInP2P.add(balanceOnPool) };
};

/**
 * This function retrieves the collateral of a given user, which is never matched, and returns the
 * result.
 *
 * @param underlying The market to retrieve the collateral.
 * @param user The user address.
 * @returns The collateral amount deposited on this market, in underlying.
 */
export const getCurrentCollateralBalanceInOf = (
  optimizer: P2POptimizer,
  underlying: string,
  user: string
) => {
  const { indexes } = marketState(optimizer, underlying);

  return WadRayMath.rayMul(
    optimizer.balanceOf(underlying, user).scaledCollateral,
    indexes.supply.poolIndex
  );
};

/**
 * This function retrieves the borrow of a given user and returns the result.
 *
 * @param underlying The market to retrieve the borrowed liquidity.
 * @param user The user address.
 * @returns The P2P amount, the pool amount and the total borrow amount of this user, in underlying.
 */
export const getCurrentBorrowBalanceInOf = (
  optimizer: P2POptimizer,
  underlying: string,
  user: string
) => {
  const { indexes } = marketState(optimizer, underlying);
  const { scaledP2PBorrow, scaledPoolBorrow } = optimizer.balanceOf(underlying, user);

  const balanceInP2P = WadRayMath.rayMul(scaledP2PBorrow, indexes.borrow.p2pIndex);
  const balanceOnPool = WadRayMath.rayMul(scaledPoolBorrow, indexes.borrow.poolIndex);

  return { balanceInP2P, balanceOnPool, totalBalance: balanceInP2P.add(balanceOnPool) };
};

// The part of the P2P amount that is actually delta. Delta and idle shares together stay below one.
const shareOfTheDelta = (params: P2PRateComputeParams) =>
  minBN(
    WadRayMath.rayDiv(
      WadRayMath.rayMul(params.p2pDelta, params.poolIndex),
      WadRayMath.rayMul(params.p2pAmount, params.p2pIndex)
    ),
    WadRayMath.RAY.sub(params.proportionIdle)
  );

/**
 * This function compute the P2P supply rate and returns the result.
 *
 * @param params The parameters inheriting of the P2PRateComputeParams interface allowing the computation.
 * @returns The p2p supply rate per year, in ray.
 */
export const getP2PSupplyRate = (params: P2PRateComputeParams) => {
  let p2pSupplyRate: BigNumber;
  if (params.poolSupplyRatePerYear.gt(params.poolBorrowRatePerYear)) {
    p2pSupplyRate = params.poolBorrowRatePerYear;
  } else {
    const p2pRate = getWeightedAvg(
      params.poolSupplyRatePerYear,
      params.poolBorrowRatePerYear,
      params.p2pIndexCursor
    );

    p2pSupplyRate = p2pRate.sub(
      PercentMath.percentMul(p2pRate.sub(params.poolSupplyRatePerYear), params.reserveFactor)
    );
  }

  if ((params.p2pDelta.gt(0) || params.proportionIdle.gt(0)) && params.p2pAmount.gt(0)) {
    const share = shareOfTheDelta(params);

    p2pSupplyRate = WadRayMath.rayMul(
      p2pSupplyRate,
      WadRayMath.RAY.sub(share).sub(params.proportionIdle)
    ).add(WadRayMath.rayMul(params.poolSupplyRatePerYear, share));
  }

  return p2pSupplyRate;
};

/**
 * This function compute the P2P borrow rate and returns the result.
 *
 * @param params The parameters inheriting of the P2PRateComputeParams interface allowing the computation.
 * @returns The p2p borrow rate per year, in ray.
 */
export const getP2PBorrowRate = (params: P2PRateComputeParams) => {
  let p2pBorrowRate: BigNumber;
  if (params.poolSupplyRatePerYear.gt(params.poolBorrowRatePerYear)) {
    p2pBorrowRate = params.poolBorrowRatePerYear;
  } else {
    const p2pRate = getWeightedAvg(
      params.poolSupplyRatePerYear,
      params.poolBorrowRatePerYear,
      params.p2pIndexCursor
    );

    p2pBorrowRate = p2pRate.add(
      PercentMath.percentMul(params.poolBorrowRatePerYear.sub(p2pRate), params.reserveFactor)
    );
  }

  if (params.p2pDelta.gt(0) && params.p2pAmount.gt(0)) {
    const share = shareOfTheDelta(params);

    p2pBorrowRate = WadRayMath.rayMul(p2pBorrowRate, WadRayMath.RAY.sub(share)).add(
      WadRayMath.rayMul(params.poolBorrowRatePerYear, share)
    );
  }

  return p2pBorrowRate;
};

/**
 * This function compute the supply rates on a specific asset and returns the result.
 *
 * @param underlying The market to retrieve the supply APY.
 * @returns The P2P supply rate and the pool supply rate.
 */
export const getSupplyRatesPerYear = (optimizer: P2POptimizer, underlying: string) => {
  const { market, indexes } = marketState(optimizer, underlying);
  const { poolSupplyRatePerYear, poolBorrowRatePerYear } =
    optimizer.pool.getReserveRates(underlying);

  const p2pSupplyRate = getP2PSupplyRate({
    poolSupplyRatePerYear,
    poolBorrowRatePerYear,
    poolIndex: indexes.supply.poolIndex,
    p2pIndex: indexes.supply.p2pIndex,
    proportionIdle: getProportionIdle(market),
    p2pDelta: market.deltas.supply.scaledDelta,
    p2pAmount: market.deltas.supply.scaledP2PTotal,
    p2pIndexCursor: market.p2pIndexCursor,
    reserveFactor: market.reserveFactor,
  });

  return { p2pSupplyRate, poolSupplyRate: poolSupplyRatePerYear };
};

/**
 * This function compute the borrow rates on a specific asset and returns the result.
 *
 * @param underlying The market to retrieve the borrow APY.
 * @returns The P2P borrow rate and the pool borrow rate.
 */
export const getBorrowRatesPerYear = (optimizer: P2POptimizer, underlying: string) => {
  const { market, indexes } = marketState(optimizer, underlying);
  const { poolSupplyRatePerYear, poolBorrowRatePerYear } =
    optimizer.pool.getReserveRates(underlying);

  const p2pBorrowRate = getP2PBorrowRate({
    poolSupplyRatePerYear,
    poolBorrowRatePerYear,
    poolIndex: indexes.borrow.poolIndex,
    p2pIndex: indexes.borrow.p2pIndex,
    proportionIdle: constants.Zero,
    p2pDelta: market.deltas.borrow.scaledDelta,
    p2pAmount: market.deltas.borrow.scaledP2PTotal,
    p2pIndexCursor: market.p2pIndexCursor,
    reserveFactor: market.reserveFactor,
  });

  return { p2pBorrowRate, poolBorrowRate: poolBorrowRatePerYear };
};

/**
 * This function retrieves the supply APY of a user on a given market and returns the result.
 * Collateral earns the pool rate.
 *
 * @param underlying The market to retrieve the supply APY.
 * @param user The user address.
 * @returns The experienced rate and the total balance of the deposited liquidity on this market.
 */
export const getCurrentUserSupplyRatePerYear = (
  optimizer: P2POptimizer,
  underlying: string,
  user: string
) => {
  const { balanceInP2P, balanceOnPool } = getCurrentSupplyBalanceInOf(optimizer, underlying, user);
  const collateral = getCurrentCollateralBalanceInOf(optimizer, underlying, user);
  const { p2pSupplyRate, poolSupplyRate } = getSupplyRatesPerYear(optimizer, underlying);

  return getWeightedRate(
    p2pSupplyRate,
    poolSupplyRate,
    balanceInP2P,
    balanceOnPool.add(collateral)
  );
};

/**
 * This function retrieves the borrow APY of a user on a given market and returns the result.
 *
 * @param underlying The market to retrieve the borrow APY.
 * @param user The user address.
 * @returns The experienced rate and the total balance of the borrowed liquidity on this market.
 */
export const getCurrentUserBorrowRatePerYear = (
  optimizer: P2POptimizer,
  underlying: string,
  user: string
) => {
  const { balanceInP2P, balanceOnPool } = getCurrentBorrowBalanceInOf(optimizer, underlying, user);
  const { p2pBorrowRate, poolBorrowRate } = getBorrowRatesPerYear(optimizer, underlying);

  return getWeightedRate(p2pBorrowRate, poolBorrowRate, balanceInP2P, balanceOnPool);
};

/**
 * This function compute the health factor on a specific user and returns the result.
 *
 * @param user The user address.
 * @returns The health factor, in wad.
 */
export const getUserHealthFactor = (optimizer: P2POptimizer, user: string) =>
  optimizer.healthFactor(user);

export const getUserLiquidityData = (optimizer: P2POptimizer, user: string) =>
  optimizer.liquidityData(user);
