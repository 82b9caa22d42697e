import { BigNumber, constants } from "ethers";

import { PercentMath, WadRayMath } from "@morpho-labs/ethers-utils/lib/maths";
import { minBN } from "@morpho-labs/ethers-utils/lib/utils";

import { ReserveIndexes } from "./collaborators";
import { GrowthFactors, Indexes, IndexesParams, Market, MarketSideIndexes } from "./types";
import { getWeightedAvg, rayDivUp, rayMulDown } from "./utils";

/**
 * This function computes the pool growth factors since the last update and the peer-to-peer
 * growth factors derived from them.
 *
 * When the pool supply grew faster than the pool borrow (a flash loan fee was paid on the pool),
 * both peer-to-peer growth factors are set to the pool borrow growth factor.
 */
export const computeGrowthFactors = (
  newPoolSupplyIndex: BigNumber,
  newPoolBorrowIndex: BigNumber,
  lastPoolSupplyIndex: BigNumber,
  lastPoolBorrowIndex: BigNumber,
  p2pIndexCursor: BigNumber,
  reserveFactor: BigNumber
): GrowthFactors => {
  const poolSupplyGrowthFactor = WadRayMath.rayDiv(newPoolSupplyIndex, lastPoolSupplyIndex);
  const poolBorrowGrowthFactor = WadRayMath.rayDiv(newPoolBorrowIndex, lastPoolBorrowIndex);

  if (poolSupplyGrowthFactor.gt(poolBorrowGrowthFactor))
    return {
      poolSupplyGrowthFactor,
      poolBorrowGrowthFactor,
      p2pSupplyGrowthFactor: poolBorrowGrowthFactor,
      p2pBorrowGrowthFactor: poolBorrowGrowthFactor,
    };

  const p2pGrowthFactor = getWeightedAvg(
    poolSupplyGrowthFactor,
    poolBorrowGrowthFactor,
    p2pIndexCursor
  );

  return {
    poolSupplyGrowthFactor,
    poolBorrowGrowthFactor,
    p2pSupplyGrowthFactor: p2pGrowthFactor.sub(
      PercentMath.percentMul(p2pGrowthFactor.sub(poolSupplyGrowthFactor), reserveFactor)
    ),
    p2pBorrowGrowthFactor: p2pGrowthFactor.add(
      PercentMath.percentMul(poolBorrowGrowthFactor.sub(p2pGrowthFactor), reserveFactor)
    ),
  };
};

/**
 * This function computes one side's new peer-to-peer index.
 *
 * The part of the P2P total that is actually delta grows at the pool rate, the idle part does
 * not grow, and the rest grows at the P2P rate.
 */
export const computeP2PIndex = (
  poolGrowthFactor: BigNumber,
  p2pGrowthFactor: BigNumber,
  lastIndexes: MarketSideIndexes,
  scaledDelta: BigNumber,
  scaledP2PTotal: BigNumber,
  proportionIdle: BigNumber
) => {
  if (scaledP2PTotal.isZero() || (scaledDelta.isZero() && proportionIdle.isZero()))
    return WadRayMath.rayMul(lastIndexes.p2pIndex, p2pGrowthFactor);

  const proportionDelta = minBN(
    rayDivUp(
      WadRayMath.rayMul(scaledDelta, lastIndexes.poolIndex),
      WadRayMath.rayMul(scaledP2PTotal, lastIndexes.p2pIndex)
    ),
    WadRayMath.RAY.sub(proportionIdle)
  );

  return WadRayMath.rayMul(
    lastIndexes.p2pIndex,
    WadRayMath.rayMul(p2pGrowthFactor, WadRayMath.RAY.sub(proportionDelta).sub(proportionIdle))
      .add(WadRayMath.rayMul(poolGrowthFactor, proportionDelta))
      .add(proportionIdle)
  );
};

export const computeP2PIndexes = (params: IndexesParams) => {
  const growthFactors = computeGrowthFactors(
    params.poolSupplyIndex,
    params.poolBorrowIndex,
    params.lastSupplyIndexes.poolIndex,
    params.lastBorrowIndexes.poolIndex,
    params.p2pIndexCursor,
    params.reserveFactor
  );

  return {
    p2pSupplyIndex: computeP2PIndex(
      growthFactors.poolSupplyGrowthFactor,
      growthFactors.p2pSupplyGrowthFactor,
      params.lastSupplyIndexes,
      params.deltas.supply.scaledDelta,
      params.deltas.supply.scaledP2PTotal,
      params.proportionIdle
    ),
    p2pBorrowIndex: computeP2PIndex(
      growthFactors.poolBorrowGrowthFactor,
      growthFactors.p2pBorrowGrowthFactor,
      params.lastBorrowIndexes,
      params.deltas.borrow.scaledDelta,
      params.deltas.borrow.scaledP2PTotal,
      constants.Zero
    ),
  };
};

/** Share of the P2P supply that is idle, in ray. */
export const getProportionIdle = (market: Market) => {
  if (market.idleSupply.isZero()) return constants.Zero;

  const totalP2PSupplied = rayMulDown(
    market.deltas.supply.scaledP2PTotal,
    market.indexes.supply.p2pIndex
  );
  if (totalP2PSupplied.isZero()) return constants.Zero;

  return minBN(rayDivUp(market.idleSupply, totalP2PSupplied), WadRayMath.RAY);
};

/** The market's indexes brought up to the pool's current ones. */
export const computeIndexes = (market: Market, poolIndexes: ReserveIndexes): Indexes => {
  const { poolSupplyIndex, poolBorrowIndex } = poolIndexes;

  if (
    poolSupplyIndex.eq(market.indexes.supply.poolIndex) &&
    poolBorrowIndex.eq(market.indexes.borrow.poolIndex)
  )
    return market.indexes;

  const { p2pSupplyIndex, p2pBorrowIndex } = computeP2PIndexes({
    lastSupplyIndexes: market.indexes.supply,
    lastBorrowIndexes: market.indexes.borrow,
    poolSupplyIndex,
    poolBorrowIndex,
    reserveFactor: market.reserveFactor,
    p2pIndexCursor: market.p2pIndexCursor,
    deltas: market.deltas,
    proportionIdle: getProportionIdle(market),
  });

  return {
    supply: { poolIndex: poolSupplyIndex, p2pIndex: p2pSupplyIndex },
    borrow: { poolIndex: poolBorrowIndex, p2pIndex: p2pBorrowIndex },
  };
};
