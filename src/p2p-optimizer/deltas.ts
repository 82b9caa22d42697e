import { BigNumber, constants } from "ethers";

import { minBN } from "@morpho-labs/ethers-utils/lib/utils";

import { EventQueue } from "./events";
import { Indexes, Market, MarketSideIndexes, Side } from "./types";
import { rayDivDown, rayDivUp, rayMulDown, rayMulUp, zeroFloorSub } from "./utils";

const opposite = (side: Side): Side => (side === "supply" ? "borrow" : "supply");

const emitDelta = (market: Market, side: Side, events: EventQueue) => {
  const payload = { underlying: market.underlying, scaledDelta: market.deltas[side].scaledDelta };

  if (side === "supply") events.push("P2PSupplyDeltaUpdated", payload);
  else events.push("P2PBorrowDeltaUpdated", payload);
};

const emitIdleSupply = ({ underlying, idleSupply }: Market, events: EventQueue) =>
  events.push("IdleSupplyUpdated", { underlying, idleSupply });

const emitP2PTotals = (market: Market, events: EventQueue) =>
  events.push("P2PTotalsUpdated", {
    underlying: market.underlying,
    scaledTotalSupplyP2P: market.deltas.supply.scaledP2PTotal,
    scaledTotalBorrowP2P: market.deltas.borrow.scaledP2PTotal,
  });

/**
 * Applies `amount` against the side's delta first.
 *
 * The amount consumed is capped at the delta's value, rounded up when `roundUp` is set so that a
 * delta worth a fraction of a unit can still be consumed. The scaled decrement always rounds up:
 * a delta is never left over-stated.
 *
 * @returns The amount consumed by the delta and what remains of `amount`.
 */
export const decreaseDelta = (
  market: Market,
  side: Side,
  amount: BigNumber,
  poolIndex: BigNumber,
  roundUp: boolean,
  events: EventQueue
) => {
  const delta = market.deltas[side];
  if (delta.scaledDelta.isZero() || amount.isZero())
    return { consumed: constants.Zero, remainder: amount };

  const deltaValue = roundUp
    ? rayMulUp(delta.scaledDelta, poolIndex)
    : rayMulDown(delta.scaledDelta, poolIndex);
  const consumed = minBN(deltaValue, amount);

  delta.scaledDelta = zeroFloorSub(delta.scaledDelta, rayDivUp(consumed, poolIndex));
  emitDelta(market, side, events);

  return { consumed, remainder: amount.sub(consumed) };
};

/** Records a freshly created mismatch on the side, rounded down. */
export const increaseDelta = (
  market: Market,
  side: Side,
  amount: BigNumber,
  indexes: MarketSideIndexes,
  events: EventQueue
) => {
  if (amount.isZero()) return;

  const delta = market.deltas[side];
  delta.scaledDelta = delta.scaledDelta.add(rayDivDown(amount, indexes.poolIndex));
  emitDelta(market, side, events);
};

/**
 * Increases the P2P totals: `promoted` is newly matched on the opposite side, `amount` on `side`.
 *
 * @returns The scaled P2P amount credited on `side`.
 */
export const increaseP2P = (
  market: Market,
  side: Side,
  promoted: BigNumber,
  amount: BigNumber,
  indexes: Indexes,
  events: EventQueue
) => {
  if (amount.isZero()) return constants.Zero;

  const promotedPartition = market.deltas[opposite(side)];
  const amountPartition = market.deltas[side];

  promotedPartition.scaledP2PTotal = promotedPartition.scaledP2PTotal.add(
    rayDivDown(promoted, indexes[opposite(side)].p2pIndex)
  );
  const amountScaledP2P = rayDivDown(amount, indexes[side].p2pIndex);
  amountPartition.scaledP2PTotal = amountPartition.scaledP2PTotal.add(amountScaledP2P);

  emitP2PTotals(market, events);

  return amountScaledP2P;
};

/** Decreases the P2P totals: `demoted` is unmatched on the opposite side, `amount` on `side`. */
export const decreaseP2P = (
  market: Market,
  side: Side,
  demoted: BigNumber,
  amount: BigNumber,
  indexes: Indexes,
  events: EventQueue
) => {
  if (amount.isZero()) return;

  const demotedPartition = market.deltas[opposite(side)];
  const amountPartition = market.deltas[side];

  demotedPartition.scaledP2PTotal = zeroFloorSub(
    demotedPartition.scaledP2PTotal,
    rayDivDown(demoted, indexes[opposite(side)].p2pIndex)
  );
  amountPartition.scaledP2PTotal = zeroFloorSub(
    amountPartition.scaledP2PTotal,
    rayDivDown(amount, indexes[side].p2pIndex)
  );

  emitP2PTotals(market, events);
};

/**
 * The P2P borrow total accrues slightly faster than the P2P supply total: the spread is the
 * reserve's fee. A repay settles that fee before its remainder is routed further.
 *
 * @returns What remains of `amount` once the fee is settled.
 */
export const repayFee = (market: Market, amount: BigNumber, indexes: Indexes) => {
  if (amount.isZero()) return constants.Zero;

  const { supply, borrow } = market.deltas;
  const scaledTotalBorrowP2P = borrow.scaledP2PTotal;

  // The borrow delta is zero here: it was consumed before the fee is repaid.
  const feeToRepay = zeroFloorSub(
    rayMulDown(scaledTotalBorrowP2P, indexes.borrow.p2pIndex),
    zeroFloorSub(
      zeroFloorSub(
        rayMulDown(supply.scaledP2PTotal, indexes.supply.p2pIndex),
        rayMulDown(supply.scaledDelta, indexes.supply.poolIndex)
      ),
      market.idleSupply
    )
  );
  if (feeToRepay.isZero()) return amount;

  const fee = minBN(feeToRepay, amount);
  borrow.scaledP2PTotal = zeroFloorSub(
    scaledTotalBorrowP2P,
    rayDivDown(fee, indexes.borrow.p2pIndex)
  );

  return amount.sub(fee);
};

/** Matches `amount` against idle supply first. */
export const decreaseIdle = (market: Market, amount: BigNumber, events: EventQueue) => {
  if (market.idleSupply.isZero() || amount.isZero())
    return { matchedIdle: constants.Zero, remainder: amount };

  const matchedIdle = minBN(market.idleSupply, amount);
  market.idleSupply = zeroFloorSub(market.idleSupply, matchedIdle);
  emitIdleSupply(market, events);

  return { matchedIdle, remainder: amount.sub(matchedIdle) };
};

/**
 * Parks the part of `amount` the pool cannot take as idle supply.
 *
 * @param suppliable Room left under the pool's supply cap, or `undefined` if uncapped.
 */
export const increaseIdle = (
  market: Market,
  amount: BigNumber,
  suppliable: BigNumber | undefined,
  events: EventQueue
) => {
  if (suppliable === undefined || amount.lte(suppliable))
    return { toSupply: amount, idleSupplyIncrease: constants.Zero };

  const idleSupplyIncrease = amount.sub(suppliable);
  market.idleSupply = market.idleSupply.add(idleSupplyIncrease);
  emitIdleSupply(market, events);

  return { toSupply: suppliable, idleSupplyIncrease };
};
