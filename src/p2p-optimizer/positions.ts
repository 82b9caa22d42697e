import { BigNumber, constants } from "ethers";

import { minBN } from "@morpho-labs/ethers-utils/lib/utils";

import { Pool } from "./collaborators";
import {
  decreaseDelta,
  decreaseIdle,
  decreaseP2P,
  increaseDelta,
  increaseIdle,
  increaseP2P,
  repayFee,
} from "./deltas";
import { MatchingEngine } from "./matching";
import { Draft } from "./registry";
import { BorrowWithdrawResult, CollateralResult, Side, SupplyRepayResult } from "./types";
import { rayDivDown, rayDivUp, rayMulDown, rayMulUp, zeroFloorSub } from "./utils";

/** Adds `amount` to a scaled pool balance, rounding the credit down. */
const addToPool = (amount: BigNumber, onPool: BigNumber, poolIndex: BigNumber) => {
  if (amount.isZero()) return onPool;

  return onPool.add(rayDivDown(amount, poolIndex));
};

/**
 * Takes as much of `amount` as the scaled pool balance is worth, rounding the debit up.
 *
 * @returns The part taken from the pool, what is left of `amount` and the new scaled balance.
 */
const subFromPool = (side: Side, amount: BigNumber, onPool: BigNumber, poolIndex: BigNumber) => {
  if (onPool.isZero()) return { toProcess: constants.Zero, remaining: amount, onPool };

  const value = side === "borrow" ? rayMulUp(onPool, poolIndex) : rayMulDown(onPool, poolIndex);
  const toProcess = minBN(value, amount);

  return {
    toProcess,
    remaining: amount.sub(toProcess),
    onPool: zeroFloorSub(onPool, rayDivUp(toProcess, poolIndex)),
  };
};

/**
 * The money-movement flows. Each one only books the move in the draft and returns how much the
 * optimizer must repay, supply, withdraw or borrow on the pool; the caller performs those calls.
 */
export class PositionsManager {
  constructor(private readonly matching: MatchingEngine, private readonly pool: Pool) {}

  executeSupply(
    tx: Draft,
    underlying: string,
    amount: BigNumber,
    onBehalf: string,
    maxLoops: number
  ) {
    const market = tx.editMarket(underlying);
    const balances = tx.editMarketBalances(underlying);
    const { indexes } = market;

    let onPool = balances.scaledPoolSupplyBalance(onBehalf);
    let inP2P = balances.scaledP2PSupplyBalance(onBehalf);

    const { consumed, remainder } = decreaseDelta(
      market,
      "borrow",
      amount,
      indexes.borrow.poolIndex,
      true,
      tx
    );
    const { processed: promoted } = this.matching.promote(
      tx,
      underlying,
      "borrow",
      remainder,
      maxLoops
    );
    const toRepay = consumed.add(promoted);
    const toSupply = remainder.sub(promoted);

    inP2P = inP2P.add(increaseP2P(market, "supply", promoted, toRepay, indexes, tx));
    onPool = addToPool(toSupply, onPool, indexes.supply.poolIndex);

    ({ onPool, inP2P } = this.matching.updateSupplierInDS(tx, underlying, onBehalf, onPool, inP2P));

    const result: SupplyRepayResult = {
      amount,
      onPool,
      inP2P,
      toRepay,
      toSupply,
      promoted,
      demoted: constants.Zero,
      feeRepaid: constants.Zero,
      idleSupplyIncrease: constants.Zero,
    };

    return result;
  }

  executeBorrow(
    tx: Draft,
    underlying: string,
    amount: BigNumber,
    onBehalf: string,
    maxLoops: number
  ) {
    const market = tx.editMarket(underlying);
    const balances = tx.editMarketBalances(underlying);
    const { indexes } = market;

    let onPool = balances.scaledPoolBorrowBalance(onBehalf);
    let inP2P = balances.scaledP2PBorrowBalance(onBehalf);

    const idle = decreaseIdle(market, amount, tx);
    const { consumed, remainder } = decreaseDelta(
      market,
      "supply",
      idle.remainder,
      indexes.supply.poolIndex,
      false,
      tx
    );
    const { processed: promoted } = this.matching.promote(
      tx,
      underlying,
      "supply",
      remainder,
      maxLoops
    );
    const toWithdraw = consumed.add(promoted);
    const toBorrow = remainder.sub(promoted);

    inP2P = inP2P.add(
      increaseP2P(market, "borrow", promoted, toWithdraw.add(idle.matchedIdle), indexes, tx)
    );
    onPool = addToPool(toBorrow, onPool, indexes.borrow.poolIndex);

    ({ onPool, inP2P } = this.matching.updateBorrowerInDS(tx, underlying, onBehalf, onPool, inP2P));

    const result: BorrowWithdrawResult = {
      amount,
      onPool,
      inP2P,
      toWithdraw,
      toBorrow,
      promoted,
      demoted: constants.Zero,
      idleSupplyDecrease: idle.matchedIdle,
    };

    return result;
  }

  executeRepay(
    tx: Draft,
    underlying: string,
    amount: BigNumber,
    onBehalf: string,
    maxLoops: number
  ) {
    const market = tx.editMarket(underlying);
    const balances = tx.editMarketBalances(underlying);
    const { indexes } = market;

    const fromPool = subFromPool(
      "borrow",
      amount,
      balances.scaledPoolBorrowBalance(onBehalf),
      indexes.borrow.poolIndex
    );
    const p2pRepaid = fromPool.remaining;
    const inP2PBefore = balances.scaledP2PBorrowBalance(onBehalf);

    const { onPool, inP2P } = this.matching.updateBorrowerInDS(
      tx,
      underlying,
      onBehalf,
      fromPool.onPool,
      zeroFloorSub(inP2PBefore, rayDivUp(p2pRepaid, indexes.borrow.p2pIndex))
    );

    const result: SupplyRepayResult = {
      amount,
      onPool,
      inP2P,
      toRepay: fromPool.toProcess,
      toSupply: constants.Zero,
      promoted: constants.Zero,
      demoted: constants.Zero,
      feeRepaid: constants.Zero,
      idleSupplyIncrease: constants.Zero,
    };
    if (p2pRepaid.isZero()) return result;

    const { consumed, remainder } = decreaseDelta(
      market,
      "borrow",
      p2pRepaid,
      indexes.borrow.poolIndex,
      true,
      tx
    );
    // The repaid delta leaves the P2P borrow total together with the repayer.
    decreaseP2P(market, "borrow", constants.Zero, consumed, indexes, tx);

    const afterFee = repayFee(market, remainder, indexes);
    result.feeRepaid = remainder.sub(afterFee);

    const promotion = this.matching.promote(tx, underlying, "borrow", afterFee, maxLoops);
    const rest = afterFee.sub(promotion.processed);

    // Demoted suppliers must be backed by an actual pool supply, so demotion stops at the cap.
    const suppliable = this.suppliableOnPool(underlying);
    const demotable = suppliable === undefined ? rest : minBN(rest, suppliable);
    const { processed: demoted } = this.matching.demote(
      tx,
      underlying,
      "supply",
      demotable,
      maxLoops - promotion.loopsUsed
    );

    const { toSupply, idleSupplyIncrease } = increaseIdle(market, rest, suppliable, tx);
    increaseDelta(market, "supply", rest.sub(demoted).sub(idleSupplyIncrease), indexes.supply, tx);
    decreaseP2P(market, "borrow", demoted, rest, indexes, tx);

    result.toRepay = result.toRepay.add(consumed).add(promotion.processed);
    result.toSupply = toSupply;
    result.promoted = promotion.processed;
    result.demoted = demoted;
    result.idleSupplyIncrease = idleSupplyIncrease;

    return result;
  }

  executeWithdraw(
    tx: Draft,
    underlying: string,
    amount: BigNumber,
    onBehalf: string,
    maxLoops: number
  ) {
    const market = tx.editMarket(underlying);
    const balances = tx.editMarketBalances(underlying);
    const { indexes } = market;

    const fromPool = subFromPool(
      "supply",
      amount,
      balances.scaledPoolSupplyBalance(onBehalf),
      indexes.supply.poolIndex
    );
    const p2pWithdrawn = fromPool.remaining;
    const inP2PBefore = balances.scaledP2PSupplyBalance(onBehalf);

    const { onPool, inP2P } = this.matching.updateSupplierInDS(
      tx,
      underlying,
      onBehalf,
      fromPool.onPool,
      zeroFloorSub(inP2PBefore, rayDivUp(p2pWithdrawn, indexes.supply.p2pIndex))
    );

    const result: BorrowWithdrawResult = {
      amount,
      onPool,
      inP2P,
      toWithdraw: fromPool.toProcess,
      toBorrow: constants.Zero,
      promoted: constants.Zero,
      demoted: constants.Zero,
      idleSupplyDecrease: constants.Zero,
    };
    if (p2pWithdrawn.isZero()) return result;

    const idle = decreaseIdle(market, p2pWithdrawn, tx);
    const { consumed, remainder } = decreaseDelta(
      market,
      "supply",
      idle.remainder,
      indexes.supply.poolIndex,
      false,
      tx
    );

    const promotion = this.matching.promote(tx, underlying, "supply", remainder, maxLoops);
    const rest = remainder.sub(promotion.processed);

    const { processed: demoted } = this.matching.demote(
      tx,
      underlying,
      "borrow",
      rest,
      maxLoops - promotion.loopsUsed
    );

    increaseDelta(market, "borrow", rest.sub(demoted), indexes.borrow, tx);
    decreaseP2P(market, "supply", demoted, idle.matchedIdle.add(consumed).add(rest), indexes, tx);

    result.toWithdraw = result.toWithdraw.add(consumed).add(promotion.processed);
    result.toBorrow = rest;
    result.promoted = promotion.processed;
    result.demoted = demoted;
    result.idleSupplyDecrease = idle.matchedIdle;

    return result;
  }

  executeSupplyCollateral(
    tx: Draft,
    underlying: string,
    amount: BigNumber,
    onBehalf: string
  ): CollateralResult {
    const market = tx.editMarket(underlying);
    const balances = tx.editMarketBalances(underlying);

    const formerCollateral = balances.scaledCollateralBalance(onBehalf);
    const collateral = formerCollateral.add(rayDivDown(amount, market.indexes.supply.poolIndex));
    balances.setCollateral(onBehalf, collateral);

    if (formerCollateral.isZero() && !collateral.isZero())
      tx.editUserCollaterals(onBehalf).add(underlying);

    return { amount, collateral };
  }

  executeWithdrawCollateral(
    tx: Draft,
    underlying: string,
    amount: BigNumber,
    onBehalf: string
  ): CollateralResult {
    const market = tx.editMarket(underlying);
    const balances = tx.editMarketBalances(underlying);

    const collateral = zeroFloorSub(
      balances.scaledCollateralBalance(onBehalf),
      rayDivUp(amount, market.indexes.supply.poolIndex)
    );
    balances.setCollateral(onBehalf, collateral);

    if (collateral.isZero()) tx.editUserCollaterals(onBehalf).delete(underlying);

    return { amount, collateral };
  }

  /** Room left under the pool's supply cap, or `undefined` when the reserve is uncapped. */
  suppliableOnPool(underlying: string) {
    const { supplyCap } = this.pool.getConfiguration(underlying);
    if (supplyCap.isZero()) return undefined;

    return zeroFloorSub(supplyCap, this.pool.getTotalSupply(underlying));
  }
}
