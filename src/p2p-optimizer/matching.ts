import { BigNumber, constants } from "ethers";

import { minBN } from "@morpho-labs/ethers-utils/lib/utils";

import { DUST_THRESHOLD } from "./constants";
import { ValidationError } from "./errors";
import { MarketBalances } from "./marketBalances";
import { Draft } from "./registry";
import { MarketSideIndexes, Side } from "./types";
import { rayDivDown, rayDivUp, rayMulDown, rayMulUp, zeroFloorSub } from "./utils";

export interface StepResult {
  onPool: BigNumber;
  inP2P: BigNumber;
  remaining: BigNumber;
}

/** Moves one user's balance between the pool and P2P buckets of one side. */
export interface MatchingStrategy {
  readonly side: Side;
  readonly demoting: boolean;
  step(
    poolBalance: BigNumber,
    p2pBalance: BigNumber,
    indexes: MarketSideIndexes,
    remaining: BigNumber
  ): StepResult;
}

export interface MatchResult {
  processed: BigNumber;
  loopsUsed: number;
}

// Debt is valued rounding up and supply rounding down: a full balance always moves in full.
const valueOf = (side: Side) => (side === "borrow" ? rayMulUp : rayMulDown);

const promoting = (side: Side): MatchingStrategy => ({
  side,
  demoting: false,
  step: (poolBalance, p2pBalance, indexes, remaining) => {
    const toProcess = minBN(valueOf(side)(poolBalance, indexes.poolIndex), remaining);

    return {
      onPool: zeroFloorSub(poolBalance, rayDivUp(toProcess, indexes.poolIndex)),
      inP2P: p2pBalance.add(rayDivDown(toProcess, indexes.p2pIndex)),
      remaining: remaining.sub(toProcess),
    };
  },
});

const demoting = (side: Side): MatchingStrategy => ({
  side,
  demoting: true,
  step: (poolBalance, p2pBalance, indexes, remaining) => {
    const toProcess = minBN(valueOf(side)(p2pBalance, indexes.p2pIndex), remaining);

    return {
      onPool: poolBalance.add(rayDivDown(toProcess, indexes.poolIndex)),
      inP2P: zeroFloorSub(p2pBalance, rayDivUp(toProcess, indexes.p2pIndex)),
      remaining: remaining.sub(toProcess),
    };
  },
});

export const promoteSuppliers = promoting("supply");
export const promoteBorrowers = promoting("borrow");
export const demoteSuppliers = demoting("supply");
export const demoteBorrowers = demoting("borrow");

const buckets = (balances: MarketBalances, side: Side) =>
  side === "supply"
    ? { pool: balances.poolSuppliers, p2p: balances.p2pSuppliers }
    : { pool: balances.poolBorrowers, p2p: balances.p2pBorrowers };

/**
 * Walks the ranking of a (market, side) bucket, largest balance first, moving users between
 * pool and P2P until the amount is processed, the bucket is empty or the loop budget is spent.
 * Running out of budget is not an error: the caller routes what is left.
 */
export class MatchingEngine {
  constructor(public maxSortedUsers: number) {}

  /** Moves pool users of `side` to P2P for up to `amount`. No-op when P2P is disabled. */
  promote(
    tx: Draft,
    underlying: string,
    side: Side,
    amount: BigNumber,
    maxLoops: number
  ): MatchResult {
    const market = tx.getMarket(underlying);
    if (!market) throw new ValidationError("MarketNotCreated", underlying);

    if (amount.isZero() || market.pauseStatuses.isP2PDisabled)
      return { processed: constants.Zero, loopsUsed: 0 };

    const strategy = side === "supply" ? promoteSuppliers : promoteBorrowers;

    return this.promoteOrDemote(tx, underlying, strategy, amount, maxLoops);
  }

  /** Moves P2P users of `side` back to the pool for up to `amount`. */
  demote(
    tx: Draft,
    underlying: string,
    side: Side,
    amount: BigNumber,
    maxLoops: number
  ): MatchResult {
    if (amount.isZero()) return { processed: constants.Zero, loopsUsed: 0 };

    const strategy = side === "supply" ? demoteSuppliers : demoteBorrowers;

    return this.promoteOrDemote(tx, underlying, strategy, amount, maxLoops);
  }

  promoteOrDemote(
    tx: Draft,
    underlying: string,
    strategy: MatchingStrategy,
    amount: BigNumber,
    maxLoops: number
  ): MatchResult {
    if (maxLoops <= 0) return { processed: constants.Zero, loopsUsed: 0 };

    const market = tx.getMarket(underlying);
    if (!market) throw new ValidationError("MarketNotCreated", underlying);

    const indexes = market.indexes[strategy.side];
    const { pool, p2p } = buckets(tx.editMarketBalances(underlying), strategy.side);
    const working = strategy.demoting ? p2p : pool;

    let remaining = amount;
    let loopsUsed = 0;
    for (; loopsUsed < maxLoops && !remaining.isZero(); ++loopsUsed) {
      const user = working.getHead();
      if (user === undefined) break;

      const step = strategy.step(pool.valueOf(user), p2p.valueOf(user), indexes, remaining);
      remaining = step.remaining;

      const { onPool, inP2P } = this.updateInDS(
        tx,
        underlying,
        strategy.side,
        user,
        step.onPool,
        step.inP2P
      );
      tx.push("PositionUpdated", {
        borrow: strategy.side === "borrow",
        user,
        underlying,
        scaledOnPool: onPool,
        scaledInP2P: inP2P,
      });
    }

    return { processed: amount.sub(remaining), loopsUsed };
  }

  updateSupplierInDS(
    tx: Draft,
    underlying: string,
    user: string,
    onPool: BigNumber,
    inP2P: BigNumber
  ) {
    return this.updateInDS(tx, underlying, "supply", user, onPool, inP2P);
  }

  updateBorrowerInDS(
    tx: Draft,
    underlying: string,
    user: string,
    onPool: BigNumber,
    inP2P: BigNumber
  ) {
    return this.updateInDS(tx, underlying, "borrow", user, onPool, inP2P);
  }

  private updateInDS(
    tx: Draft,
    underlying: string,
    side: Side,
    user: string,
    onPool: BigNumber,
    inP2P: BigNumber
  ) {
    if (onPool.lte(DUST_THRESHOLD)) onPool = constants.Zero;
    if (inP2P.lte(DUST_THRESHOLD)) inP2P = constants.Zero;

    const { pool, p2p } = buckets(tx.editMarketBalances(underlying), side);
    pool.update(user, pool.valueOf(user), onPool, this.maxSortedUsers);
    p2p.update(user, p2p.valueOf(user), inP2P, this.maxSortedUsers);

    if (side === "borrow") {
      const borrows = tx.editUserBorrows(user);
      if (onPool.isZero() && inP2P.isZero()) borrows.delete(underlying);
      else borrows.add(underlying);
    }

    return { onPool, inP2P };
  }
}
