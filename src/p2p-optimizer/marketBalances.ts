import { BigNumber, constants } from "ethers";

import { Journal } from "./journal";
import { RankingHeap } from "./ranking";
import { MarketSideIndexes, UserMarketBalance } from "./types";
import { rayMulDown, rayMulUp } from "./utils";

/**
 * Scaled balances of every user on one market. Supply and borrow balances are stored in the
 * ranking heaps themselves, so a user is ranked in a bucket exactly when that balance is non-zero.
 */
export class MarketBalances {
  private journal: Journal | undefined;

  constructor(
    readonly poolSuppliers = new RankingHeap(),
    readonly p2pSuppliers = new RankingHeap(),
    readonly poolBorrowers = new RankingHeap(),
    readonly p2pBorrowers = new RankingHeap(),
    private readonly collateral = new Map<string, BigNumber>()
  ) {}

  scaledPoolSupplyBalance(user: string) {
    return this.poolSuppliers.valueOf(user);
  }

  scaledP2PSupplyBalance(user: string) {
    return this.p2pSuppliers.valueOf(user);
  }

  scaledPoolBorrowBalance(user: string) {
    return this.poolBorrowers.valueOf(user);
  }

  scaledP2PBorrowBalance(user: string) {
    return this.p2pBorrowers.valueOf(user);
  }

  scaledCollateralBalance(user: string) {
    return this.collateral.get(user) ?? constants.Zero;
  }

  balanceOf(user: string): UserMarketBalance {
    return {
      scaledPoolSupply: this.scaledPoolSupplyBalance(user),
      scaledP2PSupply: this.scaledP2PSupplyBalance(user),
      scaledPoolBorrow: this.scaledPoolBorrowBalance(user),
      scaledP2PBorrow: this.scaledP2PBorrowBalance(user),
      scaledCollateral: this.scaledCollateralBalance(user),
    };
  }

  /** Supply balance in underlying, rounded down. */
  supplyBalance(user: string, indexes: MarketSideIndexes) {
    return rayMulDown(this.scaledPoolSupplyBalance(user), indexes.poolIndex).add(
      rayMulDown(this.scaledP2PSupplyBalance(user), indexes.p2pIndex)
    );
  }

  /** Borrow balance in underlying, rounded up. */
  borrowBalance(user: string, indexes: MarketSideIndexes) {
    return rayMulUp(this.scaledPoolBorrowBalance(user), indexes.poolIndex).add(
      rayMulUp(this.scaledP2PBorrowBalance(user), indexes.p2pIndex)
    );
  }

  collateralBalance(user: string, poolSupplyIndex: BigNumber) {
    return rayMulDown(this.scaledCollateralBalance(user), poolSupplyIndex);
  }

  /** Scaled totals over all users, as held on the pool or matched peer-to-peer. */
  scaledTotals() {
    return {
      poolSupply: this.poolSuppliers.total(),
      p2pSupply: this.p2pSuppliers.total(),
      poolBorrow: this.poolBorrowers.total(),
      p2pBorrow: this.p2pBorrowers.total(),
      collateral: [...this.collateral.values()].reduce(
        (sum, value) => sum.add(value),
        constants.Zero
      ),
    };
  }

  setCollateral(user: string, scaledBalance: BigNumber) {
    const former = this.collateral.get(user);
    this.journal?.record(() => {
      if (former === undefined) this.collateral.delete(user);
      else this.collateral.set(user, former);
    });

    if (scaledBalance.isZero()) this.collateral.delete(user);
    else this.collateral.set(user, scaledBalance);
  }

  /** Records every following change to these balances in `journal`, or stops when `undefined`. */
  track(journal: Journal | undefined) {
    this.journal = journal;
    this.poolSuppliers.track(journal);
    this.p2pSuppliers.track(journal);
    this.poolBorrowers.track(journal);
    this.p2pBorrowers.track(journal);
  }
}
