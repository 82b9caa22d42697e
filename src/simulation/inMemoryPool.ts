import { BigNumber, constants } from "ethers";

import { WadRayMath } from "@morpho-labs/ethers-utils/lib/maths";

import {
  EModeCategory,
  Pool,
  ReserveConfiguration,
  ReserveIndexes,
  ReserveRates,
} from "../p2p-optimizer/collaborators";
import { zeroFloorSub } from "../p2p-optimizer/utils";

export type PoolErrorReason =
  | "ReserveNotListed"
  | "SupplyCapExceeded"
  | "BorrowCapExceeded"
  | "EModeNotFound";

export class PoolError extends Error {
  constructor(readonly reason: PoolErrorReason, asset?: string) {
    super(asset ? `${reason}: ${asset}` : reason);
    this.name = "PoolError";
  }
}

export interface PoolCall {
  action: "supply" | "withdraw" | "borrow" | "repay";
  asset: string;
  amount: BigNumber;
}

interface Reserve {
  configuration: ReserveConfiguration;
  indexes: ReserveIndexes;
  rates: ReserveRates;
  /** Supplied by everyone, in underlying. */
  totalSupply: BigNumber;
  /** Borrowed by everyone, in underlying. */
  totalDebt: BigNumber;
}

export interface ListReserveParams extends Partial<ReserveConfiguration> {
  indexes?: ReserveIndexes;
  rates?: ReserveRates;
  totalSupply?: BigNumber;
  totalDebt?: BigNumber;
}

const DEFAULT_CONFIGURATION: ReserveConfiguration = {
  decimals: 18,
  ltv: BigNumber.from(8_000),
  liquidationThreshold: BigNumber.from(8_500),
  liquidationBonus: BigNumber.from(10_500),
  borrowingEnabled: true,
  eModeCategory: 0,
  supplyCap: constants.Zero,
  borrowCap: constants.Zero,
};

/**
 * A lending pool kept in memory. Indexes and rates only move when set explicitly; every call
 * the optimizer makes is recorded in `calls`, and the reserve totals follow them.
 */
export class InMemoryPool implements Pool {
  readonly calls: PoolCall[] = [];

  private readonly reserves = new Map<string, Reserve>();
  private readonly eModeCategories = new Map<number, EModeCategory>();

  listReserve(
    asset: string,
    { indexes, rates, totalSupply, totalDebt, ...configuration }: ListReserveParams = {}
  ) {
    this.reserves.set(asset, {
      configuration: { ...DEFAULT_CONFIGURATION, ...configuration },
      indexes: indexes ?? { poolSupplyIndex: WadRayMath.RAY, poolBorrowIndex: WadRayMath.RAY },
      rates: rates ?? {
        poolSupplyRatePerYear: constants.Zero,
        poolBorrowRatePerYear: constants.Zero,
      },
      totalSupply: totalSupply ?? constants.Zero,
      totalDebt: totalDebt ?? constants.Zero,
    });
  }

  setConfiguration(asset: string, configuration: Partial<ReserveConfiguration>) {
    const reserve = this.reserve(asset);
    reserve.configuration = { ...reserve.configuration, ...configuration };
  }

  setReserveIndexes(asset: string, indexes: ReserveIndexes) {
    this.reserve(asset).indexes = indexes;
  }

  setReserveRates(asset: string, rates: ReserveRates) {
    this.reserve(asset).rates = rates;
  }

  setEModeCategory(id: number, category: EModeCategory) {
    this.eModeCategories.set(id, category);
  }

  isListed(asset: string) {
    return this.reserves.has(asset);
  }

  getConfiguration(asset: string) {
    return { ...this.reserve(asset).configuration };
  }

  getEModeCategory(id: number) {
    const category = this.eModeCategories.get(id);
    if (!category) throw new PoolError("EModeNotFound", String(id));

    return category;
  }

  getReserveIndexes(asset: string) {
    return this.reserve(asset).indexes;
  }

  getReserveRates(asset: string) {
    return this.reserve(asset).rates;
  }

  getTotalSupply(asset: string) {
    return this.reserve(asset).totalSupply;
  }

  getTotalDebt(asset: string) {
    return this.reserve(asset).totalDebt;
  }

  supply(asset: string, amount: BigNumber) {
    const reserve = this.reserve(asset);
    const { supplyCap } = reserve.configuration;
    if (!supplyCap.isZero() && reserve.totalSupply.add(amount).gt(supplyCap))
      throw new PoolError("SupplyCapExceeded", asset);

    reserve.totalSupply = reserve.totalSupply.add(amount);
    this.calls.push({ action: "supply", asset, amount });
  }

  withdraw(asset: string, amount: BigNumber) {
    const reserve = this.reserve(asset);
    reserve.totalSupply = zeroFloorSub(reserve.totalSupply, amount);
    this.calls.push({ action: "withdraw", asset, amount });
  }

  borrow(asset: string, amount: BigNumber) {
    const reserve = this.reserve(asset);
    const { borrowCap } = reserve.configuration;
    if (!borrowCap.isZero() && reserve.totalDebt.add(amount).gt(borrowCap))
      throw new PoolError("BorrowCapExceeded", asset);

    reserve.totalDebt = reserve.totalDebt.add(amount);
    this.calls.push({ action: "borrow", asset, amount });
  }

  repay(asset: string, amount: BigNumber) {
    const reserve = this.reserve(asset);
    reserve.totalDebt = zeroFloorSub(reserve.totalDebt, amount);
    this.calls.push({ action: "repay", asset, amount });
  }

  private reserve(asset: string) {
    const reserve = this.reserves.get(asset);
    if (!reserve) throw new PoolError("ReserveNotListed", asset);

    return reserve;
  }
}
