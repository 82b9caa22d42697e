import { BigNumber } from "ethers";

export interface ReserveConfiguration {
  decimals: number;
  /** In basis points. */
  ltv: BigNumber;
  /** In basis points. */
  liquidationThreshold: BigNumber;
  /** In basis points, above 10 000: the collateral seized per unit of debt repaid. */
  liquidationBonus: BigNumber;
  borrowingEnabled: boolean;
  eModeCategory: number;
  /** In underlying, zero when uncapped. */
  supplyCap: BigNumber;
  /** In underlying, zero when uncapped. */
  borrowCap: BigNumber;
}

export interface EModeCategory {
  ltv: BigNumber;
  liquidationThreshold: BigNumber;
  liquidationBonus: BigNumber;
}

/** In ray. */
export interface ReserveIndexes {
  poolSupplyIndex: BigNumber;
  poolBorrowIndex: BigNumber;
}

/** In ray. */
export interface ReserveRates {
  poolSupplyRatePerYear: BigNumber;
  poolBorrowRatePerYear: BigNumber;
}

/** The underlying lending pool. The optimizer holds one account on it for all its users. */
export interface Pool {
  isListed(asset: string): boolean;
  getConfiguration(asset: string): ReserveConfiguration;
  getEModeCategory(id: number): EModeCategory;
  getReserveIndexes(asset: string): ReserveIndexes;
  getReserveRates(asset: string): ReserveRates;
  /** Total supplied on the pool by everyone, in underlying. */
  getTotalSupply(asset: string): BigNumber;
  /** Total borrowed from the pool by everyone, in underlying. */
  getTotalDebt(asset: string): BigNumber;

  supply(asset: string, amount: BigNumber): void;
  withdraw(asset: string, amount: BigNumber): void;
  borrow(asset: string, amount: BigNumber): void;
  repay(asset: string, amount: BigNumber): void;
}

export interface Oracle {
  /** In the oracle's base currency. */
  price(asset: string): BigNumber;
}

/** Circuit breaker the pool can put in front of borrows and liquidations. */
export interface OracleSentinel {
  isBorrowAllowed(): boolean;
  isLiquidationAllowed(): boolean;
}

export interface PermissionLayer {
  isManagedBy(owner: string, manager: string): boolean;
}
