import { BigNumber } from "ethers";

export type Side = "supply" | "borrow";

export interface LiquidityData {
  /** Value the user can borrow up to, from collateral at LTV. */
  borrowable: BigNumber;
  /** Debt value above which the user is liquidatable, from collateral at liquidation threshold. */
  maxDebt: BigNumber;
  /** Value of the user's debt. */
  debt: BigNumber;
}

export interface MarketSideDelta {
  /** The delta amount in pool unit. */
  scaledDelta: BigNumber;
  /** The total peer-to-peer amount in peer-to-peer unit. */
  scaledP2PTotal: BigNumber;
}

export interface Deltas {
  supply: MarketSideDelta;
  borrow: MarketSideDelta;
}

/** Indexes of one side of a market, in ray. */
export interface MarketSideIndexes {
  poolIndex: BigNumber;
  p2pIndex: BigNumber;
}

export interface Indexes {
  supply: MarketSideIndexes;
  borrow: MarketSideIndexes;
}

export interface PauseStatuses {
  isSupplyPaused: boolean;
  isSupplyCollateralPaused: boolean;
  isBorrowPaused: boolean;
  isRepayPaused: boolean;
  isWithdrawPaused: boolean;
  isWithdrawCollateralPaused: boolean;
  isLiquidateCollateralPaused: boolean;
  isLiquidateBorrowPaused: boolean;
  isP2PDisabled: boolean;
  isDeprecated: boolean;
}

export type PauseFlag = Exclude<keyof PauseStatuses, "isP2PDisabled" | "isDeprecated">;

export interface Market {
  underlying: string;
  indexes: Indexes;
  deltas: Deltas;
  pauseStatuses: PauseStatuses;
  isCollateral: boolean;
  /** Share of the P2P spread kept by the reserve, in basis points. */
  reserveFactor: BigNumber;
  /** Where the P2P rate sits between the pool supply and borrow rates, in basis points. */
  p2pIndexCursor: BigNumber;
  /** Supply that could not be put on the pool, in underlying. */
  idleSupply: BigNumber;
}

/** Scaled balances of one user on one market. Collateral is never matched P2P. */
export interface UserMarketBalance {
  scaledPoolSupply: BigNumber;
  scaledP2PSupply: BigNumber;
  scaledPoolBorrow: BigNumber;
  scaledP2PBorrow: BigNumber;
  scaledCollateral: BigNumber;
}

export interface Iterations {
  repay: number;
  withdraw: number;
}

export interface GrowthFactors {
  poolSupplyGrowthFactor: BigNumber;
  poolBorrowGrowthFactor: BigNumber;
  p2pSupplyGrowthFactor: BigNumber;
  p2pBorrowGrowthFactor: BigNumber;
}

export interface IndexesParams {
  lastSupplyIndexes: MarketSideIndexes;
  lastBorrowIndexes: MarketSideIndexes;
  poolSupplyIndex: BigNumber;
  poolBorrowIndex: BigNumber;
  reserveFactor: BigNumber;
  p2pIndexCursor: BigNumber;
  deltas: Deltas;
  proportionIdle: BigNumber;
}

export interface P2PRateComputeParams {
  poolSupplyRatePerYear: BigNumber;
  poolBorrowRatePerYear: BigNumber;
  poolIndex: BigNumber;
  p2pIndex: BigNumber;
  proportionIdle: BigNumber;
  p2pDelta: BigNumber;
  p2pAmount: BigNumber;
  p2pIndexCursor: BigNumber;
  reserveFactor: BigNumber;
}

/** Result of the supply and repay flows. Scaled balances are the user's post-state. */
export interface SupplyRepayResult {
  amount: BigNumber;
  onPool: BigNumber;
  inP2P: BigNumber;
  /** Underlying repaid on the pool on behalf of the optimizer. */
  toRepay: BigNumber;
  /** Underlying supplied on the pool on behalf of the optimizer. */
  toSupply: BigNumber;
  promoted: BigNumber;
  demoted: BigNumber;
  /** Repay only: amount kept as reserve fee. */
  feeRepaid: BigNumber;
  /** Repay only: amount parked as idle supply because of the pool supply cap. */
  idleSupplyIncrease: BigNumber;
}

/** Result of the borrow and withdraw flows. Scaled balances are the user's post-state. */
export interface BorrowWithdrawResult {
  amount: BigNumber;
  onPool: BigNumber;
  inP2P: BigNumber;
  /** Underlying withdrawn from the pool on behalf of the optimizer. */
  toWithdraw: BigNumber;
  /** Underlying borrowed from the pool on behalf of the optimizer. */
  toBorrow: BigNumber;
  promoted: BigNumber;
  demoted: BigNumber;
  idleSupplyDecrease: BigNumber;
}

export interface CollateralResult {
  amount: BigNumber;
  collateral: BigNumber;
}

export interface LiquidateResult {
  repaid: BigNumber;
  seized: BigNumber;
  closeFactor: BigNumber;
}
