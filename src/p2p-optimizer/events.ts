import { EventEmitter } from "events";

import { BigNumber } from "ethers";

import { Indexes, PauseFlag } from "./types";

export interface OptimizerEvents {
  Supplied: {
    from: string;
    onBehalf: string;
    underlying: string;
    amount: BigNumber;
    scaledOnPool: BigNumber;
    scaledInP2P: BigNumber;
  };
  CollateralSupplied: {
    from: string;
    onBehalf: string;
    underlying: string;
    amount: BigNumber;
    scaledBalance: BigNumber;
  };
  Borrowed: {
    caller: string;
    onBehalf: string;
    receiver: string;
    underlying: string;
    amount: BigNumber;
    scaledOnPool: BigNumber;
    scaledInP2P: BigNumber;
  };
  Repaid: {
    repayer: string;
    onBehalf: string;
    underlying: string;
    amount: BigNumber;
    scaledOnPool: BigNumber;
    scaledInP2P: BigNumber;
  };
  Withdrawn: {
    caller: string;
    onBehalf: string;
    receiver: string;
    underlying: string;
    amount: BigNumber;
    scaledOnPool: BigNumber;
    scaledInP2P: BigNumber;
  };
  CollateralWithdrawn: {
    caller: string;
    onBehalf: string;
    receiver: string;
    underlying: string;
    amount: BigNumber;
    scaledBalance: BigNumber;
  };
  Liquidated: {
    liquidator: string;
    borrower: string;
    underlyingBorrowed: string;
    amountLiquidated: BigNumber;
    underlyingCollateral: string;
    amountSeized: BigNumber;
  };
  PositionUpdated: {
    borrow: boolean;
    user: string;
    underlying: string;
    scaledOnPool: BigNumber;
    scaledInP2P: BigNumber;
  };
  P2PTotalsUpdated: {
    underlying: string;
    scaledTotalSupplyP2P: BigNumber;
    scaledTotalBorrowP2P: BigNumber;
  };
  P2PSupplyDeltaUpdated: { underlying: string; scaledDelta: BigNumber };
  P2PBorrowDeltaUpdated: { underlying: string; scaledDelta: BigNumber };
  P2PDeltasIncreased: { underlying: string; amount: BigNumber };
  IdleSupplyUpdated: { underlying: string; idleSupply: BigNumber };
  IndexesUpdated: { underlying: string; indexes: Indexes };
  MarketCreated: { underlying: string };
  IsCollateralSet: { underlying: string; isCollateral: boolean };
  PauseStatusSet: {
    underlying: string;
    flag: PauseFlag | "isP2PDisabled" | "isDeprecated";
    value: boolean;
  };
  ReserveFactorSet: { underlying: string; reserveFactor: BigNumber };
  P2PIndexCursorSet: { underlying: string; p2pIndexCursor: BigNumber };
  DefaultIterationsSet: { repay: number; withdraw: number };
}

export type OptimizerEventName = keyof OptimizerEvents;

/**
 * Where state changes report what they did. Events only reach listeners once the operation
 * commits.
 */
export interface EventQueue {
  push<K extends OptimizerEventName>(name: K, payload: OptimizerEvents[K]): void;
}

export class OptimizerEventEmitter {
  private readonly emitter = new EventEmitter();

  on<K extends OptimizerEventName>(name: K, listener: (payload: OptimizerEvents[K]) => void) {
    this.emitter.on(name, listener);
    return this;
  }

  once<K extends OptimizerEventName>(name: K, listener: (payload: OptimizerEvents[K]) => void) {
    this.emitter.once(name, listener);
    return this;
  }

  off<K extends OptimizerEventName>(name: K, listener: (payload: OptimizerEvents[K]) => void) {
    this.emitter.off(name, listener);
    return this;
  }

  emit<K extends OptimizerEventName>(name: K, payload: OptimizerEvents[K]) {
    return this.emitter.emit(name, payload);
  }
}
