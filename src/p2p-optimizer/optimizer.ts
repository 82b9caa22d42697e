import { BigNumber, constants, utils } from "ethers";
import { Logger } from "winston";

import { PercentMath } from "@morpho-labs/ethers-utils/lib/maths";
import { minBN } from "@morpho-labs/ethers-utils/lib/utils";

import { OptimizerConfig, loadConfig } from "../config";
import { createLogger } from "../logger";

import { Oracle, OracleSentinel, PermissionLayer, Pool } from "./collaborators";
import { increaseDelta } from "./deltas";
import { AuthorizationError, PolicyError, ValidationError, isOptimizerError } from "./errors";
import { OptimizerEventEmitter, OptimizerEventName, OptimizerEvents } from "./events";
import { RiskEngine } from "./health";
import { computeIndexes } from "./interestRates";
import { MatchingEngine } from "./matching";
import { PositionsManager } from "./positions";
import { Draft, MarketRegistry, PoolAction, StateReader, cloneMarket } from "./registry";
import {
  BorrowWithdrawResult,
  CollateralResult,
  Iterations,
  LiquidateResult,
  Market,
  PauseFlag,
  SupplyRepayResult,
} from "./types";
import { rayMulDown, zeroFloorSub } from "./utils";

export interface P2POptimizerOptions {
  pool: Pool;
  oracle: Oracle;
  managers: PermissionLayer;
  sentinel?: OracleSentinel;
  config?: OptimizerConfig;
  logger?: Logger;
}

const PAUSE_FLAGS: readonly PauseFlag[] = [
  "isSupplyPaused",
  "isSupplyCollateralPaused",
  "isBorrowPaused",
  "isRepayPaused",
  "isWithdrawPaused",
  "isWithdrawCollateralPaused",
  "isLiquidateCollateralPaused",
  "isLiquidateBorrowPaused",
];

const toAddress = (value: string) => {
  let address: string;
  try {
    address = utils.getAddress(value);
  } catch {
    throw new ValidationError("InvalidAddress", value);
  }
  if (address === constants.AddressZero) throw new ValidationError("AddressIsZero");

  return address;
};

const validateAmount = (amount: BigNumber) => {
  if (amount.lte(0)) throw new ValidationError("AmountIsZero");
};

const validateMaxLoops = (maxLoops: number) => {
  if (!Number.isInteger(maxLoops) || maxLoops < 0)
    throw new ValidationError("InvalidMaxLoops", String(maxLoops));
};

const validateBasisPoints = (value: BigNumber) => {
  if (value.lt(0) || value.gt(PercentMath.BASE_PERCENT))
    throw new ValidationError("ExceedsMaxBasisPoints", value.toString());
};

const marketOf = (reader: StateReader, underlying: string) => {
  const market = reader.getMarket(underlying);
  if (!market) throw new ValidationError("MarketNotCreated", underlying);

  return market;
};

const balancesOf = (reader: StateReader, underlying: string) => {
  const balances = reader.getMarketBalances(underlying);
  if (!balances) throw new ValidationError("MarketNotCreated", underlying);

  return balances;
};

/**
 * Matches suppliers and borrowers of the same asset peer-to-peer on top of a lending pool, and
 * falls back to the pool for whatever is left unmatched.
 *
 * Every mutating operation runs against a draft of the registry. The pool calls a flow needs are
 * queued and checked against the reserve's caps while the draft is open, so a flow the pool would
 * reject fails before anything is committed. The draft is then published and the pool calls are
 * made; if one of them still throws, the publication is rolled back. Events reach listeners only
 * after that.
 */
export class P2POptimizer {
  readonly pool: Pool;
  readonly oracle: Oracle;
  readonly managers: PermissionLayer;

  private readonly registry = new MarketRegistry();
  private readonly events = new OptimizerEventEmitter();
  private readonly matching: MatchingEngine;
  private readonly positions: PositionsManager;
  private readonly risk: RiskEngine;
  private readonly logger: Logger;

  private iterations: Iterations;
  private entered = false;

  constructor({
    pool,
    oracle,
    managers,
    sentinel,
    config = loadConfig(),
    logger,
  }: P2POptimizerOptions) {
    this.pool = pool;
    this.oracle = oracle;
    this.managers = managers;
    this.logger = logger ?? createLogger(config.logLevel);
    this.iterations = { ...config.defaultIterations };

    this.matching = new MatchingEngine(config.maxSortedUsers);
    this.positions = new PositionsManager(this.matching, pool);
    this.risk = new RiskEngine(pool, oracle, sentinel, config.eModeCategoryId);
  }

  /* EVENTS */

  on<K extends OptimizerEventName>(name: K, listener: (payload: OptimizerEvents[K]) => void) {
    this.events.on(name, listener);
    return this;
  }

  once<K extends OptimizerEventName>(name: K, listener: (payload: OptimizerEvents[K]) => void) {
    this.events.once(name, listener);
    return this;
  }

  off<K extends OptimizerEventName>(name: K, listener: (payload: OptimizerEvents[K]) => void) {
    this.events.off(name, listener);
    return this;
  }

  /** Binds the user-facing flows to the address performing them. */
  connect(sender: string) {
    return new OptimizerSession(this, toAddress(sender));
  }

  /* VIEWS */

  get marketsCreated() {
    return this.registry.marketsCreated;
  }

  get defaultIterations(): Iterations {
    return { ...this.iterations };
  }

  /** A copy of the market's committed state. */
  market(underlying: string) {
    const market = this.registry.getMarket(toAddress(underlying));

    return market && cloneMarket(market);
  }

  balanceOf(underlying: string, user: string) {
    return balancesOf(this.registry, toAddress(underlying)).balanceOf(toAddress(user));
  }

  /** Scaled balances summed over every user of the market. */
  scaledTotals(underlying: string) {
    return balancesOf(this.registry, toAddress(underlying)).scaledTotals();
  }

  userCollaterals(user: string) {
    return [...this.registry.getUserCollaterals(toAddress(user))];
  }

  userBorrows(user: string) {
    return [...this.registry.getUserBorrows(toAddress(user))];
  }

  /** The market's indexes brought up to the pool's, without storing them. */
  updatedIndexes(underlying: string) {
    return this.risk.indexesOf(this.registry, toAddress(underlying));
  }

  liquidityData(user: string) {
    return this.risk.liquidityData(this.registry, toAddress(user));
  }

  healthFactor(user: string) {
    return this.risk.healthFactor(this.registry, toAddress(user));
  }

  assetLiquidityData(underlying: string) {
    return this.risk.assetLiquidityData(this.registry, toAddress(underlying));
  }

  /* USER FLOWS */

  supply(
    sender: string,
    underlying: string,
    amount: BigNumber,
    onBehalf: string,
    maxLoops: number
  ) {
    return this.transact("supply", (tx): SupplyRepayResult => {
      sender = toAddress(sender);
      underlying = toAddress(underlying);
      onBehalf = toAddress(onBehalf);
      validateAmount(amount);
      validateMaxLoops(maxLoops);

      const market = marketOf(tx, underlying);
      if (market.pauseStatuses.isSupplyPaused) throw new PolicyError("SupplyIsPaused", underlying);

      this.updateIndexes(tx, underlying);

      const result = this.positions.executeSupply(tx, underlying, amount, onBehalf, maxLoops);
      this.interact(tx, "repay", underlying, result.toRepay);
      this.interact(tx, "supply", underlying, result.toSupply);

      tx.push("Supplied", {
        from: sender,
        onBehalf,
        underlying,
        amount,
        scaledOnPool: result.onPool,
        scaledInP2P: result.inP2P,
      });
      this.logger.debug("supply", {
        underlying,
        onBehalf,
        amount: amount.toString(),
        toRepay: result.toRepay.toString(),
        toSupply: result.toSupply.toString(),
      });

      return result;
    });
  }

  supplyCollateral(sender: string, underlying: string, amount: BigNumber, onBehalf: string) {
    return this.transact("supplyCollateral", (tx): CollateralResult => {
      sender = toAddress(sender);
      underlying = toAddress(underlying);
      onBehalf = toAddress(onBehalf);
      validateAmount(amount);

      const market = marketOf(tx, underlying);
      if (market.pauseStatuses.isSupplyCollateralPaused)
        throw new PolicyError("SupplyCollateralIsPaused", underlying);
      if (!market.isCollateral) throw new PolicyError("AssetNotCollateral", underlying);

      this.updateIndexes(tx, underlying);

      const result = this.positions.executeSupplyCollateral(tx, underlying, amount, onBehalf);
      this.interact(tx, "supply", underlying, amount);

      tx.push("CollateralSupplied", {
        from: sender,
        onBehalf,
        underlying,
        amount,
        scaledBalance: result.collateral,
      });
      this.logger.debug("supplyCollateral", { underlying, onBehalf, amount: amount.toString() });

      return result;
    });
  }

  borrow(
    sender: string,
    underlying: string,
    amount: BigNumber,
    onBehalf: string,
    receiver: string,
    maxLoops: number
  ) {
    return this.transact("borrow", (tx): BorrowWithdrawResult => {
      sender = toAddress(sender);
      underlying = toAddress(underlying);
      onBehalf = toAddress(onBehalf);
      receiver = toAddress(receiver);
      validateAmount(amount);
      validateMaxLoops(maxLoops);

      const market = marketOf(tx, underlying);
      if (market.pauseStatuses.isBorrowPaused) throw new PolicyError("BorrowIsPaused", underlying);
      this.validatePermission(sender, onBehalf);

      this.risk.authorizeBorrow(underlying, amount);
      this.updateIndexes(tx, underlying);

      const result = this.positions.executeBorrow(tx, underlying, amount, onBehalf, maxLoops);
      this.risk.validateBorrowLiquidity(tx, onBehalf);

      this.interact(tx, "withdraw", underlying, result.toWithdraw);
      this.interact(tx, "borrow", underlying, result.toBorrow);

      tx.push("Borrowed", {
        caller: sender,
        onBehalf,
        receiver,
        underlying,
        amount,
        scaledOnPool: result.onPool,
        scaledInP2P: result.inP2P,
      });
      this.logger.debug("borrow", {
        underlying,
        onBehalf,
        amount: amount.toString(),
        idleSupplyDecrease: result.idleSupplyDecrease.toString(),
        toWithdraw: result.toWithdraw.toString(),
        toBorrow: result.toBorrow.toString(),
      });

      return result;
    });
  }

  /** Repays at most the debt of `onBehalf`; `maxLoops` defaults to the repay iterations. */
  repay(
    sender: string,
    underlying: string,
    amount: BigNumber,
    onBehalf: string,
    maxLoops = this.iterations.repay
  ) {
    return this.transact("repay", (tx): SupplyRepayResult => {
      sender = toAddress(sender);
      underlying = toAddress(underlying);
      onBehalf = toAddress(onBehalf);
      validateAmount(amount);
      validateMaxLoops(maxLoops);

      const market = marketOf(tx, underlying);
      if (market.pauseStatuses.isRepayPaused) throw new PolicyError("RepayIsPaused", underlying);

      const indexes = this.updateIndexes(tx, underlying);
      const debt = balancesOf(tx, underlying).borrowBalance(onBehalf, indexes.borrow);
      if (debt.isZero()) throw new ValidationError("DebtIsZero", onBehalf);

      amount = minBN(amount, debt);

      const result = this.positions.executeRepay(tx, underlying, amount, onBehalf, maxLoops);
      this.interact(tx, "repay", underlying, result.toRepay);
      this.interact(tx, "supply", underlying, result.toSupply);

      tx.push("Repaid", {
        repayer: sender,
        onBehalf,
        underlying,
        amount,
        scaledOnPool: result.onPool,
        scaledInP2P: result.inP2P,
      });
      this.logger.debug("repay", {
        underlying,
        onBehalf,
        amount: amount.toString(),
        toRepay: result.toRepay.toString(),
        feeRepaid: result.feeRepaid.toString(),
        toSupply: result.toSupply.toString(),
        idleSupplyIncrease: result.idleSupplyIncrease.toString(),
      });

      return result;
    });
  }

  /** Withdraws at most the supply of `onBehalf`; `maxLoops` defaults to the withdraw iterations. */
  withdraw(
    sender: string,
    underlying: string,
    amount: BigNumber,
    onBehalf: string,
    receiver: string,
    maxLoops = this.iterations.withdraw
  ) {
    return this.transact("withdraw", (tx): BorrowWithdrawResult => {
      sender = toAddress(sender);
      underlying = toAddress(underlying);
      onBehalf = toAddress(onBehalf);
      receiver = toAddress(receiver);
      validateAmount(amount);
      validateMaxLoops(maxLoops);

      const market = marketOf(tx, underlying);
      if (market.pauseStatuses.isWithdrawPaused)
        throw new PolicyError("WithdrawIsPaused", underlying);
      this.validatePermission(sender, onBehalf);

      const indexes = this.updateIndexes(tx, underlying);
      const supplied = balancesOf(tx, underlying).supplyBalance(onBehalf, indexes.supply);
      if (supplied.isZero()) throw new ValidationError("SupplyIsZero", onBehalf);

      amount = minBN(amount, supplied);

      const result = this.positions.executeWithdraw(tx, underlying, amount, onBehalf, maxLoops);
      this.interact(tx, "withdraw", underlying, result.toWithdraw);
      this.interact(tx, "borrow", underlying, result.toBorrow);

      tx.push("Withdrawn", {
        caller: sender,
        onBehalf,
        receiver,
        underlying,
        amount,
        scaledOnPool: result.onPool,
        scaledInP2P: result.inP2P,
      });
      this.logger.debug("withdraw", {
        underlying,
        onBehalf,
        amount: amount.toString(),
        toWithdraw: result.toWithdraw.toString(),
        idleSupplyDecrease: result.idleSupplyDecrease.toString(),
        toBorrow: result.toBorrow.toString(),
      });

      return result;
    });
  }

  withdrawCollateral(
    sender: string,
    underlying: string,
    amount: BigNumber,
    onBehalf: string,
    receiver: string
  ) {
    return this.transact("withdrawCollateral", (tx): CollateralResult => {
      sender = toAddress(sender);
      underlying = toAddress(underlying);
      onBehalf = toAddress(onBehalf);
      receiver = toAddress(receiver);
      validateAmount(amount);

      const market = marketOf(tx, underlying);
      if (market.pauseStatuses.isWithdrawCollateralPaused)
        throw new PolicyError("WithdrawCollateralIsPaused", underlying);
      this.validatePermission(sender, onBehalf);

      const indexes = this.updateIndexes(tx, underlying);
      const collateral = balancesOf(tx, underlying).collateralBalance(
        onBehalf,
        indexes.supply.poolIndex
      );
      if (collateral.isZero()) throw new ValidationError("CollateralIsZero", onBehalf);

      amount = minBN(amount, collateral);

      const result = this.positions.executeWithdrawCollateral(tx, underlying, amount, onBehalf);
      this.risk.validateWithdrawCollateralLiquidity(tx, onBehalf);

      this.interact(tx, "withdraw", underlying, amount);

      tx.push("CollateralWithdrawn", {
        caller: sender,
        onBehalf,
        receiver,
        underlying,
        amount,
        scaledBalance: result.collateral,
      });
      this.logger.debug("withdrawCollateral", { underlying, onBehalf, amount: amount.toString() });

      return result;
    });
  }

  liquidate(
    sender: string,
    underlyingBorrowed: string,
    underlyingCollateral: string,
    borrower: string,
    maxDebtToCover: BigNumber
  ) {
    return this.transact("liquidate", (tx): LiquidateResult => {
      sender = toAddress(sender);
      underlyingBorrowed = toAddress(underlyingBorrowed);
      underlyingCollateral = toAddress(underlyingCollateral);
      borrower = toAddress(borrower);
      validateAmount(maxDebtToCover);

      const borrowMarket = marketOf(tx, underlyingBorrowed);
      const collateralMarket = marketOf(tx, underlyingCollateral);
      if (borrowMarket.pauseStatuses.isLiquidateBorrowPaused)
        throw new PolicyError("LiquidateBorrowIsPaused", underlyingBorrowed);
      if (collateralMarket.pauseStatuses.isLiquidateCollateralPaused)
        throw new PolicyError("LiquidateCollateralIsPaused", underlyingCollateral);

      const borrowIndexes = this.updateIndexes(tx, underlyingBorrowed);
      const collateralIndexes = this.updateIndexes(tx, underlyingCollateral);

      const closeFactor = this.risk.authorizeLiquidate(tx, underlyingBorrowed, borrower);

      const debt = balancesOf(tx, underlyingBorrowed).borrowBalance(borrower, borrowIndexes.borrow);
      const { amountToRepay, amountToSeize } = this.risk.calculateAmountToSeize(
        tx,
        underlyingBorrowed,
        underlyingCollateral,
        minBN(PercentMath.percentMul(debt, closeFactor), maxDebtToCover),
        borrower,
        collateralIndexes.supply.poolIndex
      );
      if (amountToRepay.isZero()) throw new ValidationError("AmountIsZero", "nothing to liquidate");

      const repaid = this.positions.executeRepay(
        tx,
        underlyingBorrowed,
        amountToRepay,
        borrower,
        0
      );
      this.interact(tx, "repay", underlyingBorrowed, repaid.toRepay);
      this.interact(tx, "supply", underlyingBorrowed, repaid.toSupply);

      const seized = this.positions.executeWithdrawCollateral(
        tx,
        underlyingCollateral,
        amountToSeize,
        borrower
      );
      this.interact(tx, "withdraw", underlyingCollateral, amountToSeize);

      tx.push("Repaid", {
        repayer: sender,
        onBehalf: borrower,
        underlying: underlyingBorrowed,
        amount: amountToRepay,
        scaledOnPool: repaid.onPool,
        scaledInP2P: repaid.inP2P,
      });
      tx.push("CollateralWithdrawn", {
        caller: sender,
        onBehalf: borrower,
        receiver: sender,
        underlying: underlyingCollateral,
        amount: amountToSeize,
        scaledBalance: seized.collateral,
      });
      tx.push("Liquidated", {
        liquidator: sender,
        borrower,
        underlyingBorrowed,
        amountLiquidated: amountToRepay,
        underlyingCollateral,
        amountSeized: amountToSeize,
      });
      this.logger.debug("liquidate", {
        borrower,
        underlyingBorrowed,
        underlyingCollateral,
        closeFactor: closeFactor.toString(),
        repaid: amountToRepay.toString(),
        seized: amountToSeize.toString(),
      });

      return { repaid: amountToRepay, seized: amountToSeize, closeFactor };
    });
  }

  /* GOVERNANCE */

  /**
   * Lists `underlying`. Creating a market that already exists leaves it unchanged.
   *
   * @returns A copy of the market's state.
   */
  createMarket(underlying: string, reserveFactor: BigNumber, p2pIndexCursor: BigNumber) {
    return this.transact("createMarket", (tx): Market => {
      underlying = toAddress(underlying);

      const existing = tx.getMarket(underlying);
      if (existing) return cloneMarket(existing);

      validateBasisPoints(reserveFactor);
      validateBasisPoints(p2pIndexCursor);
      if (!this.pool.isListed(underlying))
        throw new ValidationError("MarketIsNotListedOnPool", underlying);

      const { poolSupplyIndex, poolBorrowIndex } = this.pool.getReserveIndexes(underlying);
      const market: Market = {
        underlying,
        indexes: {
          supply: { poolIndex: poolSupplyIndex, p2pIndex: poolSupplyIndex },
          borrow: { poolIndex: poolBorrowIndex, p2pIndex: poolBorrowIndex },
        },
        deltas: {
          supply: { scaledDelta: constants.Zero, scaledP2PTotal: constants.Zero },
          borrow: { scaledDelta: constants.Zero, scaledP2PTotal: constants.Zero },
        },
        pauseStatuses: {
          isSupplyPaused: false,
          isSupplyCollateralPaused: false,
          isBorrowPaused: false,
          isRepayPaused: false,
          isWithdrawPaused: false,
          isWithdrawCollateralPaused: false,
          isLiquidateCollateralPaused: false,
          isLiquidateBorrowPaused: false,
          isP2PDisabled: false,
          isDeprecated: false,
        },
        isCollateral: false,
        reserveFactor,
        p2pIndexCursor,
        idleSupply: constants.Zero,
      };
      tx.addMarket(market);

      tx.push("MarketCreated", { underlying });
      this.logger.info("market created", {
        underlying,
        reserveFactor: reserveFactor.toString(),
        p2pIndexCursor: p2pIndexCursor.toString(),
      });

      return cloneMarket(market);
    });
  }

  setPauseStatus(underlying: string, flag: PauseFlag, isPaused: boolean) {
    this.transact("setPauseStatus", (tx) => {
      underlying = toAddress(underlying);

      const market = tx.editMarket(underlying);
      if (flag === "isBorrowPaused" && !isPaused && market.pauseStatuses.isDeprecated)
        throw new PolicyError("MarketIsDeprecated", underlying);

      this.setFlag(tx, market, flag, isPaused);
    });
  }

  /**
   * Pauses or unpauses every action of the market. Borrowing stays paused on a deprecated
   * market.
   */
  setIsPaused(underlying: string, isPaused: boolean) {
    this.transact("setIsPaused", (tx) => {
      underlying = toAddress(underlying);

      const market = tx.editMarket(underlying);
      for (const flag of PAUSE_FLAGS) {
        if (flag === "isBorrowPaused" && market.pauseStatuses.isDeprecated) continue;

        this.setFlag(tx, market, flag, isPaused);
      }
    });
  }

  setIsP2PDisabled(underlying: string, isP2PDisabled: boolean) {
    this.transact("setIsP2PDisabled", (tx) => {
      underlying = toAddress(underlying);

      this.setFlag(tx, tx.editMarket(underlying), "isP2PDisabled", isP2PDisabled);
    });
  }

  /**
   * A deprecated market can be fully liquidated regardless of health factor. Borrowing must be
   * paused first.
   */
  setIsDeprecated(underlying: string, isDeprecated: boolean) {
    this.transact("setIsDeprecated", (tx) => {
      underlying = toAddress(underlying);

      const market = tx.editMarket(underlying);
      if (!market.pauseStatuses.isBorrowPaused)
        throw new PolicyError("BorrowNotPaused", underlying);

      this.setFlag(tx, market, "isDeprecated", isDeprecated);
    });
  }

  setIsCollateral(underlying: string, isCollateral: boolean) {
    this.transact("setIsCollateral", (tx) => {
      underlying = toAddress(underlying);

      tx.editMarket(underlying).isCollateral = isCollateral;

      tx.push("IsCollateralSet", { underlying, isCollateral });
      this.logger.info("collateral status set", { underlying, isCollateral });
    });
  }

  setReserveFactor(underlying: string, reserveFactor: BigNumber) {
    this.transact("setReserveFactor", (tx) => {
      underlying = toAddress(underlying);
      validateBasisPoints(reserveFactor);

      this.updateIndexes(tx, underlying);
      tx.editMarket(underlying).reserveFactor = reserveFactor;

      tx.push("ReserveFactorSet", { underlying, reserveFactor });
      this.logger.info("reserve factor set", {
        underlying,
        reserveFactor: reserveFactor.toString(),
      });
    });
  }

  setP2PIndexCursor(underlying: string, p2pIndexCursor: BigNumber) {
    this.transact("setP2PIndexCursor", (tx) => {
      underlying = toAddress(underlying);
      validateBasisPoints(p2pIndexCursor);

      this.updateIndexes(tx, underlying);
      tx.editMarket(underlying).p2pIndexCursor = p2pIndexCursor;

      tx.push("P2PIndexCursorSet", { underlying, p2pIndexCursor });
      this.logger.info("p2p index cursor set", {
        underlying,
        p2pIndexCursor: p2pIndexCursor.toString(),
      });
    });
  }

  setDefaultIterations(iterations: Iterations) {
    this.transact("setDefaultIterations", (tx) => {
      validateMaxLoops(iterations.repay);
      validateMaxLoops(iterations.withdraw);

      this.iterations = { ...iterations };

      tx.push("DefaultIterationsSet", { ...iterations });
      this.logger.info("default iterations set", iterations);
    });
  }

  /**
   * Unmatches up to `amount` on both sides at once: the matched volume is borrowed and supplied
   * back on the pool, and recorded as delta on each side.
   *
   * @returns The amount actually moved, capped at what is matched net of deltas and idle supply.
   */
  increaseP2PDeltas(underlying: string, amount: BigNumber) {
    return this.transact("increaseP2PDeltas", (tx) => {
      underlying = toAddress(underlying);
      validateAmount(amount);
      marketOf(tx, underlying);

      const indexes = this.updateIndexes(tx, underlying);
      const market = tx.editMarket(underlying);
      const { supply, borrow } = market.deltas;

      const matchedSupply = zeroFloorSub(
        zeroFloorSub(
          rayMulDown(supply.scaledP2PTotal, indexes.supply.p2pIndex),
          rayMulDown(supply.scaledDelta, indexes.supply.poolIndex)
        ),
        market.idleSupply
      );
      const matchedBorrow = zeroFloorSub(
        rayMulDown(borrow.scaledP2PTotal, indexes.borrow.p2pIndex),
        rayMulDown(borrow.scaledDelta, indexes.borrow.poolIndex)
      );

      amount = minBN(amount, minBN(matchedSupply, matchedBorrow));
      if (amount.isZero())
        throw new ValidationError("AmountIsZero", "nothing matched peer-to-peer");

      increaseDelta(market, "supply", amount, indexes.supply, tx);
      increaseDelta(market, "borrow", amount, indexes.borrow, tx);

      this.interact(tx, "borrow", underlying, amount);
      this.interact(tx, "supply", underlying, amount);

      tx.push("P2PDeltasIncreased", { underlying, amount });
      this.logger.info("p2p deltas increased", { underlying, amount: amount.toString() });

      return amount;
    });
  }

  /* INTERNAL */

  /**
   * Runs `body` against a fresh draft, publishes the draft, then makes the pool calls it queued.
   * Nested mutating calls, e.g. from a pool calling back in, are rejected.
   */
  private transact<T>(operation: string, body: (tx: Draft) => T): T {
    const { tx, result } = this.guarded(operation, () => {
      const tx = new Draft(this.registry);
      try {
        const result = body(tx);

        const restore = this.registry.publish(tx.changes());
        try {
          tx.runInteractions();
        } catch (error) {
          restore();
          throw error;
        }

        return { tx, result };
      } catch (error) {
        tx.rollback();
        throw error;
      } finally {
        tx.release();
      }
    });

    tx.dispatch(this.events, (name, error) => {
      this.logger.error(`${name} listener failed`, {
        operation,
        error: error instanceof Error ? error.message : String(error),
      });
    });

    return result;
  }

  private guarded<T>(operation: string, run: () => T): T {
    if (this.entered) throw new PolicyError("ReentrantCall", operation);

    this.entered = true;
    try {
      return run();
    } catch (error) {
      this.logger.debug(`${operation} reverted`, {
        reason: isOptimizerError(error) ? error.reason : String(error),
      });
      throw error;
    } finally {
      this.entered = false;
    }
  }

  /** Brings the market's stored indexes up to the pool's. */
  private updateIndexes(tx: Draft, underlying: string) {
    const market = marketOf(tx, underlying);
    const indexes = computeIndexes(market, this.pool.getReserveIndexes(underlying));
    if (indexes === market.indexes) return indexes;

    tx.editMarket(underlying).indexes = indexes;
    tx.push("IndexesUpdated", { underlying, indexes });

    return indexes;
  }

  /** Queues a pool call, rejecting it now if the reserve's caps would not take it. */
  private interact(tx: Draft, action: PoolAction, underlying: string, amount: BigNumber) {
    if (amount.isZero()) return;

    const pending = tx.interact(action, underlying, amount, () =>
      this.pool[action](underlying, amount)
    );
    const { supplyCap, borrowCap } = this.pool.getConfiguration(underlying);

    if (
      action === "supply" &&
      !supplyCap.isZero() &&
      this.pool.getTotalSupply(underlying).add(pending.supplied).gt(supplyCap)
    )
      throw new PolicyError("ExceedsSupplyCap", underlying);

    if (
      action === "borrow" &&
      !borrowCap.isZero() &&
      this.pool.getTotalDebt(underlying).add(pending.borrowed).gt(borrowCap)
    )
      throw new PolicyError("ExceedsBorrowCap", underlying);
  }

  private validatePermission(sender: string, onBehalf: string) {
    if (sender !== onBehalf && !this.managers.isManagedBy(onBehalf, sender))
      throw new AuthorizationError("PermissionDenied", `${sender} cannot manage ${onBehalf}`);
  }

  private setFlag(
    tx: Draft,
    market: Market,
    flag: PauseFlag | "isP2PDisabled" | "isDeprecated",
    value: boolean
  ) {
    market.pauseStatuses[flag] = value;

    tx.push("PauseStatusSet", { underlying: market.underlying, flag, value });
    this.logger.info("pause status set", { underlying: market.underlying, flag, value });
  }
}

/** The user flows of a `P2POptimizer`, performed by one address. */
export class OptimizerSession {
  constructor(private readonly optimizer: P2POptimizer, readonly sender: string) {}

  supply(underlying: string, amount: BigNumber, onBehalf: string, maxLoops: number) {
    return this.optimizer.supply(this.sender, underlying, amount, onBehalf, maxLoops);
  }

  supplyCollateral(underlying: string, amount: BigNumber, onBehalf: string) {
    return this.optimizer.supplyCollateral(this.sender, underlying, amount, onBehalf);
  }

  borrow(
    underlying: string,
    amount: BigNumber,
    onBehalf: string,
    receiver: string,
    maxLoops: number
  ) {
    return this.optimizer.borrow(this.sender, underlying, amount, onBehalf, receiver, maxLoops);
  }

  repay(underlying: string, amount: BigNumber, onBehalf: string, maxLoops?: number) {
    return this.optimizer.repay(this.sender, underlying, amount, onBehalf, maxLoops);
  }

  withdraw(
    underlying: string,
    amount: BigNumber,
    onBehalf: string,
    receiver: string,
    maxLoops?: number
  ) {
    return this.optimizer.withdraw(this.sender, underlying, amount, onBehalf, receiver, maxLoops);
  }

  withdrawCollateral(underlying: string, amount: BigNumber, onBehalf: string, receiver: string) {
    return this.optimizer.withdrawCollateral(this.sender, underlying, amount, onBehalf, receiver);
  }

  liquidate(
    underlyingBorrowed: string,
    underlyingCollateral: string,
    borrower: string,
    maxDebtToCover: BigNumber
  ) {
    return this.optimizer.liquidate(
      this.sender,
      underlyingBorrowed,
      underlyingCollateral,
      borrower,
      maxDebtToCover
    );
  }
}
