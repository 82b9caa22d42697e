import { BigNumber, constants } from "ethers";

import { PercentMath, WadRayMath } from "@morpho-labs/ethers-utils/lib/maths";

import { Oracle, OracleSentinel, Pool } from "./collaborators";
import {
  DEFAULT_CLOSE_FACTOR,
  DEFAULT_LIQUIDATION_THRESHOLD,
  LT_LOWER_BOUND,
  MAX_CLOSE_FACTOR,
  MIN_LIQUIDATION_THRESHOLD,
} from "./constants";
import { AuthorizationError, PolicyError, ValidationError } from "./errors";
import { computeIndexes } from "./interestRates";
import { StateReader } from "./registry";
import { Indexes, LiquidityData } from "./types";
import { divUp, percentMulDown } from "./utils";

export interface AssetLiquidityData {
  price: BigNumber;
  ltv: BigNumber;
  liquidationThreshold: BigNumber;
  liquidationBonus: BigNumber;
  tokenUnit: BigNumber;
}

const read = (reader: StateReader, underlying: string) => {
  const market = reader.getMarket(underlying);
  const balances = reader.getMarketBalances(underlying);
  if (!market || !balances) throw new ValidationError("MarketNotCreated", underlying);

  return { market, balances };
};

/**
 * Values positions with the oracle and decides what a user may borrow, withdraw or have
 * liquidated. Every computation reads through a `StateReader`, so it sees the draft of the
 * operation being checked.
 */
export class RiskEngine {
  constructor(
    private readonly pool: Pool,
    private readonly oracle: Oracle,
    private readonly sentinel: OracleSentinel | undefined,
    public eModeCategoryId: number
  ) {}

  /** The market's indexes as of now, without storing them. */
  indexesOf(reader: StateReader, underlying: string): Indexes {
    const { market } = read(reader, underlying);

    return computeIndexes(market, this.pool.getReserveIndexes(underlying));
  }

  assetLiquidityData(reader: StateReader, underlying: string): AssetLiquidityData {
    const { market } = read(reader, underlying);
    const config = this.pool.getConfiguration(underlying);
    const inEMode = this.eModeCategoryId !== 0 && config.eModeCategory === this.eModeCategoryId;
    const params = inEMode ? this.pool.getEModeCategory(this.eModeCategoryId) : config;

    return {
      price: this.oracle.price(underlying),
      ltv: market.isCollateral ? params.ltv : constants.Zero,
      liquidationThreshold: market.isCollateral ? params.liquidationThreshold : constants.Zero,
      liquidationBonus: params.liquidationBonus,
      tokenUnit: BigNumber.from(10).pow(config.decimals),
    };
  }

  collateralData(reader: StateReader, underlying: string, user: string) {
    const { balances } = read(reader, underlying);
    const { price, ltv, liquidationThreshold, tokenUnit } = this.assetLiquidityData(
      reader,
      underlying
    );
    const { supply } = this.indexesOf(reader, underlying);

    const rawCollateral = balances
      .collateralBalance(user, supply.poolIndex)
      .mul(price)
      .div(tokenUnit);
    // Valued one basis point below par, to stay on the safe side of the pool's own rounding.
    const collateral = rawCollateral.mul(LT_LOWER_BOUND.sub(1)).div(LT_LOWER_BOUND);

    return {
      borrowable: percentMulDown(collateral, ltv),
      maxDebt: percentMulDown(collateral, liquidationThreshold),
    };
  }

  debtValue(reader: StateReader, underlying: string, user: string) {
    const { balances } = read(reader, underlying);
    const { price, tokenUnit } = this.assetLiquidityData(reader, underlying);
    const { borrow } = this.indexesOf(reader, underlying);

    return divUp(balances.borrowBalance(user, borrow).mul(price), tokenUnit);
  }

  liquidityData(reader: StateReader, user: string): LiquidityData {
    let borrowable = constants.Zero;
    let maxDebt = constants.Zero;
    let debt = constants.Zero;

    for (const underlying of reader.getUserCollaterals(user)) {
      const collateral = this.collateralData(reader, underlying, user);
      borrowable = borrowable.add(collateral.borrowable);
      maxDebt = maxDebt.add(collateral.maxDebt);
    }

    for (const underlying of reader.getUserBorrows(user))
      debt = debt.add(this.debtValue(reader, underlying, user));

    return { borrowable, maxDebt, debt };
  }

  /** In wad; the maximum uint256 when the user has no debt. */
  healthFactor(reader: StateReader, user: string) {
    const { maxDebt, debt } = this.liquidityData(reader, user);
    if (debt.isZero()) return constants.MaxUint256;

    return WadRayMath.wadDiv(maxDebt, debt);
  }

  /** Pool-side conditions a borrow must meet before it is executed. */
  authorizeBorrow(underlying: string, amount: BigNumber) {
    const config = this.pool.getConfiguration(underlying);
    if (!config.borrowingEnabled) throw new PolicyError("BorrowNotEnabled", underlying);

    if (this.eModeCategoryId !== 0 && this.eModeCategoryId !== config.eModeCategory)
      throw new PolicyError("InconsistentEMode", underlying);

    if (this.sentinel && !this.sentinel.isBorrowAllowed())
      throw new AuthorizationError("SentinelBorrowNotEnabled");

    if (
      !config.borrowCap.isZero() &&
      amount.add(this.pool.getTotalDebt(underlying)).gt(config.borrowCap)
    )
      throw new PolicyError("ExceedsBorrowCap", underlying);
  }

  /** Rejects a borrow that left the user's debt above what their collateral allows. */
  validateBorrowLiquidity(reader: StateReader, user: string) {
    const { borrowable, debt } = this.liquidityData(reader, user);
    if (debt.gt(borrowable)) throw new AuthorizationError("UnauthorizedBorrow");
  }

  /** Rejects a collateral withdrawal that left the user liquidatable. */
  validateWithdrawCollateralLiquidity(reader: StateReader, user: string) {
    if (this.healthFactor(reader, user).lt(DEFAULT_LIQUIDATION_THRESHOLD))
      throw new AuthorizationError("UnauthorizedWithdraw");
  }

  /**
   * Decides whether `borrower` can be liquidated on `underlyingBorrowed`.
   *
   * @returns The close factor, in basis points.
   */
  authorizeLiquidate(reader: StateReader, underlyingBorrowed: string, borrower: string) {
    const { market } = read(reader, underlyingBorrowed);
    if (market.pauseStatuses.isDeprecated) return MAX_CLOSE_FACTOR;

    const healthFactor = this.healthFactor(reader, borrower);
    if (healthFactor.gte(DEFAULT_LIQUIDATION_THRESHOLD))
      throw new AuthorizationError("UnauthorizedLiquidate");

    if (healthFactor.gte(MIN_LIQUIDATION_THRESHOLD)) {
      if (this.sentinel && !this.sentinel.isLiquidationAllowed())
        throw new AuthorizationError("SentinelLiquidateNotEnabled");

      return DEFAULT_CLOSE_FACTOR;
    }

    return MAX_CLOSE_FACTOR;
  }

  /**
   * Converts the debt to repay into collateral to seize, bonus included. When the borrower has
   * less collateral than that, all of it is seized and the amount to repay is scaled down.
   */
  calculateAmountToSeize(
    reader: StateReader,
    underlyingBorrowed: string,
    underlyingCollateral: string,
    maxToRepay: BigNumber,
    borrower: string,
    poolSupplyIndex: BigNumber
  ) {
    const borrowed = this.assetLiquidityData(reader, underlyingBorrowed);
    const collateral = this.assetLiquidityData(reader, underlyingCollateral);
    const { balances } = read(reader, underlyingCollateral);

    let amountToRepay = maxToRepay;
    let amountToSeize = PercentMath.percentMul(
      amountToRepay
        .mul(borrowed.price)
        .mul(collateral.tokenUnit)
        .div(borrowed.tokenUnit.mul(collateral.price)),
      collateral.liquidationBonus
    );

    const collateralBalance = balances.collateralBalance(borrower, poolSupplyIndex);
    if (amountToSeize.gt(collateralBalance)) {
      amountToSeize = collateralBalance;
      amountToRepay = PercentMath.percentDiv(
        collateralBalance
          .mul(borrowed.tokenUnit)
          .mul(collateral.price)
          .div(borrowed.price.mul(collateral.tokenUnit)),
        collateral.liquidationBonus
      );
    }

    return { amountToRepay, amountToSeize };
  }
}
