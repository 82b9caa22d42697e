import { BigNumber } from "ethers";
import { describe, expect, it } from "vitest";

import { OptimizerEvents } from "../src/p2p-optimizer/events";

import {
  BORROWER,
  DAI,
  SUPPLIER,
  USDC,
  WETH,
  callsOn,
  openBorrow,
  reasonOf,
  setup,
  units,
} from "./helpers";

describe("createMarket", () => {
  it("starts P2P indexes at the pool's", () => {
    const { pool, optimizer } = setup();
    const index = BigNumber.from(10).pow(27).mul(3).div(2);
    pool.listReserve(USDC, {
      decimals: 6,
      indexes: { poolSupplyIndex: index, poolBorrowIndex: index },
    });

    const market = optimizer.createMarket(USDC, BigNumber.from(1_000), BigNumber.from(3_000));

    expect(market.indexes.supply.p2pIndex.eq(index)).toBe(true);
    expect(market.indexes.borrow.p2pIndex.eq(index)).toBe(true);
    expect(market.isCollateral).toBe(false);
    expect(optimizer.marketsCreated).toEqual([DAI, WETH, USDC]);
  });

  it("returns the existing market when created twice", () => {
    const { optimizer } = setup();
    const created: OptimizerEvents["MarketCreated"][] = [];
    optimizer.on("MarketCreated", (payload) => created.push(payload));

    const market = optimizer.createMarket(DAI, BigNumber.from(1_000), BigNumber.from(1_000));

    expect(market.reserveFactor.isZero()).toBe(true);
    expect(created).toEqual([]);
    expect(optimizer.marketsCreated).toEqual([DAI, WETH]);
  });

  it("is rejected for assets the pool does not list or out-of-range parameters", () => {
    const { pool, optimizer } = setup();

    expect(reasonOf(() => optimizer.createMarket(USDC, BigNumber.from(0), BigNumber.from(0)))).toBe(
      "MarketIsNotListedOnPool"
    );

    pool.listReserve(USDC);
    expect(
      reasonOf(() => optimizer.createMarket(USDC, BigNumber.from(10_001), BigNumber.from(0)))
    ).toBe("ExceedsMaxBasisPoints");
    expect(optimizer.market(USDC)).toBeUndefined();
  });
});

describe("pause statuses", () => {
  it("only deprecates a market whose borrowing is paused", () => {
    const { optimizer } = setup();

    expect(reasonOf(() => optimizer.setIsDeprecated(DAI, true))).toBe("BorrowNotPaused");

    optimizer.setPauseStatus(DAI, "isBorrowPaused", true);
    optimizer.setIsDeprecated(DAI, true);

    expect(optimizer.market(DAI)?.pauseStatuses.isDeprecated).toBe(true);
    expect(
      reasonOf(() => optimizer.setPauseStatus(DAI, "isBorrowPaused", false))
    ).toBe("MarketIsDeprecated");
  });

  it("pauses every action at once, but keeps borrowing paused on a deprecated market", () => {
    const { optimizer } = setup();
    const statuses: OptimizerEvents["PauseStatusSet"][] = [];
    optimizer.on("PauseStatusSet", (payload) => statuses.push(payload));

    optimizer.setIsPaused(DAI, true);
    expect(statuses).toHaveLength(8);
    expect(optimizer.market(DAI)?.pauseStatuses.isLiquidateBorrowPaused).toBe(true);

    optimizer.setIsDeprecated(DAI, true);
    optimizer.setIsPaused(DAI, false);

    const pauseStatuses = optimizer.market(DAI)?.pauseStatuses;
    expect(pauseStatuses?.isSupplyPaused).toBe(false);
    expect(pauseStatuses?.isBorrowPaused).toBe(true);
  });

  it("keeps everyone on the pool while P2P is disabled", () => {
    const { optimizer } = setup();
    optimizer.setIsP2PDisabled(DAI, true);
    optimizer.connect(SUPPLIER).supply(DAI, units("1000"), SUPPLIER, 10);

    const result = openBorrow(optimizer, BORROWER, "500");

    expect(result.onPool.eq(units("500"))).toBe(true);
    expect(result.inP2P.isZero()).toBe(true);
    expect(optimizer.balanceOf(DAI, SUPPLIER).scaledPoolSupply.eq(units("1000"))).toBe(true);
  });
});

describe("market parameters", () => {
  it("sets the reserve factor and the P2P index cursor within bounds", () => {
    const { optimizer } = setup();

    optimizer.setReserveFactor(DAI, BigNumber.from(1_000));
    optimizer.setP2PIndexCursor(DAI, BigNumber.from(2_500));

    expect(optimizer.market(DAI)?.reserveFactor.eq(1_000)).toBe(true);
    expect(optimizer.market(DAI)?.p2pIndexCursor.eq(2_500)).toBe(true);
    expect(
      reasonOf(() => optimizer.setReserveFactor(DAI, BigNumber.from(10_001)))
    ).toBe("ExceedsMaxBasisPoints");
    expect(
      reasonOf(() => optimizer.setP2PIndexCursor(USDC, BigNumber.from(0)))
    ).toBe("MarketNotCreated");
  });

  it("toggles collateral status", () => {
    const { optimizer } = setup();

    optimizer.setIsCollateral(WETH, false);

    expect(optimizer.market(WETH)?.isCollateral).toBe(false);
    expect(
      reasonOf(() => optimizer.connect(BORROWER).supplyCollateral(WETH, units("1"), BORROWER))
    ).toBe("AssetNotCollateral");
  });

  it("sets the default iterations", () => {
    const { optimizer } = setup();

    optimizer.setDefaultIterations({ repay: 3, withdraw: 4 });

    expect(optimizer.defaultIterations).toEqual({ repay: 3, withdraw: 4 });
    expect(
      reasonOf(() => optimizer.setDefaultIterations({ repay: -1, withdraw: 4 }))
    ).toBe("InvalidMaxLoops");
  });
});

describe("increaseP2PDeltas", () => {
  it("moves matched liquidity back to the pool on both sides", () => {
    const { pool, optimizer } = setup();
    optimizer.connect(SUPPLIER).supply(DAI, units("1000"), SUPPLIER, 10);
    openBorrow(optimizer, BORROWER, "600");

    const amount = optimizer.increaseP2PDeltas(DAI, units("1000"));

    expect(amount.eq(units("600"))).toBe(true);

    const deltas = optimizer.market(DAI)?.deltas;
    expect(deltas?.supply.scaledDelta.eq(units("600"))).toBe(true);
    expect(deltas?.borrow.scaledDelta.eq(units("600"))).toBe(true);
    expect(deltas?.supply.scaledP2PTotal.eq(units("600"))).toBe(true);
    expect(callsOn(pool, DAI).slice(-2)).toEqual([
      ["borrow", units("600").toString()],
      ["supply", units("600").toString()],
    ]);

    expect(reasonOf(() => optimizer.increaseP2PDeltas(DAI, units("1")))).toBe("AmountIsZero");
  });

  it("makes no pool call when the pool cannot take the supply back", () => {
    const { pool, optimizer } = setup();
    optimizer.connect(SUPPLIER).supply(DAI, units("1000"), SUPPLIER, 10);
    openBorrow(optimizer, BORROWER, "600");
    pool.setConfiguration(DAI, { supplyCap: units("900") });
    const calls = callsOn(pool, DAI);

    expect(reasonOf(() => optimizer.increaseP2PDeltas(DAI, units("600")))).toBe("ExceedsSupplyCap");

    expect(callsOn(pool, DAI)).toEqual(calls);
    expect(pool.getTotalDebt(DAI).isZero()).toBe(true);
    expect(optimizer.market(DAI)?.deltas.supply.scaledDelta.isZero()).toBe(true);
    expect(optimizer.market(DAI)?.deltas.borrow.scaledDelta.isZero()).toBe(true);
  });
});

describe("views", () => {
  it("hand out copies of the committed market", () => {
    const { optimizer } = setup();

    const market = optimizer.market(DAI);
    if (!market) throw new Error("DAI market missing");
    market.deltas.supply.scaledDelta = units("1000000");
    market.pauseStatuses.isSupplyPaused = true;

    const created = optimizer.createMarket(DAI, BigNumber.from(0), BigNumber.from(5_000));
    created.idleSupply = units("1");

    expect(optimizer.market(DAI)?.deltas.supply.scaledDelta.isZero()).toBe(true);
    expect(optimizer.market(DAI)?.pauseStatuses.isSupplyPaused).toBe(false);
    expect(optimizer.market(DAI)?.idleSupply.isZero()).toBe(true);
    expect(
      optimizer.connect(SUPPLIER).supply(DAI, units("1"), SUPPLIER, 10).onPool.eq(units("1"))
    ).toBe(true);
  });
});
