import { describe, expect, it } from "vitest";

import { OptimizerEvents } from "../src/p2p-optimizer/events";

import {
  BORROWER,
  DAI,
  MANAGER,
  SUPPLIER,
  WETH,
  callsOn,
  openBorrow,
  reasonOf,
  setup,
  units,
} from "./helpers";

describe("supplyCollateral", () => {
  it("supplies on the pool and registers the collateral", () => {
    const { pool, optimizer } = setup();
    const supplied: OptimizerEvents["CollateralSupplied"][] = [];
    optimizer.on("CollateralSupplied", (payload) => supplied.push(payload));

    const result = optimizer.connect(BORROWER).supplyCollateral(WETH, units("1"), BORROWER);

    expect(result.collateral.eq(units("1"))).toBe(true);
    expect(optimizer.userCollaterals(BORROWER)).toEqual([WETH]);
    expect(callsOn(pool, WETH)).toEqual([["supply", units("1").toString()]]);
    expect(supplied[0].scaledBalance.eq(units("1"))).toBe(true);
  });

  it("is never matched peer-to-peer", () => {
    const { optimizer } = setup();
    openBorrow(optimizer, BORROWER, "100");
    optimizer.connect(BORROWER).borrow(WETH, units("0.1"), BORROWER, BORROWER, 10);

    optimizer.connect(SUPPLIER).supplyCollateral(WETH, units("1"), SUPPLIER);

    expect(optimizer.balanceOf(WETH, BORROWER).scaledPoolBorrow.eq(units("0.1"))).toBe(true);
    expect(optimizer.balanceOf(WETH, SUPPLIER).scaledP2PSupply.isZero()).toBe(true);
    expect(optimizer.market(WETH)?.deltas.supply.scaledP2PTotal.isZero()).toBe(true);
  });

  it("is rejected on a market that is not collateral", () => {
    const { optimizer } = setup();

    expect(
      reasonOf(() => optimizer.connect(SUPPLIER).supplyCollateral(DAI, units("1"), SUPPLIER))
    ).toBe("AssetNotCollateral");
  });

  it("is rejected while paused", () => {
    const { optimizer } = setup();
    optimizer.setPauseStatus(WETH, "isSupplyCollateralPaused", true);

    expect(
      reasonOf(() => optimizer.connect(SUPPLIER).supplyCollateral(WETH, units("1"), SUPPLIER))
    ).toBe("SupplyCollateralIsPaused");
  });
});

describe("withdrawCollateral", () => {
  it("keeps the position above the liquidation threshold", () => {
    const { optimizer } = setup();
    openBorrow(optimizer, BORROWER, "1500");
    const session = optimizer.connect(BORROWER);

    expect(reasonOf(() => session.withdrawCollateral(WETH, units("0.2"), BORROWER, BORROWER))).toBe(
      "UnauthorizedWithdraw"
    );
    expect(optimizer.balanceOf(WETH, BORROWER).scaledCollateral.eq(units("1"))).toBe(true);

    const result = session.withdrawCollateral(WETH, units("0.1"), BORROWER, BORROWER);

    expect(result.collateral.eq(units("0.9"))).toBe(true);
  });

  it("withdraws at most the collateral", () => {
    const { pool, optimizer } = setup();
    const session = optimizer.connect(SUPPLIER);
    session.supplyCollateral(WETH, units("1"), SUPPLIER);

    const result = session.withdrawCollateral(WETH, units("5"), SUPPLIER, SUPPLIER);

    expect(result.amount.eq(units("1"))).toBe(true);
    expect(result.collateral.isZero()).toBe(true);
    expect(optimizer.userCollaterals(SUPPLIER)).toEqual([]);
    expect(callsOn(pool, WETH).slice(-1)).toEqual([["withdraw", units("1").toString()]]);
    expect(
      reasonOf(() => session.withdrawCollateral(WETH, units("1"), SUPPLIER, SUPPLIER))
    ).toBe("CollateralIsZero");
  });

  it("needs the owner's approval to withdraw on their behalf", () => {
    const { optimizer, managers } = setup();
    optimizer.connect(SUPPLIER).supplyCollateral(WETH, units("1"), SUPPLIER);
    const manager = optimizer.connect(MANAGER);

    expect(
      reasonOf(() => manager.withdrawCollateral(WETH, units("1"), SUPPLIER, MANAGER))
    ).toBe("PermissionDenied");

    managers.approveManager(SUPPLIER, MANAGER, true);
    manager.withdrawCollateral(WETH, units("1"), SUPPLIER, MANAGER);
    expect(optimizer.userCollaterals(SUPPLIER)).toEqual([]);

    managers.approveManager(SUPPLIER, MANAGER, false);
    expect(managers.isManagedBy(SUPPLIER, MANAGER)).toBe(false);
  });
});
