import { BigNumber } from "ethers";
import { describe, expect, it } from "vitest";

import { WadRayMath } from "@morpho-labs/ethers-utils/lib/maths";

import { OptimizerEvents } from "../src/p2p-optimizer/events";

import {
  BORROWER,
  DAI,
  MANAGER,
  SUPPLIER,
  SUPPLIER2,
  SUPPLIER3,
  callsOn,
  openBorrow,
  reasonOf,
  setup,
  units,
} from "./helpers";

describe("withdraw", () => {
  it("withdraws from the pool first", () => {
    const { pool, optimizer } = setup();
    optimizer.connect(SUPPLIER).supply(DAI, units("1000"), SUPPLIER, 10);

    const result = optimizer.connect(SUPPLIER).withdraw(DAI, units("400"), SUPPLIER, SUPPLIER);

    expect(result.toWithdraw.eq(units("400"))).toBe(true);
    expect(result.toBorrow.isZero()).toBe(true);
    expect(result.onPool.eq(units("600"))).toBe(true);
    expect(callsOn(pool, DAI).slice(-1)).toEqual([["withdraw", units("400").toString()]]);
  });

  it("replaces the withdrawer with pool suppliers, then demotes borrowers", () => {
    const { optimizer } = setup();
    optimizer.connect(SUPPLIER).supply(DAI, units("1000"), SUPPLIER, 10);
    openBorrow(optimizer, BORROWER, "1000");
    optimizer.connect(SUPPLIER2).supply(DAI, units("500"), SUPPLIER2, 10);

    const result = optimizer.connect(SUPPLIER).withdraw(DAI, units("1000"), SUPPLIER, SUPPLIER);

    expect(result.promoted.eq(units("500"))).toBe(true);
    expect(result.demoted.eq(units("500"))).toBe(true);
    expect(result.toWithdraw.eq(units("500"))).toBe(true);
    expect(result.toBorrow.eq(units("500"))).toBe(true);

    const borrower = optimizer.balanceOf(DAI, BORROWER);
    expect(borrower.scaledPoolBorrow.eq(units("500"))).toBe(true);
    expect(borrower.scaledP2PBorrow.eq(units("500"))).toBe(true);
    expect(optimizer.balanceOf(DAI, SUPPLIER2).scaledP2PSupply.eq(units("500"))).toBe(true);

    const deltas = optimizer.market(DAI)?.deltas;
    expect(deltas?.supply.scaledP2PTotal.eq(units("500"))).toBe(true);
    expect(deltas?.borrow.scaledP2PTotal.eq(units("500"))).toBe(true);
  });

  it("leaves a borrow delta when out of loops, which the next supply consumes", () => {
    const { optimizer } = setup();
    optimizer.connect(SUPPLIER).supply(DAI, units("1000"), SUPPLIER, 10);
    openBorrow(optimizer, BORROWER, "1000");

    const result = optimizer.connect(SUPPLIER).withdraw(DAI, units("1000"), SUPPLIER, SUPPLIER, 0);

    expect(result.toBorrow.eq(units("1000"))).toBe(true);
    expect(optimizer.market(DAI)?.deltas.borrow.scaledDelta.eq(units("1000"))).toBe(true);
    expect(optimizer.market(DAI)?.deltas.supply.scaledP2PTotal.isZero()).toBe(true);
    expect(optimizer.balanceOf(DAI, BORROWER).scaledP2PBorrow.eq(units("1000"))).toBe(true);

    const supplied = optimizer.connect(SUPPLIER3).supply(DAI, units("400"), SUPPLIER3, 10);

    expect(supplied.toRepay.eq(units("400"))).toBe(true);
    expect(supplied.inP2P.eq(units("400"))).toBe(true);
    expect(optimizer.market(DAI)?.deltas.borrow.scaledDelta.eq(units("600"))).toBe(true);
  });

  it("uses the default withdraw iterations when given no loop budget", () => {
    const { optimizer } = setup({ defaultIterations: { repay: 10, withdraw: 0 } });
    optimizer.connect(SUPPLIER).supply(DAI, units("1000"), SUPPLIER, 10);
    openBorrow(optimizer, BORROWER, "1000");

    const result = optimizer.connect(SUPPLIER).withdraw(DAI, units("1000"), SUPPLIER, SUPPLIER);

    expect(result.demoted.isZero()).toBe(true);
    expect(optimizer.market(DAI)?.deltas.borrow.scaledDelta.eq(units("1000"))).toBe(true);
  });

  it("withdraws a full balance whatever the index", () => {
    const { pool, optimizer } = setup();
    pool.setReserveIndexes(DAI, {
      poolSupplyIndex: WadRayMath.RAY.mul(11).div(10),
      poolBorrowIndex: WadRayMath.RAY,
    });

    for (let cycle = 0; cycle < 3; cycle++) {
      optimizer.connect(SUPPLIER).supply(DAI, units("3"), SUPPLIER, 10);
      expect(
        optimizer.balanceOf(DAI, SUPPLIER).scaledPoolSupply.eq("2727272727272727272")
      ).toBe(true);

      const result = optimizer.connect(SUPPLIER).withdraw(DAI, units("3"), SUPPLIER, SUPPLIER);

      expect(result.amount.eq(BigNumber.from("2999999999999999999"))).toBe(true);
      expect(optimizer.balanceOf(DAI, SUPPLIER).scaledPoolSupply.isZero()).toBe(true);
    }
  });

  it("needs the supplier's approval to withdraw on their behalf", () => {
    const { optimizer, managers } = setup();
    optimizer.connect(SUPPLIER).supply(DAI, units("100"), SUPPLIER, 10);
    const manager = optimizer.connect(MANAGER);

    expect(
      reasonOf(() => manager.withdraw(DAI, units("100"), SUPPLIER, MANAGER))
    ).toBe("PermissionDenied");

    const withdrawn: OptimizerEvents["Withdrawn"][] = [];
    optimizer.on("Withdrawn", (payload) => withdrawn.push(payload));
    managers.approveManager(SUPPLIER, MANAGER, true);
    manager.withdraw(DAI, units("100"), SUPPLIER, MANAGER);

    expect(withdrawn).toHaveLength(1);
    expect(withdrawn[0].caller).toBe(MANAGER);
    expect(withdrawn[0].receiver).toBe(MANAGER);
    expect(optimizer.balanceOf(DAI, SUPPLIER).scaledPoolSupply.isZero()).toBe(true);
  });

  it("is rejected when borrowing the unmatched part would exceed the pool's borrow cap", () => {
    const { pool, optimizer } = setup();
    optimizer.connect(SUPPLIER).supply(DAI, units("1000"), SUPPLIER, 10);
    openBorrow(optimizer, BORROWER, "1000");
    pool.setConfiguration(DAI, { borrowCap: units("500") });
    const calls = callsOn(pool, DAI);

    const withdraw = () =>
      optimizer.connect(SUPPLIER).withdraw(DAI, units("1000"), SUPPLIER, SUPPLIER, 0);

    expect(reasonOf(withdraw)).toBe("ExceedsBorrowCap");

    expect(callsOn(pool, DAI)).toEqual(calls);
    expect(optimizer.balanceOf(DAI, SUPPLIER).scaledP2PSupply.eq(units("1000"))).toBe(true);
    expect(optimizer.market(DAI)?.deltas.borrow.scaledDelta.isZero()).toBe(true);
  });

  it("is rejected without supply or while paused", () => {
    const { optimizer } = setup();
    const session = optimizer.connect(SUPPLIER);

    expect(
      reasonOf(() => session.withdraw(DAI, units("1"), SUPPLIER, SUPPLIER))
    ).toBe("SupplyIsZero");

    optimizer.setPauseStatus(DAI, "isWithdrawPaused", true);
    expect(
      reasonOf(() => session.withdraw(DAI, units("1"), SUPPLIER, SUPPLIER))
    ).toBe("WithdrawIsPaused");
  });
});
