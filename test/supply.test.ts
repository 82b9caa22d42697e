import { constants } from "ethers";
import { describe, expect, it } from "vitest";

import { OptimizerEvents } from "../src/p2p-optimizer/events";

import {
  BORROWER,
  DAI,
  SUPPLIER,
  SUPPLIER2,
  USDC,
  callsOn,
  openBorrow,
  reasonOf,
  setup,
  units,
} from "./helpers";

describe("supply", () => {
  it("puts everything on the pool when nobody borrows", () => {
    const { pool, optimizer } = setup();
    const supplied: OptimizerEvents["Supplied"][] = [];
    optimizer.on("Supplied", (payload) => supplied.push(payload));

    const result = optimizer.connect(SUPPLIER).supply(DAI, units("1000"), SUPPLIER, 10);

    expect(result.onPool.eq(units("1000"))).toBe(true);
    expect(result.inP2P.isZero()).toBe(true);
    expect(result.toSupply.eq(units("1000"))).toBe(true);
    expect(result.toRepay.isZero()).toBe(true);
    expect(optimizer.market(DAI)?.deltas.borrow.scaledDelta.isZero()).toBe(true);
    expect(optimizer.market(DAI)?.deltas.supply.scaledP2PTotal.isZero()).toBe(true);
    expect(callsOn(pool, DAI)).toEqual([["supply", units("1000").toString()]]);

    expect(supplied).toHaveLength(1);
    expect(supplied[0].from).toBe(SUPPLIER);
    expect(supplied[0].onBehalf).toBe(SUPPLIER);
    expect(supplied[0].underlying).toBe(DAI);
    expect(supplied[0].scaledOnPool.eq(units("1000"))).toBe(true);
  });

  it("matches pool borrowers and repays their pool debt", () => {
    const { pool, optimizer } = setup();
    openBorrow(optimizer, BORROWER, "500");

    const result = optimizer.connect(SUPPLIER).supply(DAI, units("1000"), SUPPLIER, 10);

    expect(result.promoted.eq(units("500"))).toBe(true);
    expect(result.toRepay.eq(units("500"))).toBe(true);
    expect(result.toSupply.eq(units("500"))).toBe(true);
    expect(result.toRepay.add(result.toSupply).eq(units("1000"))).toBe(true);
    expect(result.onPool.eq(units("500"))).toBe(true);
    expect(result.inP2P.eq(units("500"))).toBe(true);

    const borrower = optimizer.balanceOf(DAI, BORROWER);
    expect(borrower.scaledPoolBorrow.isZero()).toBe(true);
    expect(borrower.scaledP2PBorrow.eq(units("500"))).toBe(true);

    const deltas = optimizer.market(DAI)?.deltas;
    expect(deltas?.supply.scaledP2PTotal.eq(units("500"))).toBe(true);
    expect(deltas?.borrow.scaledP2PTotal.eq(units("500"))).toBe(true);

    expect(callsOn(pool, DAI)).toEqual([
      ["borrow", units("500").toString()],
      ["repay", units("500").toString()],
      ["supply", units("500").toString()],
    ]);
  });

  it("does not match without loop budget", () => {
    const { optimizer } = setup();
    openBorrow(optimizer, BORROWER, "500");

    const result = optimizer.connect(SUPPLIER).supply(DAI, units("1000"), SUPPLIER, 0);

    expect(result.onPool.eq(units("1000"))).toBe(true);
    expect(result.inP2P.isZero()).toBe(true);
    expect(optimizer.balanceOf(DAI, BORROWER).scaledPoolBorrow.eq(units("500"))).toBe(true);
  });

  it("can be done on behalf of anyone", () => {
    const { optimizer } = setup();

    optimizer.connect(SUPPLIER2).supply(DAI, units("10"), SUPPLIER, 10);

    expect(optimizer.balanceOf(DAI, SUPPLIER).scaledPoolSupply.eq(units("10"))).toBe(true);
    expect(optimizer.balanceOf(DAI, SUPPLIER2).scaledPoolSupply.isZero()).toBe(true);
  });

  it("validates its inputs first", () => {
    const { optimizer } = setup();
    const session = optimizer.connect(SUPPLIER);

    expect(reasonOf(() => session.supply(DAI, units("0"), SUPPLIER, 10))).toBe("AmountIsZero");
    expect(
      reasonOf(() => session.supply(DAI, units("1"), constants.AddressZero, 10))
    ).toBe("AddressIsZero");
    expect(
      reasonOf(() => session.supply("not an address", units("1"), SUPPLIER, 10))
    ).toBe("InvalidAddress");
    expect(reasonOf(() => session.supply(DAI, units("1"), SUPPLIER, -1))).toBe("InvalidMaxLoops");
    expect(reasonOf(() => session.supply(USDC, units("1"), SUPPLIER, 10))).toBe("MarketNotCreated");
  });

  it("accepts lowercase addresses", () => {
    const { optimizer } = setup();

    optimizer
      .connect(SUPPLIER.toLowerCase())
      .supply(DAI.toLowerCase(), units("1"), SUPPLIER.toLowerCase(), 10);

    expect(optimizer.balanceOf(DAI, SUPPLIER).scaledPoolSupply.eq(units("1"))).toBe(true);
  });

  it("is rejected while paused", () => {
    const { optimizer } = setup();
    optimizer.setPauseStatus(DAI, "isSupplyPaused", true);

    expect(
      reasonOf(() => optimizer.connect(SUPPLIER).supply(DAI, units("1"), SUPPLIER, 10))
    ).toBe("SupplyIsPaused");
  });

  it("is rejected before reaching the pool when its supply cap would be exceeded", () => {
    const { pool, optimizer } = setup();
    pool.setConfiguration(DAI, { supplyCap: units("500") });

    expect(
      reasonOf(() => optimizer.connect(SUPPLIER).supply(DAI, units("1000"), SUPPLIER, 10))
    ).toBe("ExceedsSupplyCap");
    expect(optimizer.balanceOf(DAI, SUPPLIER).scaledPoolSupply.isZero()).toBe(true);
    expect(callsOn(pool, DAI)).toEqual([]);

    optimizer.connect(SUPPLIER).supply(DAI, units("500"), SUPPLIER, 10);
    expect(pool.getTotalSupply(DAI).eq(units("500"))).toBe(true);
  });
});
