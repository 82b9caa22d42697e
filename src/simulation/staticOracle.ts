import { BigNumber } from "ethers";

import { Oracle, OracleSentinel } from "../p2p-optimizer/collaborators";

export class OracleError extends Error {
  constructor(readonly asset: string) {
    super(`No price for ${asset}`);
    this.name = "OracleError";
  }
}

/** Prices set by hand, along with the switches of a sentinel. */
export class StaticOracle implements Oracle, OracleSentinel {
  private readonly prices = new Map<string, BigNumber>();

  borrowAllowed = true;
  liquidationAllowed = true;

  setPrice(asset: string, price: BigNumber) {
    this.prices.set(asset, price);
  }

  price(asset: string) {
    const price = this.prices.get(asset);
    if (!price) throw new OracleError(asset);

    return price;
  }

  isBorrowAllowed() {
    return this.borrowAllowed;
  }

  isLiquidationAllowed() {
    return this.liquidationAllowed;
  }
}
