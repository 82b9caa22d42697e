import { BigNumber, utils } from "ethers";
import winston from "winston";

import { OptimizerConfig } from "../src/config";
import { isOptimizerError } from "../src/p2p-optimizer/errors";
import { P2POptimizer } from "../src/p2p-optimizer/optimizer";
import { InMemoryPool } from "../src/simulation/inMemoryPool";
import { ManagerRegistry } from "../src/simulation/managerRegistry";
import { StaticOracle } from "../src/simulation/staticOracle";

export const address = (id: number) => utils.getAddress(utils.hexZeroPad(utils.hexlify(id), 20));

export const DAI = address(0xda1);
export const WETH = address(0xe7);
export const USDC = address(0x05dc);

export const SUPPLIER = address(0x100);
export const SUPPLIER2 = address(0x101);
export const SUPPLIER3 = address(0x102);
export const BORROWER = address(0x200);
export const BORROWER2 = address(0x201);
export const LIQUIDATOR = address(0x300);
export const MANAGER = address(0x400);

export const units = (amount: string) => utils.parseEther(amount);

export const price = (amount: string) => utils.parseUnits(amount, 8);

export const testConfig: OptimizerConfig = {
  logLevel: "error",
  maxSortedUsers: 16,
  defaultIterations: { repay: 10, withdraw: 10 },
  eModeCategoryId: 0,
};

/** DAI and WETH listed on the pool and on the optimizer; WETH is collateral. */
export const setup = (config: Partial<OptimizerConfig> = {}) => {
  const pool = new InMemoryPool();
  const oracle = new StaticOracle();
  const managers = new ManagerRegistry();

  pool.listReserve(DAI);
  pool.listReserve(WETH);
  oracle.setPrice(DAI, price("1"));
  oracle.setPrice(WETH, price("2000"));

  const optimizer = new P2POptimizer({
    pool,
    oracle,
    managers,
    sentinel: oracle,
    config: { ...testConfig, ...config },
    logger: winston.createLogger({ silent: true }),
  });

  optimizer.createMarket(DAI, BigNumber.from(0), BigNumber.from(5_000));
  optimizer.createMarket(WETH, BigNumber.from(0), BigNumber.from(5_000));
  optimizer.setIsCollateral(WETH, true);

  return { pool, oracle, managers, optimizer };
};

/** Gives `borrower` 1 WETH of collateral and borrows `amount` DAI from whatever is available. */
export const openBorrow = (
  optimizer: P2POptimizer,
  borrower: string,
  amount: string,
  maxLoops = 10
) => {
  const session = optimizer.connect(borrower);
  session.supplyCollateral(WETH, units("1"), borrower);

  return session.borrow(DAI, units(amount), borrower, borrower, maxLoops);
};

/** The reason code an operation was rejected with, or `undefined` if it went through. */
export const reasonOf = (run: () => unknown) => {
  try {
    run();
  } catch (error) {
    if (isOptimizerError(error)) return error.reason;

    throw error;
  }

  return undefined;
};

/** The pool calls made on `asset`, as `[action, amount]` pairs. */
export const callsOn = (pool: InMemoryPool, asset: string) =>
  pool.calls
    .filter((call) => call.asset === asset)
    .map(({ action, amount }) => [action, amount.toString()]);
