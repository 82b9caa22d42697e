import { BigNumber } from "ethers";

import { PercentMath, WadRayMath } from "@morpho-labs/ethers-utils/lib/maths";

/** Health factor below which a position can be liquidated, in wad. */
export const DEFAULT_LIQUIDATION_THRESHOLD = WadRayMath.WAD;

/** Health factor below which the whole debt can be liquidated at once, in wad. */
export const MIN_LIQUIDATION_THRESHOLD = WadRayMath.WAD.mul(95).div(100);

export const DEFAULT_CLOSE_FACTOR = PercentMath.BASE_PERCENT.div(2);

export const MAX_CLOSE_FACTOR = PercentMath.BASE_PERCENT;

/** Collateral is valued at (LT_LOWER_BOUND - 1) / LT_LOWER_BOUND of its raw value. */
export const LT_LOWER_BOUND = BigNumber.from(10_000);

/** Scaled balances at or below this are cleared when written to the ranking structure. */
export const DUST_THRESHOLD = BigNumber.from(1);

export const DEFAULT_MAX_SORTED_USERS = 16;

export const DEFAULT_ITERATIONS = { repay: 10, withdraw: 10 } as const;
