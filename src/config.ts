import * as dotenv from "dotenv";
import { z } from "zod";

import { DEFAULT_ITERATIONS, DEFAULT_MAX_SORTED_USERS } from "./p2p-optimizer/constants";
import { Iterations } from "./p2p-optimizer/types";

dotenv.config();

const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  MAX_SORTED_USERS: positiveInt(DEFAULT_MAX_SORTED_USERS),
  DEFAULT_ITERATIONS_REPAY: positiveInt(DEFAULT_ITERATIONS.repay),
  DEFAULT_ITERATIONS_WITHDRAW: positiveInt(DEFAULT_ITERATIONS.withdraw),
  E_MODE_CATEGORY_ID: z.coerce.number().int().min(0).max(255).default(0),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface OptimizerConfig {
  logLevel: LogLevel;
  /** Size of the heap-ordered prefix of each ranking structure. */
  maxSortedUsers: number;
  /** Loop budgets used by repay and withdraw when the caller gives none. */
  defaultIterations: Iterations;
  /** Efficiency-mode category of the optimizer's account on the pool, 0 for none. */
  eModeCategoryId: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): OptimizerConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success)
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );

  const { data } = parsed;

  return {
    logLevel: data.LOG_LEVEL,
    maxSortedUsers: data.MAX_SORTED_USERS,
    defaultIterations: {
      repay: data.DEFAULT_ITERATIONS_REPAY,
      withdraw: data.DEFAULT_ITERATIONS_WITHDRAW,
    },
    eModeCategoryId: data.E_MODE_CATEGORY_ID,
  };
};
