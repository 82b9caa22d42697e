import { BigNumber, constants } from "ethers";

import { ValidationError } from "./errors";
import { EventQueue, OptimizerEventEmitter, OptimizerEventName, OptimizerEvents } from "./events";
import { Journal } from "./journal";
import { MarketBalances } from "./marketBalances";
import { Market } from "./types";

export type PoolAction = "supply" | "withdraw" | "borrow" | "repay";

/** Net change the queued pool calls make to one reserve's totals, in underlying. */
export interface PoolMovement {
  supplied: BigNumber;
  borrowed: BigNumber;
}

const POOL_EFFECTS: Record<PoolAction, { total: keyof PoolMovement; sign: 1 | -1 }> = {
  supply: { total: "supplied", sign: 1 },
  withdraw: { total: "supplied", sign: -1 },
  borrow: { total: "borrowed", sign: 1 },
  repay: { total: "borrowed", sign: -1 },
};

export interface StateReader {
  readonly marketsCreated: readonly string[];
  getMarket(underlying: string): Market | undefined;
  getMarketBalances(underlying: string): MarketBalances | undefined;
  getUserCollaterals(user: string): ReadonlySet<string>;
  getUserBorrows(user: string): ReadonlySet<string>;
}

export interface DraftChanges {
  markets: ReadonlyMap<string, Market>;
  /** Balances of the markets created by the draft only: existing balances are edited in place. */
  balances: ReadonlyMap<string, MarketBalances>;
  userCollaterals: ReadonlyMap<string, ReadonlySet<string>>;
  userBorrows: ReadonlyMap<string, ReadonlySet<string>>;
  created: readonly string[];
}

interface QueuedEvent {
  name: OptimizerEventName;
  emit: (emitter: OptimizerEventEmitter) => void;
}

const EMPTY_SET: ReadonlySet<string> = new Set();

export const cloneMarket = (market: Market): Market => ({
  ...market,
  indexes: {
    supply: { ...market.indexes.supply },
    borrow: { ...market.indexes.borrow },
  },
  deltas: {
    supply: { ...market.deltas.supply },
    borrow: { ...market.deltas.borrow },
  },
  pauseStatuses: { ...market.pauseStatuses },
});

/**
 * Committed state of the optimizer: markets, their balances and each user's collateral and
 * borrow markets, keyed by checksummed address.
 */
export class MarketRegistry implements StateReader {
  private readonly markets = new Map<string, Market>();
  private readonly balances = new Map<string, MarketBalances>();
  private readonly userCollaterals = new Map<string, ReadonlySet<string>>();
  private readonly userBorrows = new Map<string, ReadonlySet<string>>();
  private readonly created: string[] = [];

  get marketsCreated(): readonly string[] {
    return this.created;
  }

  getMarket(underlying: string) {
    return this.markets.get(underlying);
  }

  getMarketBalances(underlying: string) {
    return this.balances.get(underlying);
  }

  getUserCollaterals(user: string) {
    return this.userCollaterals.get(user) ?? EMPTY_SET;
  }

  getUserBorrows(user: string) {
    return this.userBorrows.get(user) ?? EMPTY_SET;
  }

  /**
   * Makes a draft's changes visible. Returns a function putting back what was there before,
   * for when an interaction following the publication fails.
   */
  publish(changes: DraftChanges): () => void {
    const restores: (() => void)[] = [];

    const apply = <V>(target: Map<string, V>, updates: ReadonlyMap<string, V>) => {
      for (const [key, value] of updates) {
        const previous = target.get(key);
        restores.push(() => {
          if (previous === undefined) target.delete(key);
          else target.set(key, previous);
        });
        target.set(key, value);
      }
    };

    apply(this.markets, changes.markets);
    apply(this.balances, changes.balances);
    apply(this.userCollaterals, changes.userCollaterals);
    apply(this.userBorrows, changes.userBorrows);

    const createdLength = this.created.length;
    this.created.push(...changes.created);
    restores.push(() => {
      this.created.splice(createdLength);
    });

    return () => {
      for (const restore of restores.reverse()) restore();
    };
  }
}

/**
 * View of the registry scoped to one operation. Markets and users' market sets are copied on
 * first write and published at the end. Market balances are edited in place instead, each write
 * journaled, so an operation costs what it touches; `rollback` undoes them. Events and pool calls
 * are buffered until the operation commits.
 */
export class Draft implements StateReader, EventQueue {
  private readonly markets = new Map<string, Market>();
  private readonly balances = new Map<string, MarketBalances>();
  private readonly userCollaterals = new Map<string, Set<string>>();
  private readonly userBorrows = new Map<string, Set<string>>();
  private readonly created: string[] = [];
  private readonly events: QueuedEvent[] = [];
  private readonly interactions: (() => void)[] = [];
  private readonly poolMovements = new Map<string, PoolMovement>();
  private readonly journal = new Journal();
  private readonly tracked = new Set<MarketBalances>();

  constructor(private readonly base: StateReader) {}

  get marketsCreated(): readonly string[] {
    return [...this.base.marketsCreated, ...this.created];
  }

  /** Number of balance writes the draft would undo on rollback. */
  get journalLength() {
    return this.journal.length;
  }

  getMarket(underlying: string) {
    return this.markets.get(underlying) ?? this.base.getMarket(underlying);
  }

  getMarketBalances(underlying: string) {
    return this.balances.get(underlying) ?? this.base.getMarketBalances(underlying);
  }

  getUserCollaterals(user: string): ReadonlySet<string> {
    return this.userCollaterals.get(user) ?? this.base.getUserCollaterals(user);
  }

  getUserBorrows(user: string): ReadonlySet<string> {
    return this.userBorrows.get(user) ?? this.base.getUserBorrows(user);
  }

  addMarket(market: Market) {
    this.markets.set(market.underlying, market);
    this.balances.set(market.underlying, new MarketBalances());
    this.created.push(market.underlying);
  }

  editMarket(underlying: string): Market {
    let market = this.markets.get(underlying);
    if (market) return market;

    const committed = this.base.getMarket(underlying);
    if (!committed) throw new ValidationError("MarketNotCreated", underlying);

    market = cloneMarket(committed);
    this.markets.set(underlying, market);

    return market;
  }

  editMarketBalances(underlying: string): MarketBalances {
    const balances = this.getMarketBalances(underlying);
    if (!balances) throw new ValidationError("MarketNotCreated", underlying);

    if (!this.tracked.has(balances)) {
      balances.track(this.journal);
      this.tracked.add(balances);
    }

    return balances;
  }

  editUserCollaterals(user: string): Set<string> {
    let collaterals = this.userCollaterals.get(user);
    if (collaterals) return collaterals;

    collaterals = new Set(this.base.getUserCollaterals(user));
    this.userCollaterals.set(user, collaterals);

    return collaterals;
  }

  editUserBorrows(user: string): Set<string> {
    let borrows = this.userBorrows.get(user);
    if (borrows) return borrows;

    borrows = new Set(this.base.getUserBorrows(user));
    this.userBorrows.set(user, borrows);

    return borrows;
  }

  push<K extends OptimizerEventName>(name: K, payload: OptimizerEvents[K]) {
    this.events.push({
      name,
      emit: (emitter) => {
        emitter.emit(name, payload);
      },
    });
  }

  /**
   * Queues a call to the pool, run only once internal bookkeeping is final.
   *
   * @returns The net change to the reserve's totals once every call queued so far has run.
   */
  interact(
    action: PoolAction,
    underlying: string,
    amount: BigNumber,
    call: () => void
  ): PoolMovement {
    let movement = this.poolMovements.get(underlying);
    if (!movement) {
      movement = { supplied: constants.Zero, borrowed: constants.Zero };
      this.poolMovements.set(underlying, movement);
    }

    const { total, sign } = POOL_EFFECTS[action];
    movement[total] = movement[total].add(amount.mul(sign));
    this.interactions.push(call);

    return { ...movement };
  }

  changes(): DraftChanges {
    return {
      markets: this.markets,
      balances: this.balances,
      userCollaterals: this.userCollaterals,
      userBorrows: this.userBorrows,
      created: this.created,
    };
  }

  runInteractions() {
    for (const call of this.interactions) call();
  }

  /** Undoes every balance write made through the draft. */
  rollback() {
    this.journal.rollback();
  }

  /** Stops journaling the balances the draft edited. */
  release() {
    for (const balances of this.tracked) balances.track(undefined);
    this.tracked.clear();
  }

  /**
   * Delivers the queued events in order. An event whose listener throws is reported to `onError`;
   * its remaining listeners are skipped and the following events are still delivered.
   */
  dispatch(
    emitter: OptimizerEventEmitter,
    onError: (name: OptimizerEventName, error: unknown) => void
  ) {
    for (const { name, emit } of this.events) {
      try {
        emit(emitter);
      } catch (error) {
        onError(name, error);
      }
    }
  }
}
