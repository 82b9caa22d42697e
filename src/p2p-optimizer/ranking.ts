import { BigNumber, constants } from "ethers";

import { Journal } from "./journal";

export interface RankedAccount {
  user: string;
  value: BigNumber;
}

/**
 * Users ranked by balance, for one (market, side, pool|p2p) bucket.
 *
 * Accounts live in a flat arena; `ranks` maps each user to its slot, so a user's handle is an
 * index rather than a node reference. Only the first `size` slots are heap-ordered: inserts and
 * increases land there, and whenever `size` reaches `maxSortedSize` it is halved so the cost of an
 * update stays bounded. Slots past `size` are kept unsorted.
 *
 * While a journal is tracked, every write to the arena is recorded so that an operation's changes
 * can be undone in as many steps as it made.
 */
export class RankingHeap {
  private readonly accounts: RankedAccount[] = [];
  private readonly ranks = new Map<string, number>();
  private size = 0;
  private journal: Journal | undefined;

  get length() {
    return this.accounts.length;
  }

  get sortedSize() {
    return this.size;
  }

  has(user: string) {
    return this.ranks.has(user);
  }

  valueOf(user: string): BigNumber {
    const rank = this.ranks.get(user);
    if (rank === undefined) return constants.Zero;

    return this.accounts[rank].value;
  }

  /** The current best candidate: the maximum of the sorted prefix, if there is one. */
  getHead(): string | undefined {
    if (this.accounts.length === 0) return undefined;

    return this.accounts[0].user;
  }

  /** All accounts, descending by value. */
  entries(): RankedAccount[] {
    return this.accounts
      .map(({ user, value }) => ({ user, value }))
      .sort((a, b) => (a.value.eq(b.value) ? 0 : a.value.gt(b.value) ? -1 : 1));
  }

  /** Sum of every ranked value. */
  total() {
    return this.accounts.reduce((sum, { value }) => sum.add(value), constants.Zero);
  }

  /** Records every following change in `journal`, or stops recording when `undefined`. */
  track(journal: Journal | undefined) {
    this.journal = journal;
  }

  update(user: string, formerValue: BigNumber, newValue: BigNumber, maxSortedSize: number) {
    if (!Number.isInteger(maxSortedSize) || maxSortedSize <= 0)
      throw new RangeError(`maxSortedSize must be a positive integer, got ${maxSortedSize}`);

    let size = this.size;
    while (size >= maxSortedSize) size >>= 1;
    this.setSize(size);

    if (formerValue.eq(newValue)) return;

    if (newValue.isZero()) this.remove(user);
    else if (formerValue.isZero()) this.insert(user, newValue);
    else if (formerValue.lt(newValue)) this.increase(user, newValue);
    else this.decrease(user, newValue);
  }

  private rankOf(user: string) {
    const rank = this.ranks.get(user);
    if (rank === undefined) throw new Error(`${user} is not ranked`);

    return rank;
  }

  private insert(user: string, value: BigNumber) {
    if (this.ranks.has(user)) throw new Error(`${user} is already ranked`);

    this.push({ user, value });

    this.swap(this.size, this.accounts.length - 1);
    this.shiftUp(this.size);
    this.setSize(this.size + 1);
  }

  private increase(user: string, value: BigNumber) {
    const rank = this.rankOf(user);
    this.setValue(rank, value);

    if (rank < this.size) {
      this.shiftUp(rank);
      return;
    }

    this.swap(rank, this.size);
    this.shiftUp(this.size);
    this.setSize(this.size + 1);
  }

  private decrease(user: string, value: BigNumber) {
    const rank = this.rankOf(user);
    this.setValue(rank, value);

    if (rank < this.size) this.shiftDown(rank);
  }

  private remove(user: string) {
    const rank = this.rankOf(user);
    let slot = rank;

    if (rank < this.size) {
      this.setSize(this.size - 1);
      this.swap(rank, this.size);
      slot = this.size;
    }

    this.swap(slot, this.accounts.length - 1);
    this.pop();

    if (rank < this.size) {
      this.shiftUp(rank);
      this.shiftDown(rank);
    }
  }

  private shiftUp(rank: number) {
    while (rank > 0) {
      const parent = (rank - 1) >> 1;
      if (!this.greater(rank, parent)) return;

      this.swap(rank, parent);
      rank = parent;
    }
  }

  private shiftDown(rank: number) {
    for (;;) {
      const left = 2 * rank + 1;
      const right = left + 1;
      let largest = rank;

      if (left < this.size && this.greater(left, largest)) largest = left;
      if (right < this.size && this.greater(right, largest)) largest = right;
      if (largest === rank) return;

      this.swap(rank, largest);
      rank = largest;
    }
  }

  private greater(i: number, j: number) {
    return this.accounts[i].value.gt(this.accounts[j].value);
  }

  /* JOURNALED WRITES */

  private setSize(size: number) {
    if (size === this.size) return;

    const former = this.size;
    this.journal?.record(() => {
      this.size = former;
    });
    this.size = size;
  }

  private setValue(rank: number, value: BigNumber) {
    const former = this.accounts[rank];
    this.journal?.record(() => {
      this.accounts[rank] = former;
    });
    this.accounts[rank] = { user: former.user, value };
  }

  private push(account: RankedAccount) {
    this.journal?.record(() => {
      this.accounts.pop();
      this.ranks.delete(account.user);
    });
    this.accounts.push(account);
    this.ranks.set(account.user, this.accounts.length - 1);
  }

  private pop() {
    const slot = this.accounts.length - 1;
    const account = this.accounts[slot];
    this.journal?.record(() => {
      this.accounts.push(account);
      this.ranks.set(account.user, slot);
    });
    this.accounts.pop();
    this.ranks.delete(account.user);
  }

  private swap(i: number, j: number) {
    if (i === j) return;

    this.journal?.record(() => this.exchange(i, j));
    this.exchange(i, j);
  }

  private exchange(i: number, j: number) {
    const a = this.accounts[i];
    const b = this.accounts[j];
    this.accounts[i] = b;
    this.accounts[j] = a;
    this.ranks.set(b.user, i);
    this.ranks.set(a.user, j);
  }
}
