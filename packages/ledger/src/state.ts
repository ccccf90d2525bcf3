import { getAddress, type Address } from 'viem';
import type { LogEntry } from './types.js';

type JournalEntry =
  | { kind: 'balance'; account: Address; previous: bigint }
  | { kind: 'slot'; account: Address; slot: string; previous: bigint | undefined }
  | { kind: 'log' };

/**
 * World State
 *
 * Native balances, per-contract slot storage and the event log, behind a
 * write journal. `snapshot()` marks a point in the journal and `revert()`
 * undoes every write made after it, which is how a failed call leaves the
 * world exactly as it found it.
 */
export class WorldState {
  private balances: Map<Address, bigint> = new Map();
  private slots: Map<Address, Map<string, bigint>> = new Map();
  private logs: LogEntry[] = [];
  private journal: JournalEntry[] = [];

  getBalance(account: Address): bigint {
    return this.balances.get(getAddress(account)) ?? 0n;
  }

  setBalance(account: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError(`Negative balance for ${account}: ${amount}`);
    }
    const key = getAddress(account);
    this.journal.push({ kind: 'balance', account: key, previous: this.balances.get(key) ?? 0n });
    this.balances.set(key, amount);
  }

  getSlot(account: Address, slot: string): bigint {
    return this.slots.get(getAddress(account))?.get(slot) ?? 0n;
  }

  setSlot(account: Address, slot: string, value: bigint): void {
    const key = getAddress(account);
    let storage = this.slots.get(key);
    if (!storage) {
      storage = new Map();
      this.slots.set(key, storage);
    }
    this.journal.push({ kind: 'slot', account: key, slot, previous: storage.get(slot) });
    storage.set(slot, value);
  }

  appendLog(entry: LogEntry): void {
    this.journal.push({ kind: 'log' });
    this.logs.push(entry);
  }

  getLogs(): readonly LogEntry[] {
    return [...this.logs];
  }

  /**
   * Mark the current journal position.
   */
  snapshot(): number {
    return this.journal.length;
  }

  /**
   * Undo every write recorded after `id`, newest first.
   */
  revert(id: number): void {
    if (id < 0 || id > this.journal.length) {
      throw new RangeError(`Unknown snapshot ${id} (journal length ${this.journal.length})`);
    }

    while (this.journal.length > id) {
      const entry = this.journal.pop();
      if (!entry) break;

      switch (entry.kind) {
        case 'balance':
          this.balances.set(entry.account, entry.previous);
          break;
        case 'slot': {
          const storage = this.slots.get(entry.account);
          if (!storage) break;
          if (entry.previous === undefined) {
            storage.delete(entry.slot);
          } else {
            storage.set(entry.slot, entry.previous);
          }
          break;
        }
        case 'log':
          this.logs.pop();
          break;
      }
    }
  }

  /**
   * Make every write permanent and drop the journal. Snapshots taken before
   * a commit are no longer valid.
   */
  commit(): void {
    this.journal = [];
  }

  get journalLength(): number {
    return this.journal.length;
  }
}
