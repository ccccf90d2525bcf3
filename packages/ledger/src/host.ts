import { getAddress, isAddressEqual, type Address, type Hex } from 'viem';
import { WorldState } from './state.js';
import { RevertError, revertReason } from './revert.js';
import type { CallRequest, CallResult, Contract, LogEntry, LogValue } from './types.js';

/** Nested call frames allowed before a call fails outright */
export const MAX_CALL_DEPTH = 64;

/**
 * Ledger Host
 *
 * Runs message calls between accounts the way a chain does for a contract:
 * 1. Snapshot -- mark the journal before the frame starts
 * 2. Value -- move the attached native value from caller to callee
 * 3. Dispatch -- hand the payload to the code deployed at `to`
 * 4. Settle -- keep the frame's writes, or roll them back on revert
 *
 * Calls are processed strictly one after another; the only nesting is a
 * contract calling out while it handles a call.
 */
export class LedgerHost {
  readonly state: WorldState;
  private contracts: Map<Address, Contract> = new Map();
  private depth = 0;

  constructor(state: WorldState = new WorldState()) {
    this.state = state;
  }

  /**
   * Deploy contract code at an address.
   */
  deploy<T extends Contract>(address: Address, contract: T): T {
    const key = getAddress(address);
    if (this.contracts.has(key)) {
      throw new Error(`Address already has code: ${key}`);
    }
    this.contracts.set(key, contract);
    return contract;
  }

  hasCode(address: Address): boolean {
    return this.contracts.has(getAddress(address));
  }

  codeAt(address: Address): Contract | undefined {
    return this.contracts.get(getAddress(address));
  }

  balanceOf(account: Address): bigint {
    return this.state.getBalance(account);
  }

  /**
   * Credit native currency to an account out of thin air (test funding, plans).
   */
  fund(account: Address, amount: bigint): void {
    this.state.setBalance(account, this.state.getBalance(account) + amount);
  }

  emit(address: Address, name: string, args: Record<string, LogValue>): void {
    this.state.appendLog({ address: getAddress(address), name, args });
  }

  logs(): readonly LogEntry[] {
    return this.state.getLogs();
  }

  /**
   * Top-level entry point: one atomic unit of work. Once it settles there is
   * nothing left to roll back, so the journal is committed.
   */
  async transact(request: CallRequest): Promise<CallResult> {
    if (this.depth !== 0) {
      throw new Error('transact() must not be nested; use call() from contract code');
    }
    try {
      return await this.call(request);
    } finally {
      this.state.commit();
    }
  }

  /**
   * Execute a message call.
   *
   * A RevertError thrown anywhere in the frame becomes `success: false` with
   * its raw data, after the frame's writes are undone. Any other error is a
   * defect in contract code: the frame is rolled back and the error rethrown.
   */
  async call(request: CallRequest): Promise<CallResult> {
    const snapshot = this.state.snapshot();
    const value = request.value ?? 0n;
    const data: Hex = request.data ?? '0x';

    this.depth++;
    try {
      if (this.depth > MAX_CALL_DEPTH) {
        throw revertReason('call depth exceeded');
      }
      if (value < 0n) {
        throw revertReason('negative value');
      }

      if (value > 0n && !isAddressEqual(request.from, request.to)) {
        const available = this.state.getBalance(request.from);
        if (available < value) {
          throw revertReason('insufficient native balance');
        }
        this.state.setBalance(request.from, available - value);
        this.state.setBalance(request.to, this.state.getBalance(request.to) + value);
      }

      const contract = this.codeAt(request.to);
      if (!contract) {
        // Plain account: accepts value, runs nothing
        return { success: true, returnData: '0x' };
      }

      const returnData = await contract.handle({
        host: this,
        self: getAddress(request.to),
        sender: getAddress(request.from),
        value,
        data,
      });
      return { success: true, returnData };
    } catch (err) {
      this.state.revert(snapshot);
      if (err instanceof RevertError) {
        return { success: false, returnData: err.data };
      }
      throw err;
    } finally {
      this.depth--;
    }
  }

  get callDepth(): number {
    return this.depth;
  }
}
