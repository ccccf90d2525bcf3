import type { Address, Hex } from 'viem';
import type { LedgerHost } from './host.js';

/** A message call between two accounts */
export interface CallRequest {
  from: Address;
  to: Address;
  /** Native value moved from `from` to `to` before dispatch */
  value?: bigint;
  /** ABI-encoded payload; empty for a plain transfer */
  data?: Hex;
}

/** Outcome of a message call. A failed call carries its raw revert data. */
export interface CallResult {
  success: boolean;
  returnData: Hex;
}

/** What a contract sees while it handles a call */
export interface CallContext {
  host: LedgerHost;
  /** Address the contract is deployed at */
  self: Address;
  /** Immediate caller (msg.sender) */
  sender: Address;
  /** Native value attached to this call (already credited to `self`) */
  value: bigint;
  data: Hex;
}

/**
 * Code deployed at an address.
 *
 * `handle` returns raw return data, or throws a RevertError to fail the call.
 * Any state written through the host during a failed call is rolled back.
 */
export interface Contract {
  readonly name: string;
  handle(ctx: CallContext): Promise<Hex>;
}

/** Value types an event argument may carry */
export type LogValue = string | bigint | number | boolean;

/** An emitted event. Logs are journaled, so a reverted call drops its logs. */
export interface LogEntry {
  address: Address;
  name: string;
  args: Readonly<Record<string, LogValue>>;
}
