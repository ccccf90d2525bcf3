import type { Address, Hex } from 'viem';

// ============================================================================
// Caller Instructions
// ============================================================================

/** Transfer-in instruction. Zero amounts are no-ops. */
export interface TokenPull {
  token: Address;
  amount: bigint;
}

/** Temporary spending right granted to a whitelisted spender */
export interface TokenApproval {
  token: Address;
  spender: Address;
  amount: bigint;
  /** Reset the allowance to zero once every call has run */
  revokeAfter: boolean;
}

/** One external call of the batch */
export interface ExecutorCall {
  target: Address;
  /** Native value attached to the call */
  value: bigint;
  /** ABI-encoded payload (selector + arguments) */
  data: Hex;
  /** Token whose live balance is patched into `data`; NULL_TOKEN disables injection */
  injectToken: Address;
  /** Byte offset of the 32-byte amount word inside `data` */
  injectOffset: number;
}

/** Full argument set of one execute invocation */
export interface ExecuteRequest {
  pulls: readonly TokenPull[];
  approvals: readonly TokenApproval[];
  calls: readonly ExecutorCall[];
  tokensToFlush: readonly Address[];
}

// ============================================================================
// Per-invocation Accounting
// ============================================================================

/** Balance of one flush token captured before the pull stage */
export interface TokenSnapshot {
  token: Address;
  balance: bigint;
}

/** Amount actually patched into a call's payload */
export interface InjectionRecord {
  callIndex: number;
  token: Address;
  offset: number;
  amount: bigint;
}

/** Net amount returned to the caller for one token */
export interface FlushedAmount {
  token: Address;
  amount: bigint;
}

/** Everything an execute invocation produced */
export interface ExecutionReport {
  caller: Address;
  /** Raw return data of each call, in call order */
  returnData: Hex[];
  injections: InjectionRecord[];
  flushed: FlushedAmount[];
  nativeReturned: bigint;
}
