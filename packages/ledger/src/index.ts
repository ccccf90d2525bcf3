/**
 * @aequi/ledger - In-process ledger host for Aequi
 *
 * Provides what a chain provides to a contract:
 * - Addressed accounts with native balances
 * - Contracts reachable by ABI-encoded payloads, with msg.sender / msg.value
 * - Raw revert data, and journaled state that rolls back on revert
 *
 * Components:
 * - WorldState: balances, slot storage and logs behind a write journal
 * - LedgerHost: message-call dispatch and atomic settlement
 * - Erc20Token / ConstantRateRouter: contracts for plans and tests
 */

export { LedgerHost, MAX_CALL_DEPTH } from './host.js';
export { WorldState } from './state.js';
export { RevertError, revertReason } from './revert.js';
export {
  type CallRequest,
  type CallResult,
  type CallContext,
  type Contract,
  type LogEntry,
  type LogValue,
} from './types.js';
export { Erc20Token, tokenAbi, type Erc20Options, type TokenWriteFunction } from './contracts/erc20.js';
export {
  ConstantRateRouter,
  swapRouterAbi,
  decodeSwapAmounts,
  type ConstantRateRouterOptions,
} from './contracts/constant-rate-router.js';
