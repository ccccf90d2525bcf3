/**
 * @aequi/executor - Atomic multicall executor
 *
 * Runs pull -> approve -> call (+inject) -> revoke -> flush as one
 * all-or-nothing invocation on the ledger host.
 *
 * Components:
 * - MulticallExecutor: the contract and its admin surface
 * - InjectionEngine: selector-checked live-balance patching
 * - BalanceSnapshotService: before/after balances for dust-safe flushing
 * - ReentrancyGuard: exclusive entry
 * - Client helpers: encode, submit and decode execute invocations
 */

export { MulticallExecutor, type MulticallExecutorOptions } from './executor.js';
export { InjectionEngine, injectableAmount, type PreparedCall } from './injection.js';
export { BalanceSnapshotService, uniqueFlushTokens } from './balances.js';
export { buildPulledLedger, pulledCeiling, type PulledLedger } from './pulled-ledger.js';
export { ReentrancyGuard, type GuardState } from './guard.js';
export { TokenGateway, isTokenCallSuccessful } from './token.js';
export {
  SELECTOR_SIZE,
  WORD_SIZE,
  PayloadBoundsError,
  fitsWord,
  readSelector,
  readWord,
  writeWord,
} from './payload.js';
export {
  ExecutorError,
  CallRevertedError,
  encodeExecutorError,
  decodeExecutorError,
  describeExecutorError,
  type ExecutorErrorSpec,
  type ExecutorErrorCode,
} from './errors.js';
export { executorAbi, executorErrorsAbi } from './abi.js';
export { encodeExecute, decodeExecute } from './request.js';
export {
  submitExecute,
  decodeExecuteResult,
  type SubmitExecuteOptions,
  type SubmitExecuteResult,
} from './client.js';
export {
  DEFAULT_EXECUTOR_CONFIG,
  type ExecutorConfig,
  type ExecutionState,
  type ExecutionStateCallback,
} from './types.js';
