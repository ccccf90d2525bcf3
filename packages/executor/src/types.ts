import type { Address } from 'viem';
import type { ExecutionReport } from '@aequi/types';

/** Configuration for the executor */
export interface ExecutorConfig {
  /** Maximum TokenPull entries per execute */
  maxPulls: number;
  /** Maximum Approval entries per execute */
  maxApprovals: number;
  /** Maximum Call entries per execute */
  maxCalls: number;
  /** Maximum flush tokens per execute */
  maxFlushTokens: number;
  /** Log each completed execute to the console */
  verbose: boolean;
}

/** Default executor configuration */
export const DEFAULT_EXECUTOR_CONFIG: ExecutorConfig = {
  maxPulls: 10,
  maxApprovals: 10,
  maxCalls: 20,
  maxFlushTokens: 10,
  verbose: false,
};

/**
 * Execution progress. Reported as stages start; an invocation that ends in
 * `reverted` has left no trace on the ledger.
 */
export type ExecutionState =
  | { phase: 'pulling'; caller: Address; pulls: number }
  | { phase: 'approving'; approvals: number }
  | { phase: 'calling'; index: number; target: Address }
  | { phase: 'revoking'; approvals: number }
  | { phase: 'flushing'; tokens: number }
  | { phase: 'completed'; report: ExecutionReport }
  | { phase: 'reverted'; error: string };

/** Callback for execution state changes */
export type ExecutionStateCallback = (state: ExecutionState) => void;
