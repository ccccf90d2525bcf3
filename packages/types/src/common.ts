import type { Address, Hex } from 'viem';

export type { Address, Hex };

// ============================================================================
// Core Primitives
// ============================================================================

/** The null token: disables injection, and is skipped in flush lists */
export const NULL_TOKEN: Address = '0x0000000000000000000000000000000000000000';

/** Log level understood by the CLI and the library `verbose` switches */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Instruction lists whose length is capped per invocation */
export type BatchKind = 'pulls' | 'approvals' | 'calls' | 'tokensToFlush';

// ============================================================================
// Configuration
// ============================================================================

/** Aequi global configuration */
export interface AequiConfig {
  /** Maximum TokenPull entries per execute */
  maxPulls: number;
  /** Maximum Approval entries per execute */
  maxApprovals: number;
  /** Maximum Call entries per execute */
  maxCalls: number;
  /** Maximum flush tokens per execute */
  maxFlushTokens: number;
  /** Log level */
  logLevel: LogLevel;
}
