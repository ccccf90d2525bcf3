import type { Address } from '@aequi/types';

/**
 * Summary of one successful execute invocation, as committed to the trail.
 * Amounts are decimal strings so the record serializes to plain JSON.
 */
export interface ExecutionRecord {
  executor: Address;
  caller: Address;
  pullCount: number;
  callCount: number;
  nativeReturned: string;
}

export interface Commitment {
  /** Hex SHA-256 of the record's canonical JSON */
  hash: string;
  record: ExecutionRecord;
  timestamp: number;
}

export interface AuditTrailConfig {
  /** Maximum commitments kept in memory (default: 1000) */
  maxCommitments?: number;
  /** Log each commitment to the console (default: false) */
  verbose?: boolean;
}

export interface AuditStats {
  totalCommitments: number;
  byCaller: Record<string, number>;
  oldestTimestamp: number | null;
  newestTimestamp: number | null;
}
