import type { LogEntry } from '@aequi/ledger';
import { hashRecord, verifyRecord } from './hash.js';
import type { AuditStats, AuditTrailConfig, Commitment, ExecutionRecord } from './types.js';

/**
 * Read an execution record out of an `Executed` event.
 * Returns undefined for any other event, or one with unexpected arguments.
 */
export function recordFromLog(log: LogEntry): ExecutionRecord | undefined {
  if (log.name !== 'Executed') return undefined;

  const { caller, pullCount, callCount, nativeReturned } = log.args;
  if (
    typeof caller !== 'string' ||
    !caller.startsWith('0x') ||
    typeof pullCount !== 'bigint' ||
    typeof callCount !== 'bigint' ||
    typeof nativeReturned !== 'bigint'
  ) {
    return undefined;
  }

  return {
    executor: log.address,
    caller: `0x${caller.slice(2)}`,
    pullCount: Number(pullCount),
    callCount: Number(callCount),
    nativeReturned: nativeReturned.toString(),
  };
}

/**
 * Audit Trail
 *
 * Keeps hash commitments of completed executions. A record revealed later
 * can be checked against its commitment.
 */
export class AuditTrail {
  private commitments: Commitment[] = [];
  private maxCommitments: number;
  private verbose: boolean;

  constructor(config: AuditTrailConfig = {}) {
    this.maxCommitments = config.maxCommitments ?? 1000;
    this.verbose = config.verbose ?? false;
  }

  commit(record: ExecutionRecord): Commitment {
    const hash = hashRecord(record);
    const commitment: Commitment = { hash, record, timestamp: Date.now() };

    this.commitments.push(commitment);
    if (this.commitments.length > this.maxCommitments) {
      this.commitments = this.commitments.slice(-this.maxCommitments);
    }

    if (this.verbose) {
      console.log(
        `[audit] Committed: ${record.caller} | calls=${record.callCount} | ` +
          `native=${record.nativeReturned} | hash=${hash.slice(0, 16)}...`
      );
    }
    return commitment;
  }

  /**
   * Commit every `Executed` event among `logs`, in order.
   */
  commitFromLogs(logs: readonly LogEntry[]): Commitment[] {
    const committed: Commitment[] = [];
    for (const log of logs) {
      const record = recordFromLog(log);
      if (record) {
        committed.push(this.commit(record));
      }
    }
    return committed;
  }

  verify(hash: string, record: ExecutionRecord): boolean {
    return verifyRecord(record, hash);
  }

  /**
   * Most recent commitments, newest first.
   */
  getRecent(count: number = 20): Commitment[] {
    return this.commitments.slice(-count).reverse();
  }

  getAll(): Commitment[] {
    return [...this.commitments];
  }

  getStats(): AuditStats {
    const byCaller: Record<string, number> = {};
    for (const c of this.commitments) {
      byCaller[c.record.caller] = (byCaller[c.record.caller] ?? 0) + 1;
    }

    const oldest = this.commitments[0];
    const newest = this.commitments[this.commitments.length - 1];
    return {
      totalCommitments: this.commitments.length,
      byCaller,
      oldestTimestamp: oldest ? oldest.timestamp : null,
      newestTimestamp: newest ? newest.timestamp : null,
    };
  }

  clear(): void {
    this.commitments = [];
  }
}
