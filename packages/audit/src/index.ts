/**
 * @aequi/audit - Verifiable record of completed executions
 *
 * Commits each `Executed` summary as a SHA-256 hash of its canonical JSON.
 */

export { AuditTrail, recordFromLog } from './trail.js';
export { canonicalJson, hashRecord, verifyRecord } from './hash.js';
export type { AuditStats, AuditTrailConfig, Commitment, ExecutionRecord } from './types.js';
