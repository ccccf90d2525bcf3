/**
 * Hashing utilities for execution records.
 * SHA-256 over canonical JSON: object keys sorted at every level.
 */

import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import type { ExecutionRecord } from './types.js';

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Serialize with sorted keys, so equal records always produce equal text.
 */
export function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

export function hashRecord(record: ExecutionRecord): string {
  const { executor, caller, pullCount, callCount, nativeReturned } = record;
  const canonical = canonicalJson({ executor, caller, pullCount, callCount, nativeReturned });
  return bytesToHex(sha256(utf8ToBytes(canonical)));
}

/**
 * Verify that a record matches a previously computed hash.
 */
export function verifyRecord(record: ExecutionRecord, expectedHash: string): boolean {
  return hashRecord(record) === expectedHash;
}
