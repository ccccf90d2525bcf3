import { getAddress, type Address } from 'viem';
import type { TokenPull } from '@aequi/types';

/** Token -> total amount pulled from the caller in this invocation */
export type PulledLedger = ReadonlyMap<Address, bigint>;

/**
 * Sum the pull instructions per distinct token, in first-seen order.
 * Zero-amount entries are no-ops and leave no entry behind.
 */
export function buildPulledLedger(pulls: readonly TokenPull[]): PulledLedger {
  const ledger = new Map<Address, bigint>();
  for (const pull of pulls) {
    if (pull.amount === 0n) continue;
    const token = getAddress(pull.token);
    ledger.set(token, (ledger.get(token) ?? 0n) + pull.amount);
  }
  return ledger;
}

/**
 * Injection ceiling for a token: its pulled total, or undefined (unbounded)
 * for a token that was never pulled, such as a multi-hop intermediate.
 */
export function pulledCeiling(ledger: PulledLedger, token: Address): bigint | undefined {
  return ledger.get(getAddress(token));
}
