import { getAddress, isAddressEqual, type Address } from 'viem';
import type { LedgerHost } from '@aequi/ledger';
import { NULL_TOKEN, type TokenSnapshot } from '@aequi/types';
import { ExecutorError } from './errors.js';
import type { TokenGateway } from './token.js';

/**
 * Drop the null token and reject repeats.
 */
export function uniqueFlushTokens(tokens: readonly Address[]): Address[] {
  const seen = new Set<Address>();
  for (const raw of tokens) {
    if (isAddressEqual(raw, NULL_TOKEN)) continue;
    const token = getAddress(raw);
    if (seen.has(token)) {
      throw new ExecutorError({ code: 'DuplicateTokenInFlush', token });
    }
    seen.add(token);
  }
  return Array.from(seen);
}

/**
 * Balance Snapshot Service
 *
 * Reads the executor's own token and native balances, before the batch for
 * the snapshot and after it for the flush deltas.
 */
export class BalanceSnapshotService {
  constructor(
    private host: LedgerHost,
    private self: Address,
    private tokens: TokenGateway
  ) {}

  nativeBalance(): bigint {
    return this.host.balanceOf(this.self);
  }

  /**
   * Native balance held before this invocation's attached value arrived.
   * The attached value is already credited when execution starts.
   */
  nativeBalanceBefore(attachedValue: bigint): bigint {
    const current = this.nativeBalance();
    return current > attachedValue ? current - attachedValue : 0n;
  }

  tokenBalance(token: Address): Promise<bigint> {
    return this.tokens.balanceOf(token, this.self);
  }

  async snapshotTokens(tokens: readonly Address[]): Promise<TokenSnapshot[]> {
    const snapshots: TokenSnapshot[] = [];
    for (const token of uniqueFlushTokens(tokens)) {
      snapshots.push({ token, balance: await this.tokenBalance(token) });
    }
    return snapshots;
  }
}
