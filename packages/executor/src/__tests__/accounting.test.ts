import { describe, it, expect } from 'vitest';
import { getAddress } from 'viem';
import { LedgerHost } from '@aequi/ledger';
import { NULL_TOKEN } from '@aequi/types';
import { BalanceSnapshotService, uniqueFlushTokens } from '../balances.js';
import { buildPulledLedger, pulledCeiling } from '../pulled-ledger.js';
import { TokenGateway } from '../token.js';

const SELF = getAddress('0x0000000000000000000000000000000000000e00');
const TOKEN_A = getAddress('0x000000000000000000000000000000000000000a');
const TOKEN_B = getAddress('0x000000000000000000000000000000000000000b');

describe('buildPulledLedger', () => {
  it('sums repeated tokens in first-seen order', () => {
    const ledger = buildPulledLedger([
      { token: TOKEN_B, amount: 5n },
      { token: TOKEN_A, amount: 30n },
      { token: TOKEN_B, amount: 7n },
      { token: TOKEN_A, amount: 70n },
    ]);

    expect([...ledger]).toEqual([
      [TOKEN_B, 12n],
      [TOKEN_A, 100n],
    ]);
  });

  it('treats lowercase and checksummed addresses as one token', () => {
    const ledger = buildPulledLedger([
      { token: '0x000000000000000000000000000000000000000a', amount: 1n },
      { token: TOKEN_A, amount: 2n },
    ]);
    expect(pulledCeiling(ledger, TOKEN_A)).toBe(3n);
  });

  it('leaves no entry for zero pulls', () => {
    const ledger = buildPulledLedger([{ token: TOKEN_A, amount: 0n }]);
    expect(ledger.size).toBe(0);
    expect(pulledCeiling(ledger, TOKEN_A)).toBeUndefined();
  });
});

describe('uniqueFlushTokens', () => {
  it('drops the null token', () => {
    expect(uniqueFlushTokens([NULL_TOKEN, TOKEN_A, NULL_TOKEN])).toEqual([TOKEN_A]);
  });

  it('rejects a repeated token', () => {
    expect(() => uniqueFlushTokens([TOKEN_A, TOKEN_B, TOKEN_A])).toThrow(
      `Token ${TOKEN_A} appears more than once in the flush list`
    );
  });
});

describe('BalanceSnapshotService', () => {
  it('measures native balance from before the attached value', () => {
    const host = new LedgerHost();
    host.fund(SELF, 30n);
    const balances = new BalanceSnapshotService(host, SELF, new TokenGateway(host, SELF));

    expect(balances.nativeBalanceBefore(20n)).toBe(10n);
    expect(balances.nativeBalanceBefore(50n)).toBe(0n);
  });
});
