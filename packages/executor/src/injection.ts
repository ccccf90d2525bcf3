import { bytesToHex, getAddress, hexToBytes, isAddressEqual, type Address, type Hex } from 'viem';
import type { TargetReader } from '@aequi/registry';
import { NULL_TOKEN, type ExecutorCall, type InjectionRecord } from '@aequi/types';
import { ExecutorError } from './errors.js';
import { SELECTOR_SIZE, fitsWord, readSelector, writeWord } from './payload.js';
import { pulledCeiling, type PulledLedger } from './pulled-ledger.js';

/**
 * Amount to inject: the live balance, capped by the pulled total when there is one.
 */
export function injectableAmount(balance: bigint, ceiling: bigint | undefined): bigint {
  if (ceiling === undefined) return balance;
  return balance < ceiling ? balance : ceiling;
}

export interface PreparedCall {
  data: Hex;
  injection?: InjectionRecord;
}

/**
 * Injection Engine
 *
 * Patches a live balance into a call's payload. The write position is never
 * taken on the caller's word alone: the declared offset must equal the
 * offset registered for the payload's selector, and the word must fit.
 *
 * Order of checks:
 * 1. Payload holds a selector
 * 2. Selector is registered
 * 3. Declared offset equals the registered one
 * 4. Amount = min(balance, pulled total) is nonzero
 * 5. Word fits, then exactly 32 bytes are overwritten
 */
export class InjectionEngine {
  constructor(
    private registry: TargetReader,
    private balanceOf: (token: Address) => Promise<bigint>
  ) {}

  async prepare(call: ExecutorCall, callIndex: number, ledger: PulledLedger): Promise<PreparedCall> {
    if (isAddressEqual(call.injectToken, NULL_TOKEN)) {
      return { data: call.data };
    }

    const payload = hexToBytes(call.data);
    const offsetError = () =>
      new ExecutorError({
        code: 'InvalidInjectionOffset',
        offset: BigInt(call.injectOffset),
        length: BigInt(payload.length),
      });

    if (payload.length < SELECTOR_SIZE) {
      throw offsetError();
    }

    const selector = readSelector(payload);
    const expected = this.registry.expectedOffset(selector);
    if (expected === undefined) {
      throw new ExecutorError({ code: 'InvalidSelectorForInjection', selector });
    }
    if (call.injectOffset !== expected) {
      throw new ExecutorError({
        code: 'OffsetMismatchForSelector',
        selector,
        declared: BigInt(call.injectOffset),
        expected: BigInt(expected),
      });
    }

    const token = getAddress(call.injectToken);
    const amount = injectableAmount(await this.balanceOf(token), pulledCeiling(ledger, token));
    if (amount === 0n) {
      throw new ExecutorError({ code: 'ZeroAmountNotAllowed' });
    }

    if (!fitsWord(payload.length, call.injectOffset)) {
      throw offsetError();
    }
    writeWord(payload, call.injectOffset, amount);

    return {
      data: bytesToHex(payload),
      injection: { callIndex, token, offset: call.injectOffset, amount },
    };
  }
}
