import { encodeErrorResult, parseAbi, type Hex } from 'viem';

const reasonAbi = parseAbi(['error Error(string reason)']);

/**
 * Thrown by contract code to fail the current call.
 *
 * `data` is the raw revert payload the caller receives. The host rolls the
 * call's state back before handing it over.
 */
export class RevertError extends Error {
  readonly data: Hex;

  constructor(data: Hex, message?: string) {
    super(message ?? `execution reverted (${data})`);
    this.name = 'RevertError';
    this.data = data;
  }
}

/**
 * Revert with a plain reason string, encoded as `Error(string)`.
 */
export function revertReason(reason: string): RevertError {
  const data = encodeErrorResult({ abi: reasonAbi, errorName: 'Error', args: [reason] });
  return new RevertError(data, `execution reverted: ${reason}`);
}
