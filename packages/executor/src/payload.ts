import { bytesToBigInt, bytesToHex, maxUint256, numberToBytes, type Hex } from 'viem';

/** Width of the function selector at the start of every payload */
export const SELECTOR_SIZE = 4;

/** Width of one ABI word */
export const WORD_SIZE = 32;

export class PayloadBoundsError extends RangeError {
  constructor(offset: number, width: number, length: number) {
    super(`Read/write of ${width} bytes at offset ${offset} is outside a ${length}-byte payload`);
    this.name = 'PayloadBoundsError';
  }
}

/**
 * True when a full word starting at `offset` lies inside a payload of `length` bytes.
 */
export function fitsWord(length: number, offset: number): boolean {
  return Number.isSafeInteger(offset) && offset >= 0 && offset + WORD_SIZE <= length;
}

function assertRange(payload: Uint8Array, offset: number, width: number): void {
  if (!Number.isSafeInteger(offset) || offset < 0 || offset + width > payload.length) {
    throw new PayloadBoundsError(offset, width, payload.length);
  }
}

export function readSelector(payload: Uint8Array): Hex {
  assertRange(payload, 0, SELECTOR_SIZE);
  return bytesToHex(payload.subarray(0, SELECTOR_SIZE));
}

/**
 * Read an unsigned big-endian word.
 */
export function readWord(payload: Uint8Array, offset: number): bigint {
  assertRange(payload, offset, WORD_SIZE);
  return bytesToBigInt(payload.subarray(offset, offset + WORD_SIZE));
}

/**
 * Overwrite exactly one word with `value`, big-endian. No other byte changes.
 */
export function writeWord(payload: Uint8Array, offset: number, value: bigint): void {
  assertRange(payload, offset, WORD_SIZE);
  if (value < 0n || value > maxUint256) {
    throw new RangeError(`Value ${value} does not fit an unsigned 256-bit word`);
  }
  payload.set(numberToBytes(value, { size: WORD_SIZE }), offset);
}
