import type { Address } from 'viem';

export type RegistryErrorCode =
  | 'Unauthorized'
  | 'ZeroAddress'
  | 'InvalidOffset'
  | 'InvalidSelector'
  | 'EmptyBatch'
  | 'BatchTooLarge';

/**
 * Raised by the administrator surface. Nothing is written when one is thrown.
 */
export class RegistryError extends Error {
  readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = 'RegistryError';
    this.code = code;
  }

  static unauthorized(caller: Address): RegistryError {
    return new RegistryError('Unauthorized', `Caller ${caller} is not the owner`);
  }

  static zeroAddress(what: string): RegistryError {
    return new RegistryError('ZeroAddress', `${what} must not be the zero address`);
  }
}
