import { isAddressEqual, zeroAddress, type Address } from 'viem';
import type { RegistryEventCallback } from '@aequi/types';
import { RegistryError } from './errors.js';

/**
 * Single-owner access control shared by the registry and the executor's
 * administrator surface.
 */
export class Ownership {
  private current: Address | undefined;
  private eventCallback?: RegistryEventCallback;

  constructor(owner: Address) {
    if (isAddressEqual(owner, zeroAddress)) {
      throw RegistryError.zeroAddress('Owner');
    }
    this.current = owner;
  }

  get owner(): Address | undefined {
    return this.current;
  }

  isOwner(caller: Address): boolean {
    return this.current !== undefined && isAddressEqual(caller, this.current);
  }

  /**
   * Throws unless `caller` is the current owner.
   */
  assertOwner(caller: Address): void {
    if (!this.isOwner(caller)) {
      throw RegistryError.unauthorized(caller);
    }
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.assertOwner(caller);
    if (isAddressEqual(newOwner, zeroAddress)) {
      throw RegistryError.zeroAddress('New owner');
    }
    this.setOwner(newOwner);
  }

  /**
   * Give up ownership for good. Every admin entry point is closed afterwards.
   */
  renounceOwnership(caller: Address): void {
    this.assertOwner(caller);
    this.setOwner(undefined);
  }

  onEvent(callback: RegistryEventCallback): void {
    this.eventCallback = callback;
  }

  private setOwner(next: Address | undefined): void {
    const previousOwner = this.current;
    this.current = next;
    this.eventCallback?.({ type: 'OwnershipTransferred', previousOwner, newOwner: next });
  }
}
