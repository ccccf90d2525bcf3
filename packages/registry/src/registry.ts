import { getAddress, isAddressEqual, zeroAddress, type Address, type Hex } from 'viem';
import type { RegistryEvent, RegistryEventCallback } from '@aequi/types';
import { RegistryError } from './errors.js';
import type { Ownership } from './ownership.js';
import { MAX_BATCH_TARGETS, MIN_INJECTION_OFFSET } from './defaults.js';

/**
 * Read side of the registry -- everything the executor is allowed to see.
 */
export interface TargetReader {
  isWhitelisted(target: Address): boolean;
  /** Expected injection offset for a selector; undefined when unregistered */
  expectedOffset(selector: Hex): number | undefined;
}

export interface TargetRegistryOptions {
  /** Targets whitelisted at construction */
  targets?: readonly Address[];
  /** Selector offsets registered at construction */
  selectorOffsets?: readonly { selector: Hex; offset: number }[];
  /** Log every mutation to the console */
  verbose?: boolean;
}

/**
 * Normalize a 4-byte selector to lowercase 0x-prefixed hex.
 */
export function normalizeSelector(selector: string): Hex {
  if (!/^0x[0-9a-fA-F]{8}$/.test(selector)) {
    throw new RegistryError('InvalidSelector', `Selector must be 4 bytes (0x + 8 hex chars), got ${selector}`);
  }
  return `0x${selector.slice(2).toLowerCase()}`;
}

/**
 * Target Registry
 *
 * Holds the whitelist of callable targets (also the only valid approval
 * spenders) and the table mapping a function selector to the byte offset of
 * the amount word inside its payload.
 *
 * Reads are free. Every write goes through the owner check and emits an
 * audit event; a rejected write changes nothing.
 */
export class TargetRegistry implements TargetReader {
  private targets: Set<Address> = new Set();
  private offsets: Map<Hex, number> = new Map();
  private ownership: Ownership;
  private verbose: boolean;
  private eventCallback?: RegistryEventCallback;

  constructor(ownership: Ownership, options: TargetRegistryOptions = {}) {
    this.ownership = ownership;
    this.verbose = options.verbose ?? false;

    for (const target of options.targets ?? []) {
      this.assertNonZero(target);
      this.targets.add(getAddress(target));
    }
    for (const { selector, offset } of options.selectorOffsets ?? []) {
      this.assertValidOffset(offset);
      if (offset !== 0) {
        this.offsets.set(normalizeSelector(selector), offset);
      }
    }
  }

  // ---- Reads ----

  isWhitelisted(target: Address): boolean {
    return this.targets.has(getAddress(target));
  }

  expectedOffset(selector: Hex): number | undefined {
    return this.offsets.get(normalizeSelector(selector));
  }

  getWhitelistedTargets(): Address[] {
    return Array.from(this.targets);
  }

  getSelectorOffsets(): Array<{ selector: Hex; offset: number }> {
    return Array.from(this.offsets.entries()).map(([selector, offset]) => ({ selector, offset }));
  }

  get size(): number {
    return this.targets.size;
  }

  // ---- Admin writes ----

  /**
   * Whitelist or remove a single target.
   */
  setTarget(caller: Address, target: Address, allowed: boolean): void {
    this.ownership.assertOwner(caller);
    this.assertNonZero(target);
    this.applyTarget(getAddress(target), allowed);
  }

  /**
   * Whitelist or remove a batch of targets.
   * The whole batch is validated before the first entry is applied.
   */
  setTargets(caller: Address, targets: readonly Address[], allowed: boolean): void {
    this.ownership.assertOwner(caller);

    if (targets.length === 0) {
      throw new RegistryError('EmptyBatch', 'Target batch is empty');
    }
    if (targets.length > MAX_BATCH_TARGETS) {
      throw new RegistryError(
        'BatchTooLarge',
        `Target batch of ${targets.length} exceeds the limit of ${MAX_BATCH_TARGETS}`
      );
    }
    for (const target of targets) {
      this.assertNonZero(target);
    }

    for (const target of targets) {
      this.applyTarget(getAddress(target), allowed);
    }
  }

  /**
   * Register the injection offset of a selector. Offset 0 removes it.
   */
  setSelectorOffset(caller: Address, selector: Hex, offset: number): void {
    this.ownership.assertOwner(caller);
    const key = normalizeSelector(selector);
    this.assertValidOffset(offset);

    if (offset === 0) {
      this.offsets.delete(key);
      this.emit({ type: 'SelectorOffsetRemoved', selector: key });
      return;
    }

    this.offsets.set(key, offset);
    this.emit({ type: 'SelectorOffsetSet', selector: key, offset });
  }

  onEvent(callback: RegistryEventCallback): void {
    this.eventCallback = callback;
  }

  // ---- Private helpers ----

  private applyTarget(target: Address, allowed: boolean): void {
    if (allowed) {
      this.targets.add(target);
      this.emit({ type: 'TargetWhitelisted', target });
    } else {
      this.targets.delete(target);
      this.emit({ type: 'TargetRemoved', target });
    }
  }

  private assertNonZero(target: Address): void {
    if (isAddressEqual(target, zeroAddress)) {
      throw RegistryError.zeroAddress('Target');
    }
  }

  private assertValidOffset(offset: number): void {
    if (!Number.isSafeInteger(offset) || offset < 0 || (offset !== 0 && offset < MIN_INJECTION_OFFSET)) {
      throw new RegistryError(
        'InvalidOffset',
        `Invalid injection offset ${offset}: must be 0 (remove) or at least ${MIN_INJECTION_OFFSET}`
      );
    }
  }

  private emit(event: RegistryEvent): void {
    if (this.verbose) {
      console.log(`[registry] ${event.type} ${JSON.stringify(event)}`);
    }
    this.eventCallback?.(event);
  }
}
