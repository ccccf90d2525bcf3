import type { Address, Hex } from 'viem';

/** Registry and ownership audit events */
export type RegistryEvent =
  | { type: 'TargetWhitelisted'; target: Address }
  | { type: 'TargetRemoved'; target: Address }
  | { type: 'SelectorOffsetSet'; selector: Hex; offset: number }
  | { type: 'SelectorOffsetRemoved'; selector: Hex }
  | { type: 'OwnershipTransferred'; previousOwner: Address | undefined; newOwner: Address | undefined };

/** Callback for registry events */
export type RegistryEventCallback = (event: RegistryEvent) => void;
