import type { Address, Hex } from 'viem';

/** Largest whitelist batch a single admin call may carry */
export const MAX_BATCH_TARGETS = 50;

/** Offsets 0-3 would overwrite the selector itself */
export const MIN_INJECTION_OFFSET = 4;

export interface SelectorOffsetEntry {
  selector: Hex;
  /** Human-readable signature, for display only */
  signature: string;
  offset: number;
}

/**
 * Where the input amount sits in the calldata of the swap entry points the
 * executor injects into. Offsets count from the start of the payload,
 * selector included.
 */
export const DEFAULT_SELECTOR_OFFSETS: readonly SelectorOffsetEntry[] = [
  {
    selector: '0x38ed1739',
    signature: 'swapExactTokensForTokens(uint256,uint256,address[],address,uint256)',
    offset: 4,
  },
  {
    selector: '0x04e45aaf',
    signature: 'exactInputSingle((address,address,uint24,address,uint256,uint256,uint160))',
    offset: 132,
  },
  {
    selector: '0x414bf389',
    signature: 'exactInputSingle((address,address,uint24,address,uint256,uint256,uint256,uint160))',
    offset: 164,
  },
  {
    // Dynamic tuple: head word, then path offset, recipient, deadline, amountIn
    selector: '0xc04b8d59',
    signature: 'exactInput((bytes,address,uint256,uint256,uint256))',
    offset: 132,
  },
];

/** Router targets whitelisted on a fresh BSC deployment */
export const DEFAULT_BSC_TARGETS: readonly { name: string; address: Address }[] = [
  { name: 'PancakeSwap V2 Router', address: '0x10ED43C718714eb63d5aA57B78B54704E256024E' },
  { name: 'PancakeSwap V3 SwapRouter', address: '0x1b81D678ffb9C0263b24A97847620C99d213eB14' },
  { name: 'Uniswap V3 Router (BSC)', address: '0x4752ba5DBc23f44D87826276BF6Fd6b1C372aD24' },
  { name: 'Biswap Router', address: '0xB971eF87ede563556b2ED4b1C0b0019111Dd85d2' },
];
