import { encodeFunctionData, getAddress, maxUint256, type Address, type Hex } from 'viem';
import { ConstantRateRouter, Erc20Token, LedgerHost, swapRouterAbi, tokenAbi } from '@aequi/ledger';
import { DEFAULT_SELECTOR_OFFSETS, Ownership, TargetRegistry } from '@aequi/registry';
import { NULL_TOKEN, type ExecutorCall } from '@aequi/types';
import { MulticallExecutor } from '../executor.js';
import type { ExecutorConfig } from '../types.js';

export const OWNER = getAddress('0x00000000000000000000000000000000000000a1');
export const TRADER = getAddress('0x0000000000000000000000000000000000000B0b');
export const STRANGER = getAddress('0x00000000000000000000000000000000000000c3');
export const PAYEE = getAddress('0x00000000000000000000000000000000000000d4');
export const EXECUTOR = getAddress('0x0000000000000000000000000000000000000e00');
export const ROUTER = getAddress('0x0000000000000000000000000000000000000f00');
export const TOKEN_A = getAddress('0x000000000000000000000000000000000000000a');
export const TOKEN_B = getAddress('0x000000000000000000000000000000000000000b');

export const TRADER_START = 1_000n;
export const ROUTER_RESERVE = 10_000n;

export interface Fixture {
  host: LedgerHost;
  ownership: Ownership;
  registry: TargetRegistry;
  executor: MulticallExecutor;
  tokenA: Erc20Token;
  tokenB: Erc20Token;
  router: ConstantRateRouter;
}

/**
 * Executor with a 2:1 A->B router whitelisted, the trader holding
 * TRADER_START of A and an unlimited A allowance for the executor.
 */
export async function setupFixture(config: Partial<ExecutorConfig> = {}): Promise<Fixture> {
  const host = new LedgerHost();
  const ownership = new Ownership(OWNER);
  const registry = new TargetRegistry(ownership, {
    targets: [ROUTER, PAYEE],
    selectorOffsets: DEFAULT_SELECTOR_OFFSETS,
  });

  const tokenA = host.deploy(TOKEN_A, new Erc20Token({ address: TOKEN_A, symbol: 'A' }));
  const tokenB = host.deploy(TOKEN_B, new Erc20Token({ address: TOKEN_B, symbol: 'B' }));
  const router = host.deploy(ROUTER, new ConstantRateRouter({ address: ROUTER, rateNumerator: 2n }));
  const executor = host.deploy(
    EXECUTOR,
    new MulticallExecutor({ host, address: EXECUTOR, registry, ownership, config })
  );

  tokenA.mint(host, TRADER, TRADER_START);
  tokenB.mint(host, ROUTER, ROUTER_RESERVE);
  await host.transact({
    from: TRADER,
    to: TOKEN_A,
    data: encodeFunctionData({ abi: tokenAbi, functionName: 'approve', args: [EXECUTOR, maxUint256] }),
  });

  return { host, ownership, registry, executor, tokenA, tokenB, router };
}

/**
 * V2 swap of A for B paying the executor.
 */
export function swapData(amountIn: bigint, amountOutMin = 0n): Hex {
  return encodeFunctionData({
    abi: swapRouterAbi,
    functionName: 'swapExactTokensForTokens',
    args: [amountIn, amountOutMin, [TOKEN_A, TOKEN_B], EXECUTOR, 0n],
  });
}

export function swapCall(
  amountIn: bigint,
  options: { injectToken?: Address; injectOffset?: number; amountOutMin?: bigint } = {}
): ExecutorCall {
  return {
    target: ROUTER,
    value: 0n,
    data: swapData(amountIn, options.amountOutMin),
    injectToken: options.injectToken ?? NULL_TOKEN,
    injectOffset: options.injectOffset ?? 0,
  };
}
