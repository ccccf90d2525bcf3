import {
  decodeFunctionData,
  decodeFunctionResult,
  encodeFunctionData,
  encodeFunctionResult,
  getAddress,
  hexToBigInt,
  parseAbi,
  size,
  type Address,
  type DecodeFunctionDataReturnType,
  type Hex,
} from 'viem';
import { RevertError, revertReason } from '../revert.js';
import type { CallContext, CallResult, Contract } from '../types.js';
import { tokenAbi } from './erc20.js';

export const swapRouterAbi = parseAbi([
  'function swapExactTokensForTokens(uint256 amountIn, uint256 amountOutMin, address[] path, address to, uint256 deadline) returns (uint256[] amounts)',
  'function getAmountOut(uint256 amountIn) view returns (uint256)',
]);

export interface ConstantRateRouterOptions {
  address: Address;
  /** Output units paid per `rateDenominator` input units */
  rateNumerator: bigint;
  rateDenominator?: bigint;
}

/**
 * Constant-rate swap router
 *
 * Speaks the V2 `swapExactTokensForTokens` interface and pays out of its own
 * reserves at a fixed rate. Used for plan simulation and tests where a real
 * pool curve adds nothing.
 */
export class ConstantRateRouter implements Contract {
  readonly name = 'ConstantRateRouter';
  readonly address: Address;
  private rateNumerator: bigint;
  private rateDenominator: bigint;

  constructor(options: ConstantRateRouterOptions) {
    if (options.rateNumerator <= 0n || (options.rateDenominator ?? 1n) <= 0n) {
      throw new Error('Router rate must be positive');
    }
    this.address = getAddress(options.address);
    this.rateNumerator = options.rateNumerator;
    this.rateDenominator = options.rateDenominator ?? 1n;
  }

  quote(amountIn: bigint): bigint {
    return (amountIn * this.rateNumerator) / this.rateDenominator;
  }

  async handle(ctx: CallContext): Promise<Hex> {
    const call = this.decode(ctx.data);

    switch (call.functionName) {
      case 'getAmountOut':
        return encodeFunctionResult({
          abi: swapRouterAbi,
          functionName: 'getAmountOut',
          result: this.quote(call.args[0]),
        });

      case 'swapExactTokensForTokens': {
        const [amountIn, amountOutMin, path, to] = call.args;
        if (path.length < 2) throw revertReason('INVALID_PATH');
        if (amountIn === 0n) throw revertReason('INSUFFICIENT_INPUT_AMOUNT');

        const tokenIn = path[0];
        const tokenOut = path[path.length - 1];

        const pulled = await ctx.host.call({
          from: ctx.self,
          to: tokenIn,
          data: encodeFunctionData({ abi: tokenAbi, functionName: 'transferFrom', args: [ctx.sender, ctx.self, amountIn] }),
        });
        if (!this.tokenCallSucceeded(pulled)) throw revertReason('TRANSFER_FROM_FAILED');

        const amountOut = this.quote(amountIn);
        if (amountOut < amountOutMin) throw revertReason('INSUFFICIENT_OUTPUT_AMOUNT');

        const paid = await ctx.host.call({
          from: ctx.self,
          to: tokenOut,
          data: encodeFunctionData({ abi: tokenAbi, functionName: 'transfer', args: [to, amountOut] }),
        });
        if (!this.tokenCallSucceeded(paid)) throw revertReason('TRANSFER_FAILED');

        return encodeFunctionResult({
          abi: swapRouterAbi,
          functionName: 'swapExactTokensForTokens',
          result: [amountIn, amountOut],
        });
      }
    }
  }

  private decode(data: Hex): DecodeFunctionDataReturnType<typeof swapRouterAbi> {
    try {
      return decodeFunctionData({ abi: swapRouterAbi, data });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RevertError('0x', `router: undecodable call: ${reason}`);
    }
  }

  private tokenCallSucceeded(result: CallResult): boolean {
    if (!result.success) return false;
    if (size(result.returnData) === 0) return true;
    return hexToBigInt(result.returnData) === 1n;
  }
}

/**
 * Read the `amounts` array a router swap returned.
 */
export function decodeSwapAmounts(returnData: Hex): readonly bigint[] {
  return decodeFunctionResult({ abi: swapRouterAbi, functionName: 'swapExactTokensForTokens', data: returnData });
}
