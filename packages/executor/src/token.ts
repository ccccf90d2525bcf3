import {
  decodeFunctionResult,
  encodeFunctionData,
  erc20Abi,
  hexToBigInt,
  size,
  slice,
  type Address,
  type Hex,
} from 'viem';
import type { CallResult, LedgerHost } from '@aequi/ledger';
import { ExecutorError } from './errors.js';

/**
 * Token Gateway
 *
 * The executor's only way to touch a token. Calls go out from the executor's
 * own address; a write counts as successful only when the call did not
 * revert and either returned no data from a contract, or returned `true`.
 */
export class TokenGateway {
  constructor(
    private host: LedgerHost,
    private self: Address
  ) {}

  async balanceOf(token: Address, account: Address): Promise<bigint> {
    const result = await this.host.call({
      from: this.self,
      to: token,
      data: encodeFunctionData({ abi: erc20Abi, functionName: 'balanceOf', args: [account] }),
    });
    if (!result.success || size(result.returnData) < 32) {
      throw new ExecutorError({ code: 'BalanceQueryFailed', token });
    }
    return decodeFunctionResult({ abi: erc20Abi, functionName: 'balanceOf', data: slice(result.returnData, 0, 32) });
  }

  async transfer(token: Address, to: Address, amount: bigint): Promise<boolean> {
    return this.write(token, encodeFunctionData({ abi: erc20Abi, functionName: 'transfer', args: [to, amount] }));
  }

  async transferFrom(token: Address, from: Address, to: Address, amount: bigint): Promise<boolean> {
    return this.write(
      token,
      encodeFunctionData({ abi: erc20Abi, functionName: 'transferFrom', args: [from, to, amount] })
    );
  }

  async approve(token: Address, spender: Address, amount: bigint): Promise<boolean> {
    return this.write(token, encodeFunctionData({ abi: erc20Abi, functionName: 'approve', args: [spender, amount] }));
  }

  private async write(token: Address, data: Hex): Promise<boolean> {
    const result = await this.host.call({ from: this.self, to: token, data });
    return isTokenCallSuccessful(this.host, token, result);
  }
}

/**
 * Success rule for token writes, covering both return conventions.
 * Empty return data only counts when the token address has code.
 */
export function isTokenCallSuccessful(host: LedgerHost, token: Address, result: CallResult): boolean {
  if (!result.success) return false;

  const returned = size(result.returnData);
  if (returned === 0) return host.hasCode(token);
  if (returned < 32) return false;
  return hexToBigInt(slice(result.returnData, 0, 32)) === 1n;
}
