import {
  decodeFunctionData,
  encodeFunctionResult,
  getAddress,
  maxUint256,
  parseAbi,
  type Address,
  type DecodeFunctionDataReturnType,
  type Hex,
} from 'viem';
import type { LedgerHost } from '../host.js';
import { RevertError, revertReason } from '../revert.js';
import type { CallContext, Contract } from '../types.js';

export const tokenAbi = parseAbi([
  'function balanceOf(address account) view returns (uint256)',
  'function allowance(address owner, address spender) view returns (uint256)',
  'function transfer(address to, uint256 amount) returns (bool)',
  'function transferFrom(address from, address to, uint256 amount) returns (bool)',
  'function approve(address spender, uint256 amount) returns (bool)',
]);

/** Token entry points whose outcome follows the return convention */
export type TokenWriteFunction = 'transfer' | 'transferFrom' | 'approve';

export interface Erc20Options {
  address: Address;
  symbol: string;
  /** `bool` returns true on success; `none` returns no data at all */
  returns?: 'bool' | 'none';
  /** Report a failed write by returning false instead of reverting (`bool` tokens only) */
  failureMode?: 'revert' | 'return-false';
  /** Reject a nonzero approve while a nonzero allowance is outstanding */
  approveFromZero?: boolean;
}

const balanceSlot = (account: Address): string => `balance:${getAddress(account)}`;
const allowanceSlot = (owner: Address, spender: Address): string =>
  `allowance:${getAddress(owner)}:${getAddress(spender)}`;

/**
 * ERC-20 token contract
 *
 * Balances and allowances live in the host's world state, so they roll back
 * with the call that wrote them. The return convention is configurable to
 * cover both strict-boolean tokens and tokens that return nothing.
 */
export class Erc20Token implements Contract {
  readonly name: string;
  readonly address: Address;
  readonly symbol: string;
  private returns: 'bool' | 'none';
  private failureMode: 'revert' | 'return-false';
  private approveFromZero: boolean;
  private disabled: Set<TokenWriteFunction> = new Set();

  constructor(options: Erc20Options) {
    this.address = getAddress(options.address);
    this.symbol = options.symbol;
    this.name = `ERC20(${options.symbol})`;
    this.returns = options.returns ?? 'bool';
    this.failureMode = options.failureMode ?? 'revert';
    this.approveFromZero = options.approveFromZero ?? false;
  }

  /**
   * Make every call to `fn` fail until re-enabled.
   */
  disable(fn: TokenWriteFunction): void {
    this.disabled.add(fn);
  }

  enable(fn: TokenWriteFunction): void {
    this.disabled.delete(fn);
  }

  balanceOf(host: LedgerHost, account: Address): bigint {
    return host.state.getSlot(this.address, balanceSlot(account));
  }

  allowance(host: LedgerHost, owner: Address, spender: Address): bigint {
    return host.state.getSlot(this.address, allowanceSlot(owner, spender));
  }

  /**
   * Mint directly into an account. Setup only: there is no mint entry point for message calls.
   */
  mint(host: LedgerHost, to: Address, amount: bigint): void {
    host.state.setSlot(this.address, balanceSlot(to), this.balanceOf(host, to) + amount);
    host.emit(this.address, 'Transfer', {
      from: '0x0000000000000000000000000000000000000000',
      to: getAddress(to),
      value: amount,
    });
  }

  async handle(ctx: CallContext): Promise<Hex> {
    const call = this.decode(ctx.data);

    switch (call.functionName) {
      case 'balanceOf':
        return encodeFunctionResult({
          abi: tokenAbi,
          functionName: 'balanceOf',
          result: this.balanceOf(ctx.host, call.args[0]),
        });

      case 'allowance':
        return encodeFunctionResult({
          abi: tokenAbi,
          functionName: 'allowance',
          result: this.allowance(ctx.host, call.args[0], call.args[1]),
        });

      case 'transfer': {
        const [to, amount] = call.args;
        return this.write(ctx, 'transfer', () => this.move(ctx.host, ctx.sender, to, amount));
      }

      case 'transferFrom': {
        const [from, to, amount] = call.args;
        return this.write(
          ctx,
          'transferFrom',
          () => this.spendAllowance(ctx.host, from, ctx.sender, amount) ?? this.move(ctx.host, from, to, amount)
        );
      }

      case 'approve': {
        const [spender, amount] = call.args;
        return this.write(ctx, 'approve', () => this.setAllowance(ctx.host, ctx.sender, spender, amount));
      }
    }
  }

  // ---- Private helpers ----

  private decode(data: Hex): DecodeFunctionDataReturnType<typeof tokenAbi> {
    try {
      return decodeFunctionData({ abi: tokenAbi, data });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RevertError('0x', `${this.symbol}: undecodable call: ${reason}`);
    }
  }

  /**
   * Run a state-changing entry point. A failed operation leaves no writes
   * behind, whichever way the failure is reported.
   */
  private write(ctx: CallContext, fn: TokenWriteFunction, operation: () => string | undefined): Hex {
    if (this.disabled.has(fn)) {
      return this.fail(fn, `${fn} disabled`);
    }

    const snapshot = ctx.host.state.snapshot();
    const failure = operation();
    if (failure !== undefined) {
      ctx.host.state.revert(snapshot);
      return this.fail(fn, failure);
    }
    return this.succeed(fn);
  }

  /**
   * Returns a failure reason, or undefined once the balances are moved.
   */
  private move(host: LedgerHost, from: Address, to: Address, amount: bigint): string | undefined {
    const fromBalance = this.balanceOf(host, from);
    if (fromBalance < amount) {
      return 'transfer amount exceeds balance';
    }
    host.state.setSlot(this.address, balanceSlot(from), fromBalance - amount);
    host.state.setSlot(this.address, balanceSlot(to), this.balanceOf(host, to) + amount);
    host.emit(this.address, 'Transfer', { from: getAddress(from), to: getAddress(to), value: amount });
    return undefined;
  }

  private spendAllowance(host: LedgerHost, owner: Address, spender: Address, amount: bigint): string | undefined {
    const current = this.allowance(host, owner, spender);
    if (current < amount) {
      return 'insufficient allowance';
    }
    if (current !== maxUint256) {
      host.state.setSlot(this.address, allowanceSlot(owner, spender), current - amount);
    }
    return undefined;
  }

  private setAllowance(host: LedgerHost, owner: Address, spender: Address, amount: bigint): string | undefined {
    if (this.approveFromZero && amount !== 0n && this.allowance(host, owner, spender) !== 0n) {
      return 'approve from non-zero to non-zero allowance';
    }
    host.state.setSlot(this.address, allowanceSlot(owner, spender), amount);
    host.emit(this.address, 'Approval', { owner: getAddress(owner), spender: getAddress(spender), value: amount });
    return undefined;
  }

  private succeed(fn: TokenWriteFunction): Hex {
    if (this.returns === 'none') return '0x';
    return encodeFunctionResult({ abi: tokenAbi, functionName: fn, result: true });
  }

  private fail(fn: TokenWriteFunction, reason: string): Hex {
    if (this.returns === 'bool' && this.failureMode === 'return-false') {
      return encodeFunctionResult({ abi: tokenAbi, functionName: fn, result: false });
    }
    throw revertReason(`${this.symbol}: ${reason}`);
  }
}
