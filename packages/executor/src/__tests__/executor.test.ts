import { describe, it, expect, beforeEach } from 'vitest';
import { encodeFunctionData, getAddress, maxUint256, zeroAddress, type Address, type Hex } from 'viem';
import {
  Erc20Token,
  RevertError,
  decodeSwapAmounts,
  revertReason,
  tokenAbi,
  type CallContext,
  type Contract,
  type Erc20Options,
} from '@aequi/ledger';
import { NULL_TOKEN, type ExecuteRequest } from '@aequi/types';
import { encodeExecutorError } from '../errors.js';
import { encodeExecute } from '../request.js';
import { submitExecute } from '../client.js';
import type { ExecutionState } from '../types.js';
import {
  EXECUTOR,
  OWNER,
  PAYEE,
  ROUTER,
  ROUTER_RESERVE,
  STRANGER,
  TOKEN_A,
  TOKEN_B,
  TRADER,
  TRADER_START,
  setupFixture,
  swapCall,
  type Fixture,
} from './fixtures.js';

const EMPTY: ExecuteRequest = { pulls: [], approvals: [], calls: [], tokensToFlush: [] };

const ATTACKER = getAddress('0x0000000000000000000000000000000000000Bad');
const BLOCKER = getAddress('0x0000000000000000000000000000000000000B10');
const TOKEN_U = getAddress('0x0000000000000000000000000000000000000D01');
const TOKEN_F = getAddress('0x0000000000000000000000000000000000000F01');
const NO_CODE = getAddress('0x0000000000000000000000000000000000000C0d');

/** Whitelisted target that tries to re-enter the executor */
class ReentrantTarget implements Contract {
  readonly name = 'ReentrantTarget';

  async handle(ctx: CallContext): Promise<Hex> {
    const result = await ctx.host.call({ from: ctx.self, to: EXECUTOR, data: encodeExecute(EMPTY) });
    if (!result.success) {
      throw new RevertError(result.returnData);
    }
    return '0x';
  }
}

/** Whitelisted target that makes a token refuse approvals once it is called */
class ApprovalBlocker implements Contract {
  readonly name = 'ApprovalBlocker';
  constructor(private token: Erc20Token) {}

  async handle(): Promise<Hex> {
    this.token.disable('approve');
    return '0x';
  }
}

/** Deploy a token, fund the trader and grant the executor an unlimited allowance */
async function deployTraderToken(fx: Fixture, options: Erc20Options): Promise<Erc20Token> {
  const token = fx.host.deploy(options.address, new Erc20Token(options));
  token.mint(fx.host, TRADER, TRADER_START);
  await fx.host.transact({
    from: TRADER,
    to: options.address,
    data: encodeFunctionData({ abi: tokenAbi, functionName: 'approve', args: [EXECUTOR, maxUint256] }),
  });
  return token;
}

function pullOnly(token: Address, amount: bigint): ExecuteRequest {
  return { ...EMPTY, pulls: [{ token, amount }] };
}

/** Pull A, lend it to the router, inject the live balance, flush both tokens */
function routedSwap(pullAmounts: bigint[], injectOffset = 4): ExecuteRequest {
  const total = pullAmounts.reduce((sum, amount) => sum + amount, 0n);
  return {
    pulls: pullAmounts.map((amount) => ({ token: TOKEN_A, amount })),
    approvals: [{ token: TOKEN_A, spender: ROUTER, amount: total, revokeAfter: true }],
    calls: [swapCall(0n, { injectToken: TOKEN_A, injectOffset })],
    tokensToFlush: [TOKEN_A, TOKEN_B],
  };
}

describe('MulticallExecutor', () => {
  let fx: Fixture;

  beforeEach(async () => {
    fx = await setupFixture();
  });

  describe('router scenario', () => {
    it('swaps the pulled amount and returns the output to the caller', async () => {
      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request: routedSwap([100n]) });

      expect(result.success).toBe(true);
      if (!result.success) return;

      expect(result.returnData).toHaveLength(1);
      expect(decodeSwapAmounts(result.returnData[0])).toEqual([100n, 200n]);
      expect(fx.tokenA.balanceOf(fx.host, TRADER)).toBe(TRADER_START - 100n);
      expect(fx.tokenB.balanceOf(fx.host, TRADER)).toBe(200n);
      expect(fx.tokenA.balanceOf(fx.host, EXECUTOR)).toBe(0n);
      expect(fx.tokenB.balanceOf(fx.host, EXECUTOR)).toBe(0n);
      expect(fx.tokenB.balanceOf(fx.host, ROUTER)).toBe(ROUTER_RESERVE - 200n);
      expect(fx.tokenA.allowance(fx.host, EXECUTOR, ROUTER)).toBe(0n);
    });

    it('emits a single Executed event', async () => {
      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request: routedSwap([100n]) });

      expect(result.success).toBe(true);
      if (!result.success) return;

      const executed = result.logs.filter((log) => log.name === 'Executed');
      expect(executed).toEqual([
        {
          address: EXECUTOR,
          name: 'Executed',
          args: { caller: TRADER, pullCount: 1n, callCount: 1n, nativeReturned: 0n },
        },
      ]);
    });

    it('reports progress through every stage', async () => {
      const phases: ExecutionState['phase'][] = [];
      fx.executor.onStateChange((state) => phases.push(state.phase));

      await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request: routedSwap([100n]) });

      expect(phases).toEqual(['pulling', 'approving', 'calling', 'revoking', 'flushing', 'completed']);
    });
  });

  describe('injection cap and dust safety', () => {
    it('caps injection at the pulled amount and leaves resident balances alone', async () => {
      fx.tokenA.mint(fx.host, EXECUTOR, 5n);
      fx.tokenB.mint(fx.host, EXECUTOR, 7n);

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request: routedSwap([100n]) });

      expect(result.success).toBe(true);
      if (!result.success) return;

      expect(decodeSwapAmounts(result.returnData[0])).toEqual([100n, 200n]);
      expect(fx.tokenA.balanceOf(fx.host, EXECUTOR)).toBe(5n);
      expect(fx.tokenB.balanceOf(fx.host, EXECUTOR)).toBe(7n);
      expect(fx.tokenA.balanceOf(fx.host, TRADER)).toBe(TRADER_START - 100n);
      expect(fx.tokenB.balanceOf(fx.host, TRADER)).toBe(200n);
    });

    it('returns only leftover input when a call spends less than was pulled', async () => {
      const request: ExecuteRequest = {
        pulls: [{ token: TOKEN_A, amount: 100n }],
        approvals: [{ token: TOKEN_A, spender: ROUTER, amount: 100n, revokeAfter: false }],
        calls: [swapCall(60n)],
        tokensToFlush: [TOKEN_A, TOKEN_B],
      };

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request });

      expect(result.success).toBe(true);
      expect(fx.tokenA.balanceOf(fx.host, TRADER)).toBe(TRADER_START - 60n);
      expect(fx.tokenB.balanceOf(fx.host, TRADER)).toBe(120n);
      // revokeAfter is false, so the unused allowance stays
      expect(fx.tokenA.allowance(fx.host, EXECUTOR, ROUTER)).toBe(40n);
    });
  });

  describe('duplicate pulls', () => {
    it('debits the caller the sum and injects the summed amount', async () => {
      let injected: bigint | undefined;
      fx.executor.onStateChange((state) => {
        if (state.phase === 'completed') {
          injected = state.report.injections[0]?.amount;
        }
      });

      const result = await submitExecute(fx.host, {
        from: TRADER,
        executor: EXECUTOR,
        request: routedSwap([30n, 70n]),
      });

      expect(result.success).toBe(true);
      expect(injected).toBe(100n);
      expect(fx.tokenA.balanceOf(fx.host, TRADER)).toBe(TRADER_START - 100n);
      expect(fx.tokenB.balanceOf(fx.host, TRADER)).toBe(200n);
    });
  });

  describe('offset integrity', () => {
    it('rejects a declared offset that disagrees with the registered one', async () => {
      const logsBefore = fx.host.logs().length;

      const result = await submitExecute(fx.host, {
        from: TRADER,
        executor: EXECUTOR,
        request: routedSwap([100n], 68),
      });

      expect(result.success).toBe(false);
      if (result.success) return;

      expect(result.error).toEqual({
        code: 'OffsetMismatchForSelector',
        selector: '0x38ed1739',
        declared: 68n,
        expected: 4n,
      });
      expect(fx.tokenA.balanceOf(fx.host, TRADER)).toBe(TRADER_START);
      expect(fx.host.logs()).toHaveLength(logsBefore);
    });

    it('rejects injection into a selector with no registered offset', async () => {
      fx.registry.setSelectorOffset(OWNER, '0x38ed1739', 0);

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request: routedSwap([100n]) });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toEqual({ code: 'InvalidSelectorForInjection', selector: '0x38ed1739' });
    });

    it('rejects injection when there is nothing to inject', async () => {
      const request: ExecuteRequest = {
        pulls: [],
        approvals: [],
        calls: [swapCall(0n, { injectToken: TOKEN_B, injectOffset: 4 })],
        tokensToFlush: [],
      };

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toEqual({ code: 'ZeroAmountNotAllowed' });
    });
  });

  describe('whitelist enforcement', () => {
    it('rejects a call to a target that is not whitelisted', async () => {
      const request: ExecuteRequest = {
        ...EMPTY,
        calls: [{ target: STRANGER, value: 0n, data: '0x', injectToken: NULL_TOKEN, injectOffset: 0 }],
      };

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toEqual({ code: 'TargetNotWhitelisted', target: STRANGER });
    });

    it('rejects an approval to a spender that is not whitelisted', async () => {
      const request: ExecuteRequest = {
        ...EMPTY,
        pulls: [{ token: TOKEN_A, amount: 10n }],
        approvals: [{ token: TOKEN_A, spender: STRANGER, amount: 10n, revokeAfter: true }],
      };

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toEqual({ code: 'SpenderNotWhitelisted', spender: STRANGER });
      expect(fx.tokenA.balanceOf(fx.host, TRADER)).toBe(TRADER_START);
    });

    it('stops routing to a target once it is removed', async () => {
      fx.registry.setTarget(OWNER, ROUTER, false);

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request: routedSwap([100n]) });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toEqual({ code: 'SpenderNotWhitelisted', spender: ROUTER });
    });
  });

  describe('atomicity', () => {
    it('undoes every stage when a later call reverts', async () => {
      const logsBefore = fx.host.logs().length;
      const request: ExecuteRequest = {
        pulls: [{ token: TOKEN_A, amount: 150n }],
        approvals: [{ token: TOKEN_A, spender: ROUTER, amount: 150n, revokeAfter: true }],
        calls: [swapCall(100n), swapCall(50n, { amountOutMin: 1_000n })],
        tokensToFlush: [TOKEN_A, TOKEN_B],
      };

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request });

      expect(result.success).toBe(false);
      if (result.success) return;

      // The router's own revert data, untouched
      expect(result.revertData).toBe(revertReason('INSUFFICIENT_OUTPUT_AMOUNT').data);
      expect(result.error).toBeUndefined();
      expect(fx.tokenA.balanceOf(fx.host, TRADER)).toBe(TRADER_START);
      expect(fx.tokenB.balanceOf(fx.host, TRADER)).toBe(0n);
      expect(fx.tokenB.balanceOf(fx.host, ROUTER)).toBe(ROUTER_RESERVE);
      expect(fx.tokenA.allowance(fx.host, EXECUTOR, ROUTER)).toBe(0n);
      expect(fx.host.logs()).toHaveLength(logsBefore);
    });

    it('reports the reverted phase last', async () => {
      const phases: ExecutionState['phase'][] = [];
      fx.executor.onStateChange((state) => phases.push(state.phase));

      await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request: routedSwap([100n], 68) });

      expect(phases[phases.length - 1]).toBe('reverted');
    });

    it('fails the pull when the caller cannot cover it', async () => {
      const request: ExecuteRequest = { ...EMPTY, pulls: [{ token: TOKEN_A, amount: 2_000n }] };

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toEqual({ code: 'TokenPullFailed', token: TOKEN_A, amount: 2_000n });
    });

    it('fails when an approval is refused', async () => {
      fx.tokenA.disable('approve');

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request: routedSwap([100n]) });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toEqual({ code: 'TokenApprovalFailed', token: TOKEN_A, spender: ROUTER, amount: 100n });
    });

    it('fails when the flush transfer is refused', async () => {
      fx.tokenA.disable('transfer');
      const request: ExecuteRequest = {
        ...EMPTY,
        pulls: [{ token: TOKEN_A, amount: 100n }],
        tokensToFlush: [TOKEN_A],
      };

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toEqual({ code: 'TokenFlushFailed', token: TOKEN_A, amount: 100n });
      expect(fx.tokenA.balanceOf(fx.host, TRADER)).toBe(TRADER_START);
    });
  });

  describe('revoke stage', () => {
    it('fails the whole invocation when an allowance cannot be revoked', async () => {
      fx.host.deploy(BLOCKER, new ApprovalBlocker(fx.tokenA));
      fx.registry.setTarget(OWNER, BLOCKER, true);
      const logsBefore = fx.host.logs().length;
      const request: ExecuteRequest = {
        pulls: [{ token: TOKEN_A, amount: 100n }],
        approvals: [{ token: TOKEN_A, spender: ROUTER, amount: 100n, revokeAfter: true }],
        calls: [{ target: BLOCKER, value: 0n, data: '0x01', injectToken: NULL_TOKEN, injectOffset: 0 }],
        tokensToFlush: [TOKEN_A],
      };

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toEqual({ code: 'TokenApprovalFailed', token: TOKEN_A, spender: ROUTER, amount: 0n });
      expect(fx.tokenA.balanceOf(fx.host, TRADER)).toBe(TRADER_START);
      expect(fx.tokenA.allowance(fx.host, EXECUTOR, ROUTER)).toBe(0n);
      expect(fx.host.logs()).toHaveLength(logsBefore);
    });
  });

  describe('token conventions', () => {
    it('works with a no-return token that only approves from zero, across runs', async () => {
      const token = await deployTraderToken(fx, {
        address: TOKEN_U,
        symbol: 'U',
        returns: 'none',
        approveFromZero: true,
      });
      const request: ExecuteRequest = {
        pulls: [{ token: TOKEN_U, amount: 100n }],
        approvals: [{ token: TOKEN_U, spender: ROUTER, amount: 50n, revokeAfter: false }],
        calls: [],
        tokensToFlush: [TOKEN_U],
      };

      const first = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request });
      expect(first.success).toBe(true);
      expect(token.allowance(fx.host, EXECUTOR, ROUTER)).toBe(50n);

      // The allowance left by the first run must be zeroed before it is set again
      const second = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request });
      expect(second.success).toBe(true);

      expect(token.balanceOf(fx.host, TRADER)).toBe(TRADER_START);
      expect(token.balanceOf(fx.host, EXECUTOR)).toBe(0n);
      expect(token.allowance(fx.host, EXECUTOR, ROUTER)).toBe(50n);
    });

    it('fails a pull the token reports as false', async () => {
      const token = await deployTraderToken(fx, { address: TOKEN_F, symbol: 'F', failureMode: 'return-false' });

      const result = await submitExecute(fx.host, {
        from: TRADER,
        executor: EXECUTOR,
        request: pullOnly(TOKEN_F, 5_000n),
      });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toEqual({ code: 'TokenPullFailed', token: TOKEN_F, amount: 5_000n });
      expect(token.balanceOf(fx.host, TRADER)).toBe(TRADER_START);
    });

    it('fails a pull from an address with no code', async () => {
      const result = await submitExecute(fx.host, {
        from: TRADER,
        executor: EXECUTOR,
        request: pullOnly(NO_CODE, 10n),
      });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toEqual({ code: 'TokenPullFailed', token: NO_CODE, amount: 10n });
    });
  });

  describe('preconditions', () => {
    it('rejects an oversized batch', async () => {
      fx = await setupFixture({ maxCalls: 1 });
      const request: ExecuteRequest = { ...EMPTY, calls: [swapCall(1n), swapCall(1n)] };

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toEqual({ code: 'BatchTooLarge', kind: 'calls', length: 2n, max: 1n });
    });

    it('rejects a flush list naming a token twice', async () => {
      const request: ExecuteRequest = { ...EMPTY, tokensToFlush: [TOKEN_A, TOKEN_B, TOKEN_A] };

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toEqual({ code: 'DuplicateTokenInFlush', token: TOKEN_A });
    });

    it('skips the null token in the flush list', async () => {
      const request: ExecuteRequest = { ...EMPTY, tokensToFlush: [NULL_TOKEN, NULL_TOKEN, TOKEN_B] };

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request });

      expect(result.success).toBe(true);
    });

    it('fails when a flush token cannot report a balance', async () => {
      const request: ExecuteRequest = { ...EMPTY, tokensToFlush: [STRANGER] };

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toEqual({ code: 'BalanceQueryFailed', token: STRANGER });
    });

    it('reverts a payload that is not an execute call with empty data', async () => {
      const result = await fx.host.transact({ from: TRADER, to: EXECUTOR, data: '0xdeadbeef' });

      expect(result).toEqual({ success: false, returnData: '0x' });
    });
  });

  describe('native currency', () => {
    beforeEach(() => {
      fx.host.fund(TRADER, 100n);
    });

    it('returns unspent attached value and keeps resident native balance', async () => {
      fx.host.fund(EXECUTOR, 10n);

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request: EMPTY, value: 50n });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(fx.host.balanceOf(TRADER)).toBe(100n);
      expect(fx.host.balanceOf(EXECUTOR)).toBe(10n);
      expect(result.logs.find((log) => log.name === 'Executed')?.args.nativeReturned).toBe(50n);
    });

    it('forwards attached value to a call', async () => {
      const request: ExecuteRequest = {
        ...EMPTY,
        calls: [{ target: PAYEE, value: 20n, data: '0x', injectToken: NULL_TOKEN, injectOffset: 0 }],
      };

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request, value: 20n });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.returnData).toEqual(['0x']);
      expect(fx.host.balanceOf(PAYEE)).toBe(20n);
      expect(fx.host.balanceOf(TRADER)).toBe(80n);
      expect(fx.host.balanceOf(EXECUTOR)).toBe(0n);
    });

    it('accepts a plain transfer', async () => {
      const result = await fx.host.transact({ from: TRADER, to: EXECUTOR, value: 10n });

      expect(result).toEqual({ success: true, returnData: '0x' });
      expect(fx.host.balanceOf(EXECUTOR)).toBe(10n);
    });
  });

  describe('reentrancy', () => {
    it('fails a nested execute immediately', async () => {
      fx.host.deploy(ATTACKER, new ReentrantTarget());
      fx.registry.setTarget(OWNER, ATTACKER, true);
      const request: ExecuteRequest = {
        ...EMPTY,
        calls: [{ target: ATTACKER, value: 0n, data: '0x01', injectToken: NULL_TOKEN, injectOffset: 0 }],
      };

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.revertData).toBe(encodeExecutorError({ code: 'ReentrantCall' }));
      expect(result.error).toEqual({ code: 'ReentrantCall' });
    });

    it('accepts the next invocation after a reentrant one failed', async () => {
      fx.host.deploy(ATTACKER, new ReentrantTarget());
      fx.registry.setTarget(OWNER, ATTACKER, true);
      await submitExecute(fx.host, {
        from: TRADER,
        executor: EXECUTOR,
        request: {
          ...EMPTY,
          calls: [{ target: ATTACKER, value: 0n, data: '0x01', injectToken: NULL_TOKEN, injectOffset: 0 }],
        },
      });

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request: routedSwap([100n]) });

      expect(result.success).toBe(true);
    });
  });

  describe('administration', () => {
    it('refuses execute while paused', async () => {
      fx.executor.pause(OWNER);

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request: EMPTY });

      expect(fx.executor.isPaused).toBe(true);
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toEqual({ code: 'ExecutorPaused' });
    });

    it('resumes after unpause', async () => {
      fx.executor.pause(OWNER);
      fx.executor.unpause(OWNER);

      const result = await submitExecute(fx.host, { from: TRADER, executor: EXECUTOR, request: EMPTY });

      expect(result.success).toBe(true);
    });

    it('rejects redundant pause changes and non-owners', () => {
      expect(() => fx.executor.unpause(OWNER)).toThrow('Executor is not paused');
      fx.executor.pause(OWNER);
      expect(() => fx.executor.pause(OWNER)).toThrow('Executor is already paused');
      expect(() => fx.executor.unpause(STRANGER)).toThrow('is not the owner');
    });

    it('rescues tokens held by the executor', async () => {
      fx.tokenA.mint(fx.host, EXECUTOR, 5n);

      await fx.executor.rescueTokens(OWNER, TOKEN_A, OWNER, 5n);

      expect(fx.tokenA.balanceOf(fx.host, OWNER)).toBe(5n);
      expect(fx.host.logs().some((log) => log.name === 'TokensRescued')).toBe(true);
    });

    it('rejects a rescue the executor cannot cover', async () => {
      fx.tokenA.mint(fx.host, EXECUTOR, 5n);
      const logsBefore = fx.host.logs().length;

      await expect(fx.executor.rescueTokens(OWNER, TOKEN_A, OWNER, 6n)).rejects.toThrow(
        `Sending 6 of ${TOKEN_A} failed`
      );
      expect(fx.tokenA.balanceOf(fx.host, EXECUTOR)).toBe(5n);
      expect(fx.host.logs()).toHaveLength(logsBefore);
    });

    it('rescues native currency', async () => {
      fx.host.fund(EXECUTOR, 30n);

      await fx.executor.rescueNative(OWNER, PAYEE, 30n);

      expect(fx.host.balanceOf(PAYEE)).toBe(30n);
      await expect(fx.executor.rescueNative(OWNER, PAYEE, 1n)).rejects.toThrow('Sending 1 native units failed');
    });

    it('guards rescue entry points', async () => {
      await expect(fx.executor.rescueNative(STRANGER, STRANGER, 1n)).rejects.toThrow('is not the owner');
      await expect(fx.executor.rescueTokens(OWNER, TOKEN_A, zeroAddress, 1n)).rejects.toThrow('Zero address');
    });

    it('exposes the merged configuration', async () => {
      fx = await setupFixture({ maxCalls: 3 });

      expect(fx.executor.getConfig()).toEqual({
        maxPulls: 10,
        maxApprovals: 10,
        maxCalls: 3,
        maxFlushTokens: 10,
        verbose: false,
      });
    });
  });
});
