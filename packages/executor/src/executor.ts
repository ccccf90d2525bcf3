import { encodeFunctionResult, isAddressEqual, size, zeroAddress, type Address, type Hex } from 'viem';
import type { CallContext, Contract, LedgerHost } from '@aequi/ledger';
import type { Ownership, TargetReader } from '@aequi/registry';
import type { BatchKind, ExecuteRequest, ExecutionReport } from '@aequi/types';
import { executorAbi } from './abi.js';
import { BalanceSnapshotService, uniqueFlushTokens } from './balances.js';
import { ExecutorError } from './errors.js';
import { ReentrancyGuard } from './guard.js';
import { InjectionEngine } from './injection.js';
import { buildPulledLedger } from './pulled-ledger.js';
import { decodeExecute } from './request.js';
import { grantApprovals, revokeApprovals } from './stages/approvals.js';
import { runCalls } from './stages/calls.js';
import type { StageContext } from './stages/context.js';
import { flushNative, flushTokens } from './stages/flush.js';
import { pullTokens } from './stages/pull.js';
import { TokenGateway } from './token.js';
import {
  DEFAULT_EXECUTOR_CONFIG,
  type ExecutionState,
  type ExecutionStateCallback,
  type ExecutorConfig,
} from './types.js';

export interface MulticallExecutorOptions {
  host: LedgerHost;
  /** Address the executor is deployed at */
  address: Address;
  registry: TargetReader;
  ownership: Ownership;
  config?: Partial<ExecutorConfig>;
}

/**
 * Multicall Executor
 *
 * Contract on the ledger host that runs one caller's batch atomically:
 * 1. Check -- batch limits and flush list, before any state change
 * 2. Snapshot -- native and token balances held before the batch
 * 3. Pull -- each pull moves from the caller into custody; the ledger keeps the sum per token
 * 4. Approve -- allowances for whitelisted spenders only
 * 5. Call -- whitelisted targets, with live-balance injection
 * 6. Revoke -- allowances marked revokeAfter go back to zero
 * 7. Flush -- only the growth since the snapshot returns to the caller
 *
 * Any failure throws, and the host rolls back every write of the
 * invocation, events included.
 */
export class MulticallExecutor implements Contract {
  readonly name = 'MulticallExecutor';
  readonly address: Address;
  private host: LedgerHost;
  private registry: TargetReader;
  private ownership: Ownership;
  private config: ExecutorConfig;
  private guard = new ReentrancyGuard();
  private tokens: TokenGateway;
  private balances: BalanceSnapshotService;
  private injector: InjectionEngine;
  private paused = false;
  private stateCallback?: ExecutionStateCallback;

  constructor(options: MulticallExecutorOptions) {
    this.host = options.host;
    this.address = options.address;
    this.registry = options.registry;
    this.ownership = options.ownership;
    this.config = { ...DEFAULT_EXECUTOR_CONFIG, ...options.config };
    this.tokens = new TokenGateway(this.host, this.address);
    this.balances = new BalanceSnapshotService(this.host, this.address, this.tokens);
    this.injector = new InjectionEngine(this.registry, (token) => this.balances.tokenBalance(token));
  }

  /**
   * Set a callback to receive execution progress.
   */
  onStateChange(callback: ExecutionStateCallback): void {
    this.stateCallback = callback;
  }

  getConfig(): ExecutorConfig {
    return { ...this.config };
  }

  get isPaused(): boolean {
    return this.paused;
  }

  /**
   * Entry point for message calls. An empty payload is a plain native
   * transfer and is accepted; anything else must be an execute call.
   */
  async handle(ctx: CallContext): Promise<Hex> {
    if (size(ctx.data) === 0) {
      return '0x';
    }

    return this.guard.run(async () => {
      const request = decodeExecute(ctx.data);
      const report = await this.execute(ctx.sender, ctx.value, request);
      return encodeFunctionResult({ abi: executorAbi, functionName: 'execute', result: report.returnData });
    });
  }

  // ==========================================================================
  // Administration
  // ==========================================================================

  pause(caller: Address): void {
    this.ownership.assertOwner(caller);
    if (this.paused) {
      throw new ExecutorError({ code: 'AlreadyPaused' });
    }
    this.paused = true;
    this.host.emit(this.address, 'Paused', { account: caller });
  }

  unpause(caller: Address): void {
    this.ownership.assertOwner(caller);
    if (!this.paused) {
      throw new ExecutorError({ code: 'NotPaused' });
    }
    this.paused = false;
    this.host.emit(this.address, 'Unpaused', { account: caller });
  }

  /**
   * Send tokens held by the executor to `to`. Owner only; all or nothing.
   */
  async rescueTokens(caller: Address, token: Address, to: Address, amount: bigint): Promise<void> {
    this.ownership.assertOwner(caller);
    if (isAddressEqual(to, zeroAddress)) {
      throw new ExecutorError({ code: 'ZeroAddress' });
    }

    await this.guard.run(() =>
      this.atomically(async () => {
        const ok = await this.tokens.transfer(token, to, amount);
        if (!ok) {
          throw new ExecutorError({ code: 'TokenFlushFailed', token, amount });
        }
        this.host.emit(this.address, 'TokensRescued', { token, to, amount });
      })
    );
  }

  /**
   * Send native currency held by the executor to `to`. Owner only; all or nothing.
   */
  async rescueNative(caller: Address, to: Address, amount: bigint): Promise<void> {
    this.ownership.assertOwner(caller);
    if (isAddressEqual(to, zeroAddress)) {
      throw new ExecutorError({ code: 'ZeroAddress' });
    }

    await this.guard.run(() =>
      this.atomically(async () => {
        const result = await this.host.call({ from: this.address, to, value: amount });
        if (!result.success) {
          throw new ExecutorError({ code: 'NativeFlushFailed', amount });
        }
        this.host.emit(this.address, 'NativeRescued', { to, amount });
      })
    );
  }

  // ==========================================================================
  // Execute
  // ==========================================================================

  private async execute(caller: Address, attachedValue: bigint, request: ExecuteRequest): Promise<ExecutionReport> {
    try {
      if (this.paused) {
        throw new ExecutorError({ code: 'ExecutorPaused' });
      }
      this.checkLimits(request);
      uniqueFlushTokens(request.tokensToFlush);

      const nativeBefore = this.balances.nativeBalanceBefore(attachedValue);
      const snapshots = await this.balances.snapshotTokens(request.tokensToFlush);
      const ledger = buildPulledLedger(request.pulls);
      const ctx: StageContext = {
        host: this.host,
        self: this.address,
        caller,
        tokens: this.tokens,
        registry: this.registry,
      };

      this.emitState({ phase: 'pulling', caller, pulls: request.pulls.length });
      await pullTokens(ctx, request.pulls);

      this.emitState({ phase: 'approving', approvals: request.approvals.length });
      await grantApprovals(ctx, request.approvals);

      const { returnData, injections } = await runCalls(ctx, request.calls, this.injector, ledger, (index, target) =>
        this.emitState({ phase: 'calling', index, target })
      );

      this.emitState({ phase: 'revoking', approvals: request.approvals.length });
      await revokeApprovals(ctx, request.approvals);

      this.emitState({ phase: 'flushing', tokens: snapshots.length });
      const flushed = await flushTokens(ctx, snapshots);
      const nativeReturned = await flushNative(ctx, nativeBefore);

      this.host.emit(this.address, 'Executed', {
        caller,
        pullCount: BigInt(request.pulls.length),
        callCount: BigInt(request.calls.length),
        nativeReturned,
      });

      const report: ExecutionReport = { caller, returnData, injections, flushed, nativeReturned };
      if (this.config.verbose) {
        console.log(
          `[executor] ${caller} ran ${request.calls.length} call(s), ` +
            `flushed ${flushed.length} token(s), returned ${nativeReturned} native`
        );
      }
      this.emitState({ phase: 'completed', report });
      return report;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (this.config.verbose) {
        console.warn(`[executor] ${caller} reverted: ${message}`);
      }
      this.emitState({ phase: 'reverted', error: message });
      throw err;
    }
  }

  private checkLimits(request: ExecuteRequest): void {
    const limits: Array<[BatchKind, number, number]> = [
      ['pulls', request.pulls.length, this.config.maxPulls],
      ['approvals', request.approvals.length, this.config.maxApprovals],
      ['calls', request.calls.length, this.config.maxCalls],
      ['tokensToFlush', request.tokensToFlush.length, this.config.maxFlushTokens],
    ];

    for (const [kind, length, max] of limits) {
      if (length > max) {
        throw new ExecutorError({ code: 'BatchTooLarge', kind, length: BigInt(length), max: BigInt(max) });
      }
    }
  }

  /**
   * Run work outside a message call with the same all-or-nothing settlement.
   */
  private async atomically(work: () => Promise<void>): Promise<void> {
    const snapshot = this.host.state.snapshot();
    try {
      await work();
      if (this.host.callDepth === 0) {
        this.host.state.commit();
      }
    } catch (err) {
      this.host.state.revert(snapshot);
      throw err;
    }
  }

  private emitState(state: ExecutionState): void {
    this.stateCallback?.(state);
  }
}
