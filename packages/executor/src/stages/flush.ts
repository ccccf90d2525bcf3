import type { FlushedAmount, TokenSnapshot } from '@aequi/types';
import { ExecutorError } from '../errors.js';
import type { StageContext } from './context.js';

/**
 * Flush Stage (tokens)
 *
 * Sends the caller each token's growth since the snapshot. Balance that was
 * already resident before the invocation stays where it is.
 */
export async function flushTokens(ctx: StageContext, snapshots: readonly TokenSnapshot[]): Promise<FlushedAmount[]> {
  const flushed: FlushedAmount[] = [];

  for (const snapshot of snapshots) {
    const current = await ctx.tokens.balanceOf(snapshot.token, ctx.self);
    if (current <= snapshot.balance) continue;

    const amount = current - snapshot.balance;
    const ok = await ctx.tokens.transfer(snapshot.token, ctx.caller, amount);
    if (!ok) {
      throw new ExecutorError({ code: 'TokenFlushFailed', token: snapshot.token, amount });
    }
    flushed.push({ token: snapshot.token, amount });
  }

  return flushed;
}

/**
 * Flush Stage (native)
 *
 * Same delta rule for native currency, measured against the balance held
 * before the invocation's attached value.
 */
export async function flushNative(ctx: StageContext, balanceBefore: bigint): Promise<bigint> {
  const current = ctx.host.balanceOf(ctx.self);
  if (current <= balanceBefore) return 0n;

  const amount = current - balanceBefore;
  const result = await ctx.host.call({ from: ctx.self, to: ctx.caller, value: amount });
  if (!result.success) {
    throw new ExecutorError({ code: 'NativeFlushFailed', amount });
  }
  return amount;
}
