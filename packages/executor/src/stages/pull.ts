import type { TokenPull } from '@aequi/types';
import { ExecutorError } from '../errors.js';
import type { StageContext } from './context.js';

/**
 * Pull Stage
 *
 * Moves each nonzero pull from the caller into executor custody. Repeated
 * entries for one token are pulled one by one, so the caller is debited
 * exactly their sum; the pulled ledger records that sum once.
 */
export async function pullTokens(ctx: StageContext, pulls: readonly TokenPull[]): Promise<void> {
  for (const pull of pulls) {
    if (pull.amount === 0n) continue;

    const ok = await ctx.tokens.transferFrom(pull.token, ctx.caller, ctx.self, pull.amount);
    if (!ok) {
      throw new ExecutorError({ code: 'TokenPullFailed', token: pull.token, amount: pull.amount });
    }
  }
}
