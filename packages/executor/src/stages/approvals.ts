import type { TokenApproval } from '@aequi/types';
import { ExecutorError } from '../errors.js';
import type { StageContext } from './context.js';

/**
 * Approval Stage (set)
 *
 * Every spender must be whitelisted. The allowance is zeroed before the new
 * amount is set, for tokens that refuse nonzero-to-nonzero changes.
 */
export async function grantApprovals(ctx: StageContext, approvals: readonly TokenApproval[]): Promise<void> {
  for (const approval of approvals) {
    if (approval.amount === 0n) continue;

    if (!ctx.registry.isWhitelisted(approval.spender)) {
      throw new ExecutorError({ code: 'SpenderNotWhitelisted', spender: approval.spender });
    }

    const reset = await ctx.tokens.approve(approval.token, approval.spender, 0n);
    const granted = reset && (await ctx.tokens.approve(approval.token, approval.spender, approval.amount));
    if (!granted) {
      throw new ExecutorError({
        code: 'TokenApprovalFailed',
        token: approval.token,
        spender: approval.spender,
        amount: approval.amount,
      });
    }
  }
}

/**
 * Approval Stage (revoke)
 *
 * Zeroes every allowance marked `revokeAfter`. An allowance that cannot be
 * revoked fails the whole invocation.
 */
export async function revokeApprovals(ctx: StageContext, approvals: readonly TokenApproval[]): Promise<void> {
  for (const approval of approvals) {
    if (!approval.revokeAfter || approval.amount === 0n) continue;

    const revoked = await ctx.tokens.approve(approval.token, approval.spender, 0n);
    if (!revoked) {
      throw new ExecutorError({
        code: 'TokenApprovalFailed',
        token: approval.token,
        spender: approval.spender,
        amount: 0n,
      });
    }
  }
}
