import type { Address, Hex } from 'viem';
import type { ExecutorCall, InjectionRecord } from '@aequi/types';
import { CallRevertedError, ExecutorError } from '../errors.js';
import type { InjectionEngine } from '../injection.js';
import type { PulledLedger } from '../pulled-ledger.js';
import type { StageContext } from './context.js';

export interface CallStageResult {
  returnData: Hex[];
  injections: InjectionRecord[];
}

/**
 * Call Stage
 *
 * Runs the calls in order against whitelisted targets only, injecting where
 * requested. A failing callee's revert data becomes the executor's revert
 * data byte for byte.
 */
export async function runCalls(
  ctx: StageContext,
  calls: readonly ExecutorCall[],
  injector: InjectionEngine,
  ledger: PulledLedger,
  onCall?: (index: number, target: Address) => void
): Promise<CallStageResult> {
  const returnData: Hex[] = [];
  const injections: InjectionRecord[] = [];

  for (const [index, call] of calls.entries()) {
    if (!ctx.registry.isWhitelisted(call.target)) {
      throw new ExecutorError({ code: 'TargetNotWhitelisted', target: call.target });
    }
    onCall?.(index, call.target);

    const prepared = await injector.prepare(call, index, ledger);
    if (prepared.injection) {
      injections.push(prepared.injection);
    }

    const result = await ctx.host.call({
      from: ctx.self,
      to: call.target,
      value: call.value,
      data: prepared.data,
    });
    if (!result.success) {
      throw new CallRevertedError(index, call.target, result.returnData);
    }
    returnData.push(result.returnData);
  }

  return { returnData, injections };
}
