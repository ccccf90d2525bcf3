import { decodeFunctionResult, type Address, type Hex } from 'viem';
import type { LedgerHost, LogEntry } from '@aequi/ledger';
import type { ExecuteRequest } from '@aequi/types';
import { executorAbi } from './abi.js';
import { decodeExecutorError, type ExecutorErrorSpec } from './errors.js';
import { encodeExecute } from './request.js';

export interface SubmitExecuteOptions {
  from: Address;
  executor: Address;
  request: ExecuteRequest;
  /** Native value attached to the invocation */
  value?: bigint;
}

export type SubmitExecuteResult =
  | { success: true; returnData: Hex[]; logs: LogEntry[] }
  | {
      success: false;
      revertData: Hex;
      /** Set when the revert data is one of the executor's own errors */
      error?: ExecutorErrorSpec;
    };

/**
 * Decode the per-call return data out of an execute result.
 */
export function decodeExecuteResult(data: Hex): Hex[] {
  return [...decodeFunctionResult({ abi: executorAbi, functionName: 'execute', data })];
}

/**
 * Send an execute invocation as a top-level transaction, the way a wallet
 * would, and read back the outcome. `logs` holds only the invocation's own events.
 */
export async function submitExecute(host: LedgerHost, options: SubmitExecuteOptions): Promise<SubmitExecuteResult> {
  const logCount = host.logs().length;
  const result = await host.transact({
    from: options.from,
    to: options.executor,
    value: options.value ?? 0n,
    data: encodeExecute(options.request),
  });

  if (!result.success) {
    return { success: false, revertData: result.returnData, error: decodeExecutorError(result.returnData) };
  }
  return {
    success: true,
    returnData: decodeExecuteResult(result.returnData),
    logs: host.logs().slice(logCount),
  };
}
