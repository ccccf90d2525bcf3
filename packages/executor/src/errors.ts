import {
  AbiErrorSignatureNotFoundError,
  decodeErrorResult,
  encodeErrorResult,
  size,
  type Address,
  type DecodeErrorResultReturnType,
  type Hex,
} from 'viem';
import { RevertError } from '@aequi/ledger';
import type { BatchKind } from '@aequi/types';
import { executorErrorsAbi } from './abi.js';

const BATCH_KINDS: readonly BatchKind[] = ['pulls', 'approvals', 'calls', 'tokensToFlush'];

function isBatchKind(value: string): value is BatchKind {
  const kinds: readonly string[] = BATCH_KINDS;
  return kinds.includes(value);
}

/** Every failure the executor reports, with its typed arguments */
export type ExecutorErrorSpec =
  | { code: 'BatchTooLarge'; kind: BatchKind; length: bigint; max: bigint }
  | { code: 'DuplicateTokenInFlush'; token: Address }
  | { code: 'TokenPullFailed'; token: Address; amount: bigint }
  | { code: 'SpenderNotWhitelisted'; spender: Address }
  | { code: 'TokenApprovalFailed'; token: Address; spender: Address; amount: bigint }
  | { code: 'TargetNotWhitelisted'; target: Address }
  | { code: 'InvalidInjectionOffset'; offset: bigint; length: bigint }
  | { code: 'InvalidSelectorForInjection'; selector: Hex }
  | { code: 'OffsetMismatchForSelector'; selector: Hex; declared: bigint; expected: bigint }
  | { code: 'ZeroAmountNotAllowed' }
  | { code: 'BalanceQueryFailed'; token: Address }
  | { code: 'TokenFlushFailed'; token: Address; amount: bigint }
  | { code: 'NativeFlushFailed'; amount: bigint }
  | { code: 'ReentrantCall' }
  | { code: 'ExecutorPaused' }
  | { code: 'AlreadyPaused' }
  | { code: 'NotPaused' }
  | { code: 'ZeroAddress' };

export type ExecutorErrorCode = ExecutorErrorSpec['code'];

/**
 * Executor failure.
 *
 * Carries the typed spec for TypeScript callers and the ABI-encoded custom
 * error as its revert data, so the same failure can be read from the thrown
 * object or from the raw bytes a caller receives.
 */
export class ExecutorError extends RevertError {
  readonly spec: ExecutorErrorSpec;

  constructor(spec: ExecutorErrorSpec) {
    super(encodeExecutorError(spec), describeExecutorError(spec));
    this.name = 'ExecutorError';
    this.spec = spec;
  }

  get code(): ExecutorErrorCode {
    return this.spec.code;
  }
}

/**
 * A call of the batch failed. The revert data is the callee's own, untouched.
 */
export class CallRevertedError extends RevertError {
  readonly callIndex: number;
  readonly target: Address;

  constructor(callIndex: number, target: Address, returnData: Hex) {
    super(returnData, `Call ${callIndex} to ${target} reverted (${returnData})`);
    this.name = 'CallRevertedError';
    this.callIndex = callIndex;
    this.target = target;
  }
}

export function encodeExecutorError(spec: ExecutorErrorSpec): Hex {
  const abi = executorErrorsAbi;
  switch (spec.code) {
    case 'BatchTooLarge':
      return encodeErrorResult({ abi, errorName: 'BatchTooLarge', args: [spec.kind, spec.length, spec.max] });
    case 'DuplicateTokenInFlush':
      return encodeErrorResult({ abi, errorName: 'DuplicateTokenInFlush', args: [spec.token] });
    case 'TokenPullFailed':
      return encodeErrorResult({ abi, errorName: 'TokenPullFailed', args: [spec.token, spec.amount] });
    case 'SpenderNotWhitelisted':
      return encodeErrorResult({ abi, errorName: 'SpenderNotWhitelisted', args: [spec.spender] });
    case 'TokenApprovalFailed':
      return encodeErrorResult({
        abi,
        errorName: 'TokenApprovalFailed',
        args: [spec.token, spec.spender, spec.amount],
      });
    case 'TargetNotWhitelisted':
      return encodeErrorResult({ abi, errorName: 'TargetNotWhitelisted', args: [spec.target] });
    case 'InvalidInjectionOffset':
      return encodeErrorResult({ abi, errorName: 'InvalidInjectionOffset', args: [spec.offset, spec.length] });
    case 'InvalidSelectorForInjection':
      return encodeErrorResult({ abi, errorName: 'InvalidSelectorForInjection', args: [spec.selector] });
    case 'OffsetMismatchForSelector':
      return encodeErrorResult({
        abi,
        errorName: 'OffsetMismatchForSelector',
        args: [spec.selector, spec.declared, spec.expected],
      });
    case 'ZeroAmountNotAllowed':
      return encodeErrorResult({ abi, errorName: 'ZeroAmountNotAllowed' });
    case 'BalanceQueryFailed':
      return encodeErrorResult({ abi, errorName: 'BalanceQueryFailed', args: [spec.token] });
    case 'TokenFlushFailed':
      return encodeErrorResult({ abi, errorName: 'TokenFlushFailed', args: [spec.token, spec.amount] });
    case 'NativeFlushFailed':
      return encodeErrorResult({ abi, errorName: 'NativeFlushFailed', args: [spec.amount] });
    case 'ReentrantCall':
      return encodeErrorResult({ abi, errorName: 'ReentrantCall' });
    case 'ExecutorPaused':
      return encodeErrorResult({ abi, errorName: 'ExecutorPaused' });
    case 'AlreadyPaused':
      return encodeErrorResult({ abi, errorName: 'AlreadyPaused' });
    case 'NotPaused':
      return encodeErrorResult({ abi, errorName: 'NotPaused' });
    case 'ZeroAddress':
      return encodeErrorResult({ abi, errorName: 'ZeroAddress' });
  }
}

export function describeExecutorError(spec: ExecutorErrorSpec): string {
  switch (spec.code) {
    case 'BatchTooLarge':
      return `${spec.kind} has ${spec.length} entries, limit is ${spec.max}`;
    case 'DuplicateTokenInFlush':
      return `Token ${spec.token} appears more than once in the flush list`;
    case 'TokenPullFailed':
      return `Pulling ${spec.amount} of ${spec.token} from the caller failed`;
    case 'SpenderNotWhitelisted':
      return `Spender ${spec.spender} is not whitelisted`;
    case 'TokenApprovalFailed':
      return `Approving ${spec.amount} of ${spec.token} to ${spec.spender} failed`;
    case 'TargetNotWhitelisted':
      return `Target ${spec.target} is not whitelisted`;
    case 'InvalidInjectionOffset':
      return `Injection offset ${spec.offset} does not fit a 32-byte word in a ${spec.length}-byte payload`;
    case 'InvalidSelectorForInjection':
      return `Selector ${spec.selector} is not registered for injection`;
    case 'OffsetMismatchForSelector':
      return `Selector ${spec.selector} expects offset ${spec.expected}, call declared ${spec.declared}`;
    case 'ZeroAmountNotAllowed':
      return 'Injectable amount is zero';
    case 'BalanceQueryFailed':
      return `balanceOf on ${spec.token} failed`;
    case 'TokenFlushFailed':
      return `Sending ${spec.amount} of ${spec.token} failed`;
    case 'NativeFlushFailed':
      return `Sending ${spec.amount} native units failed`;
    case 'ReentrantCall':
      return 'Reentrant call';
    case 'ExecutorPaused':
      return 'Executor is paused';
    case 'AlreadyPaused':
      return 'Executor is already paused';
    case 'NotPaused':
      return 'Executor is not paused';
    case 'ZeroAddress':
      return 'Zero address';
  }
}

/**
 * Read an executor error out of raw revert data.
 * Returns undefined for data the executor did not produce (e.g. a callee's own revert).
 */
export function decodeExecutorError(data: Hex): ExecutorErrorSpec | undefined {
  if (size(data) < 4) return undefined;

  let decoded: DecodeErrorResultReturnType<typeof executorErrorsAbi>;
  try {
    decoded = decodeErrorResult({ abi: executorErrorsAbi, data });
  } catch (err) {
    if (err instanceof AbiErrorSignatureNotFoundError) return undefined;
    throw err;
  }

  switch (decoded.errorName) {
    case 'BatchTooLarge': {
      const [kind, length, max] = decoded.args;
      return isBatchKind(kind) ? { code: 'BatchTooLarge', kind, length, max } : undefined;
    }
    case 'DuplicateTokenInFlush':
      return { code: 'DuplicateTokenInFlush', token: decoded.args[0] };
    case 'TokenPullFailed':
      return { code: 'TokenPullFailed', token: decoded.args[0], amount: decoded.args[1] };
    case 'SpenderNotWhitelisted':
      return { code: 'SpenderNotWhitelisted', spender: decoded.args[0] };
    case 'TokenApprovalFailed': {
      const [token, spender, amount] = decoded.args;
      return { code: 'TokenApprovalFailed', token, spender, amount };
    }
    case 'TargetNotWhitelisted':
      return { code: 'TargetNotWhitelisted', target: decoded.args[0] };
    case 'InvalidInjectionOffset':
      return { code: 'InvalidInjectionOffset', offset: decoded.args[0], length: decoded.args[1] };
    case 'InvalidSelectorForInjection':
      return { code: 'InvalidSelectorForInjection', selector: decoded.args[0] };
    case 'OffsetMismatchForSelector': {
      const [selector, declared, expected] = decoded.args;
      return { code: 'OffsetMismatchForSelector', selector, declared, expected };
    }
    case 'ZeroAmountNotAllowed':
      return { code: 'ZeroAmountNotAllowed' };
    case 'BalanceQueryFailed':
      return { code: 'BalanceQueryFailed', token: decoded.args[0] };
    case 'TokenFlushFailed':
      return { code: 'TokenFlushFailed', token: decoded.args[0], amount: decoded.args[1] };
    case 'NativeFlushFailed':
      return { code: 'NativeFlushFailed', amount: decoded.args[0] };
    case 'ReentrantCall':
      return { code: 'ReentrantCall' };
    case 'ExecutorPaused':
      return { code: 'ExecutorPaused' };
    case 'AlreadyPaused':
      return { code: 'AlreadyPaused' };
    case 'NotPaused':
      return { code: 'NotPaused' };
    case 'ZeroAddress':
      return { code: 'ZeroAddress' };
    default:
      return undefined;
  }
}
