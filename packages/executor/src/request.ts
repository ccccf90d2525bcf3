import {
  BaseError,
  decodeFunctionData,
  encodeFunctionData,
  getAddress,
  isAddressEqual,
  size,
  type Address,
  type Hex,
} from 'viem';
import { RevertError } from '@aequi/ledger';
import { NULL_TOKEN, type ExecuteRequest, type ExecutorCall } from '@aequi/types';
import { executorAbi } from './abi.js';
import { ExecutorError } from './errors.js';

const MAX_OFFSET = BigInt(Number.MAX_SAFE_INTEGER);

interface EncodedCall {
  target: Address;
  value: bigint;
  data: Hex;
  injectToken: Address;
  injectOffset: bigint;
}

/**
 * Encode an execute invocation as the payload a wallet would send.
 */
export function encodeExecute(request: ExecuteRequest): Hex {
  return encodeFunctionData({
    abi: executorAbi,
    functionName: 'execute',
    args: [
      request.pulls.map((p) => ({ token: p.token, amount: p.amount })),
      request.approvals.map((a) => ({
        token: a.token,
        spender: a.spender,
        amount: a.amount,
        revokeAfter: a.revokeAfter,
      })),
      request.calls.map((c) => ({
        target: c.target,
        value: c.value,
        data: c.data,
        injectToken: c.injectToken,
        injectOffset: BigInt(c.injectOffset),
      })),
      [...request.tokensToFlush],
    ],
  });
}

/**
 * Decode an execute payload into a request.
 *
 * A payload that is not a well-formed execute call reverts with empty data.
 * An inject offset too large to address any payload fails with
 * InvalidInjectionOffset when injection is enabled, and is ignored otherwise.
 */
export function decodeExecute(data: Hex): ExecuteRequest {
  const [pulls, approvals, calls, tokensToFlush] = decodeArgs(data);
  return {
    pulls: pulls.map((p) => ({ token: getAddress(p.token), amount: p.amount })),
    approvals: approvals.map((a) => ({
      token: getAddress(a.token),
      spender: getAddress(a.spender),
      amount: a.amount,
      revokeAfter: a.revokeAfter,
    })),
    calls: calls.map(toExecutorCall),
    tokensToFlush: tokensToFlush.map((t) => getAddress(t)),
  };
}

function decodeArgs(data: Hex) {
  try {
    return decodeFunctionData({ abi: executorAbi, data }).args;
  } catch (err) {
    if (err instanceof BaseError) {
      throw new RevertError('0x', `Malformed execute payload: ${err.shortMessage}`);
    }
    throw err;
  }
}

function toExecutorCall(call: EncodedCall): ExecutorCall {
  const injecting = !isAddressEqual(call.injectToken, NULL_TOKEN);
  let injectOffset = 0;

  if (call.injectOffset <= MAX_OFFSET) {
    injectOffset = Number(call.injectOffset);
  } else if (injecting) {
    throw new ExecutorError({
      code: 'InvalidInjectionOffset',
      offset: call.injectOffset,
      length: BigInt(size(call.data)),
    });
  }

  return {
    target: getAddress(call.target),
    value: call.value,
    data: call.data,
    injectToken: getAddress(call.injectToken),
    injectOffset,
  };
}
