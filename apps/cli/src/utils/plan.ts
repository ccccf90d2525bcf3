import { getAddress, isAddress, isHex, type Address, type Hex } from 'viem';
import { NULL_TOKEN, type ExecuteRequest, type ExecutorCall, type TokenApproval, type TokenPull } from '@aequi/types';

/** A token deployed for a simulation, with its opening balances */
export interface PlanToken {
  symbol: string;
  address: Address;
  returns: 'bool' | 'none';
  balances: Array<{ account: Address; amount: bigint }>;
}

/** A constant-rate swap router deployed for a simulation */
export interface PlanRouter {
  address: Address;
  rateNumerator: bigint;
  rateDenominator: bigint;
}

/**
 * Everything `aequi simulate` needs: the world to build and the
 * invocation to run against it.
 */
export interface SimulationPlan {
  caller: Address;
  executor: Address;
  /** Native balance credited to the caller before the run */
  callerNative: bigint;
  /** Native value attached to execute */
  value: bigint;
  tokens: PlanToken[];
  routers: PlanRouter[];
  /** Plain accounts to whitelist next to the routers */
  targets: Address[];
  request: ExecuteRequest;
}

export const DEFAULT_SIMULATION_EXECUTOR = getAddress('0x00000000000000000000000000000000000AE001');

export class PlanError extends Error {
  constructor(path: string, problem: string) {
    super(`Invalid plan at ${path}: ${problem}`);
    this.name = 'PlanError';
  }
}

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function objectAt(value: unknown, path: string): Json {
  if (!isObject(value)) throw new PlanError(path, 'expected an object');
  return value;
}

function arrayAt(value: unknown, path: string, optional = false): unknown[] {
  if (value === undefined && optional) return [];
  if (!Array.isArray(value)) throw new PlanError(path, 'expected an array');
  return value;
}

function addressAt(value: unknown, path: string): Address {
  if (typeof value !== 'string' || !isAddress(value, { strict: false })) {
    throw new PlanError(path, 'expected a 20-byte hex address');
  }
  return getAddress(value);
}

/**
 * Amounts are decimal strings (or safe integers) so they survive JSON.
 */
function amountAt(value: unknown, path: string, fallback?: bigint): bigint {
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) return BigInt(value);
  if (typeof value === 'string' && /^\d+$/.test(value)) return BigInt(value);
  throw new PlanError(path, 'expected a non-negative integer amount');
}

function hexAt(value: unknown, path: string): Hex {
  if (typeof value !== 'string' || !isHex(value, { strict: true })) {
    throw new PlanError(path, 'expected 0x-prefixed hex');
  }
  return value;
}

function offsetAt(value: unknown, path: string): number {
  if (value === undefined) return 0;
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new PlanError(path, 'expected a non-negative integer offset');
  }
  return value;
}

function parseToken(value: unknown, path: string): PlanToken {
  const raw = objectAt(value, path);
  if (typeof raw.symbol !== 'string' || raw.symbol === '') {
    throw new PlanError(`${path}.symbol`, 'expected a non-empty string');
  }
  const returns = raw.returns ?? 'bool';
  if (returns !== 'bool' && returns !== 'none') {
    throw new PlanError(`${path}.returns`, 'expected "bool" or "none"');
  }

  const balances = Object.entries(objectAt(raw.balances ?? {}, `${path}.balances`)).map(([account, amount]) => ({
    account: addressAt(account, `${path}.balances`),
    amount: amountAt(amount, `${path}.balances.${account}`),
  }));

  return { symbol: raw.symbol, address: addressAt(raw.address, `${path}.address`), returns, balances };
}

function parseRouter(value: unknown, path: string): PlanRouter {
  const raw = objectAt(value, path);
  const rateNumerator = amountAt(raw.rateNumerator, `${path}.rateNumerator`);
  const rateDenominator = amountAt(raw.rateDenominator, `${path}.rateDenominator`, 1n);
  if (rateNumerator === 0n || rateDenominator === 0n) {
    throw new PlanError(path, 'router rate must be positive');
  }
  return { address: addressAt(raw.address, `${path}.address`), rateNumerator, rateDenominator };
}

function parsePull(value: unknown, path: string): TokenPull {
  const raw = objectAt(value, path);
  return { token: addressAt(raw.token, `${path}.token`), amount: amountAt(raw.amount, `${path}.amount`) };
}

function parseApproval(value: unknown, path: string): TokenApproval {
  const raw = objectAt(value, path);
  const revokeAfter = raw.revokeAfter ?? true;
  if (typeof revokeAfter !== 'boolean') {
    throw new PlanError(`${path}.revokeAfter`, 'expected a boolean');
  }
  return {
    token: addressAt(raw.token, `${path}.token`),
    spender: addressAt(raw.spender, `${path}.spender`),
    amount: amountAt(raw.amount, `${path}.amount`),
    revokeAfter,
  };
}

function parseCall(value: unknown, path: string): ExecutorCall {
  const raw = objectAt(value, path);
  return {
    target: addressAt(raw.target, `${path}.target`),
    value: amountAt(raw.value, `${path}.value`, 0n),
    data: hexAt(raw.data ?? '0x', `${path}.data`),
    injectToken: raw.injectToken === undefined ? NULL_TOKEN : addressAt(raw.injectToken, `${path}.injectToken`),
    injectOffset: offsetAt(raw.injectOffset, `${path}.injectOffset`),
  };
}

/**
 * Validate a parsed plan file.
 */
export function parsePlan(value: unknown): SimulationPlan {
  const raw = objectAt(value, 'plan');
  const request = objectAt(raw.request, 'request');

  return {
    caller: addressAt(raw.caller, 'caller'),
    executor:
      raw.executor === undefined ? DEFAULT_SIMULATION_EXECUTOR : addressAt(raw.executor, 'executor'),
    callerNative: amountAt(raw.callerNative, 'callerNative', 0n),
    value: amountAt(raw.value, 'value', 0n),
    tokens: arrayAt(raw.tokens, 'tokens', true).map((t, i) => parseToken(t, `tokens[${i}]`)),
    routers: arrayAt(raw.routers, 'routers', true).map((r, i) => parseRouter(r, `routers[${i}]`)),
    targets: arrayAt(raw.targets, 'targets', true).map((t, i) => addressAt(t, `targets[${i}]`)),
    request: {
      pulls: arrayAt(request.pulls, 'request.pulls', true).map((p, i) => parsePull(p, `request.pulls[${i}]`)),
      approvals: arrayAt(request.approvals, 'request.approvals', true).map((a, i) =>
        parseApproval(a, `request.approvals[${i}]`)
      ),
      calls: arrayAt(request.calls, 'request.calls', true).map((c, i) => parseCall(c, `request.calls[${i}]`)),
      tokensToFlush: arrayAt(request.tokensToFlush, 'request.tokensToFlush', true).map((t, i) =>
        addressAt(t, `request.tokensToFlush[${i}]`)
      ),
    },
  };
}
