import { encodeFunctionData, getAddress, maxUint256, type Address } from 'viem';
import { AuditTrail, type Commitment } from '@aequi/audit';
import {
  MulticallExecutor,
  submitExecute,
  type ExecutionStateCallback,
  type ExecutorConfig,
  type SubmitExecuteResult,
} from '@aequi/executor';
import { ConstantRateRouter, Erc20Token, LedgerHost, tokenAbi } from '@aequi/ledger';
import { DEFAULT_SELECTOR_OFFSETS, Ownership, TargetRegistry } from '@aequi/registry';
import type { ExecutionReport } from '@aequi/types';
import type { SimulationPlan } from './plan.js';

const SIMULATION_OWNER = getAddress('0x00000000000000000000000000000000000AE000');

export interface TokenBalanceRow {
  symbol: string;
  token: Address;
  caller: bigint;
  executor: bigint;
}

export interface SimulationResult {
  outcome: SubmitExecuteResult;
  /** Set when the invocation completed */
  report?: ExecutionReport;
  commitment?: Commitment;
  balances: TokenBalanceRow[];
  callerNative: bigint;
}

/**
 * Build a fresh ledger from the plan and run its execute invocation once.
 *
 * The caller grants the executor an unlimited allowance on every plan
 * token before the run, the way a wallet would ahead of a swap.
 */
export async function runPlan(
  plan: SimulationPlan,
  config: Partial<ExecutorConfig> = {},
  onState?: ExecutionStateCallback
): Promise<SimulationResult> {
  const host = new LedgerHost();
  const ownership = new Ownership(SIMULATION_OWNER);
  const registry = new TargetRegistry(ownership, {
    targets: [...plan.routers.map((r) => r.address), ...plan.targets],
    selectorOffsets: DEFAULT_SELECTOR_OFFSETS,
  });

  const tokens = plan.tokens.map((t) => {
    const token = host.deploy(t.address, new Erc20Token({ address: t.address, symbol: t.symbol, returns: t.returns }));
    for (const { account, amount } of t.balances) {
      token.mint(host, account, amount);
    }
    return token;
  });
  for (const r of plan.routers) {
    host.deploy(
      r.address,
      new ConstantRateRouter({ address: r.address, rateNumerator: r.rateNumerator, rateDenominator: r.rateDenominator })
    );
  }

  const executor = host.deploy(
    plan.executor,
    new MulticallExecutor({ host, address: plan.executor, registry, ownership, config })
  );
  host.fund(plan.caller, plan.callerNative);

  for (const token of tokens) {
    const approved = await host.transact({
      from: plan.caller,
      to: token.address,
      data: encodeFunctionData({ abi: tokenAbi, functionName: 'approve', args: [plan.executor, maxUint256] }),
    });
    if (!approved.success) {
      throw new Error(`Caller could not approve the executor on ${token.symbol}`);
    }
  }

  let report: ExecutionReport | undefined;
  executor.onStateChange((state) => {
    if (state.phase === 'completed') report = state.report;
    onState?.(state);
  });

  const outcome = await submitExecute(host, {
    from: plan.caller,
    executor: plan.executor,
    request: plan.request,
    value: plan.value,
  });

  let commitment: Commitment | undefined;
  if (outcome.success) {
    [commitment] = new AuditTrail().commitFromLogs(outcome.logs);
  }

  return {
    outcome,
    report: outcome.success ? report : undefined,
    commitment,
    balances: tokens.map((token) => ({
      symbol: token.symbol,
      token: token.address,
      caller: token.balanceOf(host, plan.caller),
      executor: token.balanceOf(host, plan.executor),
    })),
    callerNative: host.balanceOf(plan.caller),
  };
}
