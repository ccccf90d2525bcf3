import type { Address } from 'viem';
import type { LedgerHost } from '@aequi/ledger';
import type { TargetReader } from '@aequi/registry';
import type { TokenGateway } from '../token.js';

/** Everything a stage needs for one invocation */
export interface StageContext {
  host: LedgerHost;
  /** The executor's own address */
  self: Address;
  /** Account that invoked execute */
  caller: Address;
  tokens: TokenGateway;
  registry: TargetReader;
}
