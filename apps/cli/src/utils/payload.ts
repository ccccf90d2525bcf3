import { getAddress, hexToBytes, isHex, type Hex } from 'viem';
import {
  InjectionEngine,
  SELECTOR_SIZE,
  buildPulledLedger,
  fitsWord,
  readSelector,
  readWord,
} from '@aequi/executor';
import { DEFAULT_SELECTOR_OFFSETS, Ownership, TargetRegistry } from '@aequi/registry';

/** Stand-in owner and token for offline checks; nothing is ever sent to them */
const OFFLINE_OWNER = getAddress('0x000000000000000000000000000000000000dEaD');
const OFFLINE_TOKEN = getAddress('0x0000000000000000000000000000000000000001');

export interface PayloadInspection {
  selector: Hex;
  signature?: string;
  registeredOffset?: number;
  length: number;
  offset?: number;
  /** Current word at `offset`, when a full word fits there */
  word?: bigint;
}

function defaultRegistry(): TargetRegistry {
  return new TargetRegistry(new Ownership(OFFLINE_OWNER), { selectorOffsets: DEFAULT_SELECTOR_OFFSETS });
}

function parsePayload(data: string): Hex {
  if (!isHex(data, { strict: true }) || (data.length - 2) % 2 !== 0) {
    throw new Error(`Payload must be 0x-prefixed hex with whole bytes, got "${data}"`);
  }
  return data;
}

/**
 * Describe a payload against the default selector table.
 */
export function inspectPayload(data: string, offset?: number): PayloadInspection {
  const payload = hexToBytes(parsePayload(data));
  if (payload.length < SELECTOR_SIZE) {
    throw new Error(`Payload of ${payload.length} bytes has no selector`);
  }

  const selector = readSelector(payload);
  const entry = DEFAULT_SELECTOR_OFFSETS.find((e) => e.selector === selector);
  const at = offset ?? entry?.offset;

  return {
    selector,
    signature: entry?.signature,
    registeredOffset: entry?.offset,
    length: payload.length,
    offset: at,
    word: at !== undefined && fitsWord(payload.length, at) ? readWord(payload, at) : undefined,
  };
}

/**
 * Patch `amount` into a payload with the same checks the executor applies.
 * The offset defaults to the one registered for the payload's selector.
 */
export async function injectIntoPayload(data: string, amount: bigint, offset?: number): Promise<Hex> {
  const payload = parsePayload(data);
  const registry = defaultRegistry();

  let declared = offset ?? 0;
  if (offset === undefined && hexToBytes(payload).length >= SELECTOR_SIZE) {
    declared = registry.expectedOffset(readSelector(hexToBytes(payload))) ?? 0;
  }

  const engine = new InjectionEngine(registry, async () => amount);
  const prepared = await engine.prepare(
    { target: OFFLINE_TOKEN, value: 0n, data: payload, injectToken: OFFLINE_TOKEN, injectOffset: declared },
    0,
    buildPulledLedger([])
  );
  return prepared.data;
}
