/**
 * @aequi/registry - Target whitelist and selector offset table
 *
 * The registry is the trusted configuration surface of the executor:
 * - TargetRegistry: whitelist + selector -> injection offset table
 * - Ownership: single-admin check guarding every write
 */

export {
  TargetRegistry,
  normalizeSelector,
  type TargetReader,
  type TargetRegistryOptions,
} from './registry.js';
export { Ownership } from './ownership.js';
export { RegistryError, type RegistryErrorCode } from './errors.js';
export {
  DEFAULT_SELECTOR_OFFSETS,
  DEFAULT_BSC_TARGETS,
  MAX_BATCH_TARGETS,
  MIN_INJECTION_OFFSET,
  type SelectorOffsetEntry,
} from './defaults.js';
