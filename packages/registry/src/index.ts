/**
 * @contractcheck/registry
 *
 * The sealed contract registry and the JSON manifest format that feeds it.
 */

export { ContractRegistry } from './registry.js';
export {
  DuplicateContractError,
  ManifestError,
  RegistrySealedError,
  formatValidationError,
} from './errors.js';

export type { ContractManifest } from './manifest/types.js';
export { ManifestValidator } from './manifest/validator.js';
export { loadManifest, parseManifestText, readManifest } from './manifest/loader.js';
