/**
 * ContractCheck Registry — Manifest Loader
 *
 * Parses manifest text, validates its structure and registers its contracts.
 * Reading the file is the caller's concern; this module does no I/O.
 */

import type { Invocation } from '@contractcheck/contract-model';
import { ManifestError } from '../errors.js';
import type { ContractRegistry } from '../registry.js';
import type { ContractManifest } from './types.js';
import { ManifestValidator } from './validator.js';

const validator = new ManifestValidator();

/**
 * Parse manifest JSON text.
 *
 * @throws {ManifestError} if the text is not JSON
 */
export function parseManifestText(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ManifestError(source, [{ message: `Not valid JSON: ${message}` }]);
  }
}

/**
 * Validate a raw manifest value.
 *
 * @throws {ManifestError} carrying every structural error
 */
export function readManifest(raw: unknown, source: string): ContractManifest {
  const result = validator.validateManifest(raw);
  if (!result.ok) {
    throw new ManifestError(source, result.errors);
  }
  return result.value;
}

/**
 * Validate a raw manifest and register its contracts.
 *
 * @returns the manifest's invocations, in manifest order
 * @throws {ManifestError} on structural errors (nothing is registered)
 * @throws {RegistrySealedError} if the registry is sealed
 * @throws {DuplicateContractError} if a contract is already registered
 */
export function loadManifest(
  raw: unknown,
  registry: ContractRegistry,
  source = '<manifest>',
): ReadonlyArray<Invocation> {
  const manifest = readManifest(raw, source);
  registry.registerAll(manifest.contracts);
  return manifest.invocations;
}
