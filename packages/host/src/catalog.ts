/**
 * ContractCheck Host — Built-in Catalog
 *
 * The library built-ins, shipped as a manifest beside this package's
 * sources. Every catalog entry must pass the built-in shape rules.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { KernelContract } from '@contractcheck/contract-model';
import { parseManifestText, readManifest } from '@contractcheck/registry';

export const CATALOG_PATH = fileURLToPath(new URL('../catalog/builtins.json', import.meta.url));

/**
 * Read and validate the catalog.
 *
 * @throws {ManifestError} if the catalog file is not a valid manifest
 */
export function loadBuiltInCatalog(path: string = CATALOG_PATH): ReadonlyArray<KernelContract> {
  const manifest = readManifest(parseManifestText(readFileSync(path, 'utf-8'), path), path);
  return manifest.contracts;
}
