/**
 * ContractCheck Registry — Manifest Types
 *
 * A manifest is the JSON form of contracts and call sites, as written by a
 * metadata extractor or by hand:
 *
 *   {
 *     "contracts": [
 *       { "name": "setval_c", "builtin": true,
 *         "args": ["arg_type(GH_FIELD, GH_REAL, GH_WRITE, ANY_SPACE_1)",
 *                  { "kind": "scalar", "data_type": "real", "access": "read" }] }
 *     ],
 *     "invocations": [
 *       { "label": "invoke_0", "kernel": "setval_c", "args": ["u", { "handle": "zero", "kind": "scalar" }] }
 *     ]
 *   }
 */

import type { Invocation, KernelContract } from '@contractcheck/contract-model';

/** A validated manifest. Contracts are built and frozen; nothing is registered yet. */
export interface ContractManifest {
  readonly contracts: ReadonlyArray<KernelContract>;
  readonly invocations: ReadonlyArray<Invocation>;
}
