/**
 * ContractCheck Registry — Error Types
 */

import type { ValidationError } from '@contractcheck/contract-model';

/** register() after seal(). Contracts are fixed once validation can begin. */
export class RegistrySealedError extends Error {
  constructor(readonly contractName: string) {
    super(`Cannot register '${contractName}': the contract registry is sealed.`);
    this.name = 'RegistrySealedError';
  }
}

/** The exact same contract registered twice. Overloads must differ in their arguments. */
export class DuplicateContractError extends Error {
  constructor(readonly contractName: string) {
    super(
      `Contract already registered: ${contractName}. ` +
        'An overload must differ from every existing contract of the same name.',
    );
    this.name = 'DuplicateContractError';
  }
}

/**
 * A manifest that cannot be read or does not have the manifest structure.
 * Carries every structural error found.
 */
export class ManifestError extends Error {
  constructor(
    readonly source: string,
    readonly errors: ReadonlyArray<ValidationError>,
  ) {
    super(`Invalid manifest ${source}: ${errors.map(formatValidationError).join('; ')}`);
    this.name = 'ManifestError';
  }
}

export function formatValidationError(error: ValidationError): string {
  return error.context === undefined ? error.message : `${error.context}: ${error.message}`;
}
