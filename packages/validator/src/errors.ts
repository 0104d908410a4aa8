/**
 * ContractCheck Validator — Programming Errors
 *
 * Thrown, never returned. Input defects become diagnostics; these signal
 * that the caller broke the validator's usage contract.
 */

/**
 * Raised when validation starts against a registry that still accepts
 * registrations. Contracts must be complete before any invocation is bound.
 */
export class RegistryNotSealedError extends Error {
  constructor() {
    super('Contract registry must be sealed before validation begins.');
    this.name = 'RegistryNotSealedError';
  }
}
