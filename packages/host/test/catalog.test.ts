/**
 * ContractCheck Host — Built-in Catalog Tests
 *
 * Every shipped built-in must pass its own shape rules, and the catalog
 * must register without duplicates.
 */

import { describe, it, expect } from 'vitest';
import { BuiltInTag, OperatesOn } from '@contractcheck/contract-model';
import { ContractRegistry } from '@contractcheck/registry';
import { checkContract } from '@contractcheck/validator';
import { loadBuiltInCatalog } from '../src/index.js';

describe('built-in catalog', () => {
  const catalog = loadBuiltInCatalog();

  it('contains only built-ins iterating over degrees of freedom', () => {
    expect(catalog.length).toBeGreaterThan(20);
    expect(catalog.every((c) => c.isBuiltIn && c.operatesOn === OperatesOn.DegreeOfFreedom)).toBe(true);
  });

  it.each(catalog.map((c) => [c.name, c] as const))('%s passes every contract rule', (_name, contract) => {
    expect(checkContract(contract).diagnostics).toEqual([]);
  });

  it('registers without duplicates', () => {
    const registry = new ContractRegistry();
    registry.registerAll(catalog);
    expect(registry.listBuiltIns()).toHaveLength(catalog.length);
  });

  it('marks the reductions as zero-output', () => {
    const sumX = catalog.find((c) => c.name === 'sum_X');
    expect(sumX?.tags).toEqual([BuiltInTag.ZeroOutput]);
  });
});
