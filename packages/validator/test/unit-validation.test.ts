/**
 * ContractCheck Validator — Compilation-Unit Validation Tests
 *
 * unit/barrier: validation refuses an unsealed registry
 * unit/report: contract and invocation diagnostics, in order
 * unit/logging: one log entry per contract and per invocation
 *
 * The registry here is a fixed in-memory lookup. No file I/O and no wall
 * clock; timestamps come from an injected clock.
 */

import { describe, it, expect } from 'vitest';
import {
  AccessMode,
  ArgumentKind,
  DataType,
  builtIn,
  contractHash,
  field,
  invocation,
  invocationArg,
  scalar,
} from '@contractcheck/contract-model';
import type { KernelContract } from '@contractcheck/contract-model';
import {
  ContractValidator,
  DiagnosticCode,
  RegistryNotSealedError,
  ValidationLogger,
  ValidationOutcome,
} from '../src/index.js';
import type { ContractLookup, LogSink, ValidationLog } from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const REGISTRY_HASH = 'test-registry-hash';
const FIXED_TIME = '2026-01-01T00:00:00.000Z';

class StaticLookup implements ContractLookup {
  constructor(
    private readonly contracts: ReadonlyArray<KernelContract>,
    private readonly sealed = true,
  ) {}

  isSealed(): boolean {
    return this.sealed;
  }

  lookup(name: string): ReadonlyArray<KernelContract> {
    return this.contracts.filter((c) => c.name === name);
  }

  list(): ReadonlyArray<KernelContract> {
    return this.contracts;
  }

  hash(): string {
    return REGISTRY_HASH;
  }
}

class MemorySink implements LogSink {
  readonly entries: ValidationLog[] = [];

  append(entry: ValidationLog): void {
    this.entries.push(entry);
  }
}

const SETVAL = builtIn('setval_c', [
  field(DataType.Real, AccessMode.Write, 'any_space_1'),
  scalar(DataType.Real),
]);
const BAD_COPY = builtIn('bad_copy', [
  field(DataType.Real, AccessMode.Write, 'any_space_1'),
  field(DataType.Real, AccessMode.Write, 'any_space_1'),
]);

const UNIT = {
  name: 'solver_alg',
  invocations: [
    invocation('invoke_0', 'setval_c', [
      invocationArg('u', ArgumentKind.Field, DataType.Real),
      invocationArg('zero', ArgumentKind.Scalar, DataType.Real),
    ]),
    invocation('invoke_1', 'no_such_kernel', [invocationArg('u')]),
    invocation('invoke_2', 'bad_copy', [invocationArg('u'), invocationArg('v')]),
  ],
};

function newValidator(sink?: LogSink): ContractValidator {
  return new ContractValidator({ logger: new ValidationLogger(sink), clock: () => FIXED_TIME });
}

// ---------------------------------------------------------------------------
// Barrier
// ---------------------------------------------------------------------------

describe('unit/barrier', () => {
  it('throws when the registry is not sealed', () => {
    const registry = new StaticLookup([SETVAL], false);
    expect(() => newValidator().validateUnit(UNIT, registry)).toThrow(RegistryNotSealedError);
  });

  it('throws from bindInvocation as well', () => {
    const registry = new StaticLookup([SETVAL], false);
    const first = UNIT.invocations[0];
    if (first === undefined) throw new Error('fixture');
    expect(() => newValidator().bindInvocation(first, registry)).toThrow(
      'Contract registry must be sealed before validation begins.',
    );
  });
});

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

describe('unit/report', () => {
  const registry = new StaticLookup([SETVAL, BAD_COPY]);
  const report = newValidator().validateUnit(UNIT, registry);

  it('checks every registered contract in registry order', () => {
    expect(report.contracts.map((c) => [c.contract.name, c.ok])).toEqual([
      ['setval_c', true],
      ['bad_copy', false],
    ]);
    expect(report.contracts[0]?.hash).toBe(contractHash(SETVAL));
  });

  it('binds a matching invocation', () => {
    const result = report.invocations[0]?.result;
    if (result === undefined || !result.ok) throw new Error('expected binding');
    expect(result.contract).toBe(SETVAL);
    expect(result.mapping.map((m) => m.actual.handle)).toEqual(['u', 'zero']);
  });

  it('reports an unknown kernel', () => {
    const result = report.invocations[1]?.result;
    if (result === undefined || result.ok) throw new Error('expected rejection');
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({
      code: DiagnosticCode.UnknownKernel,
      kernelName: 'no_such_kernel',
      subject: 'invoke_1',
    });
    expect(result.diagnostics[0]?.message).toBe("No kernel named 'no_such_kernel' is registered.");
  });

  it('refuses to bind to an invalid contract', () => {
    const result = report.invocations[2]?.result;
    if (result === undefined || result.ok) throw new Error('expected rejection');
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({
      code: DiagnosticCode.InvalidContractBound,
      kernelName: 'bad_copy',
      contractCodes: [DiagnosticCode.InvalidWriteCount],
    });
    expect(result.diagnostics[0]?.message).toBe(
      "Invocation binds to 'bad_copy', whose contract failed validation (InvalidWriteCount).",
    );
  });

  it('lists contract diagnostics before invocation diagnostics', () => {
    expect(report.diagnostics.map((d) => [d.subject, d.code])).toEqual([
      ['bad_copy', DiagnosticCode.InvalidWriteCount],
      ['invoke_1', DiagnosticCode.UnknownKernel],
      ['invoke_2', DiagnosticCode.InvalidContractBound],
    ]);
    expect(report.ok).toBe(false);
    expect(report.unit).toBe('solver_alg');
    expect(report.registryHash).toBe(REGISTRY_HASH);
  });

  it('produces the same report on every run', () => {
    expect(newValidator().validateUnit(UNIT, registry)).toEqual(report);
  });

  it('accepts an empty unit against an empty registry', () => {
    const empty = newValidator().validateUnit({ name: 'empty', invocations: [] }, new StaticLookup([]));
    expect(empty.ok).toBe(true);
    expect(empty.diagnostics).toEqual([]);
  });

  it('binds a single invocation outside a unit', () => {
    const third = UNIT.invocations[2];
    if (third === undefined) throw new Error('fixture');
    const result = newValidator().bindInvocation(third, registry);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.diagnostics[0]?.code).toBe(DiagnosticCode.InvalidContractBound);
  });
});

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

describe('unit/logging', () => {
  it('records one entry per contract and per invocation', () => {
    const sink = new MemorySink();
    newValidator(sink).validateUnit(UNIT, new StaticLookup([SETVAL, BAD_COPY]));

    expect(sink.entries).toEqual([
      {
        subject: 'setval_c',
        subject_kind: 'contract',
        outcome: ValidationOutcome.Accepted,
        codes: [],
        registry_hash: REGISTRY_HASH,
        contract_hash: contractHash(SETVAL),
        timestamp: FIXED_TIME,
      },
      {
        subject: 'bad_copy',
        subject_kind: 'contract',
        outcome: ValidationOutcome.Rejected,
        codes: [DiagnosticCode.InvalidWriteCount],
        registry_hash: REGISTRY_HASH,
        contract_hash: contractHash(BAD_COPY),
        timestamp: FIXED_TIME,
      },
      {
        subject: 'invoke_0',
        subject_kind: 'invocation',
        outcome: ValidationOutcome.Accepted,
        codes: [],
        registry_hash: REGISTRY_HASH,
        contract_hash: contractHash(SETVAL),
        timestamp: FIXED_TIME,
      },
      {
        subject: 'invoke_1',
        subject_kind: 'invocation',
        outcome: ValidationOutcome.Rejected,
        codes: [DiagnosticCode.UnknownKernel],
        registry_hash: REGISTRY_HASH,
        contract_hash: null,
        timestamp: FIXED_TIME,
      },
      {
        subject: 'invoke_2',
        subject_kind: 'invocation',
        outcome: ValidationOutcome.Rejected,
        codes: [DiagnosticCode.InvalidContractBound],
        registry_hash: REGISTRY_HASH,
        contract_hash: contractHash(BAD_COPY),
        timestamp: FIXED_TIME,
      },
    ]);
  });

  it('records nothing without a sink', () => {
    const logger = new ValidationLogger();
    expect(logger.enabled).toBe(false);
    let clockReads = 0;
    const clock = (): string => {
      clockReads++;
      return FIXED_TIME;
    };
    const report = new ContractValidator({ logger, clock }).validateUnit(UNIT, new StaticLookup([SETVAL]));
    expect(report.invocations).toHaveLength(3);
    expect(clockReads).toBe(0);
  });
});
