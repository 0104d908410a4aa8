/**
 * contractcheck CLI — command core tests
 *
 * runCheck() over in-memory manifest text, with the log written to a
 * MemoryStateIO. No files, no process exit.
 */

import { describe, it, expect } from 'vitest';
import { AccessMode, DataType, builtIn, field, scalar } from '@contractcheck/contract-model';
import {
  FileLogSink,
  MemoryStateIO,
  VALIDATION_LOG,
  loadBuiltInCatalog,
  loadConfig,
  readLog,
} from '@contractcheck/host';
import { DuplicateContractError, ManifestError } from '@contractcheck/registry';
import { DiagnosticCode, ValidationOutcome } from '@contractcheck/validator';
import {
  EXIT_INPUT_ERROR,
  EXIT_OK,
  EXIT_REJECTED,
  applyConfigChange,
  exitCodeFor,
  parseLimit,
  parseOutcome,
  readManifestFiles,
  runCheck,
  toInputError,
} from '../src/runtime.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const FIXED_TIME = '2026-01-01T00:00:00.000Z';

const SETVAL_C = builtIn('setval_c', [
  field(DataType.Real, AccessMode.Write, 'any_space_1'),
  scalar(DataType.Real),
]);

const MANIFEST = JSON.stringify({
  contracts: [
    { name: 'smooth', args: [{ kind: 'field', data_type: 'real', access: 'inc', spaces: ['W3'] }] },
  ],
  invocations: [
    { kernel: 'setval_c', args: ['u', { handle: 'zero', kind: 'scalar', data_type: 'real' }] },
    { kernel: 'smooth', args: [{ handle: 'u', kind: 'field' }] },
    { kernel: 'missing', args: ['u'] },
  ],
});

function idSequence(): () => string {
  let n = 0;
  return () => `evt-${++n}`;
}

// ---------------------------------------------------------------------------
// runCheck
// ---------------------------------------------------------------------------

describe('runCheck', () => {
  it('validates each manifest as a unit against built-ins plus its own contracts', () => {
    const [report] = runCheck([{ source: 'a.json', text: MANIFEST }], { builtIns: [SETVAL_C] }).reports;

    expect(report?.unit).toBe('a.json');
    expect(report?.contracts.map((c) => c.contract.name)).toEqual(['setval_c', 'smooth']);
    expect(report?.invocations.map((i) => i.result.ok)).toEqual([true, true, false]);
    expect(report?.diagnostics.map((d) => [d.code, d.subject])).toEqual([
      [DiagnosticCode.UnknownKernel, 'missing#2'],
    ]);
    expect(report?.ok).toBe(false);
  });

  it('writes one log line per contract and per invocation', () => {
    const io = new MemoryStateIO();
    runCheck([{ source: 'a.json', text: MANIFEST }], {
      builtIns: [SETVAL_C],
      sink: new FileLogSink(io, idSequence()),
      clock: () => FIXED_TIME,
    });

    const { events, stats } = readLog(io.readLogRaw(VALIDATION_LOG));
    expect(stats.parseErrors).toBe(0);
    expect(events.map((e) => [e.event_id, e.subject, e.subject_kind, e.outcome])).toEqual([
      ['evt-1', 'setval_c', 'contract', ValidationOutcome.Accepted],
      ['evt-2', 'smooth', 'contract', ValidationOutcome.Accepted],
      ['evt-3', 'setval_c#0', 'invocation', ValidationOutcome.Accepted],
      ['evt-4', 'smooth#1', 'invocation', ValidationOutcome.Accepted],
      ['evt-5', 'missing#2', 'invocation', ValidationOutcome.Rejected],
    ]);
    expect(events[4]?.codes).toEqual([DiagnosticCode.UnknownKernel]);
    expect(events[4]?.contract_hash).toBeNull();
    expect(events.every((e) => e.timestamp === FIXED_TIME)).toBe(true);
  });

  it('gives each unit its own registry', () => {
    const other = JSON.stringify({ contracts: [], invocations: [{ kernel: 'smooth', args: ['u'] }] });
    const { reports } = runCheck(
      [
        { source: 'a.json', text: MANIFEST },
        { source: 'b.json', text: other },
      ],
      { builtIns: [] },
    );

    expect(reports[1]?.contracts).toEqual([]);
    expect(reports[1]?.diagnostics.map((d) => d.message)).toEqual([
      "No kernel named 'smooth' is registered.",
    ]);
  });

  it('accepts a manifest that calls only catalog built-ins', () => {
    const text = JSON.stringify({
      contracts: [],
      invocations: [{ label: 'zero_u', kernel: 'setval_c', args: ['u', 'c'] }],
    });
    const [report] = runCheck([{ source: 'calls.json', text }], { builtIns: loadBuiltInCatalog() }).reports;

    expect(report?.ok).toBe(true);
    expect(report?.contracts.every((c) => c.contract.isBuiltIn)).toBe(true);
  });

  it('reports a manifest that is not JSON and still checks the others', () => {
    const io = new MemoryStateIO();
    const good = JSON.stringify({ contracts: [], invocations: [{ kernel: 'setval_c', args: ['u', 'c'] }] });
    const run = runCheck(
      [
        { source: 'good.json', text: good },
        { source: 'bad.json', text: '{' },
        { source: 'good2.json', text: good },
      ],
      { builtIns: [SETVAL_C], sink: new FileLogSink(io, idSequence()), clock: () => FIXED_TIME },
    );

    expect(run.reports.map((r) => [r.unit, r.ok])).toEqual([
      ['good.json', true],
      ['good2.json', true],
    ]);
    expect(run.inputErrors.map((e) => e.source)).toEqual(['bad.json']);
    expect(run.inputErrors[0]?.message).toMatch(/^Invalid manifest bad\.json: Not valid JSON: /);

    const { events } = readLog(io.readLogRaw(VALIDATION_LOG));
    expect(events.map((e) => e.subject)).toEqual(['setval_c', 'setval_c#0', 'setval_c', 'setval_c#0']);
  });

  it('logs nothing when every manifest is unusable', () => {
    const io = new MemoryStateIO();
    const run = runCheck([{ source: 'bad.json', text: '[]' }], {
      builtIns: [SETVAL_C],
      sink: new FileLogSink(io, idSequence()),
    });

    expect(run.reports).toEqual([]);
    expect(run.inputErrors).toEqual([
      { source: 'bad.json', message: 'Invalid manifest bad.json: $: Manifest must be a JSON object' },
    ]);
    expect(io.readLogRaw(VALIDATION_LOG)).toBe('');
  });

  it('reports a manifest that re-declares a built-in', () => {
    const text = JSON.stringify({
      contracts: [
        {
          name: 'setval_c',
          builtin: true,
          args: ['arg_type(GH_FIELD, GH_REAL, GH_WRITE, ANY_SPACE_1)', 'arg_type(GH_SCALAR, GH_REAL, GH_READ)'],
        },
      ],
      invocations: [],
    });
    const run = runCheck([{ source: 'dup.json', text }], { builtIns: [SETVAL_C] });

    expect(run.reports).toEqual([]);
    expect(run.inputErrors[0]?.message).toMatch(/^dup\.json: Contract already registered: setval_c\./);
  });
});

describe('exitCodeFor', () => {
  it('is 0 only when every unit is clean', () => {
    const clean = JSON.stringify({ contracts: [], invocations: [] });
    expect(exitCodeFor(runCheck([{ source: 'a', text: clean }], { builtIns: [] }))).toBe(EXIT_OK);
    expect(exitCodeFor(runCheck([{ source: 'a', text: MANIFEST }], { builtIns: [SETVAL_C] }))).toBe(
      EXIT_REJECTED,
    );
  });

  it('is 2 when any manifest was unusable', () => {
    const clean = JSON.stringify({ contracts: [], invocations: [] });
    const run = runCheck(
      [
        { source: 'a', text: clean },
        { source: 'b', text: '{' },
      ],
      { builtIns: [] },
    );
    expect(exitCodeFor(run)).toBe(EXIT_INPUT_ERROR);
  });
});

// ---------------------------------------------------------------------------
// Input errors
// ---------------------------------------------------------------------------

describe('readManifestFiles', () => {
  it('pairs each path with its text', () => {
    expect(readManifestFiles(['x.json'], () => '{}')).toEqual({
      manifests: [{ source: 'x.json', text: '{}' }],
      errors: [],
    });
  });

  it('keeps the readable files when one cannot be read', () => {
    const read = (path: string): string => {
      if (path === 'gone.json') {
        throw new Error('ENOENT: no such file');
      }
      return '{}';
    };
    expect(readManifestFiles(['a.json', 'gone.json', 'b.json'], read)).toEqual({
      manifests: [
        { source: 'a.json', text: '{}' },
        { source: 'b.json', text: '{}' },
      ],
      errors: [{ source: 'gone.json', message: 'Cannot read gone.json: ENOENT: no such file' }],
    });
  });
});

describe('toInputError', () => {
  it('converts manifest and duplicate errors', () => {
    expect(toInputError('m.json', new ManifestError('m.json', [{ message: 'bad', context: '$' }]))).toEqual({
      source: 'm.json',
      message: 'Invalid manifest m.json: $: bad',
    });
    expect(toInputError('k.json', new DuplicateContractError('k'))?.message).toMatch(
      /^k\.json: Contract already registered: k\./,
    );
  });

  it('returns null for anything else', () => {
    expect(toInputError('m.json', new TypeError('boom'))).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Option parsing
// ---------------------------------------------------------------------------

describe('parseOutcome', () => {
  it('is case-insensitive', () => {
    expect(parseOutcome('rejected')).toEqual({ ok: true, value: ValidationOutcome.Rejected });
    expect(parseOutcome('ACCEPTED')).toEqual({ ok: true, value: ValidationOutcome.Accepted });
  });

  it('rejects other words', () => {
    expect(parseOutcome('maybe')).toEqual({
      ok: false,
      error: 'Unknown outcome "maybe". Expected accepted or rejected',
    });
  });
});

describe('parseLimit', () => {
  it('accepts positive integers only', () => {
    expect(parseLimit('10')).toEqual({ ok: true, value: 10 });
    expect(parseLimit('0').ok).toBe(false);
    expect(parseLimit('2.5').ok).toBe(false);
    expect(parseLimit('ten')).toEqual({ ok: false, error: '--limit must be a positive integer, got "ten"' });
  });
});

// ---------------------------------------------------------------------------
// config
// ---------------------------------------------------------------------------

describe('applyConfigChange', () => {
  it('persists a valid change', () => {
    const io = new MemoryStateIO();
    expect(applyConfigChange(io, 'logging', 'off')).toEqual({
      ok: true,
      value: { logging: false, builtins: true },
    });
    expect(loadConfig(io)).toEqual({ logging: false, builtins: true });
  });

  it('saves nothing when the value is not a boolean', () => {
    const io = new MemoryStateIO();
    expect(applyConfigChange(io, 'builtins', 'sometimes')).toEqual({
      ok: false,
      error: 'builtins: "sometimes" is not a boolean',
    });
    expect(io.readJson('config.json')).toBeUndefined();
  });
});
