/**
 * ContractCheck Host — StateIO Tests
 *
 * MemoryStateIO needs nothing; FileStateIO runs in a fresh temp directory
 * per test.
 */

import { describe, it, expect } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileStateIO, MemoryStateIO } from '../src/index.js';

describe('MemoryStateIO', () => {
  it('returns undefined for state never written', () => {
    expect(new MemoryStateIO().readJson('config.json')).toBeUndefined();
  });

  it('round-trips state through JSON', () => {
    const io = new MemoryStateIO();
    io.writeJson('config.json', { logging: false, dropped: undefined });
    expect(io.readJson('config.json')).toEqual({ logging: false });
  });

  it('keeps log lines per file and renders raw text with trailing newlines', () => {
    const io = new MemoryStateIO();
    io.appendLine('a.jsonl', '{"n":1}');
    io.appendLine('a.jsonl', '{"n":2}');
    io.appendLine('b.jsonl', '{"n":3}');
    expect(io.readLines('a.jsonl')).toEqual(['{"n":1}', '{"n":2}']);
    expect(io.readLogRaw('a.jsonl')).toBe('{"n":1}\n{"n":2}\n');
    expect(io.readLogRaw('missing.jsonl')).toBe('');
  });

  it('is isolated from other instances', () => {
    const a = new MemoryStateIO();
    a.writeJson('config.json', { logging: false });
    expect(new MemoryStateIO().readJson('config.json')).toBeUndefined();
  });
});

describe('FileStateIO', () => {
  function freshHome(): string {
    return mkdtempSync(join(tmpdir(), 'contractcheck-state-'));
  }

  it('writes state under state/ and reads it back', () => {
    const home = freshHome();
    const io = new FileStateIO(home);
    io.writeJson('config.json', { builtins: false });
    expect(existsSync(join(home, 'state', 'config.json'))).toBe(true);
    expect(io.readJson('config.json')).toEqual({ builtins: false });
  });

  it('treats missing and corrupt state as absent', () => {
    const home = freshHome();
    const io = new FileStateIO(home);
    expect(io.readJson('config.json')).toBeUndefined();
    mkdirSync(join(home, 'state'));
    writeFileSync(join(home, 'state', 'config.json'), '{ not json');
    expect(io.readJson('config.json')).toBeUndefined();
  });

  it('appends log lines under logs/', () => {
    const home = freshHome();
    const io = new FileStateIO(home);
    expect(io.readLogRaw('validations.jsonl')).toBe('');
    io.appendLine('validations.jsonl', 'first');
    io.appendLine('validations.jsonl', 'second');
    expect(readFileSync(join(home, 'logs', 'validations.jsonl'), 'utf-8')).toBe('first\nsecond\n');
    expect(io.readLogRaw('validations.jsonl')).toBe('first\nsecond\n');
  });
});
