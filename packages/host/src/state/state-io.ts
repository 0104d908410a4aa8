/**
 * ContractCheck Host — StateIO
 *
 * Injectable I/O for JSON state files and JSONL logs under one home
 * directory:
 *
 *   <home>/state/<filename>   readJson / writeJson
 *   <home>/logs/<filename>    appendLine / readLogRaw
 *
 * FileStateIO persists to disk; MemoryStateIO keeps everything in process
 * for tests and embedded use.
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

export interface StateIO {
  /**
   * Parsed content of a state file, or undefined when the file is absent or
   * is not valid JSON. The value is untrusted; callers validate its shape.
   */
  readJson(filename: string): unknown;

  /** Serialize `value` as JSON, replacing the file. Creates `state/` on demand. */
  writeJson(filename: string, value: unknown): void;

  /** Append `line` plus a newline. Creates `logs/` on demand. */
  appendLine(logfilename: string, line: string): void;

  /** Raw log text, or '' if the log does not exist. */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Synchronous file-backed StateIO. A missing file or unparsable state is
 * recoverable; every other I/O error propagates.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson(filename: string): unknown {
    const filePath = join(this.homeDir, 'state', filename);
    try {
      return JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      throw err;
    }
  }

  writeJson(filename: string, value: unknown): void {
    const stateDir = join(this.homeDir, 'state');
    mkdirSync(stateDir, { recursive: true });
    writeFileSync(join(stateDir, filename), JSON.stringify(value, null, 2) + '\n', 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.homeDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. State round-trips through JSON text so that it
 * behaves like FileStateIO (undefined members vanish, and so on).
 */
export class MemoryStateIO implements StateIO {
  private readonly state: Map<string, string> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson(filename: string): unknown {
    const text = this.state.get(filename);
    return text === undefined ? undefined : JSON.parse(text);
  }

  writeJson(filename: string, value: unknown): void {
    this.state.set(filename, JSON.stringify(value));
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename);
    if (lines === undefined) {
      this.logs.set(logfilename, [line]);
    } else {
      lines.push(line);
    }
  }

  /** Lines appended so far. Not part of StateIO; for assertions in tests. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    return lines.map((l) => l + '\n').join('');
  }
}

function isNodeError(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
