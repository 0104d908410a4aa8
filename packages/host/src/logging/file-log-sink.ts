/**
 * ContractCheck Host — File-backed Validation Log Sink
 *
 * The only writer of `logs/validations.jsonl`. Each entry becomes one JSON
 * line with a fresh ULID `event_id` in front of the validator's fields.
 * The write is synchronous and completes before append() returns.
 */

import type { LogSink, ValidationLog } from '@contractcheck/validator';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const VALIDATION_LOG = 'validations.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly newId: () => string = ulid,
  ) {}

  append(entry: ValidationLog): void {
    this.stateIO.appendLine(VALIDATION_LOG, JSON.stringify({ event_id: this.newId(), ...entry }));
  }
}
