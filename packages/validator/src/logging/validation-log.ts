/**
 * ContractCheck Validator — Validation Logger
 *
 * One entry per contract check and per invocation binding, accepted or
 * rejected. Given the registry hash and the subject, the outcome recorded
 * here is reproducible.
 *
 * Without a sink, record() is a no-op.
 */

import type { ValidationLog } from '../types/outcome.js';
import type { LogSink } from './log-sink.js';

export class ValidationLogger {
  constructor(private readonly sink?: LogSink) {}

  /** Whether entries go anywhere. */
  get enabled(): boolean {
    return this.sink !== undefined;
  }

  record(entry: ValidationLog): void {
    this.sink?.append(entry);
  }
}
