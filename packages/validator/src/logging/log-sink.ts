/**
 * ContractCheck Validator — Log Sink Interface
 *
 * Injection point for validation log persistence. Concrete sinks live in
 * @contractcheck/host; the validator never writes to disk itself.
 */

import type { ValidationLog } from '../types/outcome.js';

/**
 * Receives validation log entries. append() must not drop an entry
 * silently; a sink that cannot persist throws.
 */
export interface LogSink {
  append(entry: ValidationLog): void;
}
