/**
 * Framework misuse errors.
 *
 * Probe failures never surface as errors; they are normalized to inactive
 * readings inside the source runner. Only programming mistakes against the
 * scheduler and runner API are thrown.
 */

export type MonitorUsageErrorCode =
  | 'duplicate_source'
  | 'unknown_source'
  | 'disposed_runner'
  | 'invalid_config';

export class MonitorUsageError extends Error {
  readonly code: MonitorUsageErrorCode;

  constructor(code: MonitorUsageErrorCode, message: string) {
    super(message);
    this.name = 'MonitorUsageError';
    this.code = code;
  }
}
