import type { IngestionFailure, IngestionSummary } from '../types/index.js';

export class DiskPulseError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'DiskPulseError';
    this.code = code;
  }
}

export class MalformedRecordError extends DiskPulseError {
  public readonly line: string;
  public readonly reason: string;

  constructor(line: string, reason: string) {
    super(`Malformed diskstats record: ${reason}`, 'MALFORMED_RECORD');
    this.name = 'MalformedRecordError';
    this.line = line;
    this.reason = reason;
  }
}

/**
 * Thrown once a refresh cycle has been applied in full but some of its lines could not be
 * parsed. Devices from the remaining lines (and the total) were still updated.
 */
export class AggregatedIngestionError extends DiskPulseError {
  public readonly failures: IngestionFailure[];
  public readonly summary: IngestionSummary;

  constructor(summary: IngestionSummary) {
    const lines = summary.failures.map((failure) => `  line ${failure.lineNumber}: ${failure.reason}`);
    super(
      `Ingestion finished with ${summary.failures.length} malformed line(s):\n${lines.join('\n')}`,
      'INGESTION_FAILED',
    );
    this.name = 'AggregatedIngestionError';
    this.failures = summary.failures;
    this.summary = summary;
  }
}

export class SourceUnavailableError extends DiskPulseError {
  public readonly source: string;

  constructor(source: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Disk stats source unavailable: ${source}${detail}`, 'SOURCE_UNAVAILABLE');
    this.name = 'SourceUnavailableError';
    this.source = source;
    this.cause = cause;
  }
}

export class RegistryConflictError extends DiskPulseError {
  public readonly key: string;

  constructor(key: string) {
    super(`Metric already registered: ${key}`, 'REGISTRY_CONFLICT');
    this.name = 'RegistryConflictError';
    this.key = key;
  }
}

export class ConfigValidationError extends DiskPulseError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}
