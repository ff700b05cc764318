import type { RunDiagnostics } from '../entities/diagnostics.js';
import type { StreamKind } from '../entities/telemetry-record.js';

export type TelemetryErrorCode =
  | 'MALFORMED_RECORD'
  | 'STREAM_CORRUPT'
  | 'ANALYSIS_ABORTED'
  | 'CONFIG_INVALID';

export abstract class TelemetryError extends Error {
  abstract readonly code: TelemetryErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A single record that violates its stream's schema. Skipped and counted. */
export class MalformedRecordError extends TelemetryError {
  readonly code = 'MALFORMED_RECORD' as const;

  constructor(
    readonly stream: StreamKind,
    readonly line: number,
    readonly reason: string,
  ) {
    super(`${stream} stream, line ${line}: ${reason}`);
  }
}

/** The stream as a whole can no longer be trusted; the run is cancelled. */
export class StreamCorruptError extends TelemetryError {
  readonly code = 'STREAM_CORRUPT' as const;

  constructor(
    readonly stream: StreamKind,
    readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`${stream} stream corrupt: ${reason}`, options);
  }
}

export class AnalysisAbortedError extends TelemetryError {
  readonly code = 'ANALYSIS_ABORTED' as const;

  constructor(
    reason: string,
    readonly diagnostics: RunDiagnostics,
    options?: { cause?: unknown },
  ) {
    super(`analysis aborted: ${reason}`, options);
  }
}

export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

export class ConfigError extends TelemetryError {
  readonly code = 'CONFIG_INVALID' as const;

  constructor(readonly issues: readonly ConfigIssue[]) {
    super(`invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`);
  }
}

export function isTelemetryError(err: unknown): err is TelemetryError {
  return err instanceof TelemetryError;
}
