import type { StreamKind } from '../../entities/telemetry-record.js';

/**
 * A forward-only, lazily read telemetry stream. `records()` may be iterated
 * once; `close()` releases the underlying source and is safe to call twice.
 */
export interface TelemetryStreamPort<T> {
  readonly kind: StreamKind;
  /** Where the stream comes from (file path, or a label for in-memory sources). */
  readonly source: string;
  readonly recordsRead: number;
  readonly malformedCount: number;
  records(): AsyncIterable<T>;
  close(): Promise<void>;
}
