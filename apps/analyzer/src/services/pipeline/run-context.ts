import {
  STREAM_KINDS,
  type MalformedExample,
  type MalformedRecordError,
  type MissingCorrelation,
  type OverlapAnomaly,
  type RunDiagnostics,
  type StreamDiagnostics,
  type StreamKind,
} from '@simtrace/domain';

const MALFORMED_EXAMPLES_PER_STREAM = 5;

/** Read-only view of a stream's counters, satisfied by every stream reader. */
export interface StreamCounters {
  readonly kind: StreamKind;
  readonly source: string;
  readonly recordsRead: number;
  readonly malformedCount: number;
}

/**
 * RunContext
 *
 * Owns every counter and anomaly list of one pipeline run. Components receive
 * it by reference; nothing here is module-level, so two runs never share state.
 */
export class RunContext {
  private readonly streams = new Map<StreamKind, StreamCounters>();
  private readonly examples = new Map<StreamKind, MalformedExample[]>();
  private readonly missing: MissingCorrelation[] = [];
  private readonly overlaps: OverlapAnomaly[] = [];
  private peakActive = 0;
  private peakAggregates = 0;

  registerStream(counters: StreamCounters): void {
    this.streams.set(counters.kind, counters);
  }

  recordMalformed(error: MalformedRecordError): void {
    const list = this.examples.get(error.stream) ?? [];
    if (list.length < MALFORMED_EXAMPLES_PER_STREAM) {
      list.push({ line: error.line, reason: error.reason });
    }
    this.examples.set(error.stream, list);
  }

  recordMissingCorrelation(anomaly: Omit<MissingCorrelation, 'type'>): void {
    this.missing.push({ type: 'MissingCorrelation', ...anomaly });
  }

  recordOverlap(anomaly: Omit<OverlapAnomaly, 'type'>): void {
    this.overlaps.push({ type: 'OverlapAnomaly', ...anomaly });
  }

  observeActiveVehicles(count: number): void {
    this.peakActive = Math.max(this.peakActive, count);
  }

  observeOpenAggregates(count: number): void {
    this.peakAggregates = Math.max(this.peakAggregates, count);
  }

  get peakActiveVehicles(): number {
    return this.peakActive;
  }

  get peakOpenAggregates(): number {
    return this.peakAggregates;
  }

  get missingCorrelations(): readonly MissingCorrelation[] {
    return this.missing;
  }

  get overlapAnomalies(): readonly OverlapAnomaly[] {
    return this.overlaps;
  }

  snapshot(): RunDiagnostics {
    const streams: StreamDiagnostics[] = STREAM_KINDS.map((kind) => {
      const counters = this.streams.get(kind);
      const read = counters?.recordsRead ?? 0;
      const malformed = counters?.malformedCount ?? 0;
      return {
        stream: kind,
        source: counters?.source ?? null,
        recordsRead: read,
        recordsAccepted: read - malformed,
        malformedCount: malformed,
        malformedExamples: [...(this.examples.get(kind) ?? [])],
      };
    });

    const vehiclesWithMissing = new Set(this.missing.map((m) => m.vehicleId)).size;

    return {
      streams,
      missingCorrelations: [...this.missing],
      vehiclesWithMissingCorrelation: vehiclesWithMissing,
      overlapAnomalies: [...this.overlaps],
      peakActiveVehicles: this.peakActive,
      peakOpenAggregates: this.peakAggregates,
      caveats: buildCaveats(streams, vehiclesWithMissing, this.overlaps.length),
    };
  }
}

function buildCaveats(
  streams: readonly StreamDiagnostics[],
  vehiclesWithMissing: number,
  overlapCount: number,
): string[] {
  const caveats: string[] = [];

  for (const stream of streams) {
    if (stream.source === null) {
      caveats.push(`${stream.stream} stream not provided; related metrics are absent`);
    } else if (stream.malformedCount > 0) {
      caveats.push(
        `${stream.malformedCount} of ${stream.recordsRead} ${stream.stream} records skipped as malformed`,
      );
    }
  }
  if (vehiclesWithMissing > 0) {
    caveats.push(`${vehiclesWithMissing} vehicle(s) missing from the position/speed stream`);
  }
  if (overlapCount > 0) {
    caveats.push(`${overlapCount} charging session(s) exceeded station capacity`);
  }
  if (caveats.length === 0) {
    caveats.push('no data-quality issues detected');
  }
  return caveats;
}
