import {
  AnalysisAbortedError,
  StreamCorruptError,
  type AnalysisResult,
  type AnalysisSettings,
  type StreamLocations,
  type TelemetryStreamPort,
  type VehicleAggregate,
} from '@simtrace/domain';
import type {
  CsvStreamReaderOptions,
  RawBatteryRow,
  RawChargingRow,
  RawTripRow,
  RawVehicleRow,
} from '@simtrace/adapters';
import { CorrelationIndex } from '../correlation/correlation-index.js';
import { normalizeStream } from '../ingest/record-normalizer.js';
import { MetricsAggregator } from '../metrics/metrics-aggregator.js';
import { assembleReport } from '../report/report-assembler.js';
import { StationUtilizationTracker } from '../stations/station-utilization-tracker.js';
import { RunContext } from './run-context.js';

const log = {
  info: (msg: string, extra?: Record<string, unknown>) =>
    console.log(`[pipeline] ${msg}`, extra ? JSON.stringify(extra) : ''),
  error: (msg: string, extra?: Record<string, unknown>) =>
    console.error(`[pipeline] ${msg}`, extra ? JSON.stringify(extra) : ''),
};

/** The position/speed stream is mandatory; the others may be absent. */
export interface TelemetryStreams {
  vehicle: TelemetryStreamPort<RawVehicleRow>;
  battery?: TelemetryStreamPort<RawBatteryRow>;
  trip?: TelemetryStreamPort<RawTripRow>;
  charging?: TelemetryStreamPort<RawChargingRow>;
}

export interface RunOptions {
  signal?: AbortSignal;
  generatedAt?: Date;
}

/**
 * AnalysisPipeline
 *
 * One run over one set of streams: readers → normalizer → correlation index →
 * metrics aggregator and station tracker → report. The run context is created
 * with the pipeline so readers can report malformed rows into it.
 *
 * A corrupt stream or an aborted signal stops the merge, releases every
 * reader and discards partial aggregates; the caller gets an
 * AnalysisAbortedError carrying the diagnostics gathered so far.
 */
export class AnalysisPipeline {
  readonly context = new RunContext();
  private ran = false;

  constructor(private readonly settings: AnalysisSettings) {}

  /** Options for readers feeding this pipeline. */
  readerOptions(): CsvStreamReaderOptions {
    return {
      maxMalformedRecords: this.settings.maxMalformedRecords,
      onMalformed: (error) => this.context.recordMalformed(error),
    };
  }

  async run(streams: TelemetryStreams, options: RunOptions = {}): Promise<AnalysisResult> {
    if (this.ran) throw new Error('an analysis pipeline runs once; create a new one per run');
    this.ran = true;

    const { signal } = options;
    const readers = [streams.vehicle, streams.battery, streams.trip, streams.charging].filter(
      (reader): reader is NonNullable<typeof reader> => reader !== undefined,
    );
    for (const reader of readers) this.context.registerStream(reader);

    const inputs: StreamLocations = {
      vehicle: streams.vehicle.source,
      battery: streams.battery?.source ?? null,
      trip: streams.trip?.source ?? null,
      charging: streams.charging?.source ?? null,
    };

    const index = new CorrelationIndex(
      {
        vehicle: normalizeStream('vehicle', streams.vehicle),
        battery: streams.battery && normalizeStream('battery', streams.battery),
        trip: streams.trip && normalizeStream('trip', streams.trip),
        charging: streams.charging && normalizeStream('charging', streams.charging),
      },
      this.context,
    );
    const stations = new StationUtilizationTracker(this.context, this.settings.stationCapacity);
    const aggregator = new MetricsAggregator(this.context, stations, {
      stoppedSpeedThreshold: this.settings.stoppedSpeedThreshold,
      timeSeriesBucketSec: this.settings.timeSeriesBucketSec,
    });

    log.info('run started', inputs);
    const finalized: VehicleAggregate[] = [];

    try {
      for await (const item of index.correlate()) {
        signal?.throwIfAborted();
        const aggregate = aggregator.consume(item);
        if (aggregate) finalized.push(aggregate);
      }
      signal?.throwIfAborted();

      finalized.push(...aggregator.finish());
      const report = assembleReport({
        inputs,
        fleet: aggregator.fleetSummary(),
        vehicleTypes: aggregator.vehicleTypeSummaries(),
        vehicles: finalized,
        stations: stations.finish(),
        timeSeries: aggregator.timeSeriesBuckets(),
        diagnostics: this.context.snapshot(),
        generatedAt: options.generatedAt,
      });

      log.info('run completed', {
        vehicles: report.vehicles.length,
        stations: report.stations.length,
        missingCorrelations: report.diagnostics.missingCorrelations.length,
        overlapAnomalies: report.diagnostics.overlapAnomalies.length,
        peakActiveVehicles: report.diagnostics.peakActiveVehicles,
      });
      return { report };
    } catch (err) {
      if (err instanceof StreamCorruptError || signal?.aborted) {
        const reason = err instanceof StreamCorruptError ? err.message : 'cancelled';
        log.error('run aborted; partial aggregates discarded', { reason, discarded: finalized.length });
        throw new AnalysisAbortedError(reason, this.context.snapshot(), { cause: err });
      }
      throw err;
    } finally {
      await Promise.all(readers.map((reader) => reader.close()));
    }
  }
}
