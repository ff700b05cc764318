import { access } from 'fs/promises';
import {
  ConfigError,
  type AnalysisRequest,
  type AnalysisResult,
  type StreamKind,
  type TelemetryAnalysisPort,
} from '@simtrace/domain';
import { FileReportSink, openCsvFile, type CsvStreamReaderOptions, type TelemetryCsvReader } from '@simtrace/adapters';
import { renderReport } from '../report/report-assembler.js';
import { AnalysisPipeline } from './analysis-pipeline.js';

async function isReadable(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Opens an optional stream. A configured file that does not exist is treated
 * as an absent stream; the report's caveats say so.
 */
async function openOptional<K extends Exclude<StreamKind, 'vehicle'>>(
  kind: K,
  path: string | null,
  options: CsvStreamReaderOptions,
): Promise<TelemetryCsvReader<K> | undefined> {
  if (path === null) return undefined;
  if (!(await isReadable(path))) {
    console.warn(`[analysis] ${kind} stream not found at ${path}; continuing without it`);
    return undefined;
  }
  return openCsvFile(kind, path, options);
}

/** Analysis over the four CSV files of a simulation run, writing the report through a file sink. */
export class FileTelemetryAnalysis implements TelemetryAnalysisPort {
  async analyze(request: AnalysisRequest): Promise<AnalysisResult> {
    const { streams, settings, report, signal } = request;
    if (streams.vehicle === null) {
      throw new ConfigError([{ path: 'VEHICLE_STREAM_PATH', message: 'the position/speed stream is required' }]);
    }

    const pipeline = new AnalysisPipeline(settings);
    const options = pipeline.readerOptions();

    const result = await pipeline.run(
      {
        vehicle: openCsvFile('vehicle', streams.vehicle, options),
        battery: await openOptional('battery', streams.battery, options),
        trip: await openOptional('trip', streams.trip, options),
        charging: await openOptional('charging', streams.charging, options),
      },
      { signal },
    );

    const sink = new FileReportSink(report.path, report.format, renderReport);
    await sink.write(result.report);
    return result;
  }
}
