/**
 * Analyzer configuration, read from the environment.
 *
 * Env vars:
 *   TELEMETRY_DIR            — directory holding the default stream files (default: .)
 *   VEHICLE_STREAM_PATH      — position/speed samples (default: $TELEMETRY_DIR/realtime_data.csv)
 *   BATTERY_STREAM_PATH      — battery samples (default: $TELEMETRY_DIR/battery_data.csv)
 *   TRIP_STREAM_PATH         — trip summaries (default: $TELEMETRY_DIR/trip_summary.csv)
 *   CHARGING_STREAM_PATH     — charging sessions (default: $TELEMETRY_DIR/charging_events.csv)
 *   MAX_MALFORMED_RECORDS    — per-stream malformed-record threshold (default: 100)
 *   REPORT_PATH              — report file, or - for stdout (default: -)
 *   REPORT_FORMAT            — text | json (default: text)
 *   TIME_SERIES_BUCKET_SEC   — time-series bucket width (default: 60)
 *   STATION_CAPACITY         — modelled slots per charging station (default: 1)
 *   STOPPED_SPEED_THRESHOLD  — m/s below which a vehicle is dwelling (default: 0.1)
 */

import path from 'path';
import { z } from 'zod';
import { ConfigError, type AnalysisRequest } from '@simtrace/domain';

export const DEFAULT_STREAM_FILES = {
  vehicle: 'realtime_data.csv',
  battery: 'battery_data.csv',
  trip: 'trip_summary.csv',
  charging: 'charging_events.csv',
} as const;

const optionalPath = z.string().trim().min(1).optional();

const envSchema = z.object({
  TELEMETRY_DIR: z.string().trim().min(1).default('.'),
  VEHICLE_STREAM_PATH: optionalPath,
  BATTERY_STREAM_PATH: optionalPath,
  TRIP_STREAM_PATH: optionalPath,
  CHARGING_STREAM_PATH: optionalPath,
  MAX_MALFORMED_RECORDS: z.coerce.number().int().min(0).default(100),
  REPORT_PATH: z.string().trim().min(1).default('-'),
  REPORT_FORMAT: z.enum(['text', 'json']).default('text'),
  TIME_SERIES_BUCKET_SEC: z.coerce.number().positive().default(60),
  STATION_CAPACITY: z.coerce.number().int().min(1).default(1),
  STOPPED_SPEED_THRESHOLD: z.coerce.number().min(0).default(0.1),
});

export type AnalyzerConfig = Omit<AnalysisRequest, 'signal'>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AnalyzerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
  const cfg = parsed.data;
  const inDir = (file: string) => path.join(cfg.TELEMETRY_DIR, file);

  return {
    streams: {
      vehicle: cfg.VEHICLE_STREAM_PATH ?? inDir(DEFAULT_STREAM_FILES.vehicle),
      battery: cfg.BATTERY_STREAM_PATH ?? inDir(DEFAULT_STREAM_FILES.battery),
      trip: cfg.TRIP_STREAM_PATH ?? inDir(DEFAULT_STREAM_FILES.trip),
      charging: cfg.CHARGING_STREAM_PATH ?? inDir(DEFAULT_STREAM_FILES.charging),
    },
    settings: {
      maxMalformedRecords: cfg.MAX_MALFORMED_RECORDS,
      timeSeriesBucketSec: cfg.TIME_SERIES_BUCKET_SEC,
      stationCapacity: cfg.STATION_CAPACITY,
      stoppedSpeedThreshold: cfg.STOPPED_SPEED_THRESHOLD,
    },
    report: { path: cfg.REPORT_PATH, format: cfg.REPORT_FORMAT },
  };
}
