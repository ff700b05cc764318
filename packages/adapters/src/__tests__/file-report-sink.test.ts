import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { Writable } from 'stream';
import type { ReportFormat, TelemetryReport } from '@simtrace/domain';
import { FileReportSink } from '../fs/file-report-sink.js';

const report: TelemetryReport = {
  generatedAt: '2026-01-01T00:00:00.000Z',
  inputs: { vehicle: 'realtime_data.csv', battery: null, trip: null, charging: null },
  fleet: {
    vehicleCount: 0,
    aggregateCount: 0,
    completedTrips: 0,
    totalDistance: 0,
    totalTripDuration: 0,
    meanTripDuration: null,
    totalWaitingTime: 0,
    speed: null,
    energyConsumedWh: 0,
    energyRegeneratedWh: 0,
    netEnergyWh: 0,
    regenerationRatio: null,
    chargingEnergyWh: 0,
    firstTs: null,
    lastTs: null,
  },
  vehicleTypes: [],
  vehicles: [],
  stations: [],
  timeSeries: [],
  diagnostics: {
    streams: [],
    missingCorrelations: [],
    vehiclesWithMissingCorrelation: 0,
    overlapAnomalies: [],
    peakActiveVehicles: 0,
    peakOpenAggregates: 0,
    caveats: [],
  },
};

const render = (r: TelemetryReport, format: ReportFormat) => `${format}:${r.generatedAt}`;

describe('FileReportSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'report-sink-'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the rendered report to a file, creating parent directories', async () => {
    const target = path.join(dir, 'nested', 'out', 'report.txt');
    const sink = new FileReportSink(target, 'text', render);

    await sink.write(report);

    expect(await readFile(target, 'utf8')).toBe('text:2026-01-01T00:00:00.000Z\n');
  });

  it('writes to the given stdout stream when the destination is "-"', async () => {
    const chunks: string[] = [];
    const out = new Writable({
      write(chunk, _encoding, callback) {
        chunks.push(String(chunk));
        callback();
      },
    });
    const sink = new FileReportSink('-', 'json', render, out);

    await sink.write(report);

    expect(chunks.join('')).toBe('json:2026-01-01T00:00:00.000Z\n');
  });
});
