import { describe, it, expect } from '@jest/globals';

import {
  AnalysisAbortedError,
  ConfigError,
  MalformedRecordError,
  StreamCorruptError,
  TelemetryError,
  isTelemetryError,
  type RunDiagnostics,
} from '../index.js';

const EMPTY_DIAGNOSTICS: RunDiagnostics = {
  streams: [],
  missingCorrelations: [],
  vehiclesWithMissingCorrelation: 0,
  overlapAnomalies: [],
  peakActiveVehicles: 0,
  peakOpenAggregates: 0,
  caveats: [],
};

describe('telemetry errors', () => {
  it('MalformedRecordError names the stream and line', () => {
    const err = new MalformedRecordError('battery', 12, 'speed_ms: missing');
    expect(err.code).toBe('MALFORMED_RECORD');
    expect(err.name).toBe('MalformedRecordError');
    expect(err.message).toBe('battery stream, line 12: speed_ms: missing');
    expect(err.line).toBe(12);
  });

  it('StreamCorruptError keeps its cause', () => {
    const cause = new MalformedRecordError('vehicle', 3, 'bad');
    const err = new StreamCorruptError('vehicle', 'too many malformed records', { cause });
    expect(err.code).toBe('STREAM_CORRUPT');
    expect(err.message).toBe('vehicle stream corrupt: too many malformed records');
    expect(err.cause).toBe(cause);
    expect(err).toBeInstanceOf(TelemetryError);
    expect(err).toBeInstanceOf(Error);
  });

  it('AnalysisAbortedError carries the partial diagnostics', () => {
    const err = new AnalysisAbortedError('cancelled', EMPTY_DIAGNOSTICS);
    expect(err.code).toBe('ANALYSIS_ABORTED');
    expect(err.message).toBe('analysis aborted: cancelled');
    expect(err.diagnostics).toBe(EMPTY_DIAGNOSTICS);
  });

  it('ConfigError lists every issue', () => {
    const err = new ConfigError([
      { path: 'REPORT_FORMAT', message: 'invalid' },
      { path: 'STATION_CAPACITY', message: 'too small' },
    ]);
    expect(err.message).toBe('invalid configuration: REPORT_FORMAT: invalid; STATION_CAPACITY: too small');
  });

  it('isTelemetryError distinguishes domain errors from plain errors', () => {
    expect(isTelemetryError(new StreamCorruptError('trip', 'x'))).toBe(true);
    expect(isTelemetryError(new Error('x'))).toBe(false);
    expect(isTelemetryError('x')).toBe(false);
  });
});
