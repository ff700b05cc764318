import { describe, it, expect } from '@jest/globals';
import { MalformedRecordError } from '@simtrace/domain';
import { RunContext } from '../run-context.js';

describe('RunContext', () => {
  it('snapshots every stream in fixed order, including ones never registered', () => {
    const context = new RunContext();
    context.registerStream({ kind: 'vehicle', source: 'realtime_data.csv', recordsRead: 10, malformedCount: 2 });

    const snapshot = context.snapshot();

    expect(snapshot.streams.map((s) => [s.stream, s.source, s.recordsAccepted])).toEqual([
      ['vehicle', 'realtime_data.csv', 8],
      ['battery', null, 0],
      ['trip', null, 0],
      ['charging', null, 0],
    ]);
    expect(snapshot.caveats).toEqual([
      '2 of 10 vehicle records skipped as malformed',
      'battery stream not provided; related metrics are absent',
      'trip stream not provided; related metrics are absent',
      'charging stream not provided; related metrics are absent',
    ]);
  });

  it('keeps the first five malformed examples per stream', () => {
    const context = new RunContext();
    for (let line = 2; line < 10; line++) {
      context.recordMalformed(new MalformedRecordError('trip', line, 'bad'));
    }
    const trip = context.snapshot().streams.find((s) => s.stream === 'trip');
    expect(trip?.malformedExamples.map((e) => e.line)).toEqual([2, 3, 4, 5, 6]);
  });

  it('counts distinct vehicles with missing correlation and records overlaps', () => {
    const context = new RunContext();
    for (const kind of ['vehicle', 'battery', 'trip', 'charging'] as const) {
      context.registerStream({ kind, source: `${kind}.csv`, recordsRead: 1, malformedCount: 0 });
    }
    context.recordMissingCorrelation({ vehicleId: 'V4', stream: 'battery', ts: 6 });
    context.recordMissingCorrelation({ vehicleId: 'V4', stream: 'trip', ts: 9 });
    context.recordOverlap({ stationId: 'S1', ts: 5, concurrency: 2, capacity: 1, vehicleIds: ['A', 'B'] });

    const snapshot = context.snapshot();

    expect(snapshot.vehiclesWithMissingCorrelation).toBe(1);
    expect(snapshot.missingCorrelations).toHaveLength(2);
    expect(snapshot.overlapAnomalies[0]?.type).toBe('OverlapAnomaly');
    expect(snapshot.caveats).toEqual([
      '1 vehicle(s) missing from the position/speed stream',
      '1 charging session(s) exceeded station capacity',
    ]);
  });

  it('says so when nothing is wrong', () => {
    const context = new RunContext();
    for (const kind of ['vehicle', 'battery', 'trip', 'charging'] as const) {
      context.registerStream({ kind, source: `${kind}.csv`, recordsRead: 3, malformedCount: 0 });
    }
    expect(context.snapshot().caveats).toEqual(['no data-quality issues detected']);
  });

  it('tracks peaks', () => {
    const context = new RunContext();
    context.observeActiveVehicles(3);
    context.observeActiveVehicles(1);
    context.observeOpenAggregates(2);
    expect(context.peakActiveVehicles).toBe(3);
    expect(context.snapshot().peakOpenAggregates).toBe(2);
  });
});
