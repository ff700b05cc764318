/**
 * Domain Entity Tests
 *
 * The domain package exports record and aggregate interfaces plus a few pure
 * helpers. These tests verify:
 *   1. Every record kind can be constructed with valid data
 *   2. Ordering keys follow the stream's own time axis (start time for intervals)
 *   3. Stream kinds are listed in the fixed priority order
 */

import { describe, it, expect } from '@jest/globals';

import {
  STREAM_KINDS,
  recordOrderKey,
  streamOf,
  type BatteryState,
  type ChargingEvent,
  type TripSummary,
  type VehicleSample,
  type VehicleAggregate,
  type StationAggregate,
} from '../index.js';

// ─── Factory helpers ──────────────────────────────────────────────────────────

function makeSample(overrides: Partial<VehicleSample> = {}): VehicleSample {
  return { kind: 'vehicle_sample', vehicleId: 'V1', ts: 4, x: 10, y: 20, speed: 12.5, ...overrides };
}

function makeBattery(overrides: Partial<BatteryState> = {}): BatteryState {
  return {
    kind: 'battery_state',
    vehicleId: 'V1',
    ts: 6,
    remainingEnergyWh: 40_000,
    stateOfCharge: 0.8,
    ...overrides,
  };
}

function makeTrip(overrides: Partial<TripSummary> = {}): TripSummary {
  return {
    kind: 'trip_summary',
    vehicleId: 'V1',
    departTs: 3,
    arrivalTs: 90,
    distance: 1200,
    duration: 87,
    waitingTime: 4,
    ...overrides,
  };
}

function makeCharging(overrides: Partial<ChargingEvent> = {}): ChargingEvent {
  return {
    kind: 'charging_event',
    stationId: 'S1',
    vehicleId: 'V2',
    startTs: 5,
    endTs: 8,
    energyDeliveredWh: 12,
    ...overrides,
  };
}

// ─── recordOrderKey ───────────────────────────────────────────────────────────

describe('recordOrderKey', () => {
  it('uses the sample timestamp for point samples', () => {
    expect(recordOrderKey(makeSample({ ts: 4 }))).toBe(4);
    expect(recordOrderKey(makeBattery({ ts: 6 }))).toBe(6);
  });

  it('uses the departure time for trip summaries', () => {
    expect(recordOrderKey(makeTrip({ departTs: 3, arrivalTs: 90 }))).toBe(3);
  });

  it('uses the start time for charging sessions', () => {
    expect(recordOrderKey(makeCharging({ startTs: 5, endTs: 8 }))).toBe(5);
  });
});

// ─── streamOf ─────────────────────────────────────────────────────────────────

describe('streamOf', () => {
  it('maps each record kind to its stream', () => {
    expect(streamOf(makeSample())).toBe('vehicle');
    expect(streamOf(makeBattery())).toBe('battery');
    expect(streamOf(makeTrip())).toBe('trip');
    expect(streamOf(makeCharging())).toBe('charging');
  });
});

describe('STREAM_KINDS', () => {
  it('lists streams in priority order: position, battery, trip, charging', () => {
    expect(STREAM_KINDS).toEqual(['vehicle', 'battery', 'trip', 'charging']);
  });
});

// ─── Aggregates ───────────────────────────────────────────────────────────────

describe('VehicleAggregate', () => {
  it('represents "no data" speed statistics as null', () => {
    const aggregate: VehicleAggregate = {
      vehicleId: 'V9',
      episode: 1,
      vehicleType: null,
      sampleCount: 0,
      speed: null,
      firstSeenTs: null,
      lastSeenTs: null,
      pathDistance: 0,
      distance: 500,
      dwellTime: 0,
      energy: null,
      chargingSessionCount: 0,
      chargingEnergyWh: 0,
      chargingDuration: 0,
      trip: {
        departTs: 0,
        arrivalTs: 50,
        distance: 500,
        duration: 50,
        waitingTime: 0,
        averageSpeed: 10,
        maxSpeed: null,
      },
      finalizedBy: 'trip_summary',
      missingCorrelation: true,
    };
    expect(aggregate.speed).toBeNull();
    expect(aggregate.trip?.distance).toBe(500);
  });
});

describe('StationAggregate', () => {
  it('carries occupancy and overlap figures', () => {
    const station: StationAggregate = {
      stationId: 'S1',
      sessionCount: 2,
      totalEnergyWh: 30,
      occupiedDuration: 7,
      sessionDuration: 8,
      overlapCount: 1,
      peakConcurrency: 2,
      firstSessionStartTs: 0,
      lastSessionEndTs: 7,
      averagePowerW: 13_500,
      throughputPerHour: null,
      averageSocAtStart: null,
      vehicleIds: ['V1', 'V2'],
    };
    expect(station.overlapCount).toBe(1);
    expect(station.vehicleIds).toHaveLength(2);
  });
});
