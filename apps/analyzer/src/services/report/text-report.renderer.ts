import type { TelemetryReport } from '@simtrace/domain';

const NO_DATA = '-';

/** Integers print as-is, other numbers with `digits` decimals, null as `-`. */
export function formatNumber(value: number | null | undefined, digits = 2): string {
  if (value === null || value === undefined) return NO_DATA;
  return Number.isInteger(value) ? String(value) : value.toFixed(digits);
}

function percent(fraction: number | null | undefined): string {
  return fraction === null || fraction === undefined ? NO_DATA : (fraction * 100).toFixed(1);
}

/** Fixed-width table: first column left-aligned, the rest right-aligned. */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)));
  const line = (cells: readonly string[]) =>
    cells
      .map((cell, i) => (i === 0 ? cell.padEnd(widths[i] ?? 0) : cell.padStart(widths[i] ?? 0)))
      .join('  ')
      .trimEnd();

  return [line(headers), widths.map((w) => '-'.repeat(w)).join('  '), ...rows.map(line)];
}

function section(title: string): string[] {
  return ['', title, '='.repeat(title.length)];
}

export function renderTextReport(report: TelemetryReport): string {
  const { fleet, diagnostics } = report;
  const out: string[] = ['SIMULATION TELEMETRY REPORT', `generated ${report.generatedAt}`];

  out.push(...section('FLEET SUMMARY'));
  out.push(
    ...formatTable(
      ['Metric', 'Value', 'Unit'],
      [
        ['Vehicles', formatNumber(fleet.vehicleCount), 'count'],
        ['Completed trips', formatNumber(fleet.completedTrips), 'count'],
        ['Total distance', formatNumber(fleet.totalDistance / 1000), 'km'],
        ['Mean trip duration', formatNumber(fleet.meanTripDuration), 's'],
        ['Total waiting time', formatNumber(fleet.totalWaitingTime), 's'],
        ['Mean speed', formatNumber(fleet.speed?.mean), 'm/s'],
        ['Max speed', formatNumber(fleet.speed?.max), 'm/s'],
        ['Energy consumed', formatNumber(fleet.energyConsumedWh / 1000), 'kWh'],
        ['Energy regenerated', formatNumber(fleet.energyRegeneratedWh / 1000), 'kWh'],
        ['Net energy', formatNumber(fleet.netEnergyWh / 1000), 'kWh'],
        ['Regeneration ratio', percent(fleet.regenerationRatio), '%'],
        ['Energy charged', formatNumber(fleet.chargingEnergyWh / 1000), 'kWh'],
        ['Simulation span', formatNumber(fleet.firstTs), `to ${formatNumber(fleet.lastTs)} s`],
      ],
    ),
  );

  out.push(...section('VEHICLES'));
  out.push(
    ...formatTable(
      ['Vehicle', 'Ep', 'Type', 'Samples', 'Mean m/s', 'Max m/s', 'StdDev', 'Dist m', 'Trip s', 'Dwell s', 'Net Wh', 'Wh/km', 'SoC %', 'Charges', 'Closed by'],
      report.vehicles.map((v) => [
        v.missingCorrelation ? `${v.vehicleId}*` : v.vehicleId,
        String(v.episode),
        v.vehicleType ?? NO_DATA,
        String(v.sampleCount),
        formatNumber(v.speed?.mean),
        formatNumber(v.speed?.max),
        formatNumber(v.speed?.stdDev),
        formatNumber(v.distance, 1),
        formatNumber(v.trip?.duration),
        formatNumber(v.dwellTime),
        formatNumber(v.energy?.netEnergyWh, 1),
        formatNumber(v.energy?.energyPerKmWh, 1),
        percent(v.energy?.finalSoc),
        String(v.chargingSessionCount),
        v.finalizedBy === 'trip_summary' ? 'trip' : 'input end',
      ]),
    ),
  );
  if (report.vehicles.some((v) => v.missingCorrelation)) {
    out.push('* not found in the position/speed stream at or before another stream referenced it');
  }

  out.push(...section('CHARGING STATIONS'));
  if (report.stations.length === 0) {
    out.push('no charging sessions');
  } else {
    out.push(
      ...formatTable(
        ['Station', 'Sessions', 'Energy Wh', 'Occupied s', 'Overlaps', 'Peak', 'Avg W', 'Per hour', 'Avg SoC %'],
        report.stations.map((s) => [
          s.stationId,
          String(s.sessionCount),
          formatNumber(s.totalEnergyWh, 1),
          formatNumber(s.occupiedDuration),
          String(s.overlapCount),
          String(s.peakConcurrency),
          formatNumber(s.averagePowerW, 1),
          formatNumber(s.throughputPerHour),
          percent(s.averageSocAtStart),
        ]),
      ),
    );
  }

  out.push(...section('VEHICLE TYPES'));
  out.push(
    ...formatTable(
      ['Type', 'Vehicles', 'Samples', 'Mean m/s', 'Max m/s', 'Dist km', 'Waiting s'],
      report.vehicleTypes.map((t) => [
        t.vehicleType,
        String(t.vehicleCount),
        String(t.sampleCount),
        formatNumber(t.meanSpeed),
        formatNumber(t.maxSpeed),
        formatNumber(t.totalDistance / 1000),
        formatNumber(t.totalWaitingTime),
      ]),
    ),
  );

  out.push(...section('TIME SERIES'));
  out.push(
    ...formatTable(
      ['From s', 'Samples', 'Vehicles', 'Mean m/s', 'Charges'],
      report.timeSeries.map((b) => [
        formatNumber(b.bucketStartTs),
        String(b.sampleCount),
        String(b.activeVehicles),
        formatNumber(b.meanSpeed),
        String(b.chargingSessionsStarted),
      ]),
    ),
  );

  out.push(...section('DATA QUALITY'));
  out.push(
    ...formatTable(
      ['Stream', 'Read', 'Accepted', 'Malformed', 'Source'],
      diagnostics.streams.map((s) => [
        s.stream,
        String(s.recordsRead),
        String(s.recordsAccepted),
        String(s.malformedCount),
        s.source ?? 'not provided',
      ]),
    ),
  );
  for (const stream of diagnostics.streams) {
    for (const example of stream.malformedExamples) {
      out.push(`  ${stream.stream} line ${example.line}: ${example.reason}`);
    }
  }
  for (const missing of diagnostics.missingCorrelations) {
    out.push(`MissingCorrelation: vehicle ${missing.vehicleId} in ${missing.stream} stream at t=${formatNumber(missing.ts)}`);
  }
  for (const overlap of diagnostics.overlapAnomalies) {
    out.push(
      `OverlapAnomaly: station ${overlap.stationId} at t=${formatNumber(overlap.ts)}: ` +
        `${overlap.concurrency} sessions for capacity ${overlap.capacity} (${overlap.vehicleIds.join(', ')})`,
    );
  }
  out.push(`Peak active vehicles: ${diagnostics.peakActiveVehicles}`);
  out.push('Caveats:');
  for (const caveat of diagnostics.caveats) out.push(`  - ${caveat}`);

  return `${out.join('\n')}\n`;
}
