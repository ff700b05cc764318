/**
 * CsvStreamReader Tests
 *
 * Tests verify:
 *  - rows are validated and typed per stream schema
 *  - malformed rows are skipped, counted and reported, up to the threshold
 *  - header problems and read failures surface as StreamCorruptError
 *  - the source is released on completion, early exit and close()
 *  - a stream can be consumed only once
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { MalformedRecordError, StreamCorruptError } from '@simtrace/domain';
import { csvFromLines, openCsvFile } from '../csv/csv-stream-reader.js';

const VEHICLE_HEADER = 'timestep_sec,vehicle_id,speed_ms,x_position_m,y_position_m';

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of iterable) out.push(item);
  return out;
}

beforeEach(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

// ─────────────────────────────────────────────────────────────────────────────
// Valid rows
// ─────────────────────────────────────────────────────────────────────────────

describe('CsvStreamReader — valid rows', () => {
  it('parses typed vehicle rows in file order', async () => {
    const reader = csvFromLines('vehicle', [VEHICLE_HEADER, '0,V1,10,0,0', '1,V1,20.5,10,2'], {
      maxMalformedRecords: 0,
    });

    const rows = await collect(reader.records());

    expect(rows).toHaveLength(2);
    expect(rows[0]).toMatchObject({ timestep_sec: 0, vehicle_id: 'V1', speed_ms: 10, x_position_m: 0, y_position_m: 0 });
    expect(rows[1]).toMatchObject({ timestep_sec: 1, speed_ms: 20.5, x_position_m: 10, y_position_m: 2 });
    expect(reader.recordsRead).toBe(2);
    expect(reader.malformedCount).toBe(0);
    expect(reader.source).toBe('memory:vehicle');
  });

  it('strips a byte order mark and skips blank lines', async () => {
    const reader = csvFromLines('vehicle', [`\uFEFF${VEHICLE_HEADER}`, '', '0,V1,10,0,0', '   '], {
      maxMalformedRecords: 0,
    });
    const rows = await collect(reader.records());
    expect(rows).toHaveLength(1);
    expect(reader.recordsRead).toBe(1);
  });

  it('reads optional columns when the header carries them', async () => {
    const reader = csvFromLines(
      'battery',
      [
        'timestep_sec,vehicle_id,actualBatteryCapacity_Wh,maximumBatteryCapacity_Wh,chargingStationId',
        '3,V1,40000,50000,NULL',
      ],
      { maxMalformedRecords: 0 },
    );
    const [row] = await collect(reader.records());
    expect(row).toMatchObject({
      timestep_sec: 3,
      actualBatteryCapacity_Wh: 40000,
      maximumBatteryCapacity_Wh: 50000,
      chargingStationId: 'NULL',
    });
  });

  it('treats an empty source as an empty stream', async () => {
    const reader = csvFromLines('trip', [], { maxMalformedRecords: 0 });
    expect(await collect(reader.records())).toEqual([]);
    expect(reader.recordsRead).toBe(0);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Malformed rows
// ─────────────────────────────────────────────────────────────────────────────

describe('CsvStreamReader — malformed rows', () => {
  it('skips and reports a row that fails its schema', async () => {
    const seen: MalformedRecordError[] = [];
    const reader = csvFromLines('vehicle', [VEHICLE_HEADER, '0,V1,10,0,0', '1,V1,abc,0,0', '2,V1,20,5,0'], {
      maxMalformedRecords: 5,
      onMalformed: (error) => seen.push(error),
    });

    const rows = await collect(reader.records());

    expect(rows.map((r) => r.timestep_sec)).toEqual([0, 2]);
    expect(reader.recordsRead).toBe(3);
    expect(reader.malformedCount).toBe(1);
    expect(seen).toHaveLength(1);
    expect(seen[0]?.line).toBe(3);
    expect(seen[0]?.reason).toBe('speed_ms: not a number: "abc"');
  });

  it('reports missing values, negative speeds and wrong field counts', async () => {
    const reasons: string[] = [];
    const reader = csvFromLines(
      'vehicle',
      [VEHICLE_HEADER, '0,V1,,0,0', '1,V1,-3,0,0', '2,V1,10,0'],
      { maxMalformedRecords: 10, onMalformed: (error) => reasons.push(error.reason) },
    );

    await collect(reader.records());

    expect(reasons).toEqual(['speed_ms: missing', 'speed_ms: must be >= 0', 'expected 5 fields, got 4']);
  });

  it('rejects a trip that arrives before it departs', async () => {
    const reasons: string[] = [];
    const reader = csvFromLines(
      'trip',
      ['vehicle_id,depart_sec,arrival_sec,route_length_m', 'V1,10,5,100'],
      { maxMalformedRecords: 10, onMalformed: (error) => reasons.push(error.reason) },
    );

    expect(await collect(reader.records())).toEqual([]);
    expect(reasons).toEqual(['arrival_sec: arrival 5 before departure 10']);
  });

  it('rejects a battery row with no way to derive state of charge', async () => {
    const reader = csvFromLines(
      'battery',
      ['timestep_sec,vehicle_id,actualBatteryCapacity_Wh', '0,V1,100'],
      { maxMalformedRecords: 10 },
    );
    expect(await collect(reader.records())).toEqual([]);
    expect(reader.malformedCount).toBe(1);
  });

  it('fails the stream once malformed rows exceed the threshold', async () => {
    const reader = csvFromLines('vehicle', [VEHICLE_HEADER, 'x,V1,1,0,0', 'y,V1,1,0,0', '2,V1,1,0,0'], {
      maxMalformedRecords: 1,
    });

    const run = collect(reader.records());

    await expect(run).rejects.toThrow(StreamCorruptError);
    await expect(run).rejects.toThrow('vehicle stream corrupt: 2 malformed records exceed the threshold of 1');
  });

  it('tolerates exactly the threshold', async () => {
    const reader = csvFromLines('vehicle', [VEHICLE_HEADER, 'x,V1,1,0,0', '2,V1,1,0,0'], {
      maxMalformedRecords: 1,
    });
    expect(await collect(reader.records())).toHaveLength(1);
  });

  it('logs the first five malformed rows and then only a single notice', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const bad = Array.from({ length: 8 }, (_, i) => `${i},V1,bad,0,0`);
    const reader = csvFromLines('vehicle', [VEHICLE_HEADER, ...bad], { maxMalformedRecords: 100 });

    await collect(reader.records());

    expect(reader.malformedCount).toBe(8);
    expect(warn).toHaveBeenCalledTimes(6);
    expect(warn).toHaveBeenLastCalledWith('[stream-reader:vehicle] further malformed records are counted but not logged');
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Header problems
// ─────────────────────────────────────────────────────────────────────────────

describe('CsvStreamReader — header', () => {
  it('fails when required columns are missing', async () => {
    const reader = csvFromLines('vehicle', ['timestep_sec,vehicle_id,speed_ms', '0,V1,1'], {
      maxMalformedRecords: 10,
    });
    await expect(collect(reader.records())).rejects.toThrow(
      'vehicle stream corrupt: header is missing column(s): x_position_m, y_position_m',
    );
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Lifecycle
// ─────────────────────────────────────────────────────────────────────────────

describe('CsvStreamReader — lifecycle', () => {
  it('can be consumed only once', async () => {
    const reader = csvFromLines('vehicle', [VEHICLE_HEADER, '0,V1,1,0,0'], { maxMalformedRecords: 0 });
    await collect(reader.records());
    await expect(collect(reader.records())).rejects.toThrow('has already been consumed');
  });

  it('releases the source when the consumer stops early', async () => {
    let released = false;
    function* lines(): Generator<string> {
      try {
        yield VEHICLE_HEADER;
        for (let t = 0; t < 1000; t++) yield `${t},V1,1,0,0`;
      } finally {
        released = true;
      }
    }
    const reader = csvFromLines('vehicle', lines(), { maxMalformedRecords: 0 });

    for await (const row of reader.records()) {
      if (row.timestep_sec === 2) break;
    }

    expect(released).toBe(true);
    expect(reader.recordsRead).toBe(3);
  });

  it('yields nothing once closed', async () => {
    const reader = csvFromLines('vehicle', [VEHICLE_HEADER, '0,V1,1,0,0'], { maxMalformedRecords: 0 });
    await reader.close();
    await reader.close();
    expect(await collect(reader.records())).toEqual([]);
  });

  it('turns a source failure into a corrupt stream', async () => {
    async function* failing(): AsyncGenerator<string> {
      yield VEHICLE_HEADER;
      throw new Error('disk unplugged');
    }
    const reader = csvFromLines('vehicle', failing(), { maxMalformedRecords: 0 });
    await expect(collect(reader.records())).rejects.toThrow('vehicle stream corrupt: read failed: disk unplugged');
  });

  it('takes the message of a failure that is not an Error instance', async () => {
    async function* failing(): AsyncGenerator<string> {
      yield VEHICLE_HEADER;
      throw { code: 'EIO', message: 'i/o error' };
    }
    const reader = csvFromLines('vehicle', failing(), { maxMalformedRecords: 0 });
    await expect(collect(reader.records())).rejects.toThrow('vehicle stream corrupt: read failed: i/o error');
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Files
// ─────────────────────────────────────────────────────────────────────────────

describe('openCsvFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'stream-reader-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a CSV file with CRLF line endings', async () => {
    const file = path.join(dir, 'charging_events.csv');
    await writeFile(
      file,
      'station_id,vehicle_id,start_sec,end_sec,energy_delivered_Wh\r\nS1,V2,5,8,12\r\nS1,V3,9,10,4\r\n',
    );

    const reader = openCsvFile('charging', file, { maxMalformedRecords: 0 });
    const rows = await collect(reader.records());

    expect(rows).toEqual([
      { station_id: 'S1', vehicle_id: 'V2', start_sec: 5, end_sec: 8, energy_delivered_Wh: 12 },
      { station_id: 'S1', vehicle_id: 'V3', start_sec: 9, end_sec: 10, energy_delivered_Wh: 4 },
    ]);
    expect(reader.source).toBe(file);
  });

  it('fails with a corrupt stream when the file cannot be opened', async () => {
    const reader = openCsvFile('vehicle', path.join(dir, 'missing.csv'), { maxMalformedRecords: 0 });
    const run = collect(reader.records());
    await expect(run).rejects.toThrow(StreamCorruptError);
    await expect(run).rejects.toThrow(/read failed: ENOENT/);
  });
});
