import { createReadStream } from 'fs';
import { createInterface } from 'readline';
import {
  MalformedRecordError,
  StreamCorruptError,
  TelemetryError,
  type StreamKind,
  type TelemetryStreamPort,
} from '@simtrace/domain';
import { splitCsvLine, stripBom, toRow } from './csv-line.js';
import { REQUIRED_COLUMNS, ROW_SCHEMAS, describeIssues, type RawRowByStream, type RowSchema } from './row-schemas.js';

/** Malformed rows logged per stream before the rest are only counted. */
const LOGGED_MALFORMED_PER_STREAM = 5;

/** Errors raised by Node's fs may come from another realm, so no `instanceof Error` here. */
function messageOf(err: unknown): string {
  return typeof err === 'object' && err !== null && 'message' in err ? String(err.message) : String(err);
}

export type LineSource = AsyncIterable<string> | Iterable<string>;

interface OpenedLines {
  lines: LineSource;
  release: () => void;
  /** Error raised by the underlying source while lines were being read. */
  failure: () => unknown;
}

export interface CsvStreamReaderOptions {
  maxMalformedRecords: number;
  onMalformed?: (error: MalformedRecordError) => void;
}

type ParsedRow<T> = { ok: true; value: T } | { ok: false; error: MalformedRecordError };

/**
 * CsvStreamReader
 *
 * Reads one telemetry stream from CSV, one row at a time. Nothing is opened
 * until `records()` is iterated, and the source is released as soon as the
 * iteration ends, for whatever reason.
 *
 * Rows that fail their schema are skipped and counted. Once the count goes
 * past `maxMalformedRecords` the stream fails with `StreamCorruptError`.
 */
export class CsvStreamReader<T> implements TelemetryStreamPort<T> {
  private consumed = false;
  private closed = false;
  private release: (() => void) | null = null;
  private read = 0;
  private malformed = 0;

  constructor(
    readonly kind: StreamKind,
    readonly source: string,
    private readonly schema: RowSchema<T>,
    private readonly open: () => OpenedLines,
    private readonly options: CsvStreamReaderOptions,
  ) {}

  get recordsRead(): number {
    return this.read;
  }

  get malformedCount(): number {
    return this.malformed;
  }

  async *records(): AsyncGenerator<T, void, undefined> {
    if (this.consumed) {
      throw new Error(`${this.kind} stream from ${this.source} has already been consumed`);
    }
    this.consumed = true;
    if (this.closed) return;

    const opened = this.open();
    this.release = opened.release;

    let header: string[] | null = null;
    let lineNo = 0;
    try {
      for await (const raw of this.guard(opened.lines)) {
        lineNo++;
        const line = lineNo === 1 ? stripBom(raw) : raw;
        if (line.trim() === '') continue;

        if (header === null) {
          header = this.parseHeader(line);
          continue;
        }

        this.read++;
        const parsed = this.parseRow(header, line, lineNo);
        if (parsed.ok) {
          yield parsed.value;
        } else {
          this.reject(parsed.error);
        }
      }

      const failure = opened.failure();
      if (failure !== undefined) {
        throw new StreamCorruptError(this.kind, `read failed: ${messageOf(failure)}`, { cause: failure });
      }
    } finally {
      await this.close();
    }
  }

  /** Surface source failures (unreadable file, broken pipe) as a corrupt stream. */
  private async *guard(lines: LineSource): AsyncGenerator<string, void, undefined> {
    try {
      yield* lines;
    } catch (err) {
      if (err instanceof TelemetryError) throw err;
      throw new StreamCorruptError(this.kind, `read failed: ${messageOf(err)}`, { cause: err });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.release?.();
    this.release = null;
  }

  private parseHeader(line: string): string[] {
    const names = splitCsvLine(line)?.map((name) => name.trim());
    if (!names) {
      throw new StreamCorruptError(this.kind, 'header row has an unterminated quoted field');
    }
    const missing = REQUIRED_COLUMNS[this.kind].filter((column) => !names.includes(column));
    if (missing.length > 0) {
      throw new StreamCorruptError(this.kind, `header is missing column(s): ${missing.join(', ')}`);
    }
    return names;
  }

  private parseRow(header: readonly string[], line: string, lineNo: number): ParsedRow<T> {
    const fields = splitCsvLine(line);
    if (fields === null) {
      return { ok: false, error: new MalformedRecordError(this.kind, lineNo, 'unterminated quoted field') };
    }
    if (fields.length !== header.length) {
      return {
        ok: false,
        error: new MalformedRecordError(
          this.kind,
          lineNo,
          `expected ${header.length} fields, got ${fields.length}`,
        ),
      };
    }

    const result = this.schema.safeParse(toRow(header, fields));
    if (!result.success) {
      return { ok: false, error: new MalformedRecordError(this.kind, lineNo, describeIssues(result.error)) };
    }
    return { ok: true, value: result.data };
  }

  private reject(error: MalformedRecordError): void {
    this.malformed++;
    this.options.onMalformed?.(error);

    if (this.malformed <= LOGGED_MALFORMED_PER_STREAM) {
      console.warn(`[stream-reader:${this.kind}] skipping malformed record: ${error.message}`);
    } else if (this.malformed === LOGGED_MALFORMED_PER_STREAM + 1) {
      console.warn(`[stream-reader:${this.kind}] further malformed records are counted but not logged`);
    }

    if (this.malformed > this.options.maxMalformedRecords) {
      throw new StreamCorruptError(
        this.kind,
        `${this.malformed} malformed records exceed the threshold of ${this.options.maxMalformedRecords}`,
        { cause: error },
      );
    }
  }
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export type TelemetryCsvReader<K extends StreamKind> = CsvStreamReader<RawRowByStream[K]>;

/** Read a stream from a CSV file. The file is opened on first iteration. */
export function openCsvFile<K extends StreamKind>(
  kind: K,
  path: string,
  options: CsvStreamReaderOptions,
): TelemetryCsvReader<K> {
  const open = (): OpenedLines => {
    let failure: unknown;
    const input = createReadStream(path, { encoding: 'utf8' });
    const lines = createInterface({ input, crlfDelay: Infinity });
    input.on('error', (err) => {
      failure = err;
      lines.close();
    });
    return {
      lines,
      release: () => {
        lines.close();
        input.destroy();
      },
      failure: () => failure,
    };
  };
  return new CsvStreamReader<RawRowByStream[K]>(kind, path, ROW_SCHEMAS[kind], open, options);
}

/** Read a stream from in-memory or generated lines (first line is the header). */
export function csvFromLines<K extends StreamKind>(
  kind: K,
  lines: LineSource,
  options: CsvStreamReaderOptions,
  label = `memory:${kind}`,
): TelemetryCsvReader<K> {
  const open = (): OpenedLines => ({
    lines,
    release: () => undefined,
    failure: () => undefined,
  });
  return new CsvStreamReader<RawRowByStream[K]>(kind, label, ROW_SCHEMAS[kind], open, options);
}
