import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { ReportFormat, ReportSinkPort, TelemetryReport } from '@simtrace/domain';

export type ReportRenderer = (report: TelemetryReport, format: ReportFormat) => string;

/** Destination that means "write to standard output". */
export const STDOUT_DESTINATION = '-';

/**
 * Writes a rendered report to a file, creating parent directories, or to
 * stdout when the destination is `-`.
 */
export class FileReportSink implements ReportSinkPort {
  constructor(
    readonly destination: string,
    readonly format: ReportFormat,
    private readonly render: ReportRenderer,
    private readonly stdout: NodeJS.WritableStream = process.stdout,
  ) {}

  async write(report: TelemetryReport): Promise<void> {
    const body = this.render(report, this.format);
    const content = body.endsWith('\n') ? body : `${body}\n`;

    if (this.destination === STDOUT_DESTINATION) {
      await new Promise<void>((resolve, reject) => {
        this.stdout.write(content, (err) => (err ? reject(err) : resolve()));
      });
      return;
    }

    await mkdir(path.dirname(path.resolve(this.destination)), { recursive: true });
    await writeFile(this.destination, content, 'utf8');
    console.log(`[report-sink] ${this.format} report written to ${this.destination}`);
  }
}
