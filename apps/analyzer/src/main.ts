import 'dotenv/config';
import { AnalysisAbortedError, ConfigError } from '@simtrace/domain';
import { loadConfig } from './config/analyzer-config.js';
import { FileTelemetryAnalysis } from './services/pipeline/file-analysis.service.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const controller = new AbortController();

  const cancel = () => {
    console.log('[analyzer] interrupt received, cancelling run...');
    controller.abort();
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  console.log(`[analyzer] reading telemetry from ${config.streams.vehicle}`);
  const { report } = await new FileTelemetryAnalysis().analyze({ ...config, signal: controller.signal });

  for (const caveat of report.diagnostics.caveats) {
    console.log(`[analyzer] caveat: ${caveat}`);
  }
  console.log(`[analyzer] done: ${report.vehicles.length} vehicle aggregate(s), ${report.stations.length} station(s)`);
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(`[analyzer] ${err.message}`);
    process.exit(2);
  }
  if (err instanceof AnalysisAbortedError) {
    console.error(`[analyzer] fatal: ${err.message}`);
    console.error('[analyzer] partial diagnostics', JSON.stringify(err.diagnostics, null, 2));
    process.exit(1);
  }
  console.error('[analyzer] fatal error', err);
  process.exit(1);
});
