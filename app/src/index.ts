#!/usr/bin/env node
import { loadConfig, type BackupConfig } from './config.js';
import { createBackupEngine } from './engine.js';
import { initTelemetry, shutdownTelemetry } from './telemetry.js';
import { EXIT_CODES, describeError, exitCodeFor, type ExitCode } from './utils/error-handler.js';
import { createLogger } from './utils/logger.js';

/**
 * One backup cycle per invocation; the scheduler owns the cadence and must
 * not start a second run while one is in progress.
 */
async function main(): Promise<ExitCode> {
  let config: BackupConfig;
  try {
    config = loadConfig();
  } catch (err) {
    const { log } = createLogger('drive-backup');
    log('error', { event: 'config_invalid', ...describeError(err) });
    return exitCodeFor(err);
  }

  const { log } = createLogger('drive-backup', config.logLevel);
  const telemetrySdk = initTelemetry(config.otelEndpoint);

  try {
    const engine = await createBackupEngine(config, log);
    try {
      const report = await engine.cycle.run();
      log(report.status === 'completed' ? 'info' : 'error', {
        event: 'cycle_finished',
        status: report.status,
        phase: report.phase,
        dry_run: report.dryRun,
        admitted: report.admission?.runPlan.length ?? 0,
        rotation: report.rotation?.status ?? null,
        message: report.message,
      });
      return report.status === 'completed' ? EXIT_CODES.ok : exitCodeFor(report.error);
    } finally {
      await engine.close();
    }
  } catch (err) {
    log('error', { event: 'cycle_crashed', ...describeError(err) });
    return exitCodeFor(err);
  } finally {
    await shutdownTelemetry(telemetrySdk);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`drive-backup: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = EXIT_CODES.failure;
  },
);
