import type { BackupConfig } from './config.js';
import { closeDbPool, createDbPool, type DbPool } from './db/client.js';
import { migrate } from './db/migrate.js';
import { AdmissionPlanner } from './services/admission-planner.js';
import { AlertService, GamMailTransport } from './services/alert-service.js';
import { BackupCycle } from './services/backup-cycle.js';
import { CommandDriveCopier } from './services/command-drive-copier.js';
import { CostEstimator } from './services/cost-estimator.js';
import { GamCli } from './services/gam-cli.js';
import { GamInventory } from './services/gam-inventory.js';
import { GamPoolProvider } from './services/gam-pool-provider.js';
import { GamSheetStore } from './services/gam-sheet-store.js';
import { PgTabularStore } from './services/pg-tabular-store.js';
import { PoolRotator } from './services/pool-rotator.js';
import { UsageProjector } from './services/usage-projector.js';
import { UsageStore } from './services/usage-store.js';
import type { TabularStore } from './types/collaborators.js';
import type { LogFn } from './utils/logger.js';

export interface BackupEngine {
  cycle: BackupCycle;
  /** Open connections the caller must release. */
  close(): Promise<void>;
}

export interface BackupEngineOptions {
  /** Replace the GAM executable wrapper (tests). */
  gam?: GamCli;
}

/**
 * Wire configuration into a ready-to-run backup cycle.
 *
 * Service graph:
 *   GamCli → GamInventory, GamPoolProvider, GamMailTransport, GamSheetStore
 *   TabularStore (sheets | postgres) → UsageStore
 *   UsageStore + PoolProvider + AlertService → PoolRotator
 *   everything → BackupCycle
 *
 * With the postgres backend, pending migrations are applied first.
 */
export async function createBackupEngine(
  config: BackupConfig,
  log: LogFn,
  opts: BackupEngineOptions = {},
): Promise<BackupEngine> {
  const gam = opts.gam ?? new GamCli({ gamPath: config.gamPath, log });

  let dbPool: DbPool | null = null;
  let tabular: TabularStore;
  if (config.storeBackend === 'postgres' && config.databaseUrl) {
    dbPool = createDbPool({ connectionString: config.databaseUrl, log });
    const migration = await migrate(dbPool);
    log('info', { event: 'migrations_applied', applied: migration.applied, skipped: migration.skipped.length });
    for (const warning of migration.warnings) {
      log('warn', { event: 'migration_warning', message: warning });
    }
    tabular = new PgTabularStore(dbPool, log);
  } else {
    tabular = new GamSheetStore(gam, config.adminUser);
  }

  const store = new UsageStore(tabular, {
    resourceId: config.registrySheetId,
    sheets: config.sheetNames,
    log,
  });

  const alerting = new AlertService({
    transport: new GamMailTransport(gam, config.adminUser),
    defaultRecipients: config.alertRecipients,
    log,
  });

  const cycle = new BackupCycle(
    {
      store,
      planner: new AdmissionPlanner({
        estimator: new CostEstimator(config.secondsPerFile),
        maxMinutes: config.maxMinutes,
        log,
      }),
      projector: new UsageProjector(new GamInventory(gam, config.adminUser), {
        limits: { itemLimit: config.itemLimit, folderLimit: config.folderLimit },
        log,
      }),
      rotator: new PoolRotator(new GamPoolProvider(gam, config.adminUser, log), store, alerting, {
        baseName: config.poolBaseName,
        admins: config.poolAdmins,
        poolAttributes: config.poolAttributes,
        thresholdPercent: config.rotationThresholdPercent,
        log,
      }),
      alerting,
      copier: config.copyCommand ? new CommandDriveCopier(config.copyCommand, log) : null,
    },
    { dryRun: config.dryRun, adminUser: config.adminUser, log },
  );

  return {
    cycle,
    close: async () => {
      if (dbPool) await closeDbPool(dbPool);
    },
  };
}
