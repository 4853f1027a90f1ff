import { ConfigError } from './errors.js';
import { DEFAULT_MAX_MINUTES } from './services/admission-planner.js';
import { DEFAULT_SECONDS_PER_FILE } from './services/cost-estimator.js';
import { DEFAULT_ROTATION_THRESHOLD } from './services/pool-rotator.js';
import { isLogLevel, type LogLevel } from './utils/logger.js';

export type StoreBackend = 'sheets' | 'postgres';

export interface SheetNames {
  readonly registry: string;
  readonly candidates: string;
  readonly oversized: string;
  readonly eligible: string;
}

export interface BackupConfig {
  logLevel: LogLevel;
  otelEndpoint: string | null;

  /** Identity GAM acts as for sheet, inventory and shared-drive calls. */
  adminUser: string;
  gamPath: string;

  // Tabular store
  storeBackend: StoreBackend;
  registrySheetId: string;
  sheetNames: SheetNames;
  databaseUrl: string | null;

  // Pool naming and provisioning
  poolBaseName: string;
  poolAdmins: string[];
  /** Attributes applied to every newly provisioned pool (attr → value). */
  poolAttributes: Record<string, string>;

  // Capacity control
  rotationThresholdPercent: number;
  maxMinutes: number;
  secondsPerFile: number;
  itemLimit: number;
  folderLimit: number;

  alertRecipients: string[];

  /** External per-user copy command; null hands the plan off through the eligible sheet only. */
  copyCommand: string | null;
  dryRun: boolean;
}

/** Shared drive hard item limit. */
export const DEFAULT_ITEM_LIMIT = 400_000;
export const DEFAULT_FOLDER_LIMIT = 100_000;
export const DEFAULT_POOL_BASE_NAME = 'Legacydrivebackup';

/**
 * Environment variables:
 *
 * BACKUP_ADMIN_USER          (required) — admin identity GAM acts as
 * BACKUP_REGISTRY_SHEET_ID   (required) — resource id holding the registry/queue sheets
 * BACKUP_POOL_BASE_NAME      (optional) — pool naming base; default Legacydrivebackup
 * BACKUP_POOL_ADMINS         (optional) — comma-separated organizers for new pools; default admin user
 * BACKUP_POOL_ATTRIBUTES     (optional) — comma-separated attr=value pairs applied to new pools
 * BACKUP_ALERT_RECIPIENTS    (optional) — comma-separated alert recipients; default admin user
 * BACKUP_ROTATION_THRESHOLD  (optional) — projected percent that triggers rotation; default 80
 * BACKUP_MAX_MINUTES         (optional) — per-cycle time budget; default 360
 * BACKUP_SECONDS_PER_FILE    (optional) — copy cost calibration; default 1.2
 * BACKUP_ITEM_LIMIT          (optional) — pool item hard limit; default 400000
 * BACKUP_FOLDER_LIMIT        (optional) — pool folder hard limit; default 100000
 * BACKUP_STORE_BACKEND       (optional) — 'sheets' or 'postgres'; default 'sheets'
 * DATABASE_URL               (required when backend is postgres)
 * BACKUP_SHEET_REGISTRY / _CANDIDATES / _OVERSIZED / _ELIGIBLE (optional) — sheet names
 * BACKUP_COPY_COMMAND        (optional) — executable invoked as `<cmd> <email> <driveId>`
 * BACKUP_DRY_RUN             (optional) — 'true' plans and projects without mutating anything
 * GAM_PATH                   (optional) — GAM executable; default 'gam'
 * LOG_LEVEL                  (optional) — structured log level; default 'info'
 * OTEL_EXPORTER_OTLP_ENDPOINT (optional) — OpenTelemetry collector endpoint; null disables tracing export
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BackupConfig {
  const adminUser = (env.BACKUP_ADMIN_USER ?? '').trim().toLowerCase();
  if (!adminUser) {
    throw new ConfigError('BACKUP_ADMIN_USER is required', 'BACKUP_ADMIN_USER');
  }

  const registrySheetId = (env.BACKUP_REGISTRY_SHEET_ID ?? '').trim();
  if (!registrySheetId) {
    throw new ConfigError('BACKUP_REGISTRY_SHEET_ID is required', 'BACKUP_REGISTRY_SHEET_ID');
  }

  const logLevelRaw = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevelRaw)) {
    throw new ConfigError(`LOG_LEVEL must be one of error, warn, info, debug (got "${logLevelRaw}")`, 'LOG_LEVEL');
  }

  const storeBackendRaw = env.BACKUP_STORE_BACKEND ?? 'sheets';
  if (storeBackendRaw !== 'sheets' && storeBackendRaw !== 'postgres') {
    throw new ConfigError(
      `BACKUP_STORE_BACKEND must be 'sheets' or 'postgres' (got "${storeBackendRaw}")`,
      'BACKUP_STORE_BACKEND',
    );
  }

  const databaseUrl = env.DATABASE_URL ?? null;
  if (storeBackendRaw === 'postgres' && !databaseUrl) {
    throw new ConfigError('DATABASE_URL is required when BACKUP_STORE_BACKEND is postgres', 'DATABASE_URL');
  }

  const rotationThresholdPercent = parseNumber(env, 'BACKUP_ROTATION_THRESHOLD', DEFAULT_ROTATION_THRESHOLD);
  if (rotationThresholdPercent <= 0 || rotationThresholdPercent > 100) {
    throw new ConfigError(
      `BACKUP_ROTATION_THRESHOLD must be in (0, 100] (got ${rotationThresholdPercent})`,
      'BACKUP_ROTATION_THRESHOLD',
    );
  }

  const poolAdmins = parseList(env.BACKUP_POOL_ADMINS);
  const alertRecipients = parseList(env.BACKUP_ALERT_RECIPIENTS);

  return {
    logLevel: logLevelRaw,
    otelEndpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT || null,

    adminUser,
    gamPath: env.GAM_PATH ?? 'gam',

    storeBackend: storeBackendRaw,
    registrySheetId,
    sheetNames: {
      registry: env.BACKUP_SHEET_REGISTRY ?? 'DriveRegistry',
      candidates: env.BACKUP_SHEET_CANDIDATES ?? 'SuspendedUsers',
      oversized: env.BACKUP_SHEET_OVERSIZED ?? 'OversizedUsers',
      eligible: env.BACKUP_SHEET_ELIGIBLE ?? 'EligibleUsers',
    },
    databaseUrl,

    poolBaseName: (env.BACKUP_POOL_BASE_NAME ?? DEFAULT_POOL_BASE_NAME).trim(),
    poolAdmins: poolAdmins.length > 0 ? poolAdmins : [adminUser],
    poolAttributes: parseAttributes(env.BACKUP_POOL_ATTRIBUTES ?? 'domainusersonly=true,drivemembersonly=true'),

    rotationThresholdPercent,
    maxMinutes: parsePositiveInt(env, 'BACKUP_MAX_MINUTES', DEFAULT_MAX_MINUTES),
    secondsPerFile: parsePositive(env, 'BACKUP_SECONDS_PER_FILE', DEFAULT_SECONDS_PER_FILE),
    itemLimit: parsePositiveInt(env, 'BACKUP_ITEM_LIMIT', DEFAULT_ITEM_LIMIT),
    folderLimit: parsePositiveInt(env, 'BACKUP_FOLDER_LIMIT', DEFAULT_FOLDER_LIMIT),

    alertRecipients: alertRecipients.length > 0 ? alertRecipients : [adminUser],

    copyCommand: env.BACKUP_COPY_COMMAND?.trim() || null,
    dryRun: env.BACKUP_DRY_RUN === 'true',
  };
}

function parseList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((s) => s.trim().toLowerCase())
    .filter((s) => s.length > 0);
}

function parseAttributes(raw: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const pair of raw.split(',')) {
    const trimmed = pair.trim();
    if (!trimmed) continue;
    const eq = trimmed.indexOf('=');
    if (eq <= 0) {
      throw new ConfigError(`BACKUP_POOL_ATTRIBUTES entry "${trimmed}" is not attr=value`, 'BACKUP_POOL_ATTRIBUTES');
    }
    attributes[trimmed.slice(0, eq).trim()] = trimmed.slice(eq + 1).trim();
  }
  return attributes;
}

function parseNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number (got "${raw}")`, name);
  }
  return value;
}

function parsePositive(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const value = parseNumber(env, name, fallback);
  if (value <= 0) {
    throw new ConfigError(`${name} must be greater than 0 (got ${value})`, name);
  }
  return value;
}

function parsePositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const value = parsePositive(env, name, fallback);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer (got ${value})`, name);
  }
  return value;
}
