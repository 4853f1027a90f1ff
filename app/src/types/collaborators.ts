/**
 * Capability interfaces for everything the engine calls but does not own.
 *
 * Production implementations shell out to GAM (services/gam-*.ts) or talk to
 * PostgreSQL (services/pg-tabular-store.ts); tests use in-process fakes.
 * Every call is awaited before the next one starts — the engine never fans
 * out collaborator calls.
 */
import type { PlannedUser, PoolRecord } from './backup.js';

// ---------------------------------------------------------------------------
// Inventory
// ---------------------------------------------------------------------------

/** Whose files to list. */
export type InventoryTarget =
  | { readonly kind: 'user'; readonly email: string }
  | { readonly kind: 'pool'; readonly driveId: string };

export interface InventoryEntry {
  readonly id: string;
  /** True for folders (container nodes). */
  readonly isContainer: boolean;
}

export interface Inventory {
  /**
   * Lazily list every file owned by the target. Each iteration issues a
   * fresh remote call; an iterator cannot be restarted.
   */
  listFiles(target: InventoryTarget): AsyncIterable<InventoryEntry>;
}

// ---------------------------------------------------------------------------
// Tabular store
// ---------------------------------------------------------------------------

/** One CSV-shaped record: column name → cell text. */
export type TabularRow = Readonly<Record<string, string>>;

export interface TabularStore {
  /** Rows of a sheet; a sheet that does not exist yet yields no rows. */
  download(resourceId: string, sheetName: string): Promise<TabularRow[]>;
  /** Replace a sheet's contents. `header` fixes column order. */
  upload(
    resourceId: string,
    sheetName: string,
    header: readonly string[],
    rows: readonly TabularRow[],
  ): Promise<void>;
}

// ---------------------------------------------------------------------------
// Pool provider
// ---------------------------------------------------------------------------

export type PoolRole = 'organizer' | 'fileOrganizer' | 'writer' | 'reader';

export interface PoolProvider {
  /** Create a pool and return its externally assigned id. */
  createPool(name: string): Promise<string>;
  /** Id of an existing pool with exactly this name, or null. */
  findPoolByName(name: string): Promise<string | null>;
  setPoolAttribute(poolId: string, attribute: string, value: string): Promise<void>;
  grantRole(poolId: string, identity: string, role: PoolRole): Promise<void>;
}

// ---------------------------------------------------------------------------
// Alerting
// ---------------------------------------------------------------------------

export interface Alerting {
  /** Best-effort; never rejects. */
  notify(subject: string, body: string, recipients?: readonly string[]): Promise<void>;
}

// ---------------------------------------------------------------------------
// Drive copy
// ---------------------------------------------------------------------------

export interface DriveCopier {
  /** Copy one admitted user's drive into the pool. Rejects on failure. */
  copyUser(user: PlannedUser, pool: PoolRecord): Promise<void>;
}
