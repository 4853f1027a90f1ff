/**
 * GAM CLI — thin wrapper around the GAM executable for Workspace operations.
 *
 * All subprocess invocations use execFile with argument arrays — never
 * shell strings — so user emails and sheet names cannot inject commands.
 * Calls are sequential; no timeout is imposed here (GAM applies its own).
 */
import { execFile as execFileRaw } from 'node:child_process';
import { promisify } from 'node:util';

import { TransportError } from '../errors.js';
import { noopLog, type LogFn } from '../utils/logger.js';

const execFile = promisify(execFileRaw);

/** Large drives list hundreds of thousands of files. */
const DEFAULT_MAX_BUFFER = 512 * 1024 * 1024;

export interface GamCliOptions {
  readonly gamPath?: string;
  readonly maxBuffer?: number;
  readonly log?: LogFn;
}

export class GamCli {
  private readonly gamPath: string;
  private readonly maxBuffer: number;
  private readonly log: LogFn;

  constructor(opts: GamCliOptions = {}) {
    this.gamPath = opts.gamPath ?? 'gam';
    this.maxBuffer = opts.maxBuffer ?? DEFAULT_MAX_BUFFER;
    this.log = opts.log ?? noopLog;
  }

  /**
   * Run GAM and return its stdout.
   * @param operation - logical name for logs and errors (e.g. "create_pool")
   * @throws TransportError on a non-zero exit or spawn failure
   */
  async run(operation: string, args: readonly string[]): Promise<string> {
    const start = Date.now();
    try {
      const { stdout } = await execFile(this.gamPath, [...args], {
        maxBuffer: this.maxBuffer,
        encoding: 'utf8',
      });
      this.log('debug', { event: 'gam_call', operation, latency_ms: Date.now() - start });
      return stdout;
    } catch (err) {
      const exitCode = err instanceof Error && 'code' in err && typeof err.code === 'number' ? err.code : null;
      const stderr = err instanceof Error && 'stderr' in err && typeof err.stderr === 'string' ? err.stderr.trim() : '';
      const message = stderr || (err instanceof Error ? err.message : String(err));
      this.log('warn', { event: 'gam_call_failed', operation, exit_code: exitCode, latency_ms: Date.now() - start });
      throw new TransportError(operation, `gam ${operation} failed: ${message}`, { exitCode, cause: err });
    }
  }
}
