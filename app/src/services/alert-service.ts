/**
 * Alert Service — Operator Email with Backoff + Stdout Fallback
 *
 * Delivers each alert to every recipient in turn through a mail transport
 * (GAM sendemail in production). Transient failures are retried with
 * exponential backoff; a recipient whose delivery is exhausted gets the
 * alert written to stdout instead. notify() never rejects.
 */
import { errorMessage } from '../utils/error-handler.js';
import { noopLog, type LogFn } from '../utils/logger.js';
import type { Alerting } from '../types/collaborators.js';
import type { GamCli } from './gam-cli.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MailTransport {
  send(recipient: string, subject: string, body: string): Promise<void>;
}

/** Per-recipient delivery outcome. */
export interface AlertDelivery {
  readonly recipient: string;
  readonly success: boolean;
  readonly attempts: number;
  readonly error?: string;
  readonly fallbackUsed?: boolean;
}

export interface AlertServiceOptions {
  readonly transport: MailTransport;
  readonly defaultRecipients: readonly string[];
  readonly maxRetries?: number;
  readonly baseDelayMs?: number;
  readonly maxDelayMs?: number;
  readonly log?: LogFn;
  /** Injectable for tests. */
  readonly sleep?: (ms: number) => Promise<void>;
  /** Fallback sink; defaults to stdout. */
  readonly writeFallback?: (line: string) => void;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BASE_DELAY_MS = 500;
const DEFAULT_MAX_DELAY_MS = 30_000;

/** Subject prefix that makes alerts filterable in a shared inbox. */
export const ALERT_SUBJECT_PREFIX = '[drive-backup]';

/** Delay before retry `attempt` (0-based): min(base * 2^attempt, max). */
export function computeBackoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
}

// ---------------------------------------------------------------------------
// GAM mail transport
// ---------------------------------------------------------------------------

export class GamMailTransport implements MailTransport {
  constructor(
    private readonly gam: GamCli,
    private readonly sender: string,
  ) {}

  async send(recipient: string, subject: string, body: string): Promise<void> {
    await this.gam.run('send_alert', [
      'sendemail', recipient,
      'from', this.sender,
      'subject', subject,
      'message', body,
    ]);
  }
}

// ---------------------------------------------------------------------------
// AlertService
// ---------------------------------------------------------------------------

export class AlertService implements Alerting {
  private readonly transport: MailTransport;
  private readonly defaultRecipients: readonly string[];
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly log: LogFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly writeFallback: (line: string) => void;

  constructor(opts: AlertServiceOptions) {
    this.transport = opts.transport;
    this.defaultRecipients = opts.defaultRecipients;
    this.maxRetries = opts.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.baseDelayMs = opts.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.maxDelayMs = opts.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.log = opts.log ?? noopLog;
    this.sleep = opts.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.writeFallback = opts.writeFallback ?? ((line) => process.stdout.write(line));
  }

  async notify(subject: string, body: string, recipients?: readonly string[]): Promise<void> {
    await this.deliver(subject, body, recipients);
  }

  /** Same as notify(), returning one outcome per recipient. */
  async deliver(subject: string, body: string, recipients?: readonly string[]): Promise<AlertDelivery[]> {
    const targets = recipients && recipients.length > 0 ? recipients : this.defaultRecipients;
    const fullSubject = `${ALERT_SUBJECT_PREFIX} ${subject}`;

    if (targets.length === 0) {
      this.fallback(fullSubject, body);
      return [];
    }

    const results: AlertDelivery[] = [];
    for (const recipient of targets) {
      let result = await this.deliverWithRetry(recipient, fullSubject, body);
      if (!result.success) {
        this.log('warn', { event: 'alert_fallback_stdout', recipient, error: result.error });
        this.fallback(fullSubject, body);
        result = { ...result, fallbackUsed: true };
      }
      results.push(result);
    }
    return results;
  }

  private async deliverWithRetry(recipient: string, subject: string, body: string): Promise<AlertDelivery> {
    let lastError: string | undefined;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        await this.transport.send(recipient, subject, body);
        this.log('info', { event: 'alert_delivered', recipient, attempts: attempt + 1 });
        return { recipient, success: true, attempts: attempt + 1 };
      } catch (err) {
        lastError = errorMessage(err);
      }

      if (attempt < this.maxRetries) {
        const delay = computeBackoffDelay(attempt, this.baseDelayMs, this.maxDelayMs);
        this.log('warn', { event: 'alert_retry', recipient, attempt: attempt + 1, delay_ms: delay, error: lastError });
        await this.sleep(delay);
      }
    }

    this.log('error', { event: 'alert_exhausted', recipient, max_retries: this.maxRetries, error: lastError });
    return { recipient, success: false, attempts: this.maxRetries + 1, error: lastError };
  }

  private fallback(subject: string, body: string): void {
    this.writeFallback(`[ALERT] ${subject} | ${body.replace(/\n/g, ' | ')}\n`);
  }
}
