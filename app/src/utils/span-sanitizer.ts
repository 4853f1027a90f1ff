/**
 * Span Sanitizer — PII-safe OpenTelemetry spans for the backup cycle.
 *
 * Each span type has an attribute allowlist; anything else is dropped.
 * The admin identity is hashed (SHA-256, 12 hex chars) into `admin_hash`;
 * user emails never reach a span and are redacted from error messages.
 */
import { createHash } from 'node:crypto';
import { trace, SpanStatusCode, type AttributeValue, type Attributes, type Span } from '@opentelemetry/api';

const TRACER_NAME = 'drive-backup';

let _tracer: ReturnType<typeof trace.getTracer> | null = null;
function getTracer() {
  if (!_tracer) _tracer = trace.getTracer(TRACER_NAME);
  return _tracer;
}

export type BackupSpanName = 'backup.cycle' | 'backup.admission' | 'backup.projection' | 'backup.rotation';

export function hashForSpan(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 12);
}

const SPAN_ALLOWLISTS: Record<BackupSpanName, ReadonlySet<string>> = {
  'backup.cycle': new Set(['status', 'dry_run', 'admin_hash', 'duration_ms']),
  'backup.admission': new Set(['candidates', 'admitted', 'deferred', 'manual', 'rejected', 'cumulative_minutes']),
  'backup.projection': new Set(['pending_users', 'item_percent', 'folder_percent', 'failed_probes', 'unknown']),
  'backup.rotation': new Set(['status', 'from_pool', 'to_pool', 'failed_step', 'adopted']),
};

/** Identity attributes: raw input name → hashed output name. */
const HASH_FIELDS: Record<string, string> = {
  admin: 'admin_hash',
};

/**
 * Keep allowlisted attributes with primitive values, hashing identity fields.
 */
export function sanitizeAttributes(spanName: BackupSpanName, attrs: Record<string, unknown>): Attributes {
  const allowlist = SPAN_ALLOWLISTS[spanName];
  const sanitized: Attributes = {};

  for (const [key, value] of Object.entries(attrs)) {
    const hashTarget = HASH_FIELDS[key];
    if (hashTarget && allowlist.has(hashTarget)) {
      if (typeof value === 'string') sanitized[hashTarget] = hashForSpan(value);
      continue;
    }
    if (allowlist.has(key) && isAttributeValue(value)) {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

function isAttributeValue(value: unknown): value is AttributeValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

export function addSanitizedAttributes(span: Span, spanName: BackupSpanName, attrs: Record<string, unknown>): void {
  span.setAttributes(sanitizeAttributes(spanName, attrs));
}

/** Replace email addresses with a placeholder. */
export function redactEmails(message: string): string {
  return message.replace(/[^\s@<>"',;]+@[^\s@<>"',;]+\.[^\s@<>"',;]+/g, '[REDACTED]');
}

/**
 * Run `fn` inside an active span with allowlisted attributes. The span ends
 * with OK, or with ERROR and a redacted exception when `fn` throws.
 */
export async function startSanitizedSpan<T>(
  spanName: BackupSpanName,
  attrs: Record<string, unknown>,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  return getTracer().startActiveSpan(spanName, async (span) => {
    span.setAttributes(sanitizeAttributes(spanName, attrs));
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (err) {
      const message = redactEmails(err instanceof Error ? err.message : String(err));
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      span.recordException(new Error(message));
      throw err;
    } finally {
      span.end();
    }
  });
}
