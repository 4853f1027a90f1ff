/**
 * Span Sanitizer Tests — allowlists, identity hashing, email redaction, and
 * real spans captured through an in-memory exporter.
 */
import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { InMemorySpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { SpanStatusCode } from '@opentelemetry/api';
import { hashForSpan, redactEmails, sanitizeAttributes, startSanitizedSpan } from '../span-sanitizer.js';

// ---------------------------------------------------------------------------
// hashForSpan
// ---------------------------------------------------------------------------

describe('hashForSpan', () => {
  it('returns a deterministic 12-character hex string', () => {
    expect(hashForSpan('a@example.com')).toMatch(/^[0-9a-f]{12}$/);
    expect(hashForSpan('a@example.com')).toBe(hashForSpan('a@example.com'));
    expect(hashForSpan('a@example.com')).not.toBe(hashForSpan('b@example.com'));
  });
});

// ---------------------------------------------------------------------------
// sanitizeAttributes
// ---------------------------------------------------------------------------

describe('sanitizeAttributes', () => {
  it('keeps only allowlisted admission attributes', () => {
    expect(
      sanitizeAttributes('backup.admission', {
        candidates: 5,
        admitted: 3,
        deferred: 1,
        manual: 1,
        rejected: 0,
        cumulative_minutes: 300,
        emails: 'a@example.com,b@example.com',
      }),
    ).toEqual({ candidates: 5, admitted: 3, deferred: 1, manual: 1, rejected: 0, cumulative_minutes: 300 });
  });

  it('hashes the admin identity on the cycle span', () => {
    expect(sanitizeAttributes('backup.cycle', { admin: 'admin@example.com', dry_run: false })).toEqual({
      admin_hash: hashForSpan('admin@example.com'),
      dry_run: false,
    });
  });

  it('drops identities the span has no hashed slot for', () => {
    expect(sanitizeAttributes('backup.projection', { email: 'a@example.com', pending_users: 2 })).toEqual({
      pending_users: 2,
    });
  });

  it('drops undefined and non-primitive values', () => {
    expect(
      sanitizeAttributes('backup.rotation', {
        status: 'none',
        from_pool: 'Legacydrivebackup',
        to_pool: undefined,
        failed_step: { step: 'create' },
      }),
    ).toEqual({ status: 'none', from_pool: 'Legacydrivebackup' });
  });
});

// ---------------------------------------------------------------------------
// redactEmails
// ---------------------------------------------------------------------------

describe('redactEmails', () => {
  it('replaces every address in a message', () => {
    expect(redactEmails('gam list_user_files failed for a.b@example.com, then c@corp.example.org')).toBe(
      'gam list_user_files failed for [REDACTED], then [REDACTED]',
    );
  });

  it('leaves messages without addresses alone', () => {
    expect(redactEmails('pool Legacydrivebackup2 could not be measured')).toBe(
      'pool Legacydrivebackup2 could not be measured',
    );
  });
});

// ---------------------------------------------------------------------------
// startSanitizedSpan
// ---------------------------------------------------------------------------

describe('startSanitizedSpan', () => {
  let provider: NodeTracerProvider;
  let exporter: InMemorySpanExporter;

  beforeAll(() => {
    exporter = new InMemorySpanExporter();
    provider = new NodeTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    provider.register();
  });

  afterAll(async () => {
    await provider.shutdown();
  });

  beforeEach(() => {
    exporter.reset();
  });

  it('returns the result and records sanitized attributes', async () => {
    const result = await startSanitizedSpan('backup.cycle', { dry_run: true, admin: 'admin@example.com' }, async () => 'done');

    expect(result).toBe('done');
    const [span] = exporter.getFinishedSpans();
    expect(span.name).toBe('backup.cycle');
    expect(span.attributes).toEqual({ dry_run: true, admin_hash: hashForSpan('admin@example.com') });
    expect(span.status.code).toBe(SpanStatusCode.OK);
  });

  it('nests child spans under the cycle span', async () => {
    await startSanitizedSpan('backup.cycle', {}, async () => {
      await startSanitizedSpan('backup.projection', { pending_users: 1 }, async () => undefined);
    });

    const spans = exporter.getFinishedSpans();
    const child = spans.find((s) => s.name === 'backup.projection');
    const parent = spans.find((s) => s.name === 'backup.cycle');
    expect(child?.spanContext().traceId).toBe(parent?.spanContext().traceId);
    expect(child?.parentSpanId).toBe(parent?.spanContext().spanId);
  });

  it('marks errors with a redacted message and rethrows', async () => {
    await expect(
      startSanitizedSpan('backup.rotation', {}, async () => {
        throw new Error('grant failed for ops@example.com');
      }),
    ).rejects.toThrow('grant failed for ops@example.com');

    const [span] = exporter.getFinishedSpans();
    expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: 'grant failed for [REDACTED]' });
    expect(span.events[0].attributes?.['exception.message']).toBe('grant failed for [REDACTED]');
  });
});
