import { z } from 'zod';
import { ConversationKey, IdentityFragment, Result, ok, fail } from '../types/common';
import { InvalidRecordError, RecordAlreadyIndexedError } from '../utils/errors';
import { parseIdentityFragment } from '../identity/fragment';
import { logger } from '../utils/logger';

/**
 * One SMS email as handed over by the mailbox reader: lower-cased header names
 * mapped to their decoded text, plus the decoded body.
 */
export interface RawSmsRecord {
  headers: Record<string, string | undefined>;
  body: string;
}

const integerHeader = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'must be an integer')
  .transform(value => Number.parseInt(value, 10));

const optionalIntegerHeader = (fallback: number) =>
  z.union([integerHeader, z.undefined().transform(() => fallback)]);

export const smsHeadersSchema = z.object({
  to: z.string(),
  from: z.string(),
  subject: z.string(),
  'x-smssync-id': integerHeader,
  'x-smssync-address': z.string(),
  'x-smssync-type': integerHeader,
  'x-smssync-date': integerHeader,
  'x-smssync-thread': integerHeader,
  'x-smssync-read': optionalIntegerHeader(1),
  'x-smssync-status': optionalIntegerHeader(-1),
  'x-smssync-protocol': optionalIntegerHeader(0),
  'x-smssync-service_center': z.string().optional(),
  'content-type': z.string().optional()
});

export type SmsHeaders = z.infer<typeof smsHeadersSchema>;

/**
 * A single SMS message converted from an email.
 *
 * Timestamps are always UTC instants; `timezone` is only carried along for
 * display. `conversationKey` is attached once, after identity resolution.
 */
export class SmsRecord {
  readonly to: IdentityFragment;
  readonly from: IdentityFragment;
  readonly subject: IdentityFragment;
  readonly address: IdentityFragment;
  readonly serviceCenter: IdentityFragment;
  /** Message order within a thread. */
  readonly id: number;
  readonly kind: number;
  readonly timestamp: Date;
  /** A specific chat "opened" between two users. */
  readonly thread: number;
  readonly read: number;
  readonly status: number;
  readonly protocol: number;
  readonly contentType: string | null;
  readonly message: string;
  readonly timezone: string;
  private key: ConversationKey | null = null;

  constructor(headers: SmsHeaders, body: string, timezone: string) {
    this.to = parseIdentityFragment(headers.to);
    this.from = parseIdentityFragment(headers.from);
    this.subject = parseIdentityFragment(headers.subject);
    this.address = parseIdentityFragment(headers['x-smssync-address']);
    this.serviceCenter = parseIdentityFragment(headers['x-smssync-service_center'] ?? '');
    this.id = headers['x-smssync-id'];
    this.kind = headers['x-smssync-type'];
    this.timestamp = new Date(headers['x-smssync-date']);
    this.thread = headers['x-smssync-thread'];
    this.read = headers['x-smssync-read'];
    this.status = headers['x-smssync-status'];
    this.protocol = headers['x-smssync-protocol'];
    this.contentType = headers['content-type'] ?? null;
    this.message = body.trim();
    this.timezone = timezone;
  }

  get conversationKey(): ConversationKey | null {
    return this.key;
  }

  /**
   * A record belongs to one conversation; keys are only stable within a run,
   * so indexing the same record again under a new key fails.
   */
  attachConversationKey(key: ConversationKey): Result<void, RecordAlreadyIndexedError> {
    if (this.key !== null && this.key !== key) {
      return fail(new RecordAlreadyIndexedError(this.id, this.key, key));
    }
    this.key = key;
    return ok(undefined);
  }
}

/**
 * Validate a raw record and convert it. Any missing or malformed header
 * rejects the whole record.
 */
export function buildSmsRecord(raw: RawSmsRecord, timezone: string): Result<SmsRecord, InvalidRecordError> {
  const parsed = smsHeadersSchema.safeParse(raw.headers);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'headers'}: ${issue.message}`);
    logger.error('Invalid SMS email', undefined, { operation: 'record_build' }, { issues, headers: raw.headers });
    return fail(new InvalidRecordError(raw, issues));
  }

  const record = new SmsRecord(parsed.data, raw.body, timezone);
  if (!record.message) {
    logger.warn('Empty SMS', {
      operation: 'record_build',
      recordId: record.id,
      threadId: record.thread
    }, { timestamp: record.timestamp.toISOString() });
  }
  return ok(record);
}
