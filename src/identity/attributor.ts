import { IdentityField, IdentityFragment, MessageKind, Result, ok, fail } from '../types/common';
import { AmbiguousIdentityError, AttributionSide, UnsupportedKindError } from '../utils/errors';
import { SmsRecord } from '../records/sms-record';
import { logger } from '../utils/logger';

export type AttributionError = AmbiguousIdentityError | UnsupportedKindError;

interface AttributionSources {
  authoritative: IdentityFragment;
  corroborating: IdentityFragment[];
}

/**
 * Everything we know about who sent the record.
 *
 * Received messages trust the sync address and cross-check it against the
 * from and subject headers; anything sent from the device trusts `from` alone.
 * Drafts, outbox, failed and queued messages are treated as sent.
 */
export function senderOf(record: SmsRecord): Result<IdentityFragment, AttributionError> {
  if (record.kind === MessageKind.Received) {
    return reconcile('sender', record, {
      authoritative: record.address,
      corroborating: [record.address, record.from, record.subject]
    });
  }
  if (isSentKind(record.kind)) {
    return reconcile('sender', record, { authoritative: record.from, corroborating: [] });
  }
  return unsupported(record);
}

/**
 * Everything we know about who received the record. Mirror image of
 * `senderOf`.
 */
export function receiverOf(record: SmsRecord): Result<IdentityFragment, AttributionError> {
  if (record.kind === MessageKind.Received) {
    return reconcile('receiver', record, { authoritative: record.to, corroborating: [] });
  }
  if (isSentKind(record.kind)) {
    return reconcile('receiver', record, {
      authoritative: record.address,
      corroborating: [record.address, record.to, record.subject]
    });
  }
  return unsupported(record);
}

export function isSentKind(kind: number): boolean {
  return kind >= MessageKind.Sent && kind <= MessageKind.Queued && Number.isInteger(kind);
}

function unsupported(record: SmsRecord): Result<IdentityFragment, AttributionError> {
  logger.error('SMS type is not supported', undefined, {
    operation: 'attribution',
    recordId: record.id,
    threadId: record.thread
  }, { kind: record.kind });
  return fail(new UnsupportedKindError(record.kind, record.id));
}

function reconcile(
  side: AttributionSide,
  record: SmsRecord,
  sources: AttributionSources
): Result<IdentityFragment, AttributionError> {
  const phone = reconcileField(side, record, sources, 'phone');
  if (!phone.success) return phone;
  const name = reconcileField(side, record, sources, 'name');
  if (!name.success) return name;
  const email = reconcileField(side, record, sources, 'email');
  if (!email.success) return email;

  return ok({ phone: phone.value, name: name.value, email: email.value });
}

/**
 * Resolve one slot. The authoritative value always wins; a single distinct
 * corroborating value fills a gap; two or more distinct values abort.
 *
 * Candidates keep first-seen order so the reported values are deterministic.
 */
function reconcileField<K extends IdentityField>(
  side: AttributionSide,
  record: SmsRecord,
  { authoritative, corroborating }: AttributionSources,
  field: K
): Result<IdentityFragment[K], AttributionError> {
  const own = authoritative[field];
  const candidates: Array<IdentityFragment[K]> = [];

  for (const source of corroborating) {
    const value = source[field];
    if (value === null || value === '' || value === own || candidates.includes(value)) {
      continue;
    }
    candidates.push(value);
  }

  if (candidates.length > 1) {
    const values = candidates.map(String);
    logger.error('Multiple non-duplicate user information', undefined, {
      operation: 'attribution',
      recordId: record.id,
      threadId: record.thread,
      field
    }, { side, values });
    return fail(new AmbiguousIdentityError(side, field, values, record.id));
  }

  const hasOwn = own !== null && own !== '';
  return ok(!hasOwn && candidates.length === 1 ? candidates[0] : own);
}
