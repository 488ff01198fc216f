import { MessageKind } from '../../src/types/common';
import { RawSmsRecord, SmsRecord, buildSmsRecord } from '../../src/records/sms-record';

export const BOB_PHONE = '4155550100';
export const CAROL_PHONE = '4155550111';
export const ME = 'me@example.com';

export interface RecordOptions {
  kind?: number;
  id?: number;
  thread?: number;
  date?: number;
  to?: string;
  from?: string;
  subject?: string;
  address?: string;
  body?: string;
}

export function rawRecord(options: RecordOptions = {}): RawSmsRecord {
  return {
    headers: {
      to: options.to ?? ME,
      from: options.from ?? '',
      subject: options.subject ?? '',
      'x-smssync-id': String(options.id ?? 1),
      'x-smssync-address': options.address ?? BOB_PHONE,
      'x-smssync-type': String(options.kind ?? MessageKind.Received),
      'x-smssync-date': String(options.date ?? 1300000000000),
      'x-smssync-thread': String(options.thread ?? 7)
    },
    body: options.body ?? 'hello'
  };
}

export function makeRecord(options: RecordOptions = {}): SmsRecord {
  const result = buildSmsRecord(rawRecord(options), 'UTC');
  if (!result.success) {
    throw result.error;
  }
  return result.value;
}

/**
 * A message Bob sent to the device owner.
 */
export function inbound(options: RecordOptions = {}): SmsRecord {
  return makeRecord({ from: 'Bob', to: ME, address: BOB_PHONE, ...options, kind: MessageKind.Received });
}

/**
 * A message the device owner sent to Bob.
 */
export function outbound(options: RecordOptions = {}): SmsRecord {
  return makeRecord({ from: ME, to: 'Bob', address: BOB_PHONE, ...options, kind: options.kind ?? MessageKind.Sent });
}
