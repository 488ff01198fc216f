import * as fs from 'fs/promises';
import * as path from 'path';
import { simpleParser, AddressObject, HeaderValue, ParsedMail } from 'mailparser';
import { Result, ok, fail } from '../types/common';
import { ConfigurationError, InvalidRecordError } from '../utils/errors';
import { RawSmsRecord, SmsRecord, buildSmsRecord } from './sms-record';
import { eventBus } from '../events/bus';
import { TypedEmitter } from '../events/types';
import { logger } from '../utils/logger';

const MAILDIR_SUBDIRS = ['cur', 'new'];

/**
 * Flatten a parsed email into header text and body. Address headers are
 * rendered back to their display form so the identity parser sees
 * `"Name" <address>` text, not mailparser's structured objects.
 */
export function toRawSmsRecord(mail: ParsedMail): RawSmsRecord {
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of mail.headers) {
    headers[name.toLowerCase()] = headerText(name.toLowerCase(), value);
  }
  return { headers, body: mail.text ?? '' };
}

function headerText(name: string, value: HeaderValue): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.length > 0 ? String(value[0]) : undefined;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if ('text' in value) {
    return firstAddress(name, value);
  }
  return value.value;
}

/**
 * A message has exactly two participants, so only the first address of a
 * header counts.
 */
function firstAddress(name: string, addresses: AddressObject): string {
  const [first] = addresses.value;
  if (addresses.value.length > 1) {
    logger.warn('Header lists several addresses, keeping the first', { operation: 'maildir_load' }, {
      header: name,
      addresses: addresses.text
    });
  }
  if (!first) {
    return '';
  }

  if (!first.address) {
    return first.name;
  }
  return first.name ? `"${first.name}" <${first.address}>` : first.address;
}

export async function parseSmsEmail(source: string | Buffer, timezone: string): Promise<Result<SmsRecord, InvalidRecordError>> {
  const mail = await simpleParser(source);
  return buildSmsRecord(toRawSmsRecord(mail), timezone);
}

/**
 * Load every SMS email from a Maildir folder (`cur/` and `new/`).
 *
 * Files are read in name order so repeated runs see records in the same order.
 */
export async function loadMaildir(
  maildir: string,
  timezone: string,
  events: TypedEmitter = eventBus
): Promise<Result<SmsRecord[], InvalidRecordError | ConfigurationError>> {
  try {
    const stats = await fs.stat(maildir);
    if (!stats.isDirectory()) {
      return fail(new ConfigurationError([`maildir '${maildir}' is not a directory`]));
    }
  } catch (error) {
    logger.error('Maildir not readable', error as Error, { operation: 'maildir_load', path: maildir });
    return fail(new ConfigurationError([`maildir '${maildir}' does not exist`]));
  }

  logger.info('Loading messages', { operation: 'maildir_load', path: maildir });
  const records: SmsRecord[] = [];

  for (const subdir of MAILDIR_SUBDIRS) {
    const dir = path.join(maildir, subdir);
    const files = await listFiles(dir);

    for (const file of files) {
      const filePath = path.join(dir, file);
      const content = await fs.readFile(filePath);
      const record = await parseSmsEmail(content, timezone);
      if (!record.success) {
        logger.error('Invalid SMS email', record.error, { operation: 'maildir_load', path: filePath });
        return record;
      }
      records.push(record.value);
      events.emit('record_loaded', { recordId: record.value.id, threadId: record.value.thread });
    }
  }

  logger.info('Messages loaded', { operation: 'maildir_load', path: maildir }, { recordCount: records.length });
  return ok(records);
}

async function listFiles(dir: string): Promise<string[]> {
  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    logger.debug('Maildir subdirectory skipped', { operation: 'maildir_load', path: dir }, {
      reason: (error as Error).message
    });
    return [];
  }
  return entries
    .filter(entry => entry.isFile() && !entry.name.startsWith('.'))
    .map(entry => entry.name)
    .sort();
}
