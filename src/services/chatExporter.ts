import * as fs from 'fs/promises';
import * as path from 'path';
import { ConversationKey, IdentityFragment } from '../types/common';
import { AttributedMessage, BucketTable } from './conversationIndexer';
import { logger } from '../utils/logger';

export interface ExportedParticipant {
  phone: string | null;
  name: string | null;
  email: string | null;
}

export interface ExportedMessage {
  id: number;
  timestamp: string;
  localTime: string;
  sender: ExportedParticipant;
  receiver: ExportedParticipant;
  message: string;
}

export interface ExportedThread {
  conversationKey: ConversationKey;
  thread: number;
  timezone: string;
  messages: ExportedMessage[];
}

export interface ExportSummary {
  conversations: number;
  threads: number;
  messages: number;
}

/**
 * Order a thread's messages by their SMS id. The sort is stable, so messages
 * sharing an id keep their input order.
 */
export function sortThread(messages: readonly AttributedMessage[]): AttributedMessage[] {
  return [...messages].sort((a, b) => a.id - b.id);
}

export function formatLocalTime(timestamp: Date, timezone: string): string {
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23'
  });
  const parts: Record<string, string> = {};
  for (const part of formatter.formatToParts(timestamp)) {
    parts[part.type] = part.value;
  }
  return `${parts.year}-${parts.month}-${parts.day} ${parts.hour}:${parts.minute}:${parts.second}`;
}

export function buildThreadExport(
  conversationKey: ConversationKey,
  thread: number,
  messages: readonly AttributedMessage[],
  timezone: string
): ExportedThread {
  return {
    conversationKey,
    thread,
    timezone,
    messages: sortThread(messages).map(message => ({
      id: message.id,
      timestamp: message.timestamp.toISOString(),
      localTime: formatLocalTime(message.timestamp, timezone),
      sender: participant(message.sender),
      receiver: participant(message.receiver),
      message: message.message
    }))
  };
}

/**
 * Write one JSON file per thread:
 * `<exportDir>/<conversationKey>/thread-<thread>.json`
 */
export async function exportConversations(
  conversations: BucketTable,
  exportDir: string,
  timezone: string
): Promise<ExportSummary> {
  const summary: ExportSummary = { conversations: 0, threads: 0, messages: 0 };

  try {
    for (const [conversationKey, threads] of conversations) {
      const conversationDir = path.join(exportDir, conversationKey);
      await fs.mkdir(conversationDir, { recursive: true });
      summary.conversations++;

      for (const [thread, messages] of threads) {
        const exported = buildThreadExport(conversationKey, thread, messages, timezone);
        const filePath = path.join(conversationDir, `thread-${thread}.json`);
        await fs.writeFile(filePath, JSON.stringify(exported, null, 2));
        summary.threads++;
        summary.messages += exported.messages.length;

        logger.debug('Thread exported', {
          operation: 'export_thread',
          conversationKey,
          threadId: thread,
          path: filePath
        }, { messageCount: exported.messages.length });
      }
    }
  } catch (error) {
    logger.error('Failed to export conversations', error as Error, {
      operation: 'export',
      path: exportDir
    });
    throw error;
  }

  logger.info('Conversations exported', { operation: 'export', path: exportDir }, { ...summary });
  return summary;
}

function participant(identity: IdentityFragment): ExportedParticipant {
  return { phone: identity.phone, name: identity.name, email: identity.email };
}
