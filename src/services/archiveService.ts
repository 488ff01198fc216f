import { Result, ok, fail } from '../types/common';
import { ArchiveError, ConfigurationError } from '../utils/errors';
import { EnvironmentConfig } from '../config/environment';
import { loadMaildir } from '../records/maildir-loader';
import { ConversationIndex, ConversationIndexer } from './conversationIndexer';
import { ExportSummary, exportConversations } from './chatExporter';
import { logger } from '../utils/logger';

export interface ArchiveRunSummary {
  records: number;
  identities: number;
  conversations: number;
  threads: number;
  exported?: ExportSummary;
}

export function summarize(index: ConversationIndex): ArchiveRunSummary {
  let threads = 0;
  for (const conversation of index.conversations.values()) {
    threads += conversation.size;
  }
  return {
    records: index.recordCount,
    identities: index.identities.length,
    conversations: index.conversations.size,
    threads
  };
}

/**
 * Load a Maildir, resolve every participant, group messages into
 * conversations and optionally export them.
 */
export async function runArchive(
  config: EnvironmentConfig,
  indexer: ConversationIndexer = new ConversationIndexer()
): Promise<Result<ArchiveRunSummary, ArchiveError>> {
  if (!config.maildir) {
    return fail(new ConfigurationError(['a maildir is required']));
  }

  const loaded = await loadMaildir(config.maildir, config.timezone);
  if (!loaded.success) return loaded;

  const indexed = indexer.index(loaded.value);
  if (!indexed.success) return indexed;

  const summary = summarize(indexed.value);
  if (config.exportDir) {
    summary.exported = await exportConversations(indexed.value.conversations, config.exportDir, config.timezone);
  } else {
    logger.info('No export directory configured, skipping export', { operation: 'export' });
  }

  return ok(summary);
}
