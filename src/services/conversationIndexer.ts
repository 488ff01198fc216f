import { ConversationKey, IdentityFragment, Result, ok } from '../types/common';
import { IndexingError } from '../utils/errors';
import { SmsRecord } from '../records/sms-record';
import { senderOf, receiverOf } from '../identity/attributor';
import { CanonicalIdentity, IdentityRegistry } from '../identity/identity-registry';
import { InteractionIndex } from '../identity/interaction-index';
import { eventBus } from '../events/bus';
import { TypedEmitter } from '../events/types';
import { logger } from '../utils/logger';

/**
 * A message stripped of SMS/email details, with both participants resolved.
 */
export interface AttributedMessage {
  sender: CanonicalIdentity;
  receiver: CanonicalIdentity;
  timestamp: Date;
  id: number;
  thread: number;
  message: string;
}

/**
 * conversation key -> thread id -> messages in input order
 */
export type BucketTable = Map<ConversationKey, Map<number, AttributedMessage[]>>;

export interface ConversationIndex {
  conversations: BucketTable;
  identities: readonly CanonicalIdentity[];
  recordCount: number;
}

export interface ConversationIndexerOptions {
  events?: TypedEmitter;
  generateKey?: () => ConversationKey;
}

interface Attribution {
  record: SmsRecord;
  sender: IdentityFragment;
  receiver: IdentityFragment;
}

/**
 * Groups SMS records into per-conversation, per-thread message lists.
 *
 * Runs two passes: the first builds the complete picture of every participant,
 * the second links each record to its conversation. Any error aborts the whole
 * run; there is no partial output.
 */
export class ConversationIndexer {
  private readonly events: TypedEmitter;
  private readonly generateKey?: () => ConversationKey;

  constructor(options: ConversationIndexerOptions = {}) {
    this.events = options.events ?? eventBus;
    this.generateKey = options.generateKey;
  }

  index(records: readonly SmsRecord[]): Result<ConversationIndex, IndexingError> {
    const registry = new IdentityRegistry(this.events);
    const interactions = new InteractionIndex<CanonicalIdentity>(this.events, this.generateKey);

    logger.info('Indexing user metadata', { operation: 'index_users' }, { recordCount: records.length });
    const attributions: Attribution[] = [];
    for (const record of records) {
      const sender = senderOf(record);
      if (!sender.success) return sender;
      const receiver = receiverOf(record);
      if (!receiver.success) return receiver;

      const senderUpdate = registry.update(sender.value);
      if (!senderUpdate.success) return senderUpdate;
      const receiverUpdate = registry.update(receiver.value);
      if (!receiverUpdate.success) return receiverUpdate;

      attributions.push({ record, sender: sender.value, receiver: receiver.value });
    }

    const processed = registry.processPartials();
    if (!processed.success) return processed;

    logger.info('Indexing messages', { operation: 'index_messages' }, { identityCount: registry.size });
    const conversations: BucketTable = new Map();
    for (const { record, sender, receiver } of attributions) {
      const from = registry.find(sender);
      if (!from.success) return from;
      const to = registry.find(receiver);
      if (!to.success) return to;

      interactions.update(from.value, to.value);
      const key = interactions.get(from.value, to.value);
      if (!key.success) return key;
      const attached = record.attachConversationKey(key.value);
      if (!attached.success) return attached;

      const message: AttributedMessage = {
        sender: from.value,
        receiver: to.value,
        timestamp: record.timestamp,
        id: record.id,
        thread: record.thread,
        message: record.message
      };
      appendToBucket(conversations, key.value, record.thread, message);
    }

    this.events.emit('indexing_complete', {
      recordCount: records.length,
      identityCount: registry.size,
      conversationCount: conversations.size
    });

    return ok({ conversations, identities: registry.all(), recordCount: records.length });
  }
}

function appendToBucket(table: BucketTable, key: ConversationKey, thread: number, message: AttributedMessage): void {
  let threads = table.get(key);
  if (!threads) {
    threads = new Map();
    table.set(key, threads);
  }
  const messages = threads.get(thread);
  if (messages) {
    messages.push(message);
  } else {
    threads.set(thread, [message]);
  }
}
