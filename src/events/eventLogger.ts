import { eventBus } from './bus';
import { logger } from '../utils/logger';
import { EventName } from './types';

const LIFECYCLE_EVENTS: EventName[] = [
  'record_loaded',
  'partial_resolved',
  'interaction_created',
  'indexing_complete'
];

/**
 * EventLogger - Connects the event bus to the logging system
 */
class EventLogger {
  private static instance: EventLogger;

  constructor() {
    this.initializeEventLogging();
  }

  static getInstance(): EventLogger {
    if (!EventLogger.instance) {
      EventLogger.instance = new EventLogger();
    }
    return EventLogger.instance;
  }

  private initializeEventLogging(): void {
    eventBus.on('record_loaded', (payload) => {
      logger.debug('SMS record loaded', {
        operation: 'record_loaded',
        recordId: payload.recordId,
        threadId: payload.threadId,
        eventType: 'lifecycle'
      });
    });

    eventBus.on('partial_resolved', (payload) => {
      logger.debug('Partial user resolved', {
        operation: 'partial_resolved',
        eventType: 'lifecycle'
      }, {
        identity: payload.identity,
        matchedOn: payload.matchedOn
      });
    });

    eventBus.on('interaction_created', (payload) => {
      logger.debug('Conversation created', {
        operation: 'interaction_created',
        conversationKey: payload.conversationKey,
        eventType: 'lifecycle'
      });
    });

    eventBus.on('indexing_complete', (payload) => {
      logger.info('Indexing complete', {
        operation: 'indexing_complete',
        eventType: 'lifecycle'
      }, {
        recordCount: payload.recordCount,
        identityCount: payload.identityCount,
        conversationCount: payload.conversationCount
      });
    });
  }

  stop(): void {
    for (const event of LIFECYCLE_EVENTS) {
      eventBus.removeAllListeners(event);
    }
  }
}

// Initialize event logging automatically when module is imported
const eventLogger = EventLogger.getInstance();

export { eventLogger, EventLogger };
