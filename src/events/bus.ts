import { EventEmitter } from 'events';
import { TypedEmitter, EventName, EventPayload } from './types';
import { logger } from '../utils/logger';

type Listener<K extends EventName> = (payload: EventPayload<K>) => void;

/**
 * TypedEventBus - A type-safe event emitter for archive lifecycle events
 *
 * Listener failures are logged and re-emitted as `error` events; they never
 * propagate into the indexing code that emitted the event.
 */
class TypedEventBus extends EventEmitter implements TypedEmitter {
  private static instance: TypedEventBus;
  private readonly MAX_LISTENERS = 100;

  constructor() {
    super();
    this.setMaxListeners(this.MAX_LISTENERS);

    super.on('error', (error: Error) => {
      logger.error('Event bus error', error, {
        operation: 'event_bus_error'
      });
    });
  }

  static getInstance(): TypedEventBus {
    if (!TypedEventBus.instance) {
      TypedEventBus.instance = new TypedEventBus();
    }
    return TypedEventBus.instance;
  }

  emit<K extends EventName>(event: K, payload: EventPayload<K>): boolean {
    logger.debug('Event emitted', {
      operation: 'event_emit',
      eventType: event
    }, {
      payload
    });

    return super.emit(event, payload);
  }

  on<K extends EventName>(event: K, listener: Listener<K>): this {
    return super.on(event, this.wrap(event, listener));
  }

  once<K extends EventName>(event: K, listener: Listener<K>): this {
    return super.once(event, this.wrap(event, listener));
  }

  removeAllListeners<K extends EventName>(event?: K): this {
    if (event !== undefined) {
      return super.removeAllListeners(event);
    }
    // The bus keeps its own error handler
    for (const name of this.eventNames()) {
      if (name !== 'error') {
        super.removeAllListeners(name);
      }
    }
    return this;
  }

  listenerCount<K extends EventName>(event: K): number {
    return super.listenerCount(event);
  }

  private wrap<K extends EventName>(event: K, listener: Listener<K>): Listener<K> {
    return (payload: EventPayload<K>) => {
      try {
        listener(payload);
      } catch (error) {
        logger.error('Event listener error', error instanceof Error ? error : undefined, {
          operation: 'event_listener_error',
          eventType: event
        });
        super.emit('error', error);
      }
    };
  }
}

/**
 * Singleton event bus instance
 */
export const eventBus: TypedEmitter = TypedEventBus.getInstance();

export { TypedEventBus };
