import { v4 as uuidv4 } from 'uuid';
import { ConversationKey, IdentityFragment, Result, ok, fail } from '../types/common';
import { UnknownInteractionError } from '../utils/errors';
import { eventBus } from '../events/bus';
import { TypedEmitter } from '../events/types';

/**
 * Conversation keys for every pair of participants that exchanged a message.
 *
 * A key is unique to the pair regardless of who sent what, so both directions
 * of a conversation land in the same log. Participants are compared by object
 * identity, which is why callers pass the registry's canonical identities.
 */
export class InteractionIndex<T extends IdentityFragment = IdentityFragment> {
  private readonly pairs = new Map<T, Map<T, ConversationKey>>();
  private readonly keys = new Set<ConversationKey>();

  constructor(
    private readonly events: TypedEmitter = eventBus,
    private readonly generateKey: () => ConversationKey = () => uuidv4()
  ) {}

  get size(): number {
    return this.keys.size;
  }

  /**
   * Register the pair. Calling again for a known pair, in either order, keeps
   * the existing key.
   */
  update(first: T, second: T): ConversationKey {
    const existing = this.lookup(first, second);
    if (existing !== undefined) {
      return existing;
    }

    const key = this.generateKey();
    this.store(first, second, key);
    this.store(second, first, key);
    this.keys.add(key);
    this.events.emit('interaction_created', { conversationKey: key });
    return key;
  }

  get(first: T, second: T): Result<ConversationKey, UnknownInteractionError> {
    const key = this.lookup(first, second);
    if (key === undefined) {
      return fail(new UnknownInteractionError(first, second));
    }
    return ok(key);
  }

  private lookup(first: T, second: T): ConversationKey | undefined {
    return this.pairs.get(first)?.get(second);
  }

  private store(first: T, second: T, key: ConversationKey): void {
    let partners = this.pairs.get(first);
    if (!partners) {
      partners = new Map();
      this.pairs.set(first, partners);
    }
    partners.set(second, key);
  }
}
