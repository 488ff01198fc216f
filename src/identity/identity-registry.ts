import {
  IdentityField,
  IdentityFragment,
  NormalizedPhone,
  Result,
  ok,
  fail
} from '../types/common';
import {
  ConflictingIdentityError,
  IdentityNotFoundError,
  RegistryStateError,
  describeFragment
} from '../utils/errors';
import { eventBus } from '../events/bus';
import { MatchField, TypedEmitter } from '../events/types';
import { fragmentsEqual } from './fragment';
import { logger } from '../utils/logger';

// One upstream source writes missing names as the literal string "null".
const NULL_NAME_SENTINEL = 'null';

export function normalizeName(name: string | null): string | null {
  return name === NULL_NAME_SENTINEL || name === '' ? null : name;
}

/**
 * True when a fragment carries nothing to match on once the name sentinel is
 * dropped, e.g. an empty `To:` header.
 */
export function isBlankFragment(fragment: IdentityFragment): boolean {
  return fragment.phone === null && fragment.email === null && normalizeName(fragment.name) === null;
}

/**
 * One real participant, merged from every fragment known to describe them.
 *
 * Slots only ever go from empty to populated; the registry is the sole
 * writer.
 */
export class CanonicalIdentity implements IdentityFragment {
  phone: NormalizedPhone | null = null;
  name: string | null = null;
  email: string | null = null;

  toString(): string {
    return describeFragment(this);
  }
}

type Phase = 'collecting' | 'resolved';

/**
 * Accumulates identity fragments and deduplicates them into canonical
 * identities in two passes.
 *
 * Phone numbers are the strongest anchor, so fragments with a phone become
 * identities right away. Phone-less fragments are parked as partials and only
 * matched once every phone-anchored identity exists:
 *
 * ```ts
 * registry.update(sender);
 * registry.update(receiver);
 * registry.processPartials();
 * registry.find(sender);
 * ```
 */
export class IdentityRegistry {
  private readonly identities: CanonicalIdentity[] = [];
  private partials: IdentityFragment[] = [];
  private phase: Phase = 'collecting';

  constructor(private readonly events: TypedEmitter = eventBus) {}

  get size(): number {
    return this.identities.length;
  }

  get pendingPartials(): number {
    return this.partials.length;
  }

  all(): readonly CanonicalIdentity[] {
    return this.identities;
  }

  update(fragment: IdentityFragment): Result<void, ConflictingIdentityError | RegistryStateError> {
    if (this.phase !== 'collecting') {
      return fail(new RegistryStateError('update', 'partials have already been processed'));
    }

    if (fragment.phone === null) {
      if (!this.partials.some(partial => fragmentsEqual(partial, fragment))) {
        this.partials.push(fragment);
      }
      return ok(undefined);
    }

    const existing = this.identities.find(identity => identity.phone === fragment.phone);
    if (existing) {
      return mergeFields(existing, fragment, ['name', 'email']);
    }

    const created = new CanonicalIdentity();
    const merged = mergeFields(created, fragment, ['phone', 'name', 'email']);
    if (!merged.success) {
      return merged;
    }
    this.identities.push(created);
    return ok(undefined);
  }

  /**
   * Fold every partial into the identity it matches by phone, then email, then
   * name; the first identity in insertion order that matches wins. Partials
   * that match nothing become identities of their own.
   */
  processPartials(): Result<void, ConflictingIdentityError | RegistryStateError> {
    if (this.phase !== 'collecting') {
      return fail(new RegistryStateError('processPartials', 'partials have already been processed'));
    }

    for (const partial of this.partials) {
      // All blank fragments share one unknown participant
      if (isBlankFragment(partial) && this.unknownParticipant()) {
        continue;
      }

      const match = this.match(partial);
      if (match) {
        const merged = mergeFields(match.identity, partial, OTHER_FIELDS[match.field]);
        if (!merged.success) {
          return merged;
        }
        logger.warn(`Partial user match on ${match.field}`, {
          operation: 'process_partials',
          field: match.field
        }, { partial: describeFragment(partial), user: match.identity.toString() });
        this.events.emit('partial_resolved', { identity: match.identity.toString(), matchedOn: match.field });
        continue;
      }

      const promoted = new CanonicalIdentity();
      const merged = mergeFields(promoted, partial, ['phone', 'name', 'email']);
      if (!merged.success) {
        return merged;
      }
      this.identities.push(promoted);
      logger.warn('Partial user added to users', {
        operation: 'process_partials'
      }, { partial: describeFragment(partial) });
      this.events.emit('partial_resolved', { identity: promoted.toString(), matchedOn: 'none' });
    }

    this.partials = [];
    this.phase = 'resolved';
    return ok(undefined);
  }

  find(fragment: IdentityFragment): Result<CanonicalIdentity, IdentityNotFoundError | RegistryStateError> {
    if (this.phase !== 'resolved') {
      return fail(new RegistryStateError('find', 'partials have not been processed yet'));
    }

    if (isBlankFragment(fragment)) {
      const unknown = this.unknownParticipant();
      if (unknown) {
        return ok(unknown);
      }
    }

    const match = this.match(fragment);
    if (!match) {
      return fail(new IdentityNotFoundError(fragment));
    }
    return ok(match.identity);
  }

  private unknownParticipant(): CanonicalIdentity | undefined {
    return this.identities.find(isBlankFragment);
  }

  private match(fragment: IdentityFragment): { identity: CanonicalIdentity; field: MatchField } | null {
    const name = normalizeName(fragment.name);

    for (const identity of this.identities) {
      if (fragment.phone !== null && identity.phone === fragment.phone) {
        return { identity, field: 'phone' };
      }
      if (fragment.email !== null && identity.email === fragment.email) {
        return { identity, field: 'email' };
      }
      if (name !== null && identity.name === name) {
        return { identity, field: 'name' };
      }
    }
    return null;
  }
}

const OTHER_FIELDS: Record<MatchField, IdentityField[]> = {
  phone: ['name', 'email'],
  email: ['phone', 'name'],
  name: ['phone', 'email']
};

function mergeFields(
  identity: CanonicalIdentity,
  fragment: IdentityFragment,
  fields: IdentityField[]
): Result<void, ConflictingIdentityError> {
  for (const field of fields) {
    const updated = updateField(identity, field, fragment);
    if (!updated.success) {
      return updated;
    }
  }
  return ok(undefined);
}

/**
 * Copy one slot from `incoming` into `identity` unless it would replace a
 * different, already populated value.
 */
export function updateField(
  identity: CanonicalIdentity,
  field: IdentityField,
  incoming: IdentityFragment
): Result<void, ConflictingIdentityError> {
  switch (field) {
    case 'phone':
      return assign(identity.phone, incoming.phone, field, value => { identity.phone = value; });
    case 'name':
      return assign(normalizeName(identity.name), normalizeName(incoming.name), field, value => { identity.name = value; });
    case 'email':
      return assign(identity.email, incoming.email, field, value => { identity.email = value; });
  }
}

function assign<T extends string>(
  existing: T | null,
  incoming: T | null,
  field: IdentityField,
  set: (value: T) => void
): Result<void, ConflictingIdentityError> {
  if (incoming === null || incoming === '' || incoming === existing) {
    return ok(undefined);
  }
  if (existing === null || existing === '') {
    set(incoming);
    return ok(undefined);
  }

  logger.warn(`User has two ${field} values`, { operation: 'update_field', field }, { existing, incoming });
  return fail(new ConflictingIdentityError(field, existing, incoming));
}
