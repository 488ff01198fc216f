import { IdentityRegistry, CanonicalIdentity, normalizeName, updateField } from '../../src/identity/identity-registry';
import { TypedEventBus } from '../../src/events/bus';
import { PartialResolvedEvent } from '../../src/events/types';
import { ConflictingIdentityError, IdentityNotFoundError, RegistryStateError } from '../../src/utils/errors';
import { IdentityFragment } from '../../src/types/common';
import { parsePhone } from '../../src/identity/phone';

function phone(raw: string) {
  const parsed = parsePhone(raw);
  if (!parsed) {
    throw new Error(`not a phone: ${raw}`);
  }
  return parsed;
}

const P1 = phone('4155550100');
const P2 = phone('4155550111');

function frag(partial: Partial<IdentityFragment>): IdentityFragment {
  return { phone: null, name: null, email: null, ...partial };
}

describe('IdentityRegistry', () => {
  let events: TypedEventBus;
  let registry: IdentityRegistry;

  beforeEach(() => {
    events = new TypedEventBus();
    registry = new IdentityRegistry(events);
  });

  afterEach(() => {
    events.removeAllListeners();
  });

  function resolveAll(...fragments: IdentityFragment[]): void {
    for (const fragment of fragments) {
      expect(registry.update(fragment).success).toBe(true);
    }
    expect(registry.processPartials().success).toBe(true);
  }

  function findOrThrow(fragment: IdentityFragment): CanonicalIdentity {
    const found = registry.find(fragment);
    if (!found.success) {
      throw found.error;
    }
    return found.value;
  }

  describe('update', () => {
    it('should merge fragments sharing a phone into one identity', () => {
      resolveAll(
        frag({ phone: P1 }),
        frag({ phone: P1, name: 'Bob' }),
        frag({ phone: P1, email: 'bob@example.com' })
      );

      const byPhone = findOrThrow(frag({ phone: P1 }));
      expect(findOrThrow(frag({ name: 'Bob' }))).toBe(byPhone);
      expect(findOrThrow(frag({ email: 'bob@example.com' }))).toBe(byPhone);
      expect(byPhone).toMatchObject({ phone: P1, name: 'Bob', email: 'bob@example.com' });
      expect(registry.size).toBe(1);
    });

    it('should be idempotent for identical fragments', () => {
      const withPhone = frag({ phone: P1, name: 'Bob' });
      const withoutPhone = frag({ name: 'Carol', email: 'carol@example.com' });

      expect(registry.update(withPhone)).toEqual({ success: true, value: undefined });
      expect(registry.update(withPhone)).toEqual({ success: true, value: undefined });
      expect(registry.update(withoutPhone).success).toBe(true);
      expect(registry.update(withoutPhone).success).toBe(true);

      expect(registry.size).toBe(1);
      expect(registry.pendingPartials).toBe(1);
    });

    it('should fail on a second, different name for the same phone', () => {
      registry.update(frag({ phone: P1, name: 'Alice' }));

      const result = registry.update(frag({ phone: P1, name: 'Bob' }));

      expect(result.success).toBe(false);
      expect(result.error).toBeInstanceOf(ConflictingIdentityError);
      expect(result.error).toMatchObject({
        code: 'CONFLICTING_IDENTITY',
        field: 'name',
        existing: 'Alice',
        incoming: 'Bob'
      });
    });

    it('should treat the "null" name sentinel as empty', () => {
      resolveAll(
        frag({ phone: P1 }),
        frag({ phone: P1, name: 'null' }),
        frag({ phone: P2, name: 'null' })
      );

      expect(findOrThrow(frag({ phone: P1 })).name).toBeNull();
      expect(findOrThrow(frag({ phone: P2 })).name).toBeNull();
    });

    it('should reject updates once partials are processed', () => {
      resolveAll(frag({ phone: P1 }));

      const result = registry.update(frag({ phone: P2 }));

      expect(result.error).toBeInstanceOf(RegistryStateError);
    });
  });

  describe('processPartials', () => {
    it('should fold a partial into the identity with the same email', () => {
      resolveAll(
        frag({ phone: P1, email: 'alice@example.com' }),
        frag({ name: 'Alice', email: 'alice@example.com' })
      );

      expect(registry.size).toBe(1);
      expect(findOrThrow(frag({ phone: P1 }))).toMatchObject({ name: 'Alice', email: 'alice@example.com' });
    });

    it('should fold a partial into the identity with the same name', () => {
      resolveAll(
        frag({ phone: P1, name: 'Alice' }),
        frag({ name: 'Alice', email: 'alice@example.com' })
      );

      expect(registry.size).toBe(1);
      expect(findOrThrow(frag({ phone: P1 }))).toMatchObject({ name: 'Alice', email: 'alice@example.com' });
    });

    it('should stop at the first identity in insertion order that matches any field', () => {
      resolveAll(
        frag({ phone: P1, name: 'Sam' }),
        frag({ phone: P2, email: 'sam@example.com' }),
        frag({ name: 'Sam', email: 'sam@example.com' })
      );

      const first = findOrThrow(frag({ phone: P1 }));
      const second = findOrThrow(frag({ phone: P2 }));
      expect(first.email).toBe('sam@example.com');
      expect(second.name).toBeNull();
      expect(findOrThrow(frag({ email: 'sam@example.com' }))).toBe(first);
    });

    it('should promote unmatched partials and match later partials against them', () => {
      resolveAll(
        frag({ name: 'Me' }),
        frag({ name: 'Me', email: 'me@example.com' })
      );

      expect(registry.size).toBe(1);
      expect(registry.pendingPartials).toBe(0);
      expect(findOrThrow(frag({ email: 'me@example.com' }))).toMatchObject({
        phone: null,
        name: 'Me',
        email: 'me@example.com'
      });
    });

    it('should fail when a partial contradicts the identity it matches', () => {
      registry.update(frag({ phone: P1, name: 'Alice', email: 'alice@example.com' }));
      registry.update(frag({ name: 'Bob', email: 'alice@example.com' }));

      const result = registry.processPartials();

      expect(result.error).toMatchObject({ field: 'name', existing: 'Alice', incoming: 'Bob' });
    });

    it('should share one unknown identity between blank partials', () => {
      resolveAll(
        frag({ phone: P1, name: 'Bob' }),
        frag({ name: 'null' }),
        frag({})
      );

      const unknown = findOrThrow(frag({}));
      expect(findOrThrow(frag({ name: 'null' }))).toBe(unknown);
      expect(unknown).toMatchObject({ phone: null, name: null, email: null });
      expect(registry.size).toBe(2);
    });

    it('should only run once', () => {
      resolveAll(frag({ name: 'Me' }));

      expect(registry.processPartials().error).toBeInstanceOf(RegistryStateError);
    });

    it('should announce how each partial was resolved', () => {
      const resolved: PartialResolvedEvent[] = [];
      events.on('partial_resolved', payload => resolved.push(payload));

      resolveAll(
        frag({ phone: P1, name: 'Bob' }),
        frag({ name: 'Bob', email: 'bob@example.com' }),
        frag({ email: 'me@example.com' })
      );

      expect(resolved).toEqual([
        { identity: '(+14155550100, Bob, bob@example.com)', matchedOn: 'name' },
        { identity: '(None, None, me@example.com)', matchedOn: 'none' }
      ]);
    });
  });

  describe('find', () => {
    it('should require partials to be processed first', () => {
      registry.update(frag({ phone: P1 }));

      expect(registry.find(frag({ phone: P1 })).error).toBeInstanceOf(RegistryStateError);
    });

    it('should fail for a fragment nobody matches', () => {
      resolveAll(frag({ phone: P1, name: 'Bob' }));

      const result = registry.find(frag({ phone: P2, name: 'Carol' }));

      expect(result.error).toBeInstanceOf(IdentityNotFoundError);
      expect(result.error).toMatchObject({ code: 'IDENTITY_NOT_FOUND' });
    });

    it('should not match on empty fields', () => {
      resolveAll(frag({ name: 'Me' }));

      expect(registry.find(frag({})).error).toBeInstanceOf(IdentityNotFoundError);
    });
  });
});

describe('updateField', () => {
  it('should fill an empty slot and keep equal values', () => {
    const identity = new CanonicalIdentity();

    expect(updateField(identity, 'email', frag({ email: 'a@example.com' })).success).toBe(true);
    expect(updateField(identity, 'email', frag({ email: 'a@example.com' })).success).toBe(true);
    expect(updateField(identity, 'email', frag({})).success).toBe(true);

    expect(identity.email).toBe('a@example.com');
  });

  it('should refuse to overwrite a different phone', () => {
    const identity = new CanonicalIdentity();
    updateField(identity, 'phone', frag({ phone: P1 }));

    const result = updateField(identity, 'phone', frag({ phone: P2 }));

    expect(result.error).toMatchObject({ field: 'phone', existing: P1, incoming: P2 });
    expect(identity.phone).toBe(P1);
  });
});

describe('normalizeName', () => {
  it('should map the sentinel and empty names to null', () => {
    expect(normalizeName('null')).toBeNull();
    expect(normalizeName('')).toBeNull();
    expect(normalizeName(null)).toBeNull();
    expect(normalizeName('Nullah')).toBe('Nullah');
  });
});
