import { InteractionIndex } from '../../src/identity/interaction-index';
import { TypedEventBus } from '../../src/events/bus';
import { UnknownInteractionError } from '../../src/utils/errors';
import { IdentityFragment } from '../../src/types/common';

describe('InteractionIndex', () => {
  let events: TypedEventBus;
  let index: InteractionIndex;
  let generated: number;

  const alice: IdentityFragment = { phone: null, name: 'Alice', email: null };
  const bob: IdentityFragment = { phone: null, name: 'Bob', email: null };
  const carol: IdentityFragment = { phone: null, name: 'Carol', email: null };

  beforeEach(() => {
    events = new TypedEventBus();
    generated = 0;
    index = new InteractionIndex(events, () => `key-${++generated}`);
  });

  afterEach(() => {
    events.removeAllListeners();
  });

  it('should return the same key for both orders of a pair', () => {
    const key = index.update(alice, bob);

    expect(key).toBe('key-1');
    expect(index.get(alice, bob)).toEqual({ success: true, value: 'key-1' });
    expect(index.get(bob, alice)).toEqual({ success: true, value: 'key-1' });
  });

  it('should keep the first key when a pair is registered again', () => {
    index.update(alice, bob);

    expect(index.update(bob, alice)).toBe('key-1');
    expect(index.update(alice, bob)).toBe('key-1');
    expect(generated).toBe(1);
    expect(index.size).toBe(1);
  });

  it('should give each pair its own key', () => {
    index.update(alice, bob);
    index.update(alice, carol);

    expect(index.get(alice, carol)).toEqual({ success: true, value: 'key-2' });
    expect(index.size).toBe(2);
  });

  it('should compare participants by object identity', () => {
    index.update(alice, bob);

    const lookalike: IdentityFragment = { phone: null, name: 'Alice', email: null };
    expect(index.get(lookalike, bob).error).toBeInstanceOf(UnknownInteractionError);
  });

  it('should fail for pairs that never interacted', () => {
    index.update(alice, bob);

    const result = index.get(bob, carol);

    expect(result.success).toBe(false);
    expect(result.error).toMatchObject({ code: 'UNKNOWN_INTERACTION' });
    expect(result.error?.message).toBe(
      'No conversation registered between (None, Bob, None) and (None, Carol, None)'
    );
  });

  it('should support a participant talking to themselves', () => {
    expect(index.update(alice, alice)).toBe('key-1');
    expect(index.get(alice, alice)).toEqual({ success: true, value: 'key-1' });
    expect(index.size).toBe(1);
  });

  it('should announce new conversations only once', () => {
    const created = jest.fn();
    events.on('interaction_created', created);

    index.update(alice, bob);
    index.update(bob, alice);

    expect(created).toHaveBeenCalledTimes(1);
    expect(created).toHaveBeenCalledWith({ conversationKey: 'key-1' });
  });

  it('should generate uuid keys by default', () => {
    const defaultIndex = new InteractionIndex(events);

    const key = defaultIndex.update(alice, bob);

    expect(key).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(defaultIndex.update(alice, carol)).not.toBe(key);
  });
});
