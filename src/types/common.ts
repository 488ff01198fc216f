/**
 * Common type definitions for the archive indexing pipeline
 */

/**
 * E.164-style phone number produced by `parsePhone`.
 *
 * The brand keeps raw header text from being passed where a normalized number
 * is expected.
 *
 * @example
 * const phone = parsePhone('(415) 555-0100'); // "+14155550100"
 */
export type NormalizedPhone = string & { readonly __brand: 'NormalizedPhone' };

/**
 * Whatever one header field tells us about a participant.
 *
 * Every slot is explicitly nullable; a fragment parsed from an empty header has
 * all three set to null.
 */
export interface IdentityFragment {
  readonly phone: NormalizedPhone | null;
  readonly name: string | null;
  readonly email: string | null;
}

export type IdentityField = keyof IdentityFragment;

export const EMPTY_FRAGMENT: IdentityFragment = { phone: null, name: null, email: null };

/**
 * SMS direction/status codes as written by the backup tool.
 */
export enum MessageKind {
  Received = 1,
  Sent = 2,
  Draft = 3,
  Outbox = 4,
  Failed = 5,
  Queued = 6
}

/**
 * Opaque identifier for an unordered pair of participants. Stable for one run.
 */
export type ConversationKey = string;

export interface Success<T> {
  success: true;
  value: T;
  error?: undefined;
}

export interface Failure<E> {
  success: false;
  value?: undefined;
  error: E;
}

/**
 * Outcome of an operation that can abort the run.
 *
 * Narrow on `success` before touching `value`:
 *
 * @example
 * ```ts
 * const result = registry.find(fragment);
 * if (!result.success) {
 *   return result;
 * }
 * use(result.value);
 * ```
 */
export type Result<T, E> = Success<T> | Failure<E>;

export const ok = <T>(value: T): Success<T> => ({ success: true, value });

export const fail = <E>(error: E): Failure<E> => ({ success: false, error });
