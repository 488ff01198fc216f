import { IdentityFragment, NormalizedPhone, EMPTY_FRAGMENT } from '../types/common';
import { parsePhone } from './phone';

const UNKNOWN_PERSON_SUFFIX = '@unknown.person';
const SMS_WITH_PREFIX = 'SMS with ';
const ANGLE_ADDRESS = /^([^<]*)<([^<>]*)>\s*$/;

/**
 * Parse one header value into whatever identity information it carries.
 *
 * Handles:
 *  - phone numbers in any common format
 *  - a bare email address
 *  - `"Real Name" <email>`
 *  - `"Real Name" <phone@unknown.person>`
 *  - `phone@unknown.person` and `email@domain@unknown.person`
 *  - `SMS with <phone or name>` subjects
 */
export function parseIdentityFragment(raw: string | null | undefined): IdentityFragment {
  if (raw === null || raw === undefined) {
    return EMPTY_FRAGMENT;
  }

  const named = parseNamedUnknownPerson(raw.trim());
  if (named) {
    return named;
  }

  let data = raw.trim();
  if (raw.includes(UNKNOWN_PERSON_SUFFIX)) {
    data = data.slice(0, data.lastIndexOf('@'));
  }
  if (raw.includes(SMS_WITH_PREFIX)) {
    data = data.slice(data.indexOf(SMS_WITH_PREFIX) + SMS_WITH_PREFIX.length).trim();
  }

  const phone = parsePhone(data);
  if (phone) {
    return fragment(phone, null, null);
  }

  if (data.includes('@')) {
    const angle = ANGLE_ADDRESS.exec(data);
    if (angle) {
      return fragment(null, stripChars(angle[1], '" '), stripChars(angle[2], '<> '));
    }
    return fragment(null, null, data);
  }

  return fragment(null, data, null);
}

/**
 * `"Bob" <4155550100@unknown.person>` carries both a name and a phone; the
 * generic suffix handling would leave the name glued to the number.
 */
function parseNamedUnknownPerson(data: string): IdentityFragment | null {
  const angle = ANGLE_ADDRESS.exec(data);
  if (!angle) {
    return null;
  }

  const address = stripChars(angle[2], ' ');
  if (!address.endsWith(UNKNOWN_PERSON_SUFFIX)) {
    return null;
  }

  const inner = address.slice(0, -UNKNOWN_PERSON_SUFFIX.length);
  const name = stripChars(angle[1], '" ');
  const phone = parsePhone(inner);
  if (phone) {
    return fragment(phone, name, null);
  }
  if (inner.includes('@')) {
    return fragment(null, name, inner);
  }
  return null;
}

function fragment(phone: NormalizedPhone | null, name: string | null, email: string | null): IdentityFragment {
  return {
    phone,
    name: name === null || name.length === 0 ? null : name,
    email: email === null || email.length === 0 ? null : email
  };
}

function stripChars(value: string, chars: string): string {
  let start = 0;
  let end = value.length;
  while (start < end && chars.includes(value[start])) start++;
  while (end > start && chars.includes(value[end - 1])) end--;
  return value.slice(start, end);
}

export function fragmentsEqual(a: IdentityFragment, b: IdentityFragment): boolean {
  return a.phone === b.phone && a.name === b.name && a.email === b.email;
}
