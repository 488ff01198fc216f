import { NormalizedPhone } from '../types/common';

const PHONE_CHARACTERS = /^[\d\s()+\-.]+$/;
const E164 = /^\+\d{3,15}$/;
const MIN_DIGITS = 3;
const MAX_DIGITS = 15;

export function isNormalizedPhone(value: string): value is NormalizedPhone {
  return E164.test(value);
}

/**
 * Parse header text as a phone number, assuming US numbering for national
 * formats. Returns null when the text is not a phone number at all.
 */
export function parsePhone(raw: string): NormalizedPhone | null {
  const trimmed = raw.trim();
  if (!PHONE_CHARACTERS.test(trimmed)) {
    return null;
  }

  const digits = trimmed.replace(/\D/g, '');
  if (digits.length < MIN_DIGITS || digits.length > MAX_DIGITS) {
    return null;
  }

  // Ensure E.164 format
  const normalized = !trimmed.startsWith('+') && digits.length === 10 ? `+1${digits}` : `+${digits}`;
  return isNormalizedPhone(normalized) ? normalized : null;
}
