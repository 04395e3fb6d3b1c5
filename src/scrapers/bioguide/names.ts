import type { ParsedName } from './types';

// Generational suffix after a comma or a space: "Jr", "Jr.", "Sr", "Sr.", "I" to "IV"
const SUFFIX_PATTERN = /,?\s(Jr\.?|Sr\.?|IV|I{1,3})(?!\w)/;
const NICKNAME_PATTERN = /\s?\(([\w. ]+)\)/;

/**
 * Splits the raw `firstnames` field into first name, nickname and suffix.
 * The suffix is stripped before the nickname.
 *
 * @example
 * parseFirstNames('James Edward (Jim), Jr.')
 * // { firstName: 'James Edward', nickname: 'Jim', suffix: 'Jr.' }
 */
export function parseFirstNames(raw: string): ParsedName {
  let remainder = raw;

  let suffix: string | null = null;
  const suffixMatch = SUFFIX_PATTERN.exec(remainder);
  if (suffixMatch) {
    suffix = suffixMatch[1] ?? null;
    remainder = remainder.replace(suffixMatch[0], '');
  }

  let nickname: string | null = null;
  const nicknameMatch = NICKNAME_PATTERN.exec(remainder);
  if (nicknameMatch) {
    nickname = nicknameMatch[1]?.trim() || null;
    remainder = remainder.replace(nicknameMatch[0], '');
  }

  return { firstName: remainder.replace(/\s+/g, ' ').trim(), nickname, suffix };
}

/**
 * Title-cases a surname stored in capitals, keeping prefixes such as
 * "Mc", "La" or "De". Names already in mixed case are returned as is.
 */
export function fixLastNameCasing(name: string): string {
  const trimmed = name.trim();
  const prefixLength = /^[A-Z][a-z][A-Z]/.test(trimmed) ? 3 : 1;
  const prefix = trimmed.slice(0, prefixLength);
  const rest = trimmed.slice(prefixLength);

  if (/[a-z]/.test(rest)) {
    return trimmed;
  }
  return prefix + rest.toLowerCase();
}
