/** ASCII letters, digits and Cyrillic-script letters. Cyrillic signs and combining marks do not count. */
const MEANINGFUL_CHAR = /^(?:[A-Za-z0-9]|(?=\p{Script=Cyrillic})\p{L})$/u;

/**
 * Canonical form for comparing player input against configured vocabulary.
 * Stripped characters are deleted, not replaced by a separator:
 * "New York!" becomes "newyork".
 */
export function normalizeText(raw: string): string {
  return Array.from(raw)
    .filter((char) => MEANINGFUL_CHAR.test(char))
    .join('')
    .toLowerCase();
}
