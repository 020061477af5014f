import { describe, expect, it } from 'vitest';
import { normalizeText } from '../normalize';

describe('normalizeText', () => {
  it('strips punctuation and whitespace and lowercases', () => {
    expect(normalizeText(' Hello!! ')).toBe('hello');
    expect(normalizeText('hello')).toBe('hello');
  });

  it('deletes separators instead of collapsing them to spaces', () => {
    expect(normalizeText('New  York, NY')).toBe('newyorkny');
  });

  it('keeps digits and Cyrillic letters', () => {
    expect(normalizeText('Ответ: 42!')).toBe('ответ42');
    expect(normalizeText('ДА')).toBe('да');
    expect(normalizeText('Ёлка')).toBe('ёлка');
  });

  it('drops letters outside the ASCII and Cyrillic ranges', () => {
    expect(normalizeText('café')).toBe('caf');
    expect(normalizeText('👍 yes')).toBe('yes');
  });

  it('drops letters that only case-fold into ASCII', () => {
    expect(normalizeText('\u017Ftop')).toBe('top');
    expect(normalizeText('\u212Aelvin')).toBe('elvin');
  });

  it('drops Cyrillic signs and combining marks', () => {
    expect(normalizeText('\u0482 5')).toBe('5');
    expect(normalizeText('\u0430\u0483\u0431')).toBe('аб');
  });

  it('returns an empty string when nothing meaningful is left', () => {
    expect(normalizeText('?!… ')).toBe('');
  });

  it('is idempotent', () => {
    for (const raw of [' Hello!! ', 'Ответ: 42!', 'a-b_c d', '']) {
      const once = normalizeText(raw);
      expect(normalizeText(once)).toBe(once);
    }
  });
});
