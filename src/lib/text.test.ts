import { describe, expect, it } from 'vitest';
import { joinNonEmpty, truncateText } from './text';

describe('truncateText', () => {
  it('cuts to the column width', () => {
    expect(truncateText('abcdef', 3)).toBe('abc');
    expect(truncateText('abc', 3)).toBe('abc');
    expect(truncateText(12345, 3)).toBe('123');
  });

  it('counts an emoji as one character', () => {
    expect(truncateText('Gift 🎁 box', 6)).toBe('Gift 🎁');
    expect(truncateText('🎁🎁🎁', 2)).toBe('🎁🎁');
    expect(truncateText('ab🎁', 3)).toBe('ab🎁');
  });

  it('turns absent values into empty strings', () => {
    expect(truncateText(null, 5)).toBe('');
    expect(truncateText(undefined, 5)).toBe('');
    expect(truncateText('abc', 0)).toBe('');
  });
});

describe('joinNonEmpty', () => {
  it('skips blank parts and trims the rest', () => {
    expect(joinNonEmpty([' Jane ', null, '', 'Doe'])).toBe('Jane Doe');
    expect(joinNonEmpty([undefined, '  '])).toBe('');
  });
});
