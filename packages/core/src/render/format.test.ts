import { describe, it, expect } from 'vitest';
import { formatMetadataColumns, groupThousands } from './format';

describe('groupThousands', () => {
  it.each([
    ['', ''],
    ['7', '7'],
    ['123', '123'],
    ['1234', "1'234"],
    ['1234567', "1'234'567"],
  ])('groups %s', (digits, grouped) => {
    expect(groupThousands(digits)).toBe(grouped);
  });

  it('accepts another separator', () => {
    expect(groupThousands('1234567', ',')).toBe('1,234,567');
  });
});

describe('formatMetadataColumns', () => {
  it('aligns the size column and marks the unit', () => {
    const entry = {
      index: 1,
      rawLine: '',
      size: 1234567,
      modifiedAt: '2024-03-05 09:08:07',
      path: '/a',
    };
    expect(formatMetadataColumns(entry)).toBe("2024-03-05 09:08:07 " + ' '.repeat(6) + "1'234'567ᴮ ");
  });

  it('is empty for entries without metadata', () => {
    expect(formatMetadataColumns({ index: 1, rawLine: '/a', path: '/a' })).toBe('');
  });
});
