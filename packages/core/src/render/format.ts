import type { ResultEntry } from '../results/types';

export const THOUSANDS_SEPARATOR = "'";
export const SIZE_UNIT = 'ᴮ';
export const SIZE_COLUMN_WIDTH = 15;

export function groupThousands(digits: string, separator: string = THOUSANDS_SEPARATOR): string {
  const groups: string[] = [];
  for (let end = digits.length; end > 0; end -= 3) {
    groups.unshift(digits.slice(Math.max(0, end - 3), end));
  }
  return groups.join(separator);
}

/**
 * `<timestamp> <grouped size, right-aligned>ᴮ `: the block placed before the
 * path when metadata is shown. Empty for entries read without metadata.
 */
export function formatMetadataColumns(entry: ResultEntry): string {
  if (entry.size === undefined || entry.modifiedAt === undefined) {
    return '';
  }
  const size = groupThousands(String(entry.size)).padStart(SIZE_COLUMN_WIDTH, ' ');
  return `${entry.modifiedAt} ${size}${SIZE_UNIT} `;
}
