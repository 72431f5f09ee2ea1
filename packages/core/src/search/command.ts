import { shellQuote } from '@findfile/shared';
import type { SortKey } from '../query/flags';
import type { SearchSpec } from './types';

/** `du` output: size, tab, `YYYY-MM-DD HH:MM:SS`, tab, path. */
const METADATA_COMMAND = 'du -b -s --time --time-style="+%Y-%m-%d %H:%M:%S" {} +';

// sort splits du output on blanks: 1 size, 2 date, 3 time, 4+ path
const SORT_KEYS: Readonly<Record<SortKey, string>> = {
  name: '-k 4,2147483647',
  size: '-k 1 -n',
  modified: '-k 2,3',
};

// `cut -d':' -f2-` leaves `MM:SS<tab>path`; `cut -c7-` then drops those 6 characters
const STRIP_METADATA = " | cut -d':' -f2- | cut -c7-";

const ipath = (pattern: string): string => `-ipath "${pattern}"`;

/**
 * Renders a search specification as the shell pipeline that performs it.
 * This exact string is both executed and shown to the user by `-p`.
 */
export function buildFindCommand(spec: SearchSpec): string {
  const folders = spec.folders.map(shellQuote).join(' ');
  const type = spec.entityKind === 'directory' ? 'd' : 'f';
  const matches = spec.matchPatterns.map(ipath).join(' ');
  const exclusions = spec.exclusionPatterns.map((pattern) => ` ! ${ipath(pattern)}`).join('');
  const pruning = spec.entityKind === 'directory' ? ' -prune' : '';
  const reverse = spec.sortAscending ? '' : '-r ';
  const cut = spec.showMetadata ? '' : STRIP_METADATA;

  return (
    `find ${folders} -type ${type} ${matches}${exclusions}${pruning} 2>/dev/null` +
    ` -exec ${METADATA_COMMAND}` +
    ` | sort ${reverse}${SORT_KEYS[spec.sortKey]}${cut}`
  );
}
