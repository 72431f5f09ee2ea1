/**
 * Reserved single-token flags. Flags are case-sensitive and are never
 * stacked: `-pin` is an excluded path part, not `-p -i -n`.
 */
export const FLAG_IDS = [
  '-n',
  '-N',
  '-s',
  '-S',
  '-m',
  '-M',
  '-a',
  '-r',
  '-d',
  '-q',
  '-Q',
  '-o',
  '-O',
  '-i',
  '-f',
  '-F',
  '-p',
  '-h',
] as const;

export type FlagId = (typeof FLAG_IDS)[number];

export type FlagGroup = 'sort' | 'filter' | 'select' | 'info';

export type SortKey = 'name' | 'size' | 'modified';

export type OutputMode = 'numbered' | 'file-path' | 'folder-path';

export type LinkMode = 'never' | 'on-demand' | 'always';

/**
 * What a flag does to the compiled search. Each flag sets exactly one kind
 * of effect; the compiler folds them in the order the flags were given.
 */
export type FlagEffect =
  | { kind: 'sort'; key: SortKey; ascending: boolean }
  | { kind: 'includeAll' }
  | { kind: 'anyOrder' }
  | { kind: 'directories' }
  | { kind: 'output'; mode: Exclude<OutputMode, 'numbered'>; open: boolean }
  | { kind: 'metadata' }
  | { kind: 'links'; mode: Exclude<LinkMode, 'never'> }
  | { kind: 'printCommand' }
  | { kind: 'help' };

export interface FlagDefinition {
  group: FlagGroup;
  effect: FlagEffect;
  /** Help line, without the flag itself. */
  summary: string;
}

export const FLAG_TABLE: Readonly<Record<FlagId, FlagDefinition>> = {
  '-n': {
    group: 'sort',
    effect: { kind: 'sort', key: 'name', ascending: true },
    summary: 'sort by name, a to Z',
  },
  '-N': {
    group: 'sort',
    effect: { kind: 'sort', key: 'name', ascending: false },
    summary: 'sort by name, Z to a',
  },
  '-s': {
    group: 'sort',
    effect: { kind: 'sort', key: 'size', ascending: true },
    summary: 'sort by size, small to big',
  },
  '-S': {
    group: 'sort',
    effect: { kind: 'sort', key: 'size', ascending: false },
    summary: 'sort by size, big to small',
  },
  '-m': {
    group: 'sort',
    effect: { kind: 'sort', key: 'modified', ascending: false },
    summary: 'sort by modified time, new to old',
  },
  '-M': {
    group: 'sort',
    effect: { kind: 'sort', key: 'modified', ascending: true },
    summary: 'sort by modified time, old to new (default)',
  },
  '-a': {
    group: 'filter',
    effect: { kind: 'includeAll' },
    summary: 'include all hidden files, hidden and build directories',
  },
  '-r': {
    group: 'filter',
    effect: { kind: 'anyOrder' },
    summary: 'include reordered path parts, not only in given order',
  },
  '-d': {
    group: 'filter',
    effect: { kind: 'directories' },
    summary: 'search directories instead of files, not going into the found ones',
  },
  '-q': {
    group: 'select',
    effect: { kind: 'output', mode: 'file-path', open: false },
    summary: 'select quoted unformatted result file path',
  },
  '-Q': {
    group: 'select',
    effect: { kind: 'output', mode: 'folder-path', open: false },
    summary: 'select quoted unformatted result containing directory path',
  },
  '-o': {
    group: 'select',
    effect: { kind: 'output', mode: 'file-path', open: true },
    summary: 'select quoted and open each listed file',
  },
  '-O': {
    group: 'select',
    effect: { kind: 'output', mode: 'folder-path', open: true },
    summary: 'select quoted and open each listed containing directory',
  },
  '-i': {
    group: 'info',
    effect: { kind: 'metadata' },
    summary: 'info about modified times and sizes for results',
  },
  '-f': {
    group: 'info',
    effect: { kind: 'links', mode: 'on-demand' },
    summary: 'show as file:// links the paths that need escaping',
  },
  '-F': {
    group: 'info',
    effect: { kind: 'links', mode: 'always' },
    summary: 'show all paths as file:// links',
  },
  '-p': {
    group: 'info',
    effect: { kind: 'printCommand' },
    summary: 'print underlying find command',
  },
  '-h': {
    group: 'info',
    effect: { kind: 'help' },
    summary: 'help information',
  },
};

export function isFlagId(token: string): token is FlagId {
  return Object.prototype.hasOwnProperty.call(FLAG_TABLE, token);
}
