import { FLAG_TABLE, type LinkMode, type OutputMode, type SortKey } from '../query/flags';
import type { Classification } from '../query/types';
import type { EntityKind, FragmentOrder, SearchSpec } from './types';

/** Hidden paths and build output, skipped unless `-a` is given. */
export const DEFAULT_EXCLUSION_PATTERNS: readonly string[] = ['*/.*', '*/build/*'];

const wrap = (fragment: string): string => `*${fragment}*`;

export function buildMatchPatterns(
  fragments: readonly string[],
  order: FragmentOrder,
): string[] {
  if (order === 'any-order' && fragments.length > 0) {
    return fragments.map(wrap);
  }
  return [wrap(fragments.join('*'))];
}

/**
 * Folds the classified flags into a search specification. Later sort flags
 * override earlier ones; `-F` wins over `-f`; containing-folder output wins
 * over file output.
 */
export function compileSearch(classification: Classification): SearchSpec {
  let sortKey: SortKey = 'modified';
  let sortAscending = true;
  let includeAll = false;
  let fragmentOrder: FragmentOrder = 'sequential';
  let entityKind: EntityKind = 'file';
  let outputMode: OutputMode = 'numbered';
  let openResults = false;
  let showMetadata = false;
  let linkMode: LinkMode = 'never';
  let printCommand = false;

  for (const flag of classification.flags) {
    const effect = FLAG_TABLE[flag].effect;
    switch (effect.kind) {
      case 'sort':
        sortKey = effect.key;
        sortAscending = effect.ascending;
        break;
      case 'includeAll':
        includeAll = true;
        break;
      case 'anyOrder':
        fragmentOrder = 'any-order';
        break;
      case 'directories':
        entityKind = 'directory';
        break;
      case 'output':
        if (outputMode !== 'folder-path') {
          outputMode = effect.mode;
        }
        openResults = openResults || effect.open;
        break;
      case 'metadata':
        showMetadata = true;
        break;
      case 'links':
        if (linkMode !== 'always') {
          linkMode = effect.mode;
        }
        break;
      case 'printCommand':
        printCommand = true;
        break;
      case 'help':
        break;
    }
  }

  const exclusionPatterns = [...classification.excludeFragments].map(wrap);
  if (!includeAll) {
    exclusionPatterns.push(...DEFAULT_EXCLUSION_PATTERNS);
  }

  return Object.freeze({
    folders: Object.freeze([...classification.folders]),
    includeFragments: Object.freeze([...classification.includeFragments]),
    matchPatterns: Object.freeze(buildMatchPatterns(classification.includeFragments, fragmentOrder)),
    exclusionPatterns: Object.freeze(exclusionPatterns),
    entityKind,
    sortKey,
    sortAscending,
    showMetadata,
    fragmentOrder,
    linkMode,
    outputMode,
    openResults,
    printCommand,
  });
}
