import type { LinkMode, OutputMode, SortKey } from '../query/flags';

export type EntityKind = 'file' | 'directory';

export type FragmentOrder = 'sequential' | 'any-order';

/**
 * Declarative description of one search. Built once per invocation by
 * `compileSearch` and never changed afterwards.
 */
export interface SearchSpec {
  readonly folders: readonly string[];
  /** Include fragments as typed, used for highlighting. */
  readonly includeFragments: readonly string[];
  /** Case-insensitive path globs that must all match. `*` spans `/`. */
  readonly matchPatterns: readonly string[];
  /** Case-insensitive path globs none of which may match. */
  readonly exclusionPatterns: readonly string[];
  readonly entityKind: EntityKind;
  readonly sortKey: SortKey;
  readonly sortAscending: boolean;
  readonly showMetadata: boolean;
  readonly fragmentOrder: FragmentOrder;
  readonly linkMode: LinkMode;
  readonly outputMode: OutputMode;
  readonly openResults: boolean;
  readonly printCommand: boolean;
}
