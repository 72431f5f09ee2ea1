import type { FlagId } from './flags';

/**
 * The partition of an argument list. Every piece of every token lands in at
 * most one of these.
 */
export interface Classification {
  /** Normalized search roots: absolute, with a trailing slash. */
  folders: readonly string[];
  /** Path parts to include, in the order given. */
  includeFragments: readonly string[];
  /** Lowercased path parts to exclude. */
  excludeFragments: ReadonlySet<string>;
  /** Flags, ordered by their last occurrence. */
  flags: ReadonlySet<FlagId>;
  /** 1-based result numbers. */
  selectorIndices: ReadonlySet<number>;
}
