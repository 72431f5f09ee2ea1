import type { SearchSpec } from './types';

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compiles a `find -ipath` glob: case-insensitive, anchored, `*` matching any
 * run of characters including `/`, `?` matching one character.
 */
export function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map((char) => {
      if (char === '*') return '.*';
      if (char === '?') return '.';
      return escapeRegExp(char);
    })
    .join('');
  return new RegExp(`^${source}$`, 'is');
}

/**
 * Whether `path` would be reported by the compiled search, ignoring the
 * entity kind and pruning which only the filesystem walk can judge.
 */
export function matchesSearchSpec(spec: SearchSpec, path: string): boolean {
  if (!spec.folders.some((folder) => path.startsWith(folder))) {
    return false;
  }
  const included = spec.matchPatterns.every((pattern) => globToRegExp(pattern).test(path));
  if (!included) {
    return false;
  }
  return !spec.exclusionPatterns.some((pattern) => globToRegExp(pattern).test(path));
}
