import { isFlagId, type FlagId } from './flags';
import { isSearchFolder, normalizeFolder, type FolderContext } from './folders';
import type { Classification } from './types';

const FRAGMENT_SEPARATOR = /[^\p{L}\p{N}_.*-]+/u;
const SELECTOR = /^-\d+$/;
// Larger numbers lose precision and can never name a result.
const MAX_SELECTOR = Number.MAX_SAFE_INTEGER;

/**
 * Splits a non-folder token into the pieces that are classified one by one,
 * so that `a/b-c` contributes `a` and `b-c`.
 */
export function splitFragments(token: string): string[] {
  return token.split(FRAGMENT_SEPARATOR).filter((piece) => piece.length > 0);
}

/**
 * The invocation asks for help when it has no tokens or only `-h` tokens.
 */
export function isHelpRequest(tokens: readonly string[]): boolean {
  return tokens.every((token) => token === '-h');
}

export function classifyTokens(
  tokens: readonly string[],
  context: FolderContext,
): Classification {
  const folderTokens: string[] = [];
  const includeFragments: string[] = [];
  const excludeFragments = new Set<string>();
  const flags = new Set<FlagId>();
  const selectorIndices = new Set<number>();

  for (const token of tokens) {
    if (isSearchFolder(token)) {
      folderTokens.push(token);
      continue;
    }

    for (const piece of splitFragments(token)) {
      if (SELECTOR.test(piece)) {
        selectorIndices.add(Math.min(Number(piece.slice(1)), MAX_SELECTOR));
      } else if (isFlagId(piece)) {
        // re-insert so iteration order follows the last occurrence
        flags.delete(piece);
        flags.add(piece);
      } else if (piece.startsWith('-')) {
        if (piece.length > 1) {
          excludeFragments.add(piece.slice(1).toLowerCase());
        }
      } else if (!isSearchFolder(piece)) {
        const fragment = piece.replace(/\*/g, '');
        if (fragment.trim().length > 0) {
          includeFragments.push(fragment);
        }
      }
    }
  }

  const folders = (folderTokens.length > 0 ? folderTokens : [context.defaultFolder]).map(
    (folder) => normalizeFolder(folder, context),
  );

  return {
    folders: [...new Set(folders)],
    includeFragments,
    excludeFragments,
    flags,
    selectorIndices,
  };
}
