/**
 * Locations needed to resolve folder tokens. Built once from configuration
 * and the process environment, then passed to the classifier.
 */
export interface FolderContext {
  homeDir: string;
  cwd: string;
  parentDir: string;
  /** Folder token used when the query names none, e.g. `~`. */
  defaultFolder: string;
}

export function isSearchFolder(token: string): boolean {
  return (
    token === '.' ||
    token === '..' ||
    token.startsWith('./') ||
    token.startsWith('../') ||
    token.startsWith('/') ||
    token.startsWith('~')
  );
}

function resolvePrefix(folder: string, prefix: string, replacement: string): string {
  // `/` as the replacement must not double the separator
  const base = replacement.replace(/\/+$/, '');
  return base + folder.slice(prefix.length);
}

export function addTrailingSlash(folder: string): string {
  return folder.endsWith('/') ? folder : `${folder}/`;
}

/**
 * Resolves `~`, `..` and `.` prefixes, in that order, and adds a trailing slash.
 */
export function normalizeFolder(folder: string, context: FolderContext): string {
  let resolved = folder;
  if (resolved.startsWith('~')) {
    resolved = resolvePrefix(resolved, '~', context.homeDir);
  } else if (resolved.startsWith('..')) {
    resolved = resolvePrefix(resolved, '..', context.parentDir);
  } else if (resolved.startsWith('.')) {
    resolved = resolvePrefix(resolved, '.', context.cwd);
  }
  return addTrailingSlash(resolved);
}

/**
 * Longest of `folders` that `path` starts with, or the empty string.
 */
export function longestFolderPrefix(path: string, folders: readonly string[]): string {
  let longest = '';
  for (const folder of folders) {
    if (path.startsWith(folder) && folder.length > longest.length) {
      longest = folder;
    }
  }
  return longest;
}
