const SHELL_SAFE = /^[A-Za-z0-9_./+@%:,-]+$/;

/**
 * Quotes a word for a POSIX shell command line. Safe words are returned as-is
 * so that printed commands stay readable.
 */
export const shellQuote = (word: string): string => {
  if (word.length > 0 && SHELL_SAFE.test(word)) {
    return word;
  }
  return `'${word.replace(/'/g, `'\\''`)}'`;
};
