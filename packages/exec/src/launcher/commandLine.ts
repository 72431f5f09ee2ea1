export interface CommandLine {
  bin: string;
  args: string[];
}

/**
 * Splits a configured open command such as `code --reuse-window` into the
 * program and its leading arguments. Quotes and backslash escapes group words.
 */
export function parseCommandLine(input: string): CommandLine {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: "'" | '"' | null = null;
  let escape = false;

  for (const char of input.trim()) {
    if (escape) {
      current += char;
      escape = false;
    } else if (char === '\\' && quote !== "'") {
      escape = true;
      inWord = true;
    } else if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === "'" || char === '"') {
      quote = char;
      inWord = true;
    } else if (/\s/.test(char)) {
      if (inWord) {
        words.push(current);
        current = '';
        inWord = false;
      }
    } else {
      current += char;
      inWord = true;
    }
  }

  if (inWord) {
    words.push(current);
  }

  const [bin = '', ...args] = words;
  return { bin, args };
}
