import type { Logger } from '@findfile/shared';
import type { ResultEntry } from './types';

const SIZE = /^\d+$/;
const TIMESTAMP = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

interface ParsedLine {
  size?: number;
  modifiedAt?: string;
  path: string;
}

export interface ParseOptions {
  logger?: Logger;
}

/**
 * Splits a line into its metadata prefix and path. Returns undefined for a
 * line that carries no path or whose metadata does not parse.
 */
export function parseResultLine(line: string): ParsedLine | undefined {
  const slash = line.indexOf('/');
  if (slash < 0) {
    return undefined;
  }
  if (slash === 0) {
    return { path: line };
  }

  const [size, modifiedAt] = line
    .slice(0, slash)
    .split('\t')
    .map((field) => field.trim());
  if (size === undefined || modifiedAt === undefined) {
    return undefined;
  }
  if (!SIZE.test(size) || !TIMESTAMP.test(modifiedAt)) {
    return undefined;
  }
  return { size: Number.parseInt(size, 10), modifiedAt, path: line.slice(slash) };
}

/**
 * Turns search output into numbered entries. Blank and malformed lines are
 * dropped, and so is any repeat of a path already seen (overlapping folders).
 */
export function parseResults(output: string, options: ParseOptions = {}): ResultEntry[] {
  const entries: ResultEntry[] = [];
  const seen = new Set<string>();

  for (const rawLine of output.split(/\r?\n/)) {
    if (rawLine.trim().length === 0) continue;

    const parsed = parseResultLine(rawLine);
    if (!parsed) {
      options.logger?.debug(`Dropping unparseable output line: ${rawLine}`);
      continue;
    }
    if (seen.has(parsed.path)) {
      options.logger?.debug(`Dropping duplicate result: ${parsed.path}`);
      continue;
    }
    seen.add(parsed.path);
    entries.push({ index: entries.length + 1, rawLine, ...parsed });
  }

  return entries;
}
