import type { FragmentOrder } from '../search/types';

/** Half-open range `[start, end)` of a display string. */
export interface Span {
  start: number;
  end: number;
}

export interface HighlightOptions {
  /** Matches never start before this offset. */
  minPosition: number;
  order: FragmentOrder;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const overlaps = (a: Span, b: Span): boolean => a.start < b.end && b.start < a.end;

/**
 * Case-insensitive search for `fragment` in `text` at or after `from`,
 * skipping occurrences that overlap any of `taken`.
 */
function findFree(text: string, fragment: string, from: number, taken: Span[]): Span | undefined {
  const pattern = new RegExp(escapeRegExp(fragment), 'giu');
  pattern.lastIndex = from;
  for (let match = pattern.exec(text); match; match = pattern.exec(text)) {
    const span = { start: match.index, end: match.index + match[0].length };
    if (!taken.some((other) => overlaps(span, other))) {
      return span;
    }
    pattern.lastIndex = match.index + 1;
  }
  return undefined;
}

/**
 * Locates the include fragments in a display string.
 *
 * In sequential order each fragment is searched from the end of the previous
 * match; a fragment that is not found is skipped and the cursor stays put.
 * In any order every fragment is searched from `minPosition`, and the first
 * occurrence not overlapping an earlier highlight is taken.
 *
 * The result is sorted and non-overlapping.
 */
export function findHighlightSpans(
  text: string,
  fragments: readonly string[],
  options: HighlightOptions,
): Span[] {
  const spans: Span[] = [];
  let cursor = options.minPosition;

  for (const fragment of fragments) {
    if (fragment.length === 0) continue;
    const from = options.order === 'sequential' ? cursor : options.minPosition;
    const span = findFree(text, fragment, from, spans);
    if (!span) continue;
    spans.push(span);
    cursor = span.end;
  }

  return spans.sort((a, b) => a.start - b.start);
}

/**
 * Wraps each span of `text` with `style`, in a single left-to-right pass.
 * Spans must be sorted and non-overlapping.
 */
export function applySpans(
  text: string,
  spans: readonly Span[],
  style: (segment: string) => string,
): string {
  let result = '';
  let position = 0;
  for (const span of spans) {
    result += text.slice(position, span.start) + style(text.slice(span.start, span.end));
    position = span.end;
  }
  return result + text.slice(position);
}
