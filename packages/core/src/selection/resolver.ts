import type { ResultEntry } from '../results/types';

/** 1-based result numbers; empty means every result. */
export interface Selection {
  indices: readonly number[];
}

export interface ResolvedSelection {
  /** Selected entries, in result order. */
  selected: ResultEntry[];
  /** Requested numbers with no matching result, in the order given. */
  missing: number[];
}

export function resolveSelection(
  selection: Selection,
  entries: readonly ResultEntry[],
): ResolvedSelection {
  if (selection.indices.length === 0) {
    return { selected: [...entries], missing: [] };
  }

  const wanted = new Set(selection.indices);
  const selected = entries.filter((entry) => wanted.has(entry.index));
  const missing = [...wanted].filter((index) => index < 1 || index > entries.length);
  return { selected, missing };
}

export function missingResultMessage(index: number, opening: boolean): string {
  return `No result ${index} to ${opening ? 'open' : 'show'}`;
}
