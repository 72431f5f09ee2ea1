/**
 * One line of search output. `index` is the 1-based position shown to the user
 * and the only way selectors refer to an entry.
 */
export interface ResultEntry {
  readonly index: number;
  readonly rawLine: string;
  /** Size in bytes, when the search was asked for metadata. */
  readonly size?: number;
  /** `YYYY-MM-DD HH:MM:SS`, when the search was asked for metadata. */
  readonly modifiedAt?: string;
  readonly path: string;
}
