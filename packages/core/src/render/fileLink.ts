import type { LinkMode } from '../query/flags';

export const FILE_LINK_SCHEME = 'file://';

const percent = (char: string): string =>
  `%${char.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0')}`;

/**
 * Percent-encodes everything but unreserved characters, keeping `/`.
 */
export function encodePathForLink(path: string): string {
  return path
    .split('/')
    .map((segment) => encodeURIComponent(segment).replace(/[!'()*]/g, percent))
    .join('/');
}

export interface DisplayPath {
  /** What is printed: the path, or its `file://` link. */
  text: string;
  /** Number of leading characters of `text` taken by the link scheme. */
  schemeLength: number;
  linked: boolean;
}

export function toDisplayPath(path: string, mode: LinkMode): DisplayPath {
  if (mode === 'never') {
    return { text: path, schemeLength: 0, linked: false };
  }
  const encoded = encodePathForLink(path);
  if (mode === 'on-demand' && encoded === path) {
    return { text: path, schemeLength: 0, linked: false };
  }
  return { text: FILE_LINK_SCHEME + encoded, schemeLength: FILE_LINK_SCHEME.length, linked: true };
}
