import { longestFolderPrefix } from '../query/folders';
import type { ResultEntry } from '../results/types';
import type { SearchSpec } from '../search/types';
import type { Colors } from './colors';
import { encodePathForLink, toDisplayPath } from './fileLink';
import { formatMetadataColumns } from './format';
import { applySpans, findHighlightSpans } from './highlight';

export const LABEL_FILLER = '·';

export interface RenderedLine {
  index: number;
  /** Numbered, colored line for the listing. */
  displayText: string;
  /** The acted-on path in double quotes, for `-q`, `-Q`, `-o` and `-O`. */
  quotedPath: string;
  /** The path as displayed: a `file://` link when link mode applies. */
  linkEncodedPath: string;
  /** The path to act on: the result itself or its containing folder. */
  targetPath: string;
}

export interface RendererOptions {
  colors: Colors;
  /** Total number of results; sets the width of the number column. */
  resultCount: number;
}

export function containingFolder(path: string): string {
  return path.slice(0, path.lastIndexOf('/') + 1);
}

/**
 * Formats result entries for one search. Each entry is rendered on its own;
 * nothing carries over from one line to the next.
 */
export class ResultRenderer {
  private readonly labelWidth: number;

  constructor(
    private readonly spec: SearchSpec,
    private readonly options: RendererOptions,
  ) {
    this.labelWidth = this.styledLabel(options.resultCount).length;
  }

  render(entry: ResultEntry): RenderedLine {
    const display = toDisplayPath(entry.path, this.spec.linkMode);
    const targetPath =
      this.spec.outputMode === 'folder-path' ? containingFolder(entry.path) : entry.path;

    return {
      index: entry.index,
      displayText: `${this.label(entry.index)} ${this.renderBody(entry)}`,
      quotedPath: `"${targetPath}"`,
      linkEncodedPath: display.text,
      targetPath,
    };
  }

  /** Metadata columns, when shown, followed by the highlighted path. */
  renderBody(entry: ResultEntry): string {
    const { colors } = this.options;
    const metadata = this.spec.showMetadata ? formatMetadataColumns(entry) : '';
    return (metadata ? colors.gray(metadata) : '') + this.renderPath(entry);
  }

  /**
   * The display path with the link scheme and search folder grayed and the
   * include fragments highlighted after them.
   */
  renderPath(entry: ResultEntry): string {
    const { colors } = this.options;
    const display = toDisplayPath(entry.path, this.spec.linkMode);
    const folder = longestFolderPrefix(entry.path, this.spec.folders);
    const folderLength = display.linked ? encodePathForLink(folder).length : folder.length;
    const grayEnd = display.schemeLength + folderLength;

    const spans = findHighlightSpans(display.text, this.spec.includeFragments, {
      minPosition: grayEnd,
      order: this.spec.fragmentOrder,
    }).map((span) => ({ start: span.start - grayEnd, end: span.end - grayEnd }));

    const grayed = grayEnd > 0 ? colors.gray(display.text.slice(0, grayEnd)) : '';
    return grayed + applySpans(display.text.slice(grayEnd), spans, colors.yellow);
  }

  /** `[n]`, padded on the left so that every label is as wide as the last. */
  label(index: number): string {
    return this.styledLabel(index).padStart(this.labelWidth, LABEL_FILLER);
  }

  private styledLabel(index: number): string {
    const { colors } = this.options;
    return `[${colors.blueBright(colors.bold(String(index)))}]`;
  }
}
