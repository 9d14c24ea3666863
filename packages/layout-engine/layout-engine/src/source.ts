import type { InlineBoxSpec, TextStyle, WhiteSpaceMode } from '@textflow/contracts';
import { textStylesEqual } from '@textflow/style-engine';

/** A maximal span of backing text sharing one resolved style and whitespace mode. */
export type SourceRun = {
  readonly kind: 'run';
  readonly index: number;
  readonly start: number;
  readonly end: number;
  readonly style: TextStyle;
  readonly whiteSpace: WhiteSpaceMode;
};

export type SourceBox = {
  readonly kind: 'box';
  readonly index: number;
  readonly spec: InlineBoxSpec;
  /** Offset of the zero-length marker in the backing text. */
  readonly offset: number;
  /** Style active where the box was pushed; provides the strut for box-only lines. */
  readonly style: TextStyle;
  /** In `preserve` a box offers no break opportunity on either side. */
  readonly whiteSpace: WhiteSpaceMode;
};

export type SourceEntry = SourceRun | SourceBox;

/** Collapsed text plus runs and boxes in stream order. Input to line breaking. */
export type LayoutSource = {
  readonly text: string;
  readonly entries: readonly SourceEntry[];
  readonly runs: readonly SourceRun[];
  readonly boxes: readonly SourceBox[];
  readonly defaultStyle: TextStyle;
};

export type PendingText = {
  readonly kind: 'text';
  readonly text: string;
  readonly style: TextStyle;
  readonly whiteSpace: WhiteSpaceMode;
};

export type PendingBox = {
  readonly kind: 'box';
  readonly spec: InlineBoxSpec;
  readonly style: TextStyle;
  readonly whiteSpace: WhiteSpaceMode;
};

export type PendingEntry = PendingText | PendingBox;

const COLLAPSIBLE_WHITESPACE = new Set([' ', '\t', '\n', '\r', '\f']);

export const isWhitespaceChar = (char: string | undefined): boolean =>
  char !== undefined && COLLAPSIBLE_WHITESPACE.has(char);

type MutableRun = { -readonly [K in keyof SourceRun]: SourceRun[K] };

/**
 * Applies whitespace collapsing and coalesces adjacent compatible chunks.
 *
 * In `collapse` mode every whitespace run becomes a single space, and that
 * space is dropped when it would open the content or follow whitespace that
 * was already emitted (collapsible or preserved). Inline boxes count as
 * content, so a space after a box survives. `preserve` and `pre-wrap` text is
 * copied verbatim.
 */
export function collapseSource(pending: readonly PendingEntry[], defaultStyle: TextStyle): LayoutSource {
  let text = '';
  let previousIsWhitespace = true;
  const entries: Array<MutableRun | SourceBox> = [];
  const runs: MutableRun[] = [];
  const boxes: SourceBox[] = [];

  for (const entry of pending) {
    if (entry.kind === 'box') {
      const box: SourceBox = {
        kind: 'box',
        index: boxes.length,
        spec: entry.spec,
        offset: text.length,
        style: entry.style,
        whiteSpace: entry.whiteSpace,
      };
      boxes.push(box);
      entries.push(box);
      previousIsWhitespace = false;
      continue;
    }

    let chunk = '';
    if (entry.whiteSpace === 'collapse') {
      for (const char of entry.text) {
        if (isWhitespaceChar(char)) {
          if (!previousIsWhitespace) {
            chunk += ' ';
            previousIsWhitespace = true;
          }
          continue;
        }
        chunk += char;
        previousIsWhitespace = false;
      }
    } else {
      chunk = entry.text;
      if (chunk.length > 0) previousIsWhitespace = isWhitespaceChar(chunk[chunk.length - 1]);
    }
    if (chunk.length === 0) continue;

    const start = text.length;
    text += chunk;
    const last = entries.at(-1);
    if (
      last &&
      last.kind === 'run' &&
      last.end === start &&
      last.whiteSpace === entry.whiteSpace &&
      textStylesEqual(last.style, entry.style)
    ) {
      last.end = text.length;
      continue;
    }
    const run: MutableRun = {
      kind: 'run',
      index: runs.length,
      start,
      end: text.length,
      style: entry.style,
      whiteSpace: entry.whiteSpace,
    };
    runs.push(run);
    entries.push(run);
  }

  return { text, entries, runs, boxes, defaultStyle };
}
