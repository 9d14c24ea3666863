import type { ShapingBackend, WhiteSpaceMode } from '@textflow/contracts';
import { graphemeSegments } from '@textflow/measuring-deterministic';
import type { LayoutSource, SourceBox, SourceRun } from './source.js';

/** Float slack when comparing accumulated widths against the available width. */
const WIDTH_EPSILON = 1e-6;

export type TextPiece = {
  readonly kind: 'text';
  readonly run: SourceRun;
  readonly start: number;
  readonly end: number;
  readonly width: number;
};

export type BoxPiece = {
  readonly kind: 'box';
  readonly box: SourceBox;
  readonly width: number;
};

export type Piece = TextPiece | BoxPiece;

/**
 * Smallest element the breaker places.
 * - `word`: glue that never breaks internally, possibly spanning several runs
 * - `space`: breakable whitespace, hangs at line end
 * - `newline`: forced break, always ends the line it sits on
 * - `box`: an inline box, breakable on both sides; in `preserve` a box
 *   joins the surrounding word instead
 */
export type BreakUnit = {
  readonly kind: 'word' | 'space' | 'newline' | 'box';
  readonly pieces: readonly Piece[];
  readonly start: number;
  readonly end: number;
  readonly width: number;
};

export type LinePlan = {
  readonly startOffset: number;
  readonly endOffset: number;
  readonly units: readonly BreakUnit[];
  /** Width without hanging trailing whitespace. */
  readonly width: number;
};

type TokenKind = 'glue' | 'space' | 'newline';

const HANGING_WHITESPACE = new Set([' ', '\t', '\r', '\f']);

/**
 * Classifies one grapheme cluster. A cluster only counts as whitespace when
 * it is a lone whitespace character, so a space carrying a combining mark is glue.
 */
function classifyCluster(cluster: string, mode: WhiteSpaceMode): TokenKind {
  if (mode === 'collapse') return cluster === ' ' ? 'space' : 'glue';
  if (cluster === '\n' || cluster === '\r\n') return 'newline';
  if (mode === 'pre-wrap' && HANGING_WHITESPACE.has(cluster)) return 'space';
  return 'glue';
}

type UnitDraft = {
  kind: BreakUnit['kind'];
  pieces: Piece[];
  start: number;
  end: number;
};

/**
 * Splits the source into break units. Adjacent glue across run boundaries
 * joins one word, so a style change inside a word never creates a break
 * opportunity. Runs of spaces become a single hanging unit.
 */
export function buildBreakUnits(source: LayoutSource, shaper: ShapingBackend): BreakUnit[] {
  const drafts: UnitDraft[] = [];

  const appendText = (kind: TokenKind, run: SourceRun, start: number, end: number): void => {
    const unitKind: BreakUnit['kind'] = kind === 'glue' ? 'word' : kind;
    let target = drafts.at(-1);
    if (!target || target.end !== start || target.kind !== unitKind || unitKind === 'newline') {
      target = { kind: unitKind, pieces: [], start, end: start };
      drafts.push(target);
    }
    target.end = end;

    const lastPiece = target.pieces.at(-1);
    if (lastPiece && lastPiece.kind === 'text' && lastPiece.run === run && lastPiece.end === start) {
      target.pieces[target.pieces.length - 1] = { ...lastPiece, end, width: 0 };
    } else {
      target.pieces.push({ kind: 'text', run, start, end, width: 0 });
    }
  };

  for (const entry of source.entries) {
    if (entry.kind === 'box') {
      const piece: BoxPiece = { kind: 'box', box: entry, width: entry.spec.width };
      const previous = drafts.at(-1);
      if (entry.whiteSpace === 'preserve' && previous && previous.kind === 'word' && previous.end === entry.offset) {
        previous.pieces.push(piece);
        continue;
      }
      drafts.push({
        kind: entry.whiteSpace === 'preserve' ? 'word' : 'box',
        pieces: [piece],
        start: entry.offset,
        end: entry.offset,
      });
      continue;
    }
    // Segmenting the run alone keeps a CRLF split across two runs as two breaks.
    for (const { segment, index } of graphemeSegments(source.text.slice(entry.start, entry.end))) {
      const start = entry.start + index;
      appendText(classifyCluster(segment, entry.whiteSpace), entry, start, start + segment.length);
    }
  }

  return drafts.map((draft) => {
    const pieces = draft.pieces.map((piece): Piece => {
      if (piece.kind === 'box') return piece;
      return { ...piece, width: shaper.measure(source.text.slice(piece.start, piece.end), piece.run.style) };
    });
    const width = pieces.reduce((sum, piece) => sum + piece.width, 0);
    return { kind: draft.kind, pieces, start: draft.start, end: draft.end, width };
  });
}

/**
 * Greedy first-fit over break units. `maxWidth` undefined (or infinite) lays
 * every forced-break-delimited paragraph out on a single line.
 *
 * Lines always partition `[0, textLength]`: each line ends where the next
 * begins, and a forced break at the very end opens a final empty line.
 */
export function planLines(units: readonly BreakUnit[], textLength: number, maxWidth?: number): LinePlan[] {
  const limit = maxWidth === undefined || !Number.isFinite(maxWidth) ? Number.POSITIVE_INFINITY : maxWidth;
  const plans: LinePlan[] = [];

  let lineStart = 0;
  let lineUnits: BreakUnit[] = [];
  let lineWidth = 0;
  let hangingWidth = 0;

  const finishLine = (endOffset: number): void => {
    plans.push({ startOffset: lineStart, endOffset, units: lineUnits, width: lineWidth - hangingWidth });
    lineStart = endOffset;
    lineUnits = [];
    lineWidth = 0;
    hangingWidth = 0;
  };

  for (const unit of units) {
    if (unit.kind === 'space') {
      lineUnits.push(unit);
      lineWidth += unit.width;
      hangingWidth += unit.width;
      continue;
    }
    if (unit.kind === 'newline') {
      lineUnits.push(unit);
      finishLine(unit.end);
      continue;
    }
    const fits = lineUnits.length === 0 || lineWidth + unit.width <= limit + WIDTH_EPSILON;
    if (!fits) finishLine(unit.start);
    lineUnits.push(unit);
    lineWidth += unit.width;
    hangingWidth = 0;
  }

  plans.push({ startOffset: lineStart, endOffset: textLength, units: lineUnits, width: lineWidth - hangingWidth });
  return plans;
}

/** Widest unit that can never be split: words and boxes. Spaces hang and forced breaks are zero-width. */
export function minContentWidth(units: readonly BreakUnit[]): number {
  let min = 0;
  for (const unit of units) {
    if (unit.kind === 'word' || unit.kind === 'box') min = Math.max(min, unit.width);
  }
  return min;
}
