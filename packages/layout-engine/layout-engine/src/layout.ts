import {
  assertFiniteCoordinate,
  assertOffset,
  createDebugLogger,
  InvalidInputError,
  type CaretPosition,
  type ContentWidths,
  type GlyphRunItem,
  type InlineBoxGeometry,
  type InlineBoxItem,
  type LayoutItem,
  type LayoutLine,
  type LayoutSize,
  type ShapingBackend,
  type TextStyle,
} from '@textflow/contracts';
import { resolveLineHeightPx } from '@textflow/style-engine';
import { buildBreakUnits, minContentWidth, planLines, type BreakUnit, type LinePlan } from './line-breaker.js';
import type { LayoutSource, SourceBox, SourceRun } from './source.js';

const log = createDebugLogger('layout');

type ItemDraft = { kind: 'glyphs'; item: GlyphRunItem } | { kind: 'box'; box: SourceBox; x: number };

type LineMetrics = { height: number; baseline: number };

/** A run of consecutive glyphs sharing one cluster, positioned in layout space. */
type ClusterSpan = { start: number; end: number; left: number; width: number };

/**
 * Immutable-text, re-breakable layout of styled inline content.
 *
 * Produced by `LayoutBuilder.build()`. The text and runs never change; only
 * {@link breakAllLines} replaces the line list and inline box geometry.
 *
 * Offsets are UTF-16 indices into {@link text}. Every offset in `[0, text.length]`
 * belongs to exactly one line: a line owns `[startOffset, endOffset)`, and the
 * last line also owns `text.length`. An offset on a soft break therefore
 * belongs to the line that starts there.
 */
export class Layout {
  readonly text: string;
  readonly #source: LayoutSource;
  readonly #shaper: ShapingBackend;
  readonly #units: readonly BreakUnit[];
  #maxWidth: number | undefined;
  #lines: LayoutLine[] = [];
  #boxGeometry = new Map<string, InlineBoxGeometry>();
  #caretOffsets: number[] | null = null;

  constructor(source: LayoutSource, shaper: ShapingBackend, maxWidth?: number) {
    this.text = source.text;
    this.#source = source;
    this.#shaper = shaper;
    this.#units = buildBreakUnits(source, shaper);
    this.breakAllLines(maxWidth);
  }

  get maxWidth(): number | undefined {
    return this.#maxWidth;
  }

  get lineCount(): number {
    return this.#lines.length;
  }

  get runs(): readonly SourceRun[] {
    return this.#source.runs;
  }

  /**
   * `min` is the widest unit that can never be split (a word or an inline
   * box); `max` is the widest line when only forced breaks apply. Reads the
   * break units only, so the current lines are left as they are.
   */
  calculateContentWidths(): ContentWidths {
    const unwrapped = planLines(this.#units, this.text.length);
    const max = unwrapped.reduce((widest, plan) => Math.max(widest, plan.width), 0);
    return { min: minContentWidth(this.#units), max };
  }

  /**
   * Re-runs greedy line breaking. `undefined` or `Infinity` disables wrapping.
   * A unit wider than `maxWidth` is placed alone on its own line.
   *
   * @throws {InvalidInputError} When `maxWidth` is NaN.
   */
  breakAllLines(maxWidth?: number): void {
    if (maxWidth !== undefined && Number.isNaN(maxWidth)) {
      throw new InvalidInputError('INVALID_OPTIONS', 'maxWidth must be a number', { maxWidth });
    }
    const width = maxWidth === undefined ? undefined : Math.max(0, maxWidth);
    const plans = planLines(this.#units, this.text.length, width);

    const lines: LayoutLine[] = [];
    const boxGeometry = new Map<string, InlineBoxGeometry>();
    let top = 0;
    for (const plan of plans) {
      const line = this.#materializeLine(plan, lines.length, top, lines.at(-1), boxGeometry);
      lines.push(line);
      top += line.height;
    }

    this.#maxWidth = width;
    this.#lines = lines;
    this.#boxGeometry = boxGeometry;
    this.#caretOffsets = null;
    log('breakAllLines', { maxWidth: width ?? null, lines: lines.length, height: top });
  }

  size(): LayoutSize {
    let width = 0;
    let height = 0;
    for (const line of this.#lines) {
      width = Math.max(width, line.width);
      height += line.height;
    }
    return { width, height };
  }

  /** Restartable: each iteration walks the current lines from the top. */
  lines(): Iterable<LayoutLine> {
    const current = this.#lines;
    return {
      *[Symbol.iterator]() {
        for (const line of current) yield line;
      },
    };
  }

  lineAt(index: number): LayoutLine | undefined {
    return this.#lines[index];
  }

  /** Line owning `offset` (clamped to the text). */
  lineForOffset(offset: number): LayoutLine {
    assertOffset(offset);
    const clamped = this.#clamp(offset);
    let found = this.#lines[0];
    for (const line of this.#lines) {
      if (line.startOffset > clamped) break;
      found = line;
    }
    return found;
  }

  inlineBoxGeometry(id: string): InlineBoxGeometry | undefined {
    return this.#boxGeometry.get(id);
  }

  inlineBoxes(): InlineBoxGeometry[] {
    return [...this.#boxGeometry.values()];
  }

  /** Sorted cluster boundaries, always including 0 and `text.length`. */
  caretOffsets(): readonly number[] {
    if (!this.#caretOffsets) this.#caretOffsets = this.#collectCaretOffsets();
    return this.#caretOffsets;
  }

  nextCaretOffset(offset: number): number {
    assertOffset(offset);
    for (const stop of this.caretOffsets()) {
      if (stop > offset) return stop;
    }
    return this.text.length;
  }

  previousCaretOffset(offset: number): number {
    assertOffset(offset);
    const stops = this.caretOffsets();
    for (let i = stops.length - 1; i >= 0; i -= 1) {
      if (stops[i] < offset) return stops[i];
    }
    return 0;
  }

  /** Largest caret offset that is `<= offset`, after clamping to the text. */
  snapOffset(offset: number): number {
    assertOffset(offset);
    const clamped = this.#clamp(offset);
    let snapped = 0;
    for (const stop of this.caretOffsets()) {
      if (stop > clamped) break;
      snapped = stop;
    }
    return snapped;
  }

  /**
   * Last caret position on `line`. The end offset of any line but the last
   * belongs to the next line, so this is the caret offset before it: before
   * the trailing break whitespace of a wrapped line, before the newline of a
   * hard-broken one, before the last cluster when a box follows. A
   * zero-length line has no earlier position and returns its end.
   */
  lineCaretEnd(line: LayoutLine): number {
    const isLast = line.index === this.#lines.length - 1;
    if (isLast || line.endOffset <= line.startOffset) return line.endOffset;
    return Math.max(line.startOffset, this.previousCaretOffset(line.endOffset));
  }

  /**
   * Caret geometry for `offset`. Offsets outside the text clamp; offsets
   * inside a cluster snap to its start.
   *
   * @throws {InvalidInputError} When `offset` is not an integer.
   */
  positionAt(offset: number): CaretPosition {
    const snapped = this.snapOffset(offset);
    const line = this.lineForOffset(snapped);
    return { x: this.#caretX(line, snapped), y: line.top, lineIndex: line.index, height: line.height };
  }

  /**
   * Nearest caret offset to a point. Points above the first line hit the
   * first line, points below the last line hit the last; x clamps to the
   * line's caret range. Within a cluster, the left half maps to its start.
   *
   * @throws {InvalidInputError} When `x` or `y` is not finite.
   */
  offsetAt(x: number, y: number): number {
    assertFiniteCoordinate(x, y);
    const line = this.#lineAtY(y);
    const caretEnd = this.lineCaretEnd(line);
    if (x <= 0) return line.startOffset;

    for (const item of line.items) {
      if (item.kind === 'box') {
        if (x < item.x + item.width / 2) return Math.min(item.offset, caretEnd);
        continue;
      }
      for (const cluster of clusterSpans(item)) {
        if (x < cluster.left + cluster.width / 2) return Math.min(cluster.start, caretEnd);
      }
    }
    return caretEnd;
  }

  #clamp(offset: number): number {
    return Math.min(Math.max(offset, 0), this.text.length);
  }

  #lineAtY(y: number): LayoutLine {
    for (const line of this.#lines) {
      if (y < line.top + line.height) return line;
    }
    return this.#lines[this.#lines.length - 1];
  }

  #caretX(line: LayoutLine, offset: number): number {
    for (const item of line.items) {
      if (item.kind === 'box') {
        if (item.offset === offset) return item.x;
        continue;
      }
      if (offset < item.start || offset > item.end) continue;
      let x = item.x;
      for (const glyph of item.glyphs) {
        if (glyph.cluster >= offset) break;
        x += glyph.advance;
      }
      return x;
    }
    return 0;
  }

  #collectCaretOffsets(): number[] {
    const stops = new Set<number>([0, this.text.length]);
    for (const line of this.#lines) {
      stops.add(line.startOffset);
      for (const item of line.items) {
        if (item.kind === 'box') {
          stops.add(item.offset);
          continue;
        }
        stops.add(item.end);
        for (const glyph of item.glyphs) stops.add(glyph.cluster);
      }
    }
    return [...stops].sort((a, b) => a - b);
  }

  #materializeLine(
    plan: LinePlan,
    index: number,
    top: number,
    previous: LayoutLine | undefined,
    boxGeometry: Map<string, InlineBoxGeometry>,
  ): LayoutLine {
    const drafts: ItemDraft[] = [];
    let x = 0;
    let group: { run: SourceRun; start: number; end: number } | null = null;

    const flush = (): void => {
      if (!group) return;
      const { run, start, end } = group;
      const text = this.text.slice(start, end);
      const shaped = this.#shaper.shape(text, run.style, start);
      drafts.push({
        kind: 'glyphs',
        item: {
          kind: 'glyphs',
          runIndex: run.index,
          start,
          end,
          text,
          style: run.style,
          whiteSpace: run.whiteSpace,
          x,
          width: shaped.width,
          glyphs: shaped.glyphs,
        },
      });
      x += shaped.width;
      group = null;
    };

    for (const unit of plan.units) {
      for (const piece of unit.pieces) {
        if (piece.kind === 'box') {
          flush();
          drafts.push({ kind: 'box', box: piece.box, x });
          x += piece.width;
          continue;
        }
        if (group && group.run === piece.run && group.end === piece.start) {
          group.end = piece.end;
          continue;
        }
        flush();
        group = { run: piece.run, start: piece.start, end: piece.end };
      }
    }
    flush();

    const metrics = this.#lineMetrics(drafts, plan, previous);
    const items: LayoutItem[] = drafts.map((draft) => {
      if (draft.kind === 'glyphs') return draft.item;
      const { spec, offset } = draft.box;
      const y = top + metrics.baseline - spec.height;
      boxGeometry.set(spec.id, { id: spec.id, offset, x: draft.x, y, width: spec.width, height: spec.height, lineIndex: index });
      const item: InlineBoxItem = { kind: 'box', id: spec.id, offset, x: draft.x, y, width: spec.width, height: spec.height };
      return item;
    });

    return {
      index,
      startOffset: plan.startOffset,
      endOffset: plan.endOffset,
      top,
      height: metrics.height,
      baseline: metrics.baseline,
      width: plan.width,
      items,
    };
  }

  /**
   * Each text style contributes a line box of its resolved line height with
   * the glyph box centred in it (half-leading above and below). Inline boxes
   * sit on the baseline and push it down when taller than the space above it.
   */
  #lineMetrics(drafts: readonly ItemDraft[], plan: LinePlan, previous: LayoutLine | undefined): LineMetrics {
    const styles: TextStyle[] = [];
    const boxHeights: number[] = [];
    for (const draft of drafts) {
      if (draft.kind === 'glyphs') styles.push(draft.item.style);
      else boxHeights.push(draft.box.spec.height);
    }
    if (styles.length === 0) styles.push(this.#strutStyle(drafts, plan, previous));

    let above = 0;
    let below = 0;
    for (const style of styles) {
      const { ascent, descent } = this.#shaper.metrics(style);
      const halfLeading = (resolveLineHeightPx(style) - (ascent + descent)) / 2;
      above = Math.max(above, halfLeading + ascent);
      below = Math.max(below, halfLeading + descent);
    }
    for (const height of boxHeights) above = Math.max(above, height);
    return { height: above + below, baseline: above };
  }

  #strutStyle(drafts: readonly ItemDraft[], plan: LinePlan, previous: LayoutLine | undefined): TextStyle {
    for (const draft of drafts) {
      if (draft.kind === 'box') return draft.box.style;
    }
    const lastItem = previous?.items.at(-1);
    if (lastItem && lastItem.kind === 'glyphs') return lastItem.style;
    const runBefore = [...this.#source.runs].reverse().find((run) => run.start < plan.startOffset);
    return runBefore?.style ?? this.#source.defaultStyle;
  }
}

function clusterSpans(item: GlyphRunItem): ClusterSpan[] {
  const spans: ClusterSpan[] = [];
  let current: ClusterSpan | null = null;
  for (const glyph of item.glyphs) {
    if (current && current.start === glyph.cluster) {
      current.width += glyph.advance;
      continue;
    }
    if (current) {
      current.end = glyph.cluster;
      spans.push(current);
    }
    current = { start: glyph.cluster, end: item.end, left: item.x + glyph.x, width: glyph.advance };
  }
  if (current) spans.push(current);
  return spans;
}
