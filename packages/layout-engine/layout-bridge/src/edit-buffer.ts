import { z } from 'zod';
import {
  assertFiniteCoordinate,
  assertOffset,
  createDebugLogger,
  parseOrThrow,
  type LineHeight,
  type ShapingBackend,
  type TextRange,
  type TextStyleOverride,
} from '@textflow/contracts';
import { LayoutBuilder, type Layout } from '@textflow/layout-engine';
import { createDeterministicShaper } from '@textflow/measuring-deterministic';
import { combineTextStyleOverrides, createTextStyle, validateTextStyleOverride } from '@textflow/style-engine';
import { nextWordBreak, prevWordBreak, wordBoundariesAt } from './text-boundaries.js';

const log = createDebugLogger('edit-buffer');

/**
 * What happens to uncommitted IME text when a non-IME operation runs.
 * - `discard`: the composition text is removed
 * - `commit`: the composition text is kept as regular text
 */
export type CompositionPolicy = 'discard' | 'commit';

/** Modes whose backing text equals the buffer text, so buffer and layout offsets agree. */
export type EditableWhiteSpaceMode = 'preserve' | 'pre-wrap';

export type EditBufferState =
  | { readonly kind: 'idle' }
  | { readonly kind: 'selecting'; readonly anchor: number }
  | { readonly kind: 'composing'; readonly range: TextRange };

/** Override applied on top of the buffer's base style over `[start, end)`. */
export type StyleRange = {
  readonly start: number;
  readonly end: number;
  readonly style: TextStyleOverride;
};

export type EditBufferOptions = {
  text?: string;
  /** Wrap width in layout units; omitted means no wrapping. */
  width?: number;
  /** Multiplies font sizes and absolute line heights. Default 1. */
  scale?: number;
  /** Default 16. */
  fontSize?: number;
  /** Default `pre-wrap`. */
  whiteSpace?: EditableWhiteSpaceMode;
  /** Default `discard`. */
  compositionPolicy?: CompositionPolicy;
  /** Base style under every style range; `fontSize` here is superseded by the `fontSize` option. */
  style?: TextStyleOverride;
  shaper?: ShapingBackend;
};

export const COMPOSITION_DECORATION = { underline: 'composition' } as const;

const IDLE: EditBufferState = { kind: 'idle' };

const widthSchema = z.number().nonnegative().optional();
const positiveSchema = z.number().finite().positive();
const whiteSpaceSchema = z.enum(['preserve', 'pre-wrap']);
const compositionPolicySchema = z.enum(['discard', 'commit']);

const editBufferOptionsSchema = z.object({
  text: z.string().optional(),
  width: widthSchema,
  scale: positiveSchema.optional(),
  fontSize: positiveSchema.optional(),
  whiteSpace: whiteSpaceSchema.optional(),
  compositionPolicy: compositionPolicySchema.optional(),
});

const validate = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, message: string): T =>
  parseOrThrow(schema, value, 'INVALID_OPTIONS', message);

const scaleLineHeight = (lineHeight: LineHeight, scale: number): LineHeight =>
  lineHeight.kind === 'absolute' ? { kind: 'absolute', px: lineHeight.px * scale } : lineHeight;

function scaleOverride(override: TextStyleOverride, scale: number): TextStyleOverride {
  if (scale === 1) return override;
  return {
    ...override,
    fontSize: override.fontSize === undefined ? undefined : override.fontSize * scale,
    lineHeight: override.lineHeight === undefined ? undefined : scaleLineHeight(override.lineHeight, scale),
  };
}

/**
 * Editable text with cursor, selection and IME composition over a lazily
 * rebuilt {@link Layout}.
 *
 * Offsets are UTF-16 indices into {@link text}. The cursor and the selection
 * anchor always sit on caret offsets reported by the layout, so they never
 * split a grapheme cluster or a ligature.
 *
 * Every operation other than `setCompose`, `clearCompose` and `commitCompose`
 * first settles an active composition according to the composition policy.
 * Vertical moves remember the x they started from until any other operation
 * runs.
 *
 * @example
 * ```typescript
 * const buffer = new EditBuffer({ text: 'hello world', width: 200 });
 * buffer.moveWordLeft();
 * buffer.selectToTextEnd();
 * buffer.insertOrReplaceSelection('there');
 * buffer.text; // 'hello there'
 * ```
 */
export class EditBuffer {
  #text = '';
  #styles: StyleRange[] = [];
  #cursor = 0;
  #state: EditBufferState = IDLE;
  #goalX: number | null = null;
  #width: number | undefined;
  #scale: number;
  #fontSize: number;
  #whiteSpace: EditableWhiteSpaceMode;
  readonly #compositionPolicy: CompositionPolicy;
  readonly #baseStyle: TextStyleOverride;
  readonly #shaper: ShapingBackend;
  #layout: Layout | null = null;

  constructor(options: EditBufferOptions = {}) {
    const parsed = validate(
      editBufferOptionsSchema,
      {
        text: options.text,
        width: options.width,
        scale: options.scale,
        fontSize: options.fontSize,
        whiteSpace: options.whiteSpace,
        compositionPolicy: options.compositionPolicy,
      },
      'Invalid edit buffer options',
    );
    this.#width = parsed.width;
    this.#scale = parsed.scale ?? 1;
    this.#fontSize = parsed.fontSize ?? 16;
    this.#whiteSpace = parsed.whiteSpace ?? 'pre-wrap';
    this.#compositionPolicy = parsed.compositionPolicy ?? 'discard';
    this.#baseStyle = validateTextStyleOverride(options.style ?? {});
    this.#shaper = options.shaper ?? createDeterministicShaper();
    if (parsed.text) this.setText(parsed.text);
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  get text(): string {
    return this.#text;
  }

  get cursor(): number {
    return this.#cursor;
  }

  get state(): EditBufferState {
    return this.#state;
  }

  get compositionPolicy(): CompositionPolicy {
    return this.#compositionPolicy;
  }

  /** Normalised selection range, or null when idle or composing. May be empty. */
  get selection(): TextRange | null {
    if (this.#state.kind !== 'selecting') return null;
    const { anchor } = this.#state;
    return { start: Math.min(anchor, this.#cursor), end: Math.max(anchor, this.#cursor) };
  }

  get composition(): TextRange | null {
    return this.#state.kind === 'composing' ? this.#state.range : null;
  }

  get styleRanges(): readonly StyleRange[] {
    return this.#styles;
  }

  hasSelection(): boolean {
    const selection = this.selection;
    return selection !== null && selection.start !== selection.end;
  }

  /** Current layout, rebuilt if text, style or composition changed since the last read. */
  layout(): Layout {
    if (!this.#layout) this.#layout = this.#buildLayout();
    return this.#layout;
  }

  // ---------------------------------------------------------------------------
  // Setup
  // ---------------------------------------------------------------------------

  /** Replaces the whole text. Styles reset, the cursor moves to the end. */
  setText(text: string): void {
    this.#text = text;
    this.#styles = text.length > 0 ? [{ start: 0, end: text.length, style: {} }] : [];
    this.#cursor = text.length;
    this.#state = IDLE;
    this.#goalX = null;
    this.#invalidate();
  }

  /** Re-breaks the current layout without rebuilding it. */
  setWidth(width: number | undefined): void {
    this.#width = validate(widthSchema, width, 'Invalid width');
    this.#goalX = null;
    this.#layout?.breakAllLines(this.#width);
  }

  setScale(scale: number): void {
    this.#scale = validate(positiveSchema, scale, 'Invalid scale');
    this.#goalX = null;
    this.#invalidate();
  }

  setFontSize(fontSize: number): void {
    this.#fontSize = validate(positiveSchema, fontSize, 'Invalid font size');
    this.#goalX = null;
    this.#invalidate();
  }

  setWhiteSpaceMode(mode: EditableWhiteSpaceMode): void {
    this.#whiteSpace = validate(whiteSpaceSchema, mode, 'Invalid white space mode');
    this.#goalX = null;
    this.#invalidate();
  }

  /**
   * Layers `override` over `[start, end)`. Later applications win field by
   * field; decorations merge key-wise.
   *
   * @throws {InvalidInputError} On non-integer offsets or an invalid override.
   */
  applyStyle(start: number, end: number, override: TextStyleOverride): void {
    assertOffset(start);
    assertOffset(end);
    const validated = validateTextStyleOverride(override);
    const from = this.#clamp(Math.min(start, end));
    const to = this.#clamp(Math.max(start, end));
    if (from === to) return;

    this.#splitStyleRangesAt(from);
    this.#splitStyleRangesAt(to);
    this.#styles = this.#styles.map((range) =>
      range.start >= from && range.end <= to
        ? { ...range, style: combineTextStyleOverrides([range.style, validated]) }
        : range,
    );
    this.#invalidate();
  }

  // ---------------------------------------------------------------------------
  // Navigation
  // ---------------------------------------------------------------------------

  moveLeft(): void {
    this.#beginOperation();
    const selection = this.#takeSelection();
    this.#moveTo(selection ? selection.start : this.layout().previousCaretOffset(this.#cursor));
  }

  moveRight(): void {
    this.#beginOperation();
    const selection = this.#takeSelection();
    this.#moveTo(selection ? selection.end : this.layout().nextCaretOffset(this.#cursor));
  }

  moveUp(): void {
    this.#beginVerticalOperation();
    const selection = this.#takeSelection();
    if (selection) this.#cursor = selection.start;
    this.#moveTo(this.#verticalTarget(-1));
  }

  moveDown(): void {
    this.#beginVerticalOperation();
    const selection = this.#takeSelection();
    if (selection) this.#cursor = selection.end;
    this.#moveTo(this.#verticalTarget(1));
  }

  moveWordLeft(): void {
    this.#beginOperation();
    const selection = this.#takeSelection();
    this.#moveTo(this.#snap(prevWordBreak(this.#text, selection ? selection.start : this.#cursor)));
  }

  moveWordRight(): void {
    this.#beginOperation();
    const selection = this.#takeSelection();
    this.#moveTo(this.#snap(nextWordBreak(this.#text, selection ? selection.end : this.#cursor)));
  }

  moveToLineStart(): void {
    this.#beginOperation();
    this.#takeSelection();
    this.#moveTo(this.layout().lineForOffset(this.#cursor).startOffset);
  }

  moveToLineEnd(): void {
    this.#beginOperation();
    this.#takeSelection();
    const layout = this.layout();
    this.#moveTo(layout.lineCaretEnd(layout.lineForOffset(this.#cursor)));
  }

  moveToTextStart(): void {
    this.#beginOperation();
    this.#takeSelection();
    this.#moveTo(0);
  }

  moveToTextEnd(): void {
    this.#beginOperation();
    this.#takeSelection();
    this.#moveTo(this.#text.length);
  }

  /** @throws {InvalidInputError} On non-finite coordinates; state is unchanged. */
  moveToPoint(x: number, y: number): void {
    assertFiniteCoordinate(x, y);
    this.#beginOperation();
    this.#takeSelection();
    this.#moveTo(this.layout().offsetAt(x, y));
  }

  // ---------------------------------------------------------------------------
  // Selection
  // ---------------------------------------------------------------------------

  selectLeft(): void {
    this.#beginOperation();
    this.#extendTo(this.layout().previousCaretOffset(this.#cursor));
  }

  selectRight(): void {
    this.#beginOperation();
    this.#extendTo(this.layout().nextCaretOffset(this.#cursor));
  }

  selectUp(): void {
    this.#beginVerticalOperation();
    this.#extendTo(this.#verticalTarget(-1));
  }

  selectDown(): void {
    this.#beginVerticalOperation();
    this.#extendTo(this.#verticalTarget(1));
  }

  selectWordLeft(): void {
    this.#beginOperation();
    this.#extendTo(this.#snap(prevWordBreak(this.#text, this.#cursor)));
  }

  selectWordRight(): void {
    this.#beginOperation();
    this.#extendTo(this.#snap(nextWordBreak(this.#text, this.#cursor)));
  }

  selectToLineStart(): void {
    this.#beginOperation();
    this.#extendTo(this.layout().lineForOffset(this.#cursor).startOffset);
  }

  selectToLineEnd(): void {
    this.#beginOperation();
    const layout = this.layout();
    this.#extendTo(layout.lineCaretEnd(layout.lineForOffset(this.#cursor)));
  }

  selectToTextStart(): void {
    this.#beginOperation();
    this.#extendTo(0);
  }

  selectToTextEnd(): void {
    this.#beginOperation();
    this.#extendTo(this.#text.length);
  }

  selectAll(): void {
    this.#beginOperation();
    if (this.#text.length === 0) return;
    this.#state = { kind: 'selecting', anchor: 0 };
    this.#cursor = this.#text.length;
  }

  /** Drops the anchor; the cursor stays where it is. */
  collapseSelection(): void {
    this.#beginOperation();
    this.#state = IDLE;
  }

  /** @throws {InvalidInputError} On non-finite coordinates; state is unchanged. */
  extendSelectionToPoint(x: number, y: number): void {
    assertFiniteCoordinate(x, y);
    this.#beginOperation();
    this.#extendTo(this.layout().offsetAt(x, y));
  }

  /** Selects the word, whitespace run or punctuation under the point. */
  selectWordAt(x: number, y: number): void {
    assertFiniteCoordinate(x, y);
    this.#beginOperation();
    if (this.#text.length === 0) return;
    const { start, end } = wordBoundariesAt(this.#text, this.layout().offsetAt(x, y));
    this.#select(this.#snap(start), this.#snap(end));
  }

  /**
   * Sets anchor and focus directly; both clamp to the text and snap to caret offsets.
   *
   * @throws {InvalidInputError} On non-integer offsets.
   */
  setSelection(anchor: number, focus: number): void {
    assertOffset(anchor);
    assertOffset(focus);
    this.#beginOperation();
    this.#select(this.#snap(anchor), this.#snap(focus));
  }

  // ---------------------------------------------------------------------------
  // Text mutation
  // ---------------------------------------------------------------------------

  /**
   * Returns the inserted range. When the new text joins a grapheme cluster that
   * follows it, the caret lands after that cluster, past `range.end`.
   */
  insertOrReplaceSelection(text: string): TextRange {
    this.#beginOperation();
    this.#deleteActiveSelection();
    const start = this.#cursor;
    if (text.length === 0) return { start, end: start };
    this.#replace(start, start, text);
    this.#cursor = this.#snapForward(start + text.length);
    return { start, end: start + text.length };
  }

  delete(): void {
    this.#beginOperation();
    if (this.#deleteActiveSelection()) return;
    if (this.#cursor >= this.#text.length) return;
    this.#replace(this.#cursor, this.layout().nextCaretOffset(this.#cursor), '');
  }

  backdelete(): void {
    this.#beginOperation();
    if (this.#deleteActiveSelection()) return;
    if (this.#cursor <= 0) return;
    const start = this.layout().previousCaretOffset(this.#cursor);
    this.#replace(start, this.#cursor, '');
    this.#cursor = start;
  }

  deleteWord(): void {
    this.#beginOperation();
    if (this.#deleteActiveSelection()) return;
    if (this.#cursor >= this.#text.length) return;
    this.#replace(this.#cursor, this.#snap(nextWordBreak(this.#text, this.#cursor)), '');
  }

  backdeleteWord(): void {
    this.#beginOperation();
    if (this.#deleteActiveSelection()) return;
    if (this.#cursor <= 0) return;
    const start = this.#snap(prevWordBreak(this.#text, this.#cursor));
    this.#replace(start, this.#cursor, '');
    this.#cursor = start;
  }

  deleteSelection(): void {
    this.#beginOperation();
    this.#deleteActiveSelection();
  }

  // ---------------------------------------------------------------------------
  // IME composition
  // ---------------------------------------------------------------------------

  /**
   * Replaces the composition text, starting a composition at the cursor
   * (over the selection, if any) when none is active. The cursor lands at
   * `cursorWithinCompose`, clamped to the new text. Empty `text` ends the
   * composition like {@link clearCompose}.
   *
   * @throws {InvalidInputError} When `cursorWithinCompose` is not an integer.
   */
  setCompose(text: string, cursorWithinCompose: number): void {
    assertOffset(cursorWithinCompose);
    this.#goalX = null;
    if (text.length === 0) {
      this.clearCompose();
      return;
    }

    let range: TextRange;
    if (this.#state.kind === 'composing') {
      range = this.#state.range;
    } else {
      this.#deleteActiveSelection();
      range = { start: this.#cursor, end: this.#cursor };
    }

    this.#replace(range.start, range.end, text);
    this.#state = { kind: 'composing', range: { start: range.start, end: range.start + text.length } };
    this.#cursor = this.#snap(range.start + Math.min(Math.max(cursorWithinCompose, 0), text.length));
    log('setCompose', { start: range.start, length: text.length, cursor: this.#cursor });
  }

  /** Removes the composition text and leaves composing. No-op when not composing. */
  clearCompose(): void {
    this.#goalX = null;
    if (this.#state.kind !== 'composing') return;
    const { range } = this.#state;
    this.#state = IDLE;
    this.#replace(range.start, range.end, '');
    this.#cursor = range.start;
  }

  /** Keeps the composition text as regular text and puts the cursor after it. */
  commitCompose(): void {
    this.#goalX = null;
    if (this.#state.kind !== 'composing') return;
    const { range } = this.#state;
    this.#state = IDLE;
    this.#cursor = range.end;
    this.#invalidate();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  #beginOperation(): void {
    this.#goalX = null;
    this.#settleComposition();
  }

  #beginVerticalOperation(): void {
    this.#settleComposition();
  }

  #settleComposition(): void {
    if (this.#state.kind !== 'composing') return;
    if (this.#compositionPolicy === 'commit') {
      this.commitCompose();
    } else {
      this.clearCompose();
    }
  }

  /** Collapses any selection and returns it when it was non-empty. */
  #takeSelection(): TextRange | null {
    const selection = this.hasSelection() ? this.selection : null;
    this.#state = IDLE;
    return selection;
  }

  #moveTo(offset: number): void {
    this.#cursor = offset;
    this.#state = IDLE;
  }

  #extendTo(offset: number): void {
    const anchor = this.#state.kind === 'selecting' ? this.#state.anchor : this.#cursor;
    if (this.#state.kind !== 'selecting' && offset === this.#cursor) return;
    this.#select(anchor, offset);
  }

  #select(anchor: number, focus: number): void {
    this.#cursor = focus;
    this.#state = anchor === focus ? IDLE : { kind: 'selecting', anchor };
  }

  /** Removes a non-empty selection and collapses to its start. Returns whether anything was removed. */
  #deleteActiveSelection(): boolean {
    const selection = this.#takeSelection();
    if (!selection) return false;
    this.#replace(selection.start, selection.end, '');
    this.#cursor = selection.start;
    return true;
  }

  /**
   * Offset on the adjacent line at the remembered x. The first line moves up
   * to the text start, the last line down to the text end.
   */
  #verticalTarget(direction: -1 | 1): number {
    const layout = this.layout();
    const position = layout.positionAt(this.#cursor);
    const goalX = this.#goalX ?? position.x;
    this.#goalX = goalX;

    const target = layout.lineAt(position.lineIndex + direction);
    if (!target) return direction < 0 ? 0 : this.#text.length;
    return layout.offsetAt(goalX, target.top + target.height / 2);
  }

  #snap(offset: number): number {
    return this.layout().snapOffset(offset);
  }

  /** Smallest caret offset that is `>= offset`. */
  #snapForward(offset: number): number {
    const layout = this.layout();
    const snapped = layout.snapOffset(offset);
    return snapped === offset ? snapped : layout.nextCaretOffset(snapped);
  }

  #clamp(offset: number): number {
    return Math.min(Math.max(offset, 0), this.#text.length);
  }

  /** Replaces `[start, end)` and shifts style ranges. Inserted text takes the style before it. */
  #replace(start: number, end: number, insert: string): void {
    const removed = end - start;
    this.#text = this.#text.slice(0, start) + insert + this.#text.slice(end);

    const mapDeleted = (offset: number): number => (offset <= start ? offset : offset >= end ? offset - removed : start);
    let styles = this.#styles
      .map((range) => ({ ...range, start: mapDeleted(range.start), end: mapDeleted(range.end) }))
      .filter((range) => range.end > range.start);

    if (insert.length > 0) {
      const length = insert.length;
      const host = styles.findIndex((range) => range.start < start && start <= range.end);
      const growIndex = host >= 0 ? host : styles.length > 0 ? 0 : -1;
      if (growIndex < 0) {
        styles = [{ start: 0, end: length, style: {} }];
      } else {
        styles = styles.map((range, index) => {
          if (index === growIndex) return { ...range, end: range.end + length };
          if (index > growIndex) return { ...range, start: range.start + length, end: range.end + length };
          return range;
        });
      }
    }

    this.#styles = styles;
    this.#invalidate();
  }

  #splitStyleRangesAt(offset: number): void {
    const next: StyleRange[] = [];
    for (const range of this.#styles) {
      if (range.start < offset && offset < range.end) {
        next.push({ ...range, end: offset }, { ...range, start: offset });
      } else {
        next.push(range);
      }
    }
    this.#styles = next;
  }

  #invalidate(): void {
    this.#layout = null;
  }

  #buildLayout(): Layout {
    const builder = new LayoutBuilder({
      shaper: this.#shaper,
      defaultStyle: createTextStyle(scaleOverride({ ...this.#baseStyle, fontSize: this.#fontSize }, this.#scale)),
      whiteSpace: this.#whiteSpace,
    });
    const composition = this.composition;

    for (const range of this.#styles) {
      builder.pushStyleSpan(scaleOverride(range.style, this.#scale));
      const cuts = [range.start, range.end];
      if (composition) {
        for (const edge of [composition.start, composition.end]) {
          if (edge > range.start && edge < range.end) cuts.push(edge);
        }
      }
      cuts.sort((a, b) => a - b);
      for (let i = 0; i < cuts.length - 1; i += 1) {
        const from = cuts[i];
        const to = cuts[i + 1];
        const chunk = this.#text.slice(from, to);
        if (composition && from >= composition.start && to <= composition.end) {
          builder.pushTemporaryStyle({ decorations: COMPOSITION_DECORATION });
          builder.pushText(chunk);
          builder.popStyleSpan();
        } else {
          builder.pushText(chunk);
        }
      }
      builder.popStyleSpan();
    }

    const { layout } = builder.build({ maxWidth: this.#width });
    log('rebuild', { length: this.#text.length, lines: layout.lineCount, ranges: this.#styles.length });
    return layout;
  }
}
