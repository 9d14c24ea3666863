import {
  createDebugLogger,
  inlineBoxSpecSchema,
  LogicError,
  parseOrThrow,
  type InlineBoxSpec,
  type ShapingBackend,
  type TextStyle,
  type TextStyleOverride,
  type WhiteSpaceMode,
} from '@textflow/contracts';
import { createDeterministicShaper } from '@textflow/measuring-deterministic';
import { DEFAULT_TEXT_STYLE, StyleSpanStack, validateTextStyleOverride } from '@textflow/style-engine';
import { Layout } from './layout.js';
import { collapseSource, type PendingEntry } from './source.js';

const log = createDebugLogger('layout-builder');

export type LayoutBuilderOptions = {
  /** Defaults to a cached deterministic shaper built from the current measurement config. */
  shaper?: ShapingBackend;
  /** Style used for text pushed with no open span. */
  defaultStyle?: TextStyle;
  whiteSpace?: WhiteSpaceMode;
};

export type BuildOptions = {
  /** Breaks lines immediately; omitted means a single unwrapped line per paragraph. */
  maxWidth?: number;
};

export type BuildResult = {
  layout: Layout;
  /** Backing text after whitespace collapsing; identical to `layout.text`. */
  text: string;
};

/**
 * Accumulates styled text and inline boxes for one {@link Layout}.
 *
 * Single use: `build()` consumes the builder and every later call throws a
 * `LogicError` with code `BUILDER_CONSUMED`.
 *
 * @example
 * ```typescript
 * const builder = new LayoutBuilder();
 * builder.pushText('Hello ');
 * builder.pushStyleSpan({ fontWeight: 700 });
 * builder.pushText('world');
 * builder.popStyleSpan();
 * const { layout } = builder.build({ maxWidth: 40 });
 * ```
 */
export class LayoutBuilder {
  readonly #shaper: ShapingBackend;
  readonly #styles: StyleSpanStack;
  readonly #pending: PendingEntry[] = [];
  readonly #boxIds = new Set<string>();
  #whiteSpace: WhiteSpaceMode;
  #consumed = false;

  constructor(options: LayoutBuilderOptions = {}) {
    this.#shaper = options.shaper ?? createDeterministicShaper();
    this.#styles = new StyleSpanStack(options.defaultStyle ?? DEFAULT_TEXT_STYLE);
    this.#whiteSpace = options.whiteSpace ?? 'collapse';
  }

  get styleDepth(): number {
    return this.#styles.depth;
  }

  currentStyle(): TextStyle {
    return this.#styles.current();
  }

  pushText(text: string): void {
    this.#assertUsable();
    if (text.length === 0) return;
    this.#pending.push({ kind: 'text', text, style: this.#styles.current(), whiteSpace: this.#whiteSpace });
  }

  /** @throws {InvalidInputError} When the override fails validation. */
  pushStyleSpan(override: TextStyleOverride): void {
    this.#assertUsable();
    this.#styles.push(validateTextStyleOverride(override));
  }

  /** Pushes a span meant to be popped after a single insertion. */
  pushTemporaryStyle(fields: TextStyleOverride): void {
    this.#assertUsable();
    this.#styles.pushTemporaryModification(validateTextStyleOverride(fields));
  }

  /** @throws {LogicError} When no span is open. */
  popStyleSpan(): void {
    this.#assertUsable();
    this.#styles.pop();
  }

  setWhiteSpaceMode(mode: WhiteSpaceMode): void {
    this.#assertUsable();
    this.#whiteSpace = mode;
  }

  /**
   * Inserts a zero-length marker for replaced content at the current position.
   *
   * @throws {InvalidInputError} On an empty id or a negative or non-finite size.
   * @throws {LogicError} When the id was already used in this builder.
   */
  pushInlineBox(spec: InlineBoxSpec): void {
    this.#assertUsable();
    const parsed = parseOrThrow(inlineBoxSpecSchema, spec, 'INVALID_INLINE_BOX', 'Invalid inline box');
    if (this.#boxIds.has(parsed.id)) {
      throw new LogicError('DUPLICATE_INLINE_BOX', `Inline box id "${parsed.id}" is already used in this layout`, {
        id: parsed.id,
      });
    }
    this.#boxIds.add(parsed.id);
    this.#pending.push({
      kind: 'box',
      spec: Object.freeze({ ...parsed }),
      style: this.#styles.current(),
      whiteSpace: this.#whiteSpace,
    });
  }

  build(options: BuildOptions = {}): BuildResult {
    this.#assertUsable();
    this.#consumed = true;
    const source = collapseSource(this.#pending, this.#styles.base);
    log('build', {
      chunks: this.#pending.length,
      runs: source.runs.length,
      boxes: source.boxes.length,
      openSpans: this.#styles.depth,
    });
    const layout = new Layout(source, this.#shaper, options.maxWidth);
    return { layout, text: source.text };
  }

  #assertUsable(): void {
    if (this.#consumed) {
      throw new LogicError('BUILDER_CONSUMED', 'LayoutBuilder was already consumed by build()');
    }
  }
}
