import { LogicError, type TextStyle, type TextStyleOverride } from '@textflow/contracts';
import { mergeTextStyle } from './cascade.js';

type StackEntry = {
  readonly override: TextStyleOverride;
  readonly effective: TextStyle;
};

/**
 * Owned stack of style overrides. Each entry stores the effective style it
 * produced so `current()` is a constant-time read.
 */
export class StyleSpanStack {
  readonly #base: TextStyle;
  readonly #entries: StackEntry[] = [];

  constructor(base: TextStyle) {
    this.#base = base;
  }

  get depth(): number {
    return this.#entries.length;
  }

  get base(): TextStyle {
    return this.#base;
  }

  current(): TextStyle {
    return this.#entries.at(-1)?.effective ?? this.#base;
  }

  push(override: TextStyleOverride): TextStyle {
    const effective = mergeTextStyle(this.current(), override);
    this.#entries.push({ override, effective });
    return effective;
  }

  /**
   * Same contract as {@link push}. The caller pops it right after a single
   * atomic insertion (forced breaks, composition underline).
   */
  pushTemporaryModification(fields: TextStyleOverride): TextStyle {
    return this.push(fields);
  }

  pop(): TextStyleOverride {
    const entry = this.#entries.pop();
    if (!entry) {
      throw new LogicError('STYLE_STACK_UNDERFLOW', 'StyleSpanStack.pop called with no pushed style span');
    }
    return entry.override;
  }
}
