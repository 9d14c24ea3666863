import { EditBuffer, type EditBufferOptions } from '../src/index.js';

/**
 * Default shaper metrics: 16px font, 8px per grapheme, 20px lines.
 * A point in the middle of line `n` sits at `y = n * LINE_HEIGHT + LINE_HEIGHT / 2`.
 */
export const ADVANCE = 8;
export const LINE_HEIGHT = 20;

export const lineMiddle = (lineIndex: number): number => lineIndex * LINE_HEIGHT + LINE_HEIGHT / 2;

export const threeLines = 'abcdef\nab\nabcdef';

export function bufferWith(text: string, options: Omit<EditBufferOptions, 'text'> = {}): EditBuffer {
  return new EditBuffer({ ...options, text });
}

/** Buffer with `text` and the cursor at `cursor`, nothing selected. */
export function bufferAt(text: string, cursor: number, options: Omit<EditBufferOptions, 'text'> = {}): EditBuffer {
  const buffer = bufferWith(text, options);
  buffer.setSelection(cursor, cursor);
  return buffer;
}
