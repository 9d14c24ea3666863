/**
 * @textflow/layout-bridge
 *
 * Editing on top of the layout engine: an {@link EditBuffer} holding text,
 * cursor, selection and IME composition, and an {@link EditDriver} that maps
 * keys and pointer input onto it.
 */

export {
  EditBuffer,
  COMPOSITION_DECORATION,
  type CompositionPolicy,
  type EditableWhiteSpaceMode,
  type EditBufferOptions,
  type EditBufferState,
  type StyleRange,
} from './edit-buffer.js';
export {
  EditDriver,
  actionForKey,
  type CaretMotion,
  type EditAction,
  type EditDriverOptions,
  type InsertGroup,
  type KeyboardPlatform,
  type KeyModifiers,
} from './edit-driver.js';
export { prevWordBreak, nextWordBreak, wordBoundariesAt } from './text-boundaries.js';
