import { z } from 'zod';
import { createDebugLogger, parseOrThrow } from '@textflow/contracts';
import type { EditBuffer } from './edit-buffer.js';

const log = createDebugLogger('edit-driver');

export type CaretMotion =
  | 'left'
  | 'right'
  | 'up'
  | 'down'
  | 'wordLeft'
  | 'wordRight'
  | 'lineStart'
  | 'lineEnd'
  | 'textStart'
  | 'textEnd';

/** Closed set of input actions the driver understands. */
export type EditAction =
  | { readonly type: 'move'; readonly motion: CaretMotion }
  | { readonly type: 'select'; readonly motion: CaretMotion }
  | { readonly type: 'moveToPoint'; readonly x: number; readonly y: number }
  | { readonly type: 'extendSelectionToPoint'; readonly x: number; readonly y: number }
  | { readonly type: 'selectWordAt'; readonly x: number; readonly y: number }
  | { readonly type: 'selectAll' }
  | { readonly type: 'collapseSelection' }
  | { readonly type: 'insertText'; readonly text: string }
  | { readonly type: 'delete' }
  | { readonly type: 'backdelete' }
  | { readonly type: 'deleteWord' }
  | { readonly type: 'backdeleteWord' }
  | { readonly type: 'deleteSelection' }
  | { readonly type: 'setCompose'; readonly text: string; readonly cursor: number }
  | { readonly type: 'clearCompose' }
  | { readonly type: 'commitCompose' };

export type KeyModifiers = {
  shift?: boolean;
  alt?: boolean;
  ctrl?: boolean;
  meta?: boolean;
};

/** `mac` moves by word with Alt and by line with Meta; `standard` uses Ctrl and Home/End. */
export type KeyboardPlatform = 'mac' | 'standard';

/** Consecutive contiguous insertions, reported once the group closes. */
export type InsertGroup = {
  readonly start: number;
  readonly end: number;
  readonly text: string;
  readonly startedAt: number;
  readonly updatedAt: number;
};

export type EditDriverOptions = {
  platform?: KeyboardPlatform;
  /** Longest pause, in ms, between insertions of one group. Default 1000. */
  groupWindowMs?: number;
  now?: () => number;
  onInsertGroup?: (group: InsertGroup) => void;
};

const editDriverOptionsSchema = z.object({
  platform: z.enum(['mac', 'standard']).optional(),
  groupWindowMs: z.number().finite().nonnegative().optional(),
});

const MOVES: Record<CaretMotion, (buffer: EditBuffer) => void> = {
  left: (buffer) => buffer.moveLeft(),
  right: (buffer) => buffer.moveRight(),
  up: (buffer) => buffer.moveUp(),
  down: (buffer) => buffer.moveDown(),
  wordLeft: (buffer) => buffer.moveWordLeft(),
  wordRight: (buffer) => buffer.moveWordRight(),
  lineStart: (buffer) => buffer.moveToLineStart(),
  lineEnd: (buffer) => buffer.moveToLineEnd(),
  textStart: (buffer) => buffer.moveToTextStart(),
  textEnd: (buffer) => buffer.moveToTextEnd(),
};

const SELECTIONS: Record<CaretMotion, (buffer: EditBuffer) => void> = {
  left: (buffer) => buffer.selectLeft(),
  right: (buffer) => buffer.selectRight(),
  up: (buffer) => buffer.selectUp(),
  down: (buffer) => buffer.selectDown(),
  wordLeft: (buffer) => buffer.selectWordLeft(),
  wordRight: (buffer) => buffer.selectWordRight(),
  lineStart: (buffer) => buffer.selectToLineStart(),
  lineEnd: (buffer) => buffer.selectToLineEnd(),
  textStart: (buffer) => buffer.selectToTextStart(),
  textEnd: (buffer) => buffer.selectToTextEnd(),
};

/**
 * Translates input actions into {@link EditBuffer} calls. Apart from the
 * open insertion group it keeps no state; every policy lives in the buffer.
 */
export class EditDriver {
  readonly #buffer: EditBuffer;
  readonly #platform: KeyboardPlatform;
  readonly #groupWindowMs: number;
  readonly #now: () => number;
  readonly #onInsertGroup: ((group: InsertGroup) => void) | undefined;
  #openGroup: InsertGroup | null = null;

  constructor(buffer: EditBuffer, options: EditDriverOptions = {}) {
    const parsed = parseOrThrow(
      editDriverOptionsSchema,
      { platform: options.platform, groupWindowMs: options.groupWindowMs },
      'INVALID_OPTIONS',
      'Invalid edit driver options',
    );
    this.#buffer = buffer;
    this.#platform = parsed.platform ?? 'standard';
    this.#groupWindowMs = parsed.groupWindowMs ?? 1000;
    this.#now = options.now ?? Date.now;
    this.#onInsertGroup = options.onInsertGroup;
  }

  get buffer(): EditBuffer {
    return this.#buffer;
  }

  dispatch(action: EditAction): void {
    if (action.type === 'insertText') {
      this.#insert(action.text);
      return;
    }
    this.flush();

    const buffer = this.#buffer;
    switch (action.type) {
      case 'move':
        MOVES[action.motion](buffer);
        break;
      case 'select':
        SELECTIONS[action.motion](buffer);
        break;
      case 'moveToPoint':
        buffer.moveToPoint(action.x, action.y);
        break;
      case 'extendSelectionToPoint':
        buffer.extendSelectionToPoint(action.x, action.y);
        break;
      case 'selectWordAt':
        buffer.selectWordAt(action.x, action.y);
        break;
      case 'selectAll':
        buffer.selectAll();
        break;
      case 'collapseSelection':
        buffer.collapseSelection();
        break;
      case 'delete':
        buffer.delete();
        break;
      case 'backdelete':
        buffer.backdelete();
        break;
      case 'deleteWord':
        buffer.deleteWord();
        break;
      case 'backdeleteWord':
        buffer.backdeleteWord();
        break;
      case 'deleteSelection':
        buffer.deleteSelection();
        break;
      case 'setCompose':
        buffer.setCompose(action.text, action.cursor);
        break;
      case 'clearCompose':
        buffer.clearCompose();
        break;
      case 'commitCompose':
        buffer.commitCompose();
        break;
    }
  }

  /** Maps a key and dispatches the result. Returns whether the key was handled. */
  handleKey(key: string, modifiers: KeyModifiers = {}): boolean {
    const action = actionForKey(key, modifiers, this.#platform);
    if (!action) return false;
    this.dispatch(action);
    return true;
  }

  /** Closes the open insertion group and reports it. */
  flush(): void {
    const group = this.#openGroup;
    if (!group) return;
    this.#openGroup = null;
    log('insert group', { start: group.start, end: group.end, length: group.text.length });
    this.#onInsertGroup?.(group);
  }

  #insert(text: string): void {
    const replacing = this.#buffer.hasSelection();
    const { start, end } = this.#buffer.insertOrReplaceSelection(text);
    if (start === end) return;

    const now = this.#now();
    const open = this.#openGroup;
    if (open && !replacing && open.end === start && now - open.updatedAt <= this.#groupWindowMs) {
      this.#openGroup = { ...open, end, text: open.text + text, updatedAt: now };
      return;
    }
    this.flush();
    this.#openGroup = { start, end, text, startedAt: now, updatedAt: now };
  }
}

/**
 * Default key bindings. `key` follows `KeyboardEvent.key`; Shift turns any
 * caret motion into a selection.
 */
export function actionForKey(
  key: string,
  modifiers: KeyModifiers = {},
  platform: KeyboardPlatform = 'standard',
): EditAction | null {
  const isMac = platform === 'mac';
  const word = isMac ? Boolean(modifiers.alt) : Boolean(modifiers.ctrl);
  const primary = isMac ? Boolean(modifiers.meta) : Boolean(modifiers.ctrl);
  const macLine = isMac && Boolean(modifiers.meta);

  const motion = (value: CaretMotion): EditAction =>
    modifiers.shift ? { type: 'select', motion: value } : { type: 'move', motion: value };

  switch (key) {
    case 'ArrowLeft':
      return motion(macLine ? 'lineStart' : word ? 'wordLeft' : 'left');
    case 'ArrowRight':
      return motion(macLine ? 'lineEnd' : word ? 'wordRight' : 'right');
    case 'ArrowUp':
      return motion(macLine ? 'textStart' : 'up');
    case 'ArrowDown':
      return motion(macLine ? 'textEnd' : 'down');
    case 'Home':
      return motion(primary ? 'textStart' : 'lineStart');
    case 'End':
      return motion(primary ? 'textEnd' : 'lineEnd');
    case 'Backspace':
      return { type: word ? 'backdeleteWord' : 'backdelete' };
    case 'Delete':
      return { type: word ? 'deleteWord' : 'delete' };
    case 'Escape':
      return { type: 'collapseSelection' };
    case 'Enter':
      return { type: 'insertText', text: '\n' };
    case 'Tab':
      return { type: 'insertText', text: '\t' };
  }

  if (primary && key.toLowerCase() === 'a') return { type: 'selectAll' };
  if (key.length === 1 && !modifiers.ctrl && !modifiers.meta && !modifiers.alt) {
    return { type: 'insertText', text: key };
  }
  return null;
}
