import { describe, it, expect } from 'vitest';
import { InvalidInputError } from '@textflow/contracts';
import { EditBuffer, EditDriver, actionForKey, type InsertGroup } from '../src/index.js';
import { bufferAt, bufferWith, lineMiddle } from './fixtures.js';

describe('actionForKey', () => {
  it('maps arrows to caret motions and shift to selection', () => {
    expect(actionForKey('ArrowLeft')).toEqual({ type: 'move', motion: 'left' });
    expect(actionForKey('ArrowDown', { shift: true })).toEqual({ type: 'select', motion: 'down' });
  });

  it('uses ctrl and Home/End outside macOS', () => {
    expect(actionForKey('ArrowLeft', { shift: true, ctrl: true })).toEqual({ type: 'select', motion: 'wordLeft' });
    expect(actionForKey('End')).toEqual({ type: 'move', motion: 'lineEnd' });
    expect(actionForKey('Home', { ctrl: true })).toEqual({ type: 'move', motion: 'textStart' });
    expect(actionForKey('Backspace', { ctrl: true })).toEqual({ type: 'backdeleteWord' });
    expect(actionForKey('a', { ctrl: true })).toEqual({ type: 'selectAll' });
  });

  it('uses alt for words and meta for lines on macOS', () => {
    expect(actionForKey('ArrowLeft', { alt: true }, 'mac')).toEqual({ type: 'move', motion: 'wordLeft' });
    expect(actionForKey('ArrowRight', { meta: true }, 'mac')).toEqual({ type: 'move', motion: 'lineEnd' });
    expect(actionForKey('ArrowUp', { meta: true, shift: true }, 'mac')).toEqual({
      type: 'select',
      motion: 'textStart',
    });
    expect(actionForKey('Delete', { alt: true }, 'mac')).toEqual({ type: 'deleteWord' });
    expect(actionForKey('a', { meta: true }, 'mac')).toEqual({ type: 'selectAll' });
    expect(actionForKey('a', { ctrl: true }, 'mac')).toBeNull();
  });

  it('turns printable keys, Enter and Tab into insertions', () => {
    expect(actionForKey('A', { shift: true })).toEqual({ type: 'insertText', text: 'A' });
    expect(actionForKey('Enter')).toEqual({ type: 'insertText', text: '\n' });
    expect(actionForKey('Tab')).toEqual({ type: 'insertText', text: '\t' });
  });

  it('ignores keys it has no binding for', () => {
    expect(actionForKey('F5')).toBeNull();
    expect(actionForKey('x', { ctrl: true })).toBeNull();
  });

  it('collapses the selection on Escape', () => {
    expect(actionForKey('Escape')).toEqual({ type: 'collapseSelection' });
  });
});

describe('EditDriver', () => {
  it('forwards handled keys to the buffer', () => {
    const driver = new EditDriver(bufferWith('hello'));
    expect(driver.handleKey('ArrowLeft')).toBe(true);
    expect(driver.buffer.cursor).toBe(4);

    expect(driver.handleKey('F5')).toBe(false);
    expect(driver.buffer.cursor).toBe(4);

    driver.handleKey('Home', { shift: true });
    expect(driver.buffer.selection).toEqual({ start: 0, end: 4 });
  });

  it('dispatches pointer and composition actions', () => {
    const driver = new EditDriver(bufferWith('hello'));
    driver.dispatch({ type: 'moveToPoint', x: 8, y: lineMiddle(0) });
    expect(driver.buffer.cursor).toBe(1);

    driver.dispatch({ type: 'setCompose', text: 'xy', cursor: 2 });
    expect(driver.buffer.text).toBe('hxyello');
    driver.dispatch({ type: 'commitCompose' });
    expect(driver.buffer.cursor).toBe(3);

    driver.dispatch({ type: 'selectWordAt', x: 8, y: lineMiddle(0) });
    expect(driver.buffer.selection).toEqual({ start: 0, end: 7 });
    driver.dispatch({ type: 'deleteSelection' });
    expect(driver.buffer.text).toBe('');
  });

  it('rejects an invalid grouping window', () => {
    expect(() => new EditDriver(new EditBuffer(), { groupWindowMs: -1 })).toThrow(InvalidInputError);
  });
});

describe('EditDriver insert grouping', () => {
  const setup = () => {
    let time = 0;
    const groups: InsertGroup[] = [];
    const driver = new EditDriver(new EditBuffer(), {
      groupWindowMs: 500,
      now: () => time,
      onInsertGroup: (group) => groups.push(group),
    });
    const advance = (ms: number): void => {
      time += ms;
    };
    return { driver, groups, advance };
  };

  it('coalesces contiguous typing until flushed', () => {
    const { driver, groups, advance } = setup();
    driver.handleKey('h');
    advance(100);
    driver.handleKey('i');
    expect(groups).toEqual([]);

    driver.flush();
    expect(groups).toEqual([{ start: 0, end: 2, text: 'hi', startedAt: 0, updatedAt: 100 }]);
  });

  it('starts a new group after a pause longer than the window', () => {
    const { driver, groups, advance } = setup();
    driver.handleKey('a');
    advance(501);
    driver.handleKey('b');
    driver.flush();
    expect(groups).toEqual([
      { start: 0, end: 1, text: 'a', startedAt: 0, updatedAt: 0 },
      { start: 1, end: 2, text: 'b', startedAt: 501, updatedAt: 501 },
    ]);
  });

  it('closes the group on any other action', () => {
    const { driver, groups } = setup();
    driver.handleKey('a');
    driver.handleKey('b');
    driver.handleKey('ArrowLeft');
    expect(groups).toEqual([{ start: 0, end: 2, text: 'ab', startedAt: 0, updatedAt: 0 }]);

    driver.handleKey('x');
    driver.flush();
    expect(groups[1]).toEqual({ start: 1, end: 2, text: 'x', startedAt: 0, updatedAt: 0 });
    expect(driver.buffer.text).toBe('axb');
  });

  it('reports the inserted range when the caret lands past it', () => {
    const groups: InsertGroup[] = [];
    const driver = new EditDriver(bufferAt('\u{1F1F8}', 0), {
      now: () => 0,
      onInsertGroup: (group) => groups.push(group),
    });
    driver.dispatch({ type: 'insertText', text: '\u{1F1FA}' });
    driver.handleKey('x');
    driver.flush();
    expect(driver.buffer.text).toBe('\u{1F1FA}\u{1F1F8}x');
    expect(groups).toEqual([
      { start: 0, end: 2, text: '\u{1F1FA}', startedAt: 0, updatedAt: 0 },
      { start: 4, end: 5, text: 'x', startedAt: 0, updatedAt: 0 },
    ]);
  });

  it('reports nothing for empty insertions', () => {
    const { driver, groups } = setup();
    driver.dispatch({ type: 'insertText', text: '' });
    driver.flush();
    expect(groups).toEqual([]);
  });
});
