import type { TextRange } from '@textflow/contracts';

type WordSegment = {
  segment: string;
  index: number;
  isWordLike: boolean;
};

const wordSegmenter = new Intl.Segmenter(undefined, { granularity: 'word' });

function wordSegments(text: string): WordSegment[] {
  return Array.from(wordSegmenter.segment(text), ({ segment, index, isWordLike }) => ({
    segment,
    index,
    isWordLike: isWordLike ?? false,
  }));
}

const isWhitespaceOnly = (segment: string): boolean => /^\s+$/.test(segment);

const isPunctuationOnly = (segment: string): boolean => /^[\p{P}\p{S}]+$/u.test(segment);

/** Word-like segments, plus runs that are neither whitespace nor punctuation (numbers mixed with symbols...). */
function isNavigableWord(segment: WordSegment): boolean {
  if (segment.isWordLike) return true;
  return !isWhitespaceOnly(segment.segment) && !isPunctuationOnly(segment.segment);
}

const segmentEnd = (segment: WordSegment): number => segment.index + segment.segment.length;

/** Start of the word before `offset`, joining adjacent navigable segments. Returns 0 when there is none. */
export function prevWordBreak(text: string, offset: number): number {
  if (offset <= 0 || text.length === 0) return 0;
  const clamped = Math.min(offset, text.length);
  const segments = wordSegments(text);

  for (let i = segments.length - 1; i >= 0; i -= 1) {
    const segment = segments[i];
    if (segment.index >= clamped || !isNavigableWord(segment)) continue;
    let start = segment.index;
    for (let j = i - 1; j >= 0; j -= 1) {
      const previous = segments[j];
      if (!isNavigableWord(previous) || segmentEnd(previous) !== start) break;
      start = previous.index;
    }
    return start;
  }
  return 0;
}

/** End of the word at or after `offset`. Returns `text.length` when there is none. */
export function nextWordBreak(text: string, offset: number): number {
  if (offset >= text.length || text.length === 0) return text.length;
  const clamped = Math.max(0, offset);
  const segments = wordSegments(text);

  for (let i = 0; i < segments.length; i += 1) {
    const segment = segments[i];
    if (segmentEnd(segment) <= clamped || !isNavigableWord(segment)) continue;
    let end = segmentEnd(segment);
    for (let j = i + 1; j < segments.length; j += 1) {
      const next = segments[j];
      if (!isNavigableWord(next) || next.index !== end) break;
      end = segmentEnd(next);
    }
    return end;
  }
  return text.length;
}

/**
 * Range selected by a double click at `offset`: the segment under the offset,
 * whether it is a word, a whitespace run or punctuation. A click at the very
 * end, or on a newline, selects the segment before it.
 */
export function wordBoundariesAt(text: string, offset: number): TextRange {
  if (text.length === 0) return { start: 0, end: 0 };

  let target = Math.max(0, Math.min(offset, text.length - 1));
  if (text[target] === '\n' && target > 0) target -= 1;

  for (const segment of wordSegments(text)) {
    if (target >= segment.index && target < segmentEnd(segment)) {
      return { start: segment.index, end: segmentEnd(segment) };
    }
  }
  return { start: text.length, end: text.length };
}
