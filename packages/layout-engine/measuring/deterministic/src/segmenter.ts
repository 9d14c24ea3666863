export type GraphemeSegment = {
  segment: string;
  index: number;
};

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

function isAsciiText(text: string): boolean {
  for (let i = 0; i < text.length; i += 1) {
    if (text.charCodeAt(i) > 0x7f) {
      return false;
    }
  }
  return true;
}

/**
 * Splits text into grapheme clusters. ASCII input skips `Intl.Segmenter`,
 * where every code unit is its own cluster (CRLF is kept together).
 */
export function graphemeSegments(text: string): GraphemeSegment[] {
  if (isAsciiText(text)) {
    const segments: GraphemeSegment[] = [];
    for (let i = 0; i < text.length; i += 1) {
      if (text[i] === '\r' && text[i + 1] === '\n') {
        segments.push({ segment: '\r\n', index: i });
        i += 1;
        continue;
      }
      segments.push({ segment: text[i] ?? '', index: i });
    }
    return segments;
  }
  return Array.from(graphemeSegmenter.segment(text), ({ segment, index }) => ({ segment, index }));
}

export function graphemeCount(text: string): number {
  return graphemeSegments(text).length;
}
