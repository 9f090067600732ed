/**
 * Source Location
 * Grapheme-based positions and half-open spans shared by every stage
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  /** 1-based line */
  readonly line: number;
  /** 1-based column, counted in grapheme clusters */
  readonly column: number;
  /** 0-based grapheme index from the start of the source */
  readonly index: number;
}

/** Half-open range: `start` inclusive, `end` exclusive */
export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/** Mutable span owned by whichever stage currently holds the cursor */
export interface CursorSpan {
  start: SourceLocation;
  end: SourceLocation;
}

export const INITIAL_LOCATION: SourceLocation = {
  line: 1,
  column: 1,
  index: 0,
};

// ============================================================
// GRAPHEMES
// ============================================================

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/** Code units segmented at a time */
const SEGMENT_WINDOW = 1024;

/**
 * Split text into user-perceived characters.
 * `"\r\n"` comes back as a single cluster.
 *
 * Text is segmented one window at a time. The last cluster of a window may
 * continue past it, so the next window starts at that cluster; a window
 * holding a single unfinished cluster is doubled.
 */
export function splitGraphemes(text: string): string[] {
  const graphemes: string[] = [];
  let offset = 0;
  let size = SEGMENT_WINDOW;

  while (offset < text.length) {
    const end = offset + size;
    const segments = Array.from(segmenter.segment(text.slice(offset, end)));

    if (end >= text.length) {
      for (const { segment } of segments) graphemes.push(segment);
      break;
    }

    const last = segments.pop();
    if (!last || segments.length === 0) {
      size *= 2;
      continue;
    }

    for (const { segment } of segments) graphemes.push(segment);
    offset += last.index;
    size = SEGMENT_WINDOW;
  }

  return graphemes;
}

export function isNewlineGrapheme(grapheme: string): boolean {
  return grapheme === '\n' || grapheme === '\r\n';
}

// ============================================================
// LOCATION ARITHMETIC
// ============================================================

/** Position after consuming `grapheme` at `location` */
export function advanceLocation(
  location: SourceLocation,
  grapheme: string
): SourceLocation {
  if (isNewlineGrapheme(grapheme)) {
    return { line: location.line + 1, column: 1, index: location.index + 1 };
  }
  return {
    line: location.line,
    column: location.column + 1,
    index: location.index + 1,
  };
}

export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

export function createCursor(): CursorSpan {
  return { start: INITIAL_LOCATION, end: INITIAL_LOCATION };
}

export function advanceCursor(cursor: CursorSpan, grapheme: string): void {
  cursor.end = advanceLocation(cursor.end, grapheme);
}

/** Collapse the cursor so the next token starts where this one ended */
export function closeSpan(cursor: CursorSpan): void {
  cursor.start = cursor.end;
}

export function snapshotSpan(cursor: CursorSpan): SourceSpan {
  return { start: cursor.start, end: cursor.end };
}

/** Source text covered by `span` */
export function spanText(graphemes: readonly string[], span: SourceSpan): string {
  return graphemes.slice(span.start.index, span.end.index).join('');
}
