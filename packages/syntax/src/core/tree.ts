import type { Location, Span } from "./model.js";

/**
 * Check whether a location falls inside a span (inclusive on both ends).
 */
export function spanContains(span: Span, loc: Pick<Location, "line" | "column">): boolean {
  if (loc.line < span.start.line || loc.line > span.end.line) {
    return false;
  }
  if (loc.line === span.start.line && loc.column < span.start.column) {
    return false;
  }
  if (loc.line === span.end.line && loc.column > span.end.column) {
    return false;
  }
  return true;
}

/**
 * Span covering both inputs, assuming `start` precedes `end` in the source.
 */
export function joinSpans(start: Span, end: Span): Span {
  return { start: start.start, end: end.end };
}
