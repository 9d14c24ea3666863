/**
 * @textflow/layout-engine
 *
 * Turns styled inline content into lines of positioned glyph runs and inline
 * boxes, and answers caret and hit-testing queries against the result.
 *
 * Debug output: set `TEXTFLOW_DEBUG=layout,layout-builder` to log builds and
 * line breaking.
 */

export { LayoutBuilder, type LayoutBuilderOptions, type BuildOptions, type BuildResult } from './layout-builder.js';
export { Layout } from './layout.js';
export { collapseSource, isWhitespaceChar } from './source.js';
export type { LayoutSource, SourceRun, SourceBox, SourceEntry, PendingEntry } from './source.js';
export { buildBreakUnits, planLines, minContentWidth } from './line-breaker.js';
export type { BreakUnit, LinePlan, Piece } from './line-breaker.js';
