// Single-pass builder for span traces. Open markers push a fresh aggregate node;
// close markers pop it and fold it into the parent's children (or the forest when
// the stack empties). Closes carry no label, so they always match the top of the stack.

import { mergeInto } from '../callTree/build';
import { createNode } from '../callTree/types';
import type { AggregateNode } from '../callTree/types';
import { DEFAULT_MARKERS, classifyLine } from './markers';
import type { MarkerGlyphs, ParseIssue, ParseOptions, ParseResult, ParseStats } from './types';

export * from './types';
export * from './errors';
export { DEFAULT_MARKERS, classifyLine, parseCycleCount } from './markers';

export const MAX_ISSUES = 100;

type OpenSpan = { node: AggregateNode; line: number };

// A trailing newline ends the last line; it does not start an empty one
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Incremental form of {@link parseSpanTrace}: feed lines one at a time with `push`,
 * then call `finish` once at end of input. Only open spans and merged nodes are
 * held, never the input itself.
 * - Unmatched closes, opens outside a top-level section and spans never closed are tolerated
 *   and reported through `issues`.
 * - A malformed cycle count throws from `push` and the builder must be discarded.
 */
export class SpanTraceBuilder {
  private readonly markers: MarkerGlyphs;
  private readonly strict: boolean;
  private readonly stack: OpenSpan[] = [];
  private readonly roots: AggregateNode[] = [];
  private readonly issues: ParseIssue[] = [];
  private readonly stats: ParseStats = {
    lines: 0,
    opens: 0,
    closes: 0,
    unmatchedCloses: 0,
    skippedOpens: 0,
    unclosedAtEnd: 0
  };
  // Depth inside a skipped section; only used with strictSections
  private skipDepth = 0;

  constructor(private readonly options: ParseOptions) {
    this.markers = options.markers ?? DEFAULT_MARKERS;
    this.strict = options.strictSections === true;
  }

  push(text: string): void {
    const lineNo = ++this.stats.lines;
    const marker = classifyLine(text, lineNo, this.markers);

    if (marker.kind === 'open') {
      this.stats.opens++;
      if (this.skipDepth > 0) {
        this.skipDepth++;
        this.stats.skippedOpens++;
        return;
      }
      if (!this.stack.length && marker.label !== this.options.topLevelLabel) {
        this.stats.skippedOpens++;
        if (this.strict) this.skipDepth = 1;
        this.report({
          severity: 'info',
          code: 'open.skipped',
          message: `Skipped section "${marker.label}" outside "${this.options.topLevelLabel}"`,
          line: lineNo
        });
        return;
      }
      this.stack.push({ node: createNode(marker.label), line: lineNo });
    } else if (marker.kind === 'close') {
      this.stats.closes++;
      if (this.skipDepth > 0) {
        this.skipDepth--;
        return;
      }
      const top = this.stack.pop();
      if (!top) {
        this.stats.unmatchedCloses++;
        this.report({ severity: 'warning', code: 'close.unmatched', message: 'Close marker without an open span', line: lineNo });
        return;
      }
      const node = top.node;
      node.callCount += 1;
      node.totalCycles += marker.cycles;
      const parent = this.stack[this.stack.length - 1];
      if (parent) {
        mergeInto(parent.node.children, node);
      } else {
        this.roots.push(node);
      }
    }
  }

  finish(): ParseResult {
    // Spans never closed are dropped together with everything merged under them
    this.stats.unclosedAtEnd = this.stack.length;
    for (const open of this.stack) {
      this.report({
        severity: 'warning',
        code: 'open.unclosed',
        message: `Span "${open.node.label}" was never closed`,
        line: open.line
      });
    }
    this.stack.length = 0;
    return { roots: this.roots, stats: { ...this.stats }, issues: this.issues };
  }

  private report(issue: ParseIssue): void {
    if (this.issues.length < MAX_ISSUES) this.issues.push(issue);
  }
}

/**
 * Build the aggregate forest for every section rooted at `options.topLevelLabel`.
 * A malformed cycle count throws and no result is produced.
 */
export function parseSpanTrace(input: string | Iterable<string>, options: ParseOptions): ParseResult {
  const builder = new SpanTraceBuilder(options);
  for (const text of typeof input === 'string' ? splitLines(input) : input) {
    builder.push(text);
  }
  return builder.finish();
}
