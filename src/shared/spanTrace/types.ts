import type { AggregateNode } from '../callTree/types';

export type MarkerGlyphs = {
  open: string;
  close: string;
};

export type Marker =
  | { kind: 'open'; label: string }
  | { kind: 'close'; cycles: number }
  | { kind: 'ignore' };

export type ParseOptions = {
  // Only sections rooted at this label are aggregated
  topLevelLabel: string;
  markers?: MarkerGlyphs;
  // Track depth inside skipped top-level sections so their nested opens never start a root
  strictSections?: boolean;
};

export type ParseStats = {
  lines: number;
  opens: number;
  closes: number;
  unmatchedCloses: number; // close with an empty stack
  skippedOpens: number; // opens outside any top-level section
  unclosedAtEnd: number; // still on the stack when input ran out
};

export type ParseIssue = {
  severity: 'info' | 'warning';
  code: 'close.unmatched' | 'open.skipped' | 'open.unclosed';
  message: string;
  line: number;
};

export type ParseResult = {
  roots: AggregateNode[];
  stats: ParseStats;
  issues: ParseIssue[]; // capped at MAX_ISSUES; stats keep the full counts
};
