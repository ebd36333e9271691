// Span markers as written by the cycle tracker of an instrumented program:
//   "│ │ ┌╴verify_proof"
//   "│ │ └╴12,345 cycles"
// The "│ " padding and any log prefix in front of the glyph are ignored.

import { MalformedCycleCountError } from './errors';
import type { Marker, MarkerGlyphs } from './types';

export const DEFAULT_MARKERS: MarkerGlyphs = { open: '┌╴', close: '└╴' };

const reThousands = /,/g;
const reUnitSuffix = /\s*[A-Za-z]+$/;
const reDigits = /^\d+$/;

export function parseCycleCount(payload: string, line: number): number {
  const raw = payload.trim();
  const digits = raw.replace(reThousands, '').replace(reUnitSuffix, '').trim();
  if (!reDigits.test(digits)) {
    throw new MalformedCycleCountError(line, raw);
  }
  const cycles = Number(digits);
  if (!Number.isSafeInteger(cycles)) {
    throw new MalformedCycleCountError(line, raw);
  }
  return cycles;
}

/**
 * Classify one trace line. An open glyph wins over a close glyph on the same line.
 * @param line 1-based line number, used in error reports
 */
export function classifyLine(text: string, line: number, markers: MarkerGlyphs = DEFAULT_MARKERS): Marker {
  const openAt = text.indexOf(markers.open);
  if (openAt >= 0) {
    return { kind: 'open', label: text.slice(openAt + markers.open.length).trim() };
  }
  const closeAt = text.indexOf(markers.close);
  if (closeAt >= 0) {
    return { kind: 'close', cycles: parseCycleCount(text.slice(closeAt + markers.close.length), line) };
  }
  return { kind: 'ignore' };
}
