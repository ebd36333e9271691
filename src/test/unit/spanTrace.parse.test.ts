import assert from 'assert/strict';
import { totalCallCount } from '../../shared/callTree';
import type { AggregateNode } from '../../shared/callTree';
import { MAX_ISSUES, MalformedCycleCountError, SpanTraceBuilder, parseSpanTrace, splitLines } from '../../shared/spanTrace';

function child(node: AggregateNode | undefined, label: string): AggregateNode {
  const found = node?.children.get(label);
  assert.ok(found, `missing child ${label}`);
  return found;
}

suite('spanTrace.parse', () => {
  test('builds a root with one nested child', () => {
    const { roots } = parseSpanTrace('┌╴A\n┌╴B\n└╴ 10 cycles\n└╴ 5 cycles\n', { topLevelLabel: 'A' });
    assert.equal(roots.length, 1);
    const a = roots[0]!;
    assert.equal(a.label, 'A');
    assert.equal(a.callCount, 1);
    assert.equal(a.totalCycles, 5);
    const b = child(a, 'B');
    assert.equal(b.callCount, 1);
    assert.equal(b.totalCycles, 10);
    assert.equal(b.children.size, 0);
  });

  test('merges sibling invocations of the same label', () => {
    const { roots } = parseSpanTrace(['┌╴A', '┌╴B', '└╴10', '┌╴B', '└╴20', '└╴0'], { topLevelLabel: 'A' });
    const a = roots[0]!;
    assert.equal(a.children.size, 1);
    const b = child(a, 'B');
    assert.equal(b.callCount, 2);
    assert.equal(b.totalCycles, 30);
  });

  test('merges grandchildren of repeated siblings at every depth', () => {
    const lines = [
      '┌╴main',
      '┌╴step',
      '┌╴hash',
      '└╴3 cycles',
      '└╴10 cycles',
      '┌╴step',
      '┌╴load',
      '└╴1 cycles',
      '┌╴hash',
      '└╴4 cycles',
      '└╴20 cycles',
      '└╴40 cycles'
    ];
    const { roots } = parseSpanTrace(lines, { topLevelLabel: 'main' });
    const step = child(roots[0], 'step');
    assert.equal(step.callCount, 2);
    assert.equal(step.totalCycles, 30);
    assert.deepEqual(Array.from(step.children.keys()), ['hash', 'load']);
    const hash = child(step, 'hash');
    assert.equal(hash.callCount, 2);
    assert.equal(hash.totalCycles, 7);
    assert.equal(child(step, 'load').totalCycles, 1);
  });

  test('matches closes by position, not by label', () => {
    const { roots } = parseSpanTrace(['┌╴A', '┌╴B', '┌╴C', '└╴1', '└╴2', '└╴3'], { topLevelLabel: 'A' });
    const b = child(roots[0], 'B');
    assert.equal(b.totalCycles, 2);
    assert.equal(child(b, 'C').totalCycles, 1);
  });

  test('ignores a close with no open span', () => {
    const result = parseSpanTrace('└╴5 cycles', { topLevelLabel: 'A' });
    assert.deepEqual(result.roots, []);
    assert.equal(result.stats.unmatchedCloses, 1);
    assert.deepEqual(result.issues, [
      { severity: 'warning', code: 'close.unmatched', message: 'Close marker without an open span', line: 1 }
    ]);
  });

  test('skips sections that are not rooted at the top-level label', () => {
    const result = parseSpanTrace(['┌╴setup', '└╴9'], { topLevelLabel: 'A' });
    assert.deepEqual(result.roots, []);
    assert.equal(result.stats.skippedOpens, 1);
    // The close of the skipped section finds an empty stack
    assert.equal(result.stats.unmatchedCloses, 1);
    assert.equal(result.issues[0]?.code, 'open.skipped');
    assert.equal(result.issues[0]?.message, 'Skipped section "setup" outside "A"');
  });

  test('appends each completed top-level section as its own root', () => {
    const { roots } = parseSpanTrace(['┌╴A', '└╴5', 'noise', '┌╴A', '└╴7'], { topLevelLabel: 'A' });
    assert.equal(roots.length, 2);
    assert.equal(roots[0]!.totalCycles, 5);
    assert.equal(roots[1]!.totalCycles, 7);
  });

  test('drops spans still open at end of input', () => {
    const result = parseSpanTrace(['┌╴A', '└╴5', '┌╴A', '┌╴B', '└╴1'], { topLevelLabel: 'A' });
    assert.equal(result.roots.length, 1);
    assert.equal(result.roots[0]!.children.size, 0);
    assert.equal(result.stats.unclosedAtEnd, 1);
    assert.deepEqual(result.issues, [
      { severity: 'warning', code: 'open.unclosed', message: 'Span "A" was never closed', line: 3 }
    ]);
  });

  test('aborts on a malformed cycle count', () => {
    assert.throws(
      () => parseSpanTrace(['┌╴A', '└╴abc cycles'], { topLevelLabel: 'A' }),
      (err: unknown) => err instanceof MalformedCycleCountError && err.line === 2
    );
  });

  test('counts one call per close on well-formed input', () => {
    const lines = ['┌╴A', '┌╴B', '└╴1', '┌╴B', '┌╴C', '└╴1', '└╴1', '┌╴D', '└╴1', '└╴1', '┌╴A', '└╴1'];
    const { roots, stats } = parseSpanTrace(lines, { topLevelLabel: 'A' });
    assert.equal(stats.closes, 6);
    assert.equal(totalCallCount(roots), 6);
  });

  test('splits CRLF input and counts lines', () => {
    const { roots, stats } = parseSpanTrace('┌╴A\r\n└╴2 cycles\r\n', { topLevelLabel: 'A' });
    assert.equal(roots[0]!.label, 'A');
    assert.equal(stats.lines, 2);
    assert.equal(stats.opens, 1);
    assert.equal(stats.closes, 1);
  });

  test('default mode lets a nested top-level label inside a skipped section start a root', () => {
    const lines = ['┌╴other', '┌╴A', '└╴2', '└╴3'];
    const { roots } = parseSpanTrace(lines, { topLevelLabel: 'A' });
    assert.equal(roots.length, 1);
    assert.equal(roots[0]!.totalCycles, 2);
  });

  test('strictSections ignores everything nested in a skipped section', () => {
    const lines = ['┌╴other', '┌╴A', '└╴2', '└╴3', '┌╴A', '└╴4'];
    const result = parseSpanTrace(lines, { topLevelLabel: 'A', strictSections: true });
    assert.equal(result.roots.length, 1);
    assert.equal(result.roots[0]!.totalCycles, 4);
    assert.equal(result.stats.skippedOpens, 2);
    assert.equal(result.stats.unmatchedCloses, 0);
  });

  test('caps the issue list but keeps full counts', () => {
    const lines = Array.from({ length: MAX_ISSUES + 5 }, () => '└╴1');
    const result = parseSpanTrace(lines, { topLevelLabel: 'A' });
    assert.equal(result.issues.length, MAX_ISSUES);
    assert.equal(result.stats.unmatchedCloses, MAX_ISSUES + 5);
  });

  test('a trailing newline does not count as another line', () => {
    assert.deepEqual(splitLines('a\nb\n'), ['a', 'b']);
    assert.deepEqual(splitLines('a\nb'), ['a', 'b']);
    assert.deepEqual(splitLines('a\n\n'), ['a', '']);
    assert.deepEqual(splitLines(''), []);
    assert.equal(parseSpanTrace('┌╴A\n└╴2 cycles\n', { topLevelLabel: 'A' }).stats.lines, 2);
    assert.equal(parseSpanTrace('', { topLevelLabel: 'A' }).stats.lines, 0);
  });

  test('SpanTraceBuilder takes one line at a time', () => {
    const builder = new SpanTraceBuilder({ topLevelLabel: 'A' });
    for (const line of ['┌╴A', '┌╴B', '└╴7 cycles', '└╴10 cycles', '┌╴A']) builder.push(line);
    const result = builder.finish();
    assert.equal(result.roots.length, 1);
    assert.equal(result.roots[0]!.totalCycles, 10);
    assert.equal(child(result.roots[0], 'B').totalCycles, 7);
    assert.equal(result.stats.lines, 5);
    assert.equal(result.stats.unclosedAtEnd, 1);
    assert.deepEqual(result.issues, [
      { severity: 'warning', code: 'open.unclosed', message: 'Span "A" was never closed', line: 5 }
    ]);
  });
});
