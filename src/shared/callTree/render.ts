import { selfCycles } from './build';
import type { AggregateNode, AggregateNodeJson, LabelSummary, RenderOptions } from './types';

export const DEFAULT_INDENT_UNIT = '  ';

export function renderNodeLine(node: AggregateNode, depth: number, options?: RenderOptions): string {
  const unit = options?.indentUnit ?? DEFAULT_INDENT_UNIT;
  let line = `${unit.repeat(depth)} ${node.label} count: ${node.callCount} sum: ${node.totalCycles}`;
  if (options?.showSelf) line += ` self: ${selfCycles(node)}`;
  return line;
}

/**
 * Render every root and its subtree, one line per node.
 * Roots keep their append order; children keep first-encountered order.
 */
export function renderForest(roots: readonly AggregateNode[], options?: RenderOptions): string[] {
  const lines: string[] = [];
  for (const root of roots) {
    // Explicit stack, children pushed in reverse so they pop in insertion order
    const stack: Array<{ node: AggregateNode; depth: number }> = [{ node: root, depth: 0 }];
    while (stack.length) {
      const { node, depth } = stack.pop()!;
      lines.push(renderNodeLine(node, depth, options));
      const children = Array.from(node.children.values());
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ node: children[i]!, depth: depth + 1 });
      }
    }
  }
  return lines;
}

export function renderLabelSummary(summaries: readonly LabelSummary[]): string[] {
  return summaries.map(
    s => `${s.label} count: ${s.callCount} sum: ${s.totalCycles} self: ${s.selfCycles}`
  );
}

function shallowJson(node: AggregateNode): AggregateNodeJson {
  return {
    label: node.label,
    callCount: node.callCount,
    totalCycles: node.totalCycles,
    selfCycles: selfCycles(node),
    children: []
  };
}

export function forestToJson(roots: readonly AggregateNode[]): AggregateNodeJson[] {
  const result: AggregateNodeJson[] = [];
  const stack: Array<{ node: AggregateNode; json: AggregateNodeJson }> = [];
  for (const root of roots) {
    const json = shallowJson(root);
    result.push(json);
    stack.push({ node: root, json });
  }
  // Children are appended when their parent is visited, so visit order does not matter
  while (stack.length) {
    const { node, json } = stack.pop()!;
    for (const child of node.children.values()) {
      const childJson = shallowJson(child);
      json.children.push(childJson);
      stack.push({ node: child, json: childJson });
    }
  }
  return result;
}

/**
 * Compact JSON text for the forest, equal to `JSON.stringify(forestToJson(roots))`.
 * Written from a work-list because `JSON.stringify` recurses once per nesting level.
 */
export function renderForestJson(roots: readonly AggregateNode[]): string {
  const parts: string[] = ['['];
  // Strings are emitted verbatim; nodes open an object and leave its closer on the stack
  const stack: Array<AggregateNode | string> = [']'];
  const pushSiblings = (nodes: readonly AggregateNode[]) => {
    for (let i = nodes.length - 1; i >= 0; i--) {
      stack.push(nodes[i]!);
      if (i > 0) stack.push(',');
    }
  };
  pushSiblings(roots);

  while (stack.length) {
    const step = stack.pop()!;
    if (typeof step === 'string') {
      parts.push(step);
      continue;
    }
    parts.push(
      `{"label":${JSON.stringify(step.label)},"callCount":${step.callCount},` +
        `"totalCycles":${step.totalCycles},"selfCycles":${selfCycles(step)},"children":[`
    );
    stack.push(']}');
    pushSiblings(Array.from(step.children.values()));
  }
  return parts.join('');
}
