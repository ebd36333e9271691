import type { AggregateNode, LabelSummary } from './types';

/**
 * Combine `incoming` into `existing` in place. Both must describe the same label
 * at the same tree position. Children missing from `existing` are moved over as-is;
 * shared labels are merged to any depth.
 */
export function mergeNodes(existing: AggregateNode, incoming: AggregateNode): AggregateNode {
  // Work-list instead of recursion so deep traces cannot overflow the call stack
  const stack: Array<{ into: AggregateNode; from: AggregateNode }> = [{ into: existing, from: incoming }];
  while (stack.length) {
    const { into, from } = stack.pop()!;
    into.callCount += from.callCount;
    into.totalCycles += from.totalCycles;
    for (const [label, child] of from.children) {
      const target = into.children.get(label);
      if (target) {
        stack.push({ into: target, from: child });
      } else {
        into.children.set(label, child);
      }
    }
  }
  return existing;
}

/**
 * Merge a completed node into a sibling map under its own label.
 * Returns the node that now holds the aggregate for that label.
 */
export function mergeInto(children: Map<string, AggregateNode>, incoming: AggregateNode): AggregateNode {
  const existing = children.get(incoming.label);
  if (!existing) {
    children.set(incoming.label, incoming);
    return incoming;
  }
  return mergeNodes(existing, incoming);
}

export function cloneNode(node: AggregateNode): AggregateNode {
  const copyOf = (n: AggregateNode): AggregateNode => ({
    label: n.label,
    totalCycles: n.totalCycles,
    callCount: n.callCount,
    children: new Map()
  });
  const root = copyOf(node);
  const stack: Array<{ from: AggregateNode; into: AggregateNode }> = [{ from: node, into: root }];
  while (stack.length) {
    const { from, into } = stack.pop()!;
    for (const [label, child] of from.children) {
      const copy = copyOf(child);
      into.children.set(label, copy);
      stack.push({ from: child, into: copy });
    }
  }
  return root;
}

// Own cost = total - sum(children.total), floored at zero
export function selfCycles(node: AggregateNode): number {
  let childrenTotal = 0;
  for (const child of node.children.values()) childrenTotal += child.totalCycles;
  return Math.max(0, node.totalCycles - childrenTotal);
}

export function totalCallCount(roots: Iterable<AggregateNode>): number {
  let count = 0;
  const stack = Array.from(roots);
  while (stack.length) {
    const n = stack.pop()!;
    count += n.callCount;
    for (const child of n.children.values()) stack.push(child);
  }
  return count;
}

/**
 * Flat per-label totals across the forest, in first-encountered (pre-order) order.
 * A label nested under itself adds its inclusive cycles only once per path.
 */
export function summarizeByLabel(roots: readonly AggregateNode[]): LabelSummary[] {
  const byLabel = new Map<string, LabelSummary>();
  const onPath = new Map<string, number>();

  // Enter frames count the node; exit frames take its label back off the path
  // once the whole subtree has been visited. Pushed in reverse to keep pre-order.
  const stack: Array<{ node: AggregateNode; exit: boolean }> = [];
  for (let i = roots.length - 1; i >= 0; i--) stack.push({ node: roots[i]!, exit: false });

  while (stack.length) {
    const { node, exit } = stack.pop()!;
    const depth = onPath.get(node.label) ?? 0;
    if (exit) {
      onPath.set(node.label, depth - 1);
      continue;
    }

    let entry = byLabel.get(node.label);
    if (!entry) {
      entry = { label: node.label, callCount: 0, totalCycles: 0, selfCycles: 0 };
      byLabel.set(node.label, entry);
    }
    entry.callCount += node.callCount;
    entry.selfCycles += selfCycles(node);
    if (depth === 0) entry.totalCycles += node.totalCycles;

    onPath.set(node.label, depth + 1);
    stack.push({ node, exit: true });
    const children = Array.from(node.children.values());
    for (let i = children.length - 1; i >= 0; i--) stack.push({ node: children[i]!, exit: false });
  }
  return Array.from(byLabel.values());
}
