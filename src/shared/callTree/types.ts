export type AggregateNode = {
  label: string; // unique among siblings only
  totalCycles: number; // sum of close-marker cycles merged into this node
  callCount: number; // invocations merged into this node
  children: Map<string, AggregateNode>; // insertion order = first encountered
};

export type LabelSummary = {
  label: string;
  callCount: number;
  totalCycles: number; // inclusive, outermost occurrence per path only
  selfCycles: number;
};

export type RenderOptions = {
  // Repeated once per depth level; root lines get none
  indentUnit?: string;
  // Append " self: <n>" to every line
  showSelf?: boolean;
};

export type AggregateNodeJson = {
  label: string;
  callCount: number;
  totalCycles: number;
  selfCycles: number;
  children: AggregateNodeJson[];
};

export function createNode(label: string): AggregateNode {
  return { label, totalCycles: 0, callCount: 0, children: new Map() };
}
