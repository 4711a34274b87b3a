import { topologicalOrder } from './Backward';
import type { Value } from './Value';

/**
 * Renders the graph reachable from `root` as Graphviz DOT, left to right,
 * operands pointing at the nodes built from them. Nodes are numbered in
 * topological order (leaves first); edges carry the op tag.
 */
export function toDot(root: Value): string {
  const order = topologicalOrder(root);
  const index = new Map<number, number>();
  order.forEach((v, i) => index.set(v.id, i));

  const lines = ['digraph {', '    rankdir="LR"', '    node [shape=box]'];
  order.forEach((v, i) => {
    lines.push(`    ${i} [ label = "data=${v.data.toFixed(1)} grad=${v.grad.toFixed(1)}" ]`);
  });
  order.forEach((v, i) => {
    for (const child of v.prev) {
      lines.push(`    ${index.get(child.id)} -> ${i} [ label = "${v.op ?? ''}" ]`);
    }
  });
  lines.push('}');
  return lines.join('\n');
}
