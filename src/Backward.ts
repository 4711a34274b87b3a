import type { Value } from './Value';

/**
 * Options for a backward pass.
 * @property zeroGrad: Reset every reachable gradient to 0 before propagating (default false).
 * @public
 */
export interface BackwardOptions {
  zeroGrad?: boolean;
}

interface Frame {
  node: Value;
  next: number;
}

/**
 * Depth-first postorder over the operand relation: every node appears after
 * all of its operands, the root appears last. Nodes reachable through several
 * paths are emitted once, keyed by identity.
 *
 * Walks with an explicit stack so long accumulation chains (e.g. a sum over a
 * whole dataset) cannot overflow the call stack.
 * @public
 */
export function topologicalOrder(root: Value): Value[] {
  const topo: Value[] = [];
  const visited = new Set<number>();
  const stack: Frame[] = [];

  const enter = (v: Value) => {
    visited.add(v.id);
    stack.push({ node: v, next: 0 });
  };

  enter(root);
  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.next < frame.node.prev.length) {
      const child = frame.node.prev[frame.next++];
      if (!visited.has(child.id)) enter(child);
    } else {
      stack.pop();
      topo.push(frame.node);
    }
  }
  return topo;
}

/**
 * Reverse-mode pass from `root`: sets root.grad to 1, then runs each node's
 * propagation rule once, consumers before producers. Gradients of other nodes
 * are added to, never overwritten, so a second call without `zeroGrad`
 * accumulates on top of the first.
 * @public
 */
export function backward(root: Value, options: BackwardOptions = {}): void {
  const topo = topologicalOrder(root);
  if (options.zeroGrad) {
    for (const v of topo) v.grad = 0;
  }

  root.grad = 1;
  for (let i = topo.length - 1; i >= 0; i--) {
    topo[i].backwardFn?.();
  }
}

/**
 * Sets grad to 0 on every node reachable from root.
 * @public
 */
export function zeroGradTree(root: Value): void {
  for (const v of topologicalOrder(root)) v.grad = 0;
}

/**
 * Sets grad to 0 on every node reachable from any of the roots.
 * @public
 */
export function zeroGradAll(roots: readonly Value[]): void {
  for (const root of roots) zeroGradTree(root);
}
