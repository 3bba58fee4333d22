import type { NodeValue, TreeNode } from './model.js';

/**
 * Traversal engine.
 *
 * A traversal visits every node under a start node (the start included) and
 * yields one accumulator output per node. Accumulators thread a value from
 * parent to child, so renderers get depth, path or last-child facts from a
 * single pass instead of recomputing them.
 *
 * Uses explicit stacks/queues to avoid recursion depth issues on deep trees.
 */
export type TraversalOrder = 'depth-first' | 'breadth-first';

/**
 * Raw traversal arguments for one node.
 *
 * For the start node `parent` is undefined and `index` is 0.
 */
export interface Visit {
  parent: TreeNode | undefined;
  index: number;
  node: TreeNode;
}

export type AccumulatorKind =
  | 'identity'
  | 'parent'
  | 'isLast'
  | 'value'
  | 'path'
  | 'depth'
  | 'visit'
  | 'combined';

export interface Accumulator<T> {
  readonly kind: AccumulatorKind;
  /** Stands in for the parent's value when stepping the start node. */
  initial(start: TreeNode): T;
  /** Pure: compute this node's value from its visit and its parent's value. */
  step(visit: Visit, previous: T): T;
}

/** The node itself. */
export const identity: Accumulator<TreeNode> = {
  kind: 'identity',
  initial: (start) => start,
  step: (visit) => visit.node,
};

export const parentOf: Accumulator<TreeNode | undefined> = {
  kind: 'parent',
  initial: () => undefined,
  step: (visit) => visit.parent,
};

/**
 * True for the last child of its parent. The start node counts as last.
 */
export const isLast: Accumulator<boolean> = {
  kind: 'isLast',
  initial: () => true,
  step: ({ parent, index }) => (parent ? index === parent.children.length - 1 : true),
};

export const valueOf: Accumulator<NodeValue> = {
  kind: 'value',
  initial: (start) => start.value,
  step: (visit) => visit.node.value,
};

/**
 * Child indices leading from the traversal start to the node.
 */
export const pathOf: Accumulator<readonly number[]> = {
  kind: 'path',
  initial: () => [],
  step: ({ parent, index }, previous) => (parent ? [...previous, index] : previous),
};

/** Distance from the traversal start (start = 0). */
export const depthOf: Accumulator<number> = {
  kind: 'depth',
  initial: () => 0,
  step: ({ parent }, previous) => (parent ? previous + 1 : previous),
};

export const visitOf: Accumulator<Visit> = {
  kind: 'visit',
  initial: (start) => ({ parent: undefined, index: 0, node: start }),
  step: (visit) => visit,
};

/**
 * Combine accumulators into one that yields a tuple of their outputs.
 *
 * Every member receives the same visit and its own slot of the parent's tuple;
 * for the start node each member falls back to its own initial value.
 */
export function combine<A, B>(a: Accumulator<A>, b: Accumulator<B>): Accumulator<[A, B]>;
export function combine<A, B, C>(
  a: Accumulator<A>,
  b: Accumulator<B>,
  c: Accumulator<C>
): Accumulator<[A, B, C]>;
export function combine<A, B, C, D>(
  a: Accumulator<A>,
  b: Accumulator<B>,
  c: Accumulator<C>,
  d: Accumulator<D>
): Accumulator<[A, B, C, D]>;
export function combine(...members: Accumulator<unknown>[]): Accumulator<unknown[]> {
  return {
    kind: 'combined',
    initial: (start) => members.map((member) => member.initial(start)),
    step: (visit, previous) =>
      members.map((member, index) => member.step(visit, previous[index])),
  };
}

interface PendingVisit<T> {
  visit: Visit;
  previous: T;
}

function childVisit<T>(node: TreeNode, index: number, value: T): PendingVisit<T> | undefined {
  const child = node.children[index];
  if (!child) return undefined;
  return { visit: { parent: node, index, node: child }, previous: value };
}

/**
 * Lazily yield the accumulator output of every node under `start`.
 *
 * - `depth-first`: pre-order, children in document order.
 * - `breadth-first`: level order.
 *
 * `initial` overrides the accumulator's own value for the start node's parent
 * slot (e.g. a path prefix when traversing a subtree on its own).
 */
export function* traverse<T>(
  start: TreeNode,
  order: TraversalOrder,
  accumulator: Accumulator<T>,
  initial: T = accumulator.initial(start)
): Generator<T, void, undefined> {
  const first: PendingVisit<T> = {
    visit: { parent: undefined, index: 0, node: start },
    previous: initial,
  };

  if (order === 'depth-first') {
    const stack: PendingVisit<T>[] = [first];
    while (stack.length > 0) {
      const pending = stack.pop();
      if (!pending) continue;
      const value = accumulator.step(pending.visit, pending.previous);
      yield value;
      // Push children in reverse so traversal preserves the original order.
      const { node } = pending.visit;
      for (let index = node.children.length - 1; index >= 0; index -= 1) {
        const child = childVisit(node, index, value);
        if (child) stack.push(child);
      }
    }
    return;
  }

  const queue: PendingVisit<T>[] = [first];
  for (let head = 0; head < queue.length; head += 1) {
    const pending = queue[head];
    if (!pending) continue;
    const value = accumulator.step(pending.visit, pending.previous);
    yield value;
    const { node } = pending.visit;
    for (let index = 0; index < node.children.length; index += 1) {
      const child = childVisit(node, index, value);
      if (child) queue.push(child);
    }
  }
}
