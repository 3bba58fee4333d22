import type { TreeNode } from '../tree/model.js';
import { sliceText } from '../tree/span.js';
import { combine, depthOf, identity, traverse } from '../tree/traverse.js';

/**
 * Run `fn` and return what it throws; fails the test when nothing is thrown.
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

/**
 * One entry per node below `root`: its value prefixed by one `.` per level
 * below the top.
 */
export function outline(text: string, root: TreeNode): string[] {
  const rows = [...traverse(root, 'depth-first', combine(depthOf, identity))];
  return rows
    .filter(([depth]) => depth > 0)
    .map(([depth, node]) => `${'.'.repeat(depth - 1)}${sliceText(text, node.value.text)}`);
}
