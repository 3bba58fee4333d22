import { INDEX_FIELD_WIDTH, INDEX_SEPARATOR, INDEX_SEPARATOR_EMPTY } from '../tree/constants.js';
import type { NodeValue, TreeNode } from '../tree/model.js';
import { sliceText } from '../tree/span.js';
import { combine, pathOf, traverse, valueOf } from '../tree/traverse.js';
import type { OutputSink } from './sink.js';

/**
 * Format one row: right-justified indices, a separator, then the value.
 *
 * Example: `  0  1   value`.
 */
export function formatIndexRow(path: readonly number[], value: string): string {
  const indices = path.map((index) => String(index).padStart(INDEX_FIELD_WIDTH)).join('');
  const separator = path.length > 0 ? INDEX_SEPARATOR : INDEX_SEPARATOR_EMPTY;
  return `${indices}${separator}${value}\n`;
}

/**
 * Print every node prefixed by its path from the start node.
 *
 * With the start node hidden, each top-level child is traversed on its own
 * with its index as the path prefix.
 */
export function renderIndices(text: string, node: TreeNode, showRoot: boolean, sink: OutputSink): void {
  const accumulator = combine(pathOf, valueOf);
  const walks = showRoot
    ? [traverse(node, 'depth-first', accumulator)]
    : node.children.map((child, index) => {
        const initial: [readonly number[], NodeValue] = [[index], child.value];
        return traverse(child, 'depth-first', accumulator, initial);
      });

  for (const walk of walks) {
    for (const [path, value] of walk) sink.write(formatIndexRow(path, sliceText(text, value.text)));
  }
}
