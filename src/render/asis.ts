import type { TreeNode } from '../tree/model.js';
import { sliceText } from '../tree/span.js';
import { traverse, valueOf } from '../tree/traverse.js';
import type { OutputSink } from './sink.js';

/**
 * Re-emit a subtree with its original indentation, value and line terminator.
 *
 * Indentation levels above the start node are dropped so a selected subtree
 * starts at column 0. Rendering the synthetic root with `showRoot` reproduces the
 * input byte for byte.
 */
export function renderAsIs(text: string, node: TreeNode, showRoot: boolean, sink: OutputSink): void {
  const starts = showRoot ? [node] : node.children;
  for (const start of starts) {
    const skipLevels = start.value.prefixes.length;
    for (const value of traverse(start, 'depth-first', valueOf)) {
      const indentation = value.prefixes
        .slice(skipLevels)
        .map((prefix) => sliceText(text, prefix))
        .join('');
      sink.write(`${indentation}${sliceText(text, value.text)}${sliceText(text, value.suffix)}`);
    }
  }
}
