import type { TreeNode } from '../tree/model.js';
import { sliceText } from '../tree/span.js';
import type { OutputSink } from './sink.js';

/**
 * JSON shape of a subtree: a leaf is its value, an inner node maps its value to
 * its children.
 */
export type JsonTree = string | { [value: string]: JsonTree[] };

/**
 * Convert a subtree into its JSON shape.
 *
 * Uses an explicit stack to avoid recursion depth issues on deep trees.
 */
export function toJsonTree(text: string, node: TreeNode): JsonTree {
  const out: JsonTree[] = [];
  const stack: { node: TreeNode; outArray: JsonTree[] }[] = [{ node, outArray: out }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) continue;

    const value = sliceText(text, frame.node.value.text);
    if (frame.node.children.length === 0) {
      frame.outArray.push(value);
      continue;
    }

    const children: JsonTree[] = [];
    frame.outArray.push({ [value]: children });
    for (let index = frame.node.children.length - 1; index >= 0; index -= 1) {
      const child = frame.node.children[index];
      if (child) stack.push({ node: child, outArray: children });
    }
  }

  return out[0] ?? sliceText(text, node.value.text);
}

/**
 * Serialize a subtree as compact JSON, with no trailing newline.
 *
 * With the start node hidden the output is the bare array of its children.
 */
export function renderJson(text: string, node: TreeNode, showRoot: boolean, sink: OutputSink): void {
  const tree = showRoot
    ? toJsonTree(text, node)
    : node.children.map((child) => toJsonTree(text, child));
  sink.write(JSON.stringify(tree));
}
