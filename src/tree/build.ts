import type { NodeValue, TreeNode } from './model.js';
import { scanLines } from './scan.js';
import type { ScannedLine, ValueMatcher } from './scan.js';
import { emptySpan, relativeOffset, span, subSpan } from './span.js';
import type { Span } from './span.js';

/**
 * Tree builder.
 *
 * Rebuilds parent/child relationships from scanned lines with a stack of open
 * nodes keyed by depth marker (the value's column on its line). A line closes
 * every open node whose marker is at or right of its own, so equal markers make
 * siblings and column 0 always lands under the root.
 */
interface OpenNodeFrame {
  marker: number;
  node: TreeNode;
}

const ROOT_MARKER = -1;

export function createRootNode(): TreeNode {
  return {
    value: { prefixes: [], text: emptySpan(), suffix: emptySpan() },
    children: [],
  };
}

/**
 * Pop frames until the top marker is strictly left of `marker`.
 *
 * The root frame has marker -1 and is never popped.
 */
function closeNodesAtBoundary(stack: OpenNodeFrame[], marker: number): void {
  while (stack.length > 1) {
    const top = stack[stack.length - 1];
    if (!top || marker > top.marker) break;
    stack.pop();
  }
}

/**
 * Indentation spans for a line: text between each surviving ancestor's column and
 * the next, ending at this line's own value column.
 */
function buildPrefixes(stack: OpenNodeFrame[], line: Span, marker: number): Span[] {
  const columns = [0, ...stack.slice(1).map((frame) => frame.marker), marker];
  const prefixes: Span[] = [];
  for (let index = 0; index + 1 < columns.length; index += 1) {
    prefixes.push(subSpan(line, columns[index] ?? 0, columns[index + 1] ?? marker));
  }
  return prefixes;
}

/**
 * Build the tree from already-scanned lines.
 *
 * Every line becomes exactly one node; there is no failure mode.
 */
export function buildTree(lines: Iterable<ScannedLine>): TreeNode {
  const root = createRootNode();
  const stack: OpenNodeFrame[] = [{ marker: ROOT_MARKER, node: root }];

  for (const { line, value } of lines) {
    const marker = relativeOffset(line, value.start);
    closeNodesAtBoundary(stack, marker);

    const nodeValue: NodeValue = {
      prefixes: buildPrefixes(stack, line, marker),
      text: value,
      suffix: span(value.stop ?? value.start, line.stop),
    };
    const node: TreeNode = { value: nodeValue, children: [] };

    const parentFrame = stack[stack.length - 1];
    (parentFrame?.node ?? root).children.push(node);
    stack.push({ marker, node });
  }

  return root;
}

/**
 * Scan and build in one pass.
 */
export function parseTree(text: string, matcher?: ValueMatcher): TreeNode {
  return buildTree(scanLines(text, matcher));
}
