import { PATH_TEXT_ESCAPE } from './constants.js';
import { PathNotFoundError, SubtreeError } from './errors.js';
import type { TreeNode } from './model.js';
import { sliceText } from './span.js';

/**
 * Path resolver.
 *
 * A path is a list of components walked from a start node:
 * - an index selects `children[i]` (negative counts from the end)
 * - text selects the first child whose value equals it
 *
 * Resolution is all or nothing: the first failing component throws.
 */
export type PathComponent =
  | { kind: 'index'; index: number; raw?: string }
  | { kind: 'text'; text: string };

const INDEX_RE = /^[+-]?\d+$/;

/**
 * Read a raw CLI/tool component.
 *
 * A leading `\` forces text (and is dropped), so `\3` looks up a child named
 * "3" rather than the fourth child.
 */
export function parsePathComponent(raw: string): PathComponent {
  if (raw.startsWith(PATH_TEXT_ESCAPE)) {
    return { kind: 'text', text: raw.slice(PATH_TEXT_ESCAPE.length) };
  }
  if (!INDEX_RE.test(raw)) return { kind: 'text', text: raw };

  const index = Number(raw);
  // Past the safe range no node can hold the child, so it resolves as out of range.
  if (!Number.isSafeInteger(index)) {
    return { kind: 'index', index: index < 0 ? -Infinity : Infinity, raw };
  }
  return { kind: 'index', index };
}

export function parsePath(raw: readonly string[]): PathComponent[] {
  return raw.map(parsePathComponent);
}

function childAt(node: TreeNode, index: number, label: string | number = index): TreeNode {
  const count = node.children.length;
  const resolved = index < 0 ? count + index : index;
  const child = resolved >= 0 ? node.children[resolved] : undefined;
  if (!child) {
    throw new SubtreeError(
      'PATH_OUT_OF_RANGE',
      `Path index ${label} is out of range (node has ${count} ${count === 1 ? 'child' : 'children'})`
    );
  }
  return child;
}

function childNamed(text: string, node: TreeNode, name: string): TreeNode {
  const child = node.children.find((candidate) => sliceText(text, candidate.value.text) === name);
  if (!child) {
    throw new PathNotFoundError(
      name,
      node.children.map((candidate) => sliceText(text, candidate.value.text))
    );
  }
  return child;
}

/**
 * Walk `components` from `start` and return the node they address.
 */
export function resolvePath(
  text: string,
  start: TreeNode,
  components: readonly PathComponent[]
): TreeNode {
  let node = start;
  for (const component of components) {
    node =
      component.kind === 'index'
        ? childAt(node, component.index, component.raw)
        : childNamed(text, node, component.text);
  }
  return node;
}
