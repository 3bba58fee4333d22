import type { TreeNode } from '../tree/model.js';
import { sliceText } from '../tree/span.js';
import { combine, depthOf, isLast, traverse, valueOf } from '../tree/traverse.js';
import type { OutputSink } from './sink.js';
import type { Theme } from './themes.js';

/** Set once a slot's node has shown a descendant: draw a continuation. */
const SLOT_HAS_DESCENDANT = 1;
/** Set when a slot's node is the last child: draw an end branch or a blank. */
const SLOT_LAST = 2;

/**
 * Draw a subtree with branch glyphs, one node per line.
 *
 * `slots[d]` holds the flags of the open node at depth `d`; each row prints the
 * glyph for every slot below the start node's.
 */
export function renderThemed(
  text: string,
  node: TreeNode,
  showRoot: boolean,
  sink: OutputSink,
  theme: Theme
): void {
  const slots: number[] = [];
  const rows = traverse(node, 'depth-first', combine(depthOf, isLast, valueOf));

  for (const [depth, last, value] of rows) {
    slots.length = depth;
    const parentSlot = slots.length - 1;
    if (parentSlot >= 0) slots[parentSlot] = (slots[parentSlot] ?? 0) | SLOT_HAS_DESCENDANT;
    slots.push(last ? SLOT_LAST : 0);

    if (depth === 0 && !showRoot) continue;
    const glyphs = slots
      .slice(1)
      .map((slot) => theme[slot] ?? '')
      .join('');
    sink.write(`${glyphs}${sliceText(text, value.text)}\n`);
  }
}
