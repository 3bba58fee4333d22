import type { Span } from './span.js';

/**
 * In-memory tree reconstructed from indented text.
 *
 * Notes:
 * - Nodes hold spans into the original buffer, never copied text.
 * - Parents are not stored; traversal supplies them.
 * - The root is synthetic: empty prefixes and zero-width value and suffix.
 */
export interface NodeValue {
  /**
   * Indentation spans, one per ancestor level (this node's own level last).
   *
   * Each span covers the text between two consecutive value-start columns on
   * this node's line. Only the as-is renderer reads them.
   */
  prefixes: readonly Span[];
  /** The node's label. */
  text: Span;
  /** Everything after the label on the line (the terminator). */
  suffix: Span;
}

export interface TreeNode {
  value: NodeValue;
  /** Children in document order. */
  children: TreeNode[];
}
