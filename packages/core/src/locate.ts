import { intersects } from "./rect";
import type { NativeTree, NodeType, Rect } from "./types";

/**
 * Pre-order depth-first search for the first node satisfying `predicate`.
 *
 * A node is tested before its children, and children are visited in order,
 * so an ancestor always wins over its descendants and an earlier sibling
 * subtree wins over a later one. Traversal stops at the first match.
 */
export function firstMatch<N, T extends N>(
  root: N,
  tree: NativeTree<N>,
  predicate: (node: N) => node is T,
): T | null {
  if (predicate(root)) {
    return root;
  }

  for (const child of tree.children(root)) {
    const found = firstMatch(child, tree, predicate);
    if (found !== null) {
      return found;
    }
  }

  return null;
}

/**
 * Find the first node under `root` (inclusive) that is an instance of `type`
 * and whose bounds intersect `region`.
 *
 * `region` must already be in the coordinate space `tree.bounds` resolves to.
 * Bounds are only resolved for nodes of the requested type.
 * Returns null when nothing matches.
 */
export function locate<N, T extends N>(
  root: N,
  type: NodeType<T>,
  region: Rect,
  tree: NativeTree<N>,
): T | null {
  const isMatch = (node: N): node is T =>
    node instanceof type && intersects(tree.bounds(node), region);

  return firstMatch(root, tree, isMatch);
}
