import type { NativeTree, Rect } from "./types";

/**
 * DOM adapter. Bounds come from `getBoundingClientRect()`, so the shared
 * coordinate space is the viewport.
 *
 * Shadow roots are not entered: their contents are never searched, and an
 * element inside one resolves to the shadow tree's top element as root.
 */
export const domTree: NativeTree<Element> = {
  children(node: Element): Iterable<Element> {
    return node.children;
  },

  bounds(node: Element): Rect {
    const { left, top, width, height } = node.getBoundingClientRect();
    return { x: left, y: top, width, height };
  },

  root(node: Element): Element | null {
    if (!node.isConnected) {
      return null;
    }

    let current = node;
    while (current.parentElement) {
      current = current.parentElement;
    }
    return current;
  },
};
