import type { NativeTree, Rect } from "../types";

/**
 * Minimal retained-mode view hierarchy for tests.
 * Frames are relative to the parent, like most native toolkits.
 */
export class FakeView {
  readonly children: FakeView[] = [];
  parent: FakeView | null = null;

  constructor(
    readonly id: string,
    readonly frame: Rect,
  ) {}

  add(...views: FakeView[]): this {
    for (const view of views) {
      view.parent = this;
      this.children.push(view);
    }
    return this;
  }

  remove(): void {
    if (this.parent) {
      const siblings = this.parent.children;
      siblings.splice(siblings.indexOf(this), 1);
      this.parent = null;
    }
  }
}

export class ContainerView extends FakeView {}
export class FakeWindow extends ContainerView {}
export class ScrollView extends FakeView {}
export class TextField extends FakeView {}

/**
 * Tree adapter whose shared space is the window's coordinate space.
 * Only hierarchies rooted in a FakeWindow count as attached.
 */
export function createFakeTree(): NativeTree<FakeView> {
  return {
    children(view) {
      return view.children;
    },

    bounds(view) {
      let { x, y } = view.frame;
      for (let p = view.parent; p !== null; p = p.parent) {
        x += p.frame.x;
        y += p.frame.y;
      }
      return { x, y, width: view.frame.width, height: view.frame.height };
    },

    root(view) {
      let top = view;
      while (top.parent) {
        top = top.parent;
      }
      return top instanceof FakeWindow ? top : null;
    },
  };
}
