/**
 * Axis-aligned rectangle in the shared coordinate space.
 * For the DOM this is viewport space: origin (0,0) is the top-left of the viewport.
 */
export type Rect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

/**
 * A checkable runtime type for native nodes.
 * Abstract classes are accepted; matching uses `instanceof`.
 */
export type NodeType<T> = abstract new (...args: never[]) => T;

/**
 * Read-only view of a native tree owned by another subsystem.
 *
 * Implementations must not mutate the tree. Callers never keep the nodes
 * they receive beyond a single search.
 */
export type NativeTree<N> = {
  /** Ordered children of a node (construction order) */
  children(node: N): Iterable<N>;

  /** Bounding rectangle of a node resolved into the shared coordinate space */
  bounds(node: N): Rect;

  /** Enclosing root of a node, or null when the node is detached */
  root(node: N): N | null;
};

/**
 * Runs a task after the current layout pass has completed.
 */
export type Scheduler = (task: () => void) => void;

/**
 * Why an extraction pass produced nothing.
 */
export type MissCode =
  | "NOT_FOUND" // No node matched both type and region
  | "NOT_ATTACHED"; // Adjunct has no root at execution time

/**
 * Result of a single extraction pass.
 */
export type ExtractResult<T> = { found: true; node: T } | { found: false; code: MissCode };

/**
 * Receives the matched node. May be invoked on every layout pass.
 */
export type MatchHandler<T> = (node: T) => void;
