import { ExtractError } from "./errors";
import { locate } from "./locate";
import { createLogger, type Logger } from "./logger";
import { nextTask } from "./scheduler";
import type { ExtractResult, MatchHandler, NativeTree, NodeType, Scheduler } from "./types";

export type ExtractorOptions<N> = {
  /** Adapter over the native tree to search */
  tree: NativeTree<N>;
  /** Where deferred searches run (default: next macrotask) */
  scheduler?: Scheduler;
  /** Logger (default: console logger, debug off) */
  logger?: Logger;
};

/**
 * Native-side peer of an invisible adjunct node.
 *
 * On every layout pass the host calls `update(adjunct)`. The search is
 * deferred so geometry is final when it runs, and attachment is checked at
 * execution time. Each pass may deliver again; there is no de-duplication.
 *
 * @example
 * ```typescript
 * const extractor = new Extractor(HTMLTextAreaElement, (textarea) => {
 *   textarea.spellcheck = false;
 * }, { tree: domTree });
 *
 * extractor.update(adjunctElement);
 * ```
 */
export class Extractor<N, T extends N> {
  private readonly type: NodeType<T>;
  private readonly tree: NativeTree<N>;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private onMatch: MatchHandler<T>;

  constructor(type: NodeType<T>, onMatch: MatchHandler<T>, options: ExtractorOptions<N>) {
    if (typeof type !== "function") {
      throw new ExtractError(`Target type must be a constructor, got ${typeof type}`, "INVALID_TYPE");
    }

    this.type = type;
    this.onMatch = onMatch;
    this.tree = options.tree;
    this.scheduler = options.scheduler ?? nextTask;
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Replace the handler used by deliveries that have not run yet.
   */
  setCallback(onMatch: MatchHandler<T>): void {
    this.onMatch = onMatch;
  }

  /**
   * Run one search synchronously, using the adjunct's own bounds as the region.
   */
  resolve(adjunct: N): ExtractResult<T> {
    const root = this.tree.root(adjunct);
    if (root === null) {
      return { found: false, code: "NOT_ATTACHED" };
    }

    const region = this.tree.bounds(adjunct);
    const node = locate(root, this.type, region, this.tree);

    return node === null ? { found: false, code: "NOT_FOUND" } : { found: true, node };
  }

  /**
   * Schedule a search for the current layout pass.
   */
  update(adjunct: N): void {
    this.scheduler(() => this.deliver(adjunct));
  }

  private deliver(adjunct: N): void {
    const result = this.resolve(adjunct);

    if (!result.found) {
      this.logger.debug(`No ${this.type.name} delivered (${result.code})`);
      return;
    }

    this.logger.debug(`Delivering ${this.type.name}`);
    try {
      this.onMatch(result.node);
    } catch (error) {
      this.logger.error("Match handler error:", error);
    }
  }
}
