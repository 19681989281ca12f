import {
	createLogger,
	domTree,
	Extractor,
	type MatchHandler,
	type NativeTree,
	type NodeType,
	type Scheduler,
} from "@view-extract/core";
import { useEffect, useLayoutEffect, useMemo, useRef, useState } from "react";

export type UseExtractOptions = {
	/** Where deferred searches run (default: next macrotask) */
	scheduler?: Scheduler;

	/** Tree adapter (default: DOM) */
	tree?: NativeTree<Element>;

	/**
	 * Also search when the adjunct is resized without a re-render.
	 * Ignored where ResizeObserver is unavailable.
	 */
	trackResize?: boolean;

	/** Log each pass to the console */
	debug?: boolean;
};

/**
 * Turn any element into an extraction adjunct.
 *
 * Returns a callback ref. After every commit the attached element's bounds
 * are used to search its document for the first element of `type` that
 * intersects them; `onMatch` receives it on a later task.
 *
 * @example
 * ```tsx
 * function Notes() {
 *   const ref = useExtract(HTMLTextAreaElement, (textarea) => {
 *     textarea.setSelectionRange(0, 0);
 *   });
 *   return <RichEditor ref={ref} />;
 * }
 * ```
 */
export function useExtract<T extends Element>(
	type: NodeType<T>,
	onMatch: MatchHandler<T>,
	options: UseExtractOptions = {},
): (element: Element | null) => void {
	const { scheduler, tree = domTree, trackResize = false, debug = false } = options;
	const [adjunct, setAdjunct] = useState<Element | null>(null);
	const onMatchRef = useRef(onMatch);

	const extractor = useMemo(
		() =>
			new Extractor<Element, T>(type, (node) => onMatchRef.current(node), {
				tree,
				scheduler,
				logger: createLogger({ debug }),
			}),
		[type, tree, scheduler, debug],
	);

	// Searches still queued on a replaced extractor were made for its type,
	// not the current handler's. Silence them during the commit that replaces it.
	useLayoutEffect(
		() => () => {
			extractor.setCallback(() => {});
		},
		[extractor],
	);

	// No dependency list: every commit is a layout pass.
	useLayoutEffect(() => {
		onMatchRef.current = onMatch;
		if (adjunct) {
			extractor.update(adjunct);
		}
	});

	useEffect(() => {
		if (!trackResize || !adjunct || typeof ResizeObserver === "undefined") return;

		const observer = new ResizeObserver(() => {
			extractor.update(adjunct);
		});
		observer.observe(adjunct);

		return () => {
			observer.disconnect();
		};
	}, [adjunct, extractor, trackResize]);

	return setAdjunct;
}
