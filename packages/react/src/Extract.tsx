/**
 * Extract - Reach the DOM element a component renders through
 *
 * @example
 * ```tsx
 * import { Extract } from '@view-extract/react';
 *
 * function Search() {
 *   return (
 *     <Extract type={HTMLInputElement} onMatch={(input) => input.setAttribute('enterkeyhint', 'search')}>
 *       <ThirdPartySearchField />
 *     </Extract>
 *   );
 * }
 * ```
 */
import type { MatchHandler, NodeType } from "@view-extract/core";
import type { CSSProperties, ReactElement, ReactNode } from "react";
import { useExtract, type UseExtractOptions } from "./useExtract";

export type ExtractProps<T extends Element> = UseExtractOptions & {
	/** Element class to look for, e.g. HTMLInputElement */
	type: NodeType<T>;

	/**
	 * Called with the match after layout. Runs again on later commits
	 * while a match exists, so it should be safe to repeat.
	 */
	onMatch: MatchHandler<T>;

	children?: ReactNode;

	/** Applied to the wrapper element */
	className?: string;

	/** Merged over the wrapper's `position: relative` */
	style?: CSSProperties;
};

const WRAPPER_STYLE: CSSProperties = { position: "relative" };

// Covers the wrapper exactly without being seen or hit.
const ADJUNCT_STYLE: CSSProperties = {
	position: "absolute",
	top: 0,
	right: 0,
	bottom: 0,
	left: 0,
	visibility: "hidden",
	pointerEvents: "none",
};

export function Extract<T extends Element>({
	type,
	onMatch,
	children,
	className,
	style,
	...options
}: ExtractProps<T>): ReactElement {
	const adjunctRef = useExtract(type, onMatch, options);

	return (
		<div className={className} style={{ ...WRAPPER_STYLE, ...style }}>
			{children}
			<div ref={adjunctRef} aria-hidden="true" data-view-extract="" style={ADJUNCT_STYLE} />
		</div>
	);
}

/**
 * Wrap `node` so that the first `type` element it renders over is passed to `onMatch`.
 */
export function extract<T extends Element>(
	node: ReactNode,
	type: NodeType<T>,
	onMatch: MatchHandler<T>,
	options: UseExtractOptions = {},
): ReactElement {
	return (
		<Extract type={type} onMatch={onMatch} {...options}>
			{node}
		</Extract>
	);
}
