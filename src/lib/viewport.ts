/**
 * Cursor and scroll arithmetic for the tag list.
 * Every operation saturates at its bounds, so an empty list is always valid.
 */

export interface ViewportState {
	cursor: number;
	scrollVertical: number;
	scrollHorizontal: number;
	activeFileIndex: number;
	/** Row count of the view as of the last reconcile. */
	visibleRowCount: number;
}

/** Rows kept in frame below the last scroll position. */
export const DEFAULT_SCROLL_MARGIN = 5;

export const initialViewport: ViewportState = {
	cursor: 0,
	scrollVertical: 0,
	scrollHorizontal: 0,
	activeFileIndex: 0,
	visibleRowCount: 0,
};

export function clampCursor(cursor: number, rowCount: number): number {
	if (rowCount <= 0) return 0;
	return Math.min(Math.max(0, Math.trunc(cursor)), rowCount - 1);
}

export function moveCursor(
	cursor: number,
	delta: number,
	rowCount: number,
): number {
	return clampCursor(cursor + delta, rowCount);
}

/**
 * Move the scroll position and the cursor together. The scroll upper bound is
 * left to the next {@link reconcileViewport}.
 */
export function dragCursor(
	viewport: ViewportState,
	delta: number,
): ViewportState {
	return {
		...viewport,
		scrollVertical: Math.max(0, Math.trunc(viewport.scrollVertical + delta)),
		cursor: moveCursor(viewport.cursor, delta, viewport.visibleRowCount),
	};
}

/** No upper bound: content width is only known to the renderer. */
export function scrollHorizontal(offset: number, delta: number): number {
	return Math.max(0, Math.trunc(offset + delta));
}

export function scrollIntoView(
	scroll: number,
	cursor: number,
	height: number,
	rowCount: number,
	margin: number = DEFAULT_SCROLL_MARGIN,
): number {
	const rows = Math.max(1, Math.trunc(height));
	let next = scroll;
	if (cursor < next) {
		next = cursor;
	} else if (cursor >= next + rows) {
		next = cursor - rows + 1;
	}
	return Math.max(0, Math.min(next, rowCount - Math.max(1, margin)));
}

/**
 * Bring cursor and scroll back in line with a view of `rowCount` rows shown in
 * a window of `height` rows.
 */
export function reconcileViewport(
	viewport: ViewportState,
	rowCount: number,
	height: number,
	margin: number = DEFAULT_SCROLL_MARGIN,
): ViewportState {
	const cursor = clampCursor(viewport.cursor, rowCount);
	return {
		...viewport,
		cursor,
		visibleRowCount: Math.max(0, rowCount),
		scrollVertical: scrollIntoView(
			viewport.scrollVertical,
			cursor,
			height,
			rowCount,
			margin,
		),
	};
}

export function resetPosition(viewport: ViewportState): ViewportState {
	return { ...viewport, cursor: 0, scrollVertical: 0, scrollHorizontal: 0 };
}

/** Step through `count` files, wrapping at both ends. */
export function cycleIndex(index: number, delta: number, count: number): number {
	if (count <= 0) return 0;
	return (((index + delta) % count) + count) % count;
}

/**
 * Active index once the file at `removed` is dropped, leaving `remaining`
 * files. An index at or past the removed slot moves back by one.
 */
export function indexAfterRemoval(
	active: number,
	removed: number,
	remaining: number,
): number {
	if (remaining <= 0) return 0;
	const shifted = active >= removed ? active - 1 : active;
	return Math.min(Math.max(0, shifted), remaining - 1);
}
