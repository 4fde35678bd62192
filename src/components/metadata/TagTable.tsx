import { Box } from "ink";
import { displayName, displayValue } from "@/lib/tagEntry";
import type { DisplayMode, TagEntry } from "@/types/metadata";

import { SCROLLBAR_WIDTH, Scrollbar } from "./Scrollbar";
import { type TagCell, TagColumn } from "./TagColumn";
import { rowStyle, scrollbarThumb, splitWidth } from "./utils";

interface TagTableProps {
	entries: TagEntry[];
	cursor: number;
	scroll: number;
	offset: number;
	display: DisplayMode;
	width: number;
	rows: number;
}

export function keyColumnTitle(display: DisplayMode): string {
	return display.short ? " Tag [Short] " : " Tag [Detailed] ";
}

export function valueColumnTitle(display: DisplayMode): string {
	return display.numerical ? " Value [Numerical] " : " Value [Readable] ";
}

export function positionLabel(cursor: number, total: number): string {
	return total === 0 ? "0/0" : `${cursor + 1}/${total}`;
}

export function TagTable({
	entries,
	cursor,
	scroll,
	offset,
	display,
	width,
	rows,
}: TagTableProps) {
	const barWidth = scrollbarThumb(entries.length, rows, scroll)
		? SCROLLBAR_WIDTH
		: 0;
	const [keyWidth, valueWidth] = splitWidth(width - barWidth, [2, 3]);
	const visible = entries.slice(scroll, scroll + rows);

	const keyCells: TagCell[] = [];
	const valueCells: TagCell[] = [];
	visible.forEach((entry, i) => {
		const row = scroll + i;
		const style = rowStyle(entry, row === cursor);
		keyCells.push({
			key: `${row}`,
			text: displayName(entry, display.short),
			style,
		});
		valueCells.push({
			key: `${row}`,
			text: displayValue(entry, display.numerical),
			style,
		});
	});

	return (
		<Box flexDirection="row">
			<TagColumn
				title={`${keyColumnTitle(display)}${positionLabel(cursor, entries.length)}`}
				width={keyWidth}
				rows={rows}
				cells={keyCells}
				offset={offset}
			/>
			<TagColumn
				title={valueColumnTitle(display)}
				width={valueWidth}
				rows={rows}
				cells={valueCells}
				offset={offset}
			/>
			<Scrollbar total={entries.length} rows={rows} scroll={scroll} />
		</Box>
	);
}
