import { Box } from "ink";
import { truncateStart } from "@/lib/fileUtils";
import { displayName, displayValue } from "@/lib/tagEntry";
import type { CompareRow, DisplayMode, FileTagSet } from "@/types/metadata";

import { SCROLLBAR_WIDTH, Scrollbar } from "./Scrollbar";
import { type TagCell, TagColumn } from "./TagColumn";
import { keyColumnTitle, positionLabel } from "./TagTable";
import { innerWidth, rowStyle, scrollbarThumb, splitWidth } from "./utils";

interface CompareTableProps {
	rows: CompareRow[];
	files: FileTagSet[];
	activeFileIndex: number;
	cursor: number;
	scroll: number;
	offset: number;
	display: DisplayMode;
	width: number;
	height: number;
}

export function CompareTable({
	rows,
	files,
	activeFileIndex,
	cursor,
	scroll,
	offset,
	display,
	width,
	height,
}: CompareTableProps) {
	const barWidth = scrollbarThumb(rows.length, height, scroll)
		? SCROLLBAR_WIDTH
		: 0;
	const widths = splitWidth(width - barWidth, [1, ...files.map(() => 2)]);
	const visible = rows.slice(scroll, scroll + height);

	const keyCells: TagCell[] = visible.map((row, i) => ({
		key: `${scroll + i}`,
		text: displayName(row.representative, display.short),
		style: rowStyle(row.representative, scroll + i === cursor),
	}));

	const fileCells = files.map((_, fileIndex) =>
		visible.map((row, i): TagCell => {
			const entry = row.perFile[fileIndex] ?? null;
			return {
				key: `${scroll + i}`,
				text: entry ? displayValue(entry, display.numerical) : "",
				style: rowStyle(entry ?? row.representative, scroll + i === cursor),
			};
		}),
	);

	return (
		<Box flexDirection="row">
			<TagColumn
				title={`${keyColumnTitle(display)}${positionLabel(cursor, rows.length)}`}
				width={widths[0]}
				rows={height}
				cells={keyCells}
				offset={offset}
			/>
			{files.map((file, fileIndex) => (
				<TagColumn
					key={file.path}
					title={truncateStart(file.path, innerWidth(widths[fileIndex + 1]))}
					highlightTitle={fileIndex === activeFileIndex}
					width={widths[fileIndex + 1]}
					rows={height}
					cells={fileCells[fileIndex]}
					offset={offset}
				/>
			))}
			<Scrollbar total={rows.length} rows={height} scroll={scroll} />
		</Box>
	);
}
