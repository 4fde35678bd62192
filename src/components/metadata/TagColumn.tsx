import { Box, Text } from "ink";

import { TagRow } from "./TagRow";
import { innerWidth, type RowStyle, TABLE_CHROME_ROWS } from "./utils";

export interface TagCell {
	key: string;
	text: string;
	style: RowStyle;
}

interface TagColumnProps {
	title: string;
	highlightTitle?: boolean;
	width: number;
	/** Visible data rows. */
	rows: number;
	cells: TagCell[];
	offset: number;
}

export function TagColumn({
	title,
	highlightTitle,
	width,
	rows,
	cells,
	offset,
}: TagColumnProps) {
	const textWidth = innerWidth(width);

	return (
		<Box
			flexDirection="column"
			width={width}
			height={rows + TABLE_CHROME_ROWS}
			borderStyle="single"
		>
			<Text
				bold
				color={highlightTitle ? "black" : undefined}
				backgroundColor={highlightTitle ? "green" : undefined}
				wrap="truncate"
			>
				{title}
			</Text>
			{cells.map((cell) => (
				<TagRow
					key={cell.key}
					text={cell.text}
					width={textWidth}
					offset={offset}
					style={cell.style}
				/>
			))}
		</Box>
	);
}
