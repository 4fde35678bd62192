import { Box, Text } from "ink";

import { scrollbarThumb, TABLE_CHROME_ROWS } from "./utils";

export const SCROLLBAR_WIDTH = 1;

interface ScrollbarProps {
	total: number;
	rows: number;
	scroll: number;
}

/** Track aligned with the data rows of a bordered tag column. */
export function Scrollbar({ total, rows, scroll }: ScrollbarProps) {
	const thumb = scrollbarThumb(total, rows, scroll);
	if (!thumb) return null;

	return (
		<Box
			flexDirection="column"
			width={SCROLLBAR_WIDTH}
			height={rows + TABLE_CHROME_ROWS}
			paddingTop={TABLE_CHROME_ROWS - 1}
		>
			{Array.from({ length: rows }, (_, i) => {
				const inThumb = i >= thumb.start && i < thumb.start + thumb.size;
				return (
					<Text key={i} color={inThumb ? "white" : "gray"}>
						{inThumb ? "█" : "│"}
					</Text>
				);
			})}
		</Box>
	);
}
