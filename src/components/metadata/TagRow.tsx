import { Text } from "ink";
import { cutText, singleLine } from "@/lib/fileUtils";

import type { RowStyle } from "./utils";

interface TagRowProps {
	text: string;
	width: number;
	offset: number;
	style: RowStyle;
}

/** One padded line of cell text, scrolled by `offset`. */
export function cellText(text: string, width: number, offset: number): string {
	return cutText(singleLine(text), width, offset).padEnd(width, " ");
}

export function TagRow({ text, width, offset, style }: TagRowProps) {
	return (
		<Text
			color={style.color}
			bold={style.bold}
			inverse={style.inverse}
			wrap="truncate"
		>
			{cellText(text, width, offset)}
		</Text>
	);
}
