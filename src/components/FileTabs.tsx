import { Box, Text } from "ink";
import type { FileTagSet } from "@/types/metadata";

interface FileTabsProps {
	files: FileTagSet[];
	activeIndex: number;
	width: number;
}

/** Tabs narrower than this are replaced by a notice. */
const MIN_TAB_WIDTH = 6;

export function tabWidth(width: number, count: number): number {
	return count === 0 ? 0 : Math.floor((width * 0.95) / count);
}

export function tabLabel(path: string, width: number): string {
	const room = Math.max(0, width - 3);
	return `*${path.slice(Math.max(0, path.length - room))}`;
}

export function FileTabs({ files, activeIndex, width }: FileTabsProps) {
	const size = tabWidth(width, files.length);
	if (size < MIN_TAB_WIDTH) {
		return (
			<Text color="yellow" wrap="truncate">
				Too many files to show tabs, {"<TAB>"} can still be used
			</Text>
		);
	}

	return (
		<Box flexDirection="row">
			{files.map((file, i) => (
				<Box key={file.path} width={size}>
					<Text
						bold={i === activeIndex}
						backgroundColor={i === activeIndex ? "gray" : undefined}
						wrap="truncate"
					>
						<Text color="red">|</Text>
						{tabLabel(file.path, size)}
						<Text color="red">|</Text>
					</Text>
				</Box>
			))}
		</Box>
	);
}
