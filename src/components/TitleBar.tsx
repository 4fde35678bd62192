import { Box, Text } from "ink";
import { truncateStart } from "@/lib/fileUtils";

interface TitleBarProps {
	title: string;
	width: number;
}

export function TitleBar({ title, width }: TitleBarProps) {
	return (
		<Box width={width}>
			<Text bold color="black" backgroundColor="white" wrap="truncate">
				{` ${truncateStart(title, Math.max(0, width - 2))} `.padEnd(width, " ")}
			</Text>
		</Box>
	);
}
