import { Box, Text } from "ink";

interface FilterPanelProps {
	filter: string;
	editing: boolean;
	width: number;
}

export const FILTER_PANEL_ROWS = 3;

export function FilterPanel({ filter, editing, width }: FilterPanelProps) {
	return (
		<Box width={width} borderStyle="single" paddingX={1}>
			<Text bold>Filter: </Text>
			<Text wrap="truncate">{filter}</Text>
			{editing && <Text inverse> </Text>}
		</Box>
	);
}
