import { Box, Text } from "ink";
import {
	formatTagId,
	numericOrValue,
	renderValue,
	tableToString,
} from "@/lib/tagEntry";
import type { TagEntry } from "@/types/metadata";

interface DetailsPanelProps {
	entry: TagEntry | null;
	width: number;
	height: number;
}

/**
 * Shorten values that would flood the panel. Returns the text to show and
 * whether it was clipped.
 */
export function clipLongValue(
	text: string,
	width: number,
): { text: string; clipped: boolean } {
	if (text.length <= width * 5) return { text, clipped: false };
	return { text: text.slice(0, width * 3), clipped: true };
}

function ValueLine({
	label,
	value,
	width,
	copyKey,
}: {
	label: string;
	value: string;
	width: number;
	copyKey: string;
}) {
	const clipped = clipLongValue(value, width);
	return (
		<Text>
			{label}
			{clipped.text}
			{clipped.clipped && (
				<Text color="yellow">
					... value too long, press {`<${copyKey}>`} to copy
				</Text>
			)}
		</Text>
	);
}

export function DetailsPanel({ entry, width, height }: DetailsPanelProps) {
	return (
		<Box
			flexDirection="column"
			width={width}
			height={height}
			borderStyle="single"
			paddingX={1}
		>
			{entry ? (
				<>
					<Text bold>{` Details [${entry.shortName}] `}</Text>
					<Text>Detailed name: {entry.displayName}</Text>
					<Text>Tag ID: {formatTagId(entry.id)}</Text>
					<Text>
						Tag family: {tableToString(entry.table)}
						<Text color="yellow"> {"<F>"} - filter by tag family</Text>
					</Text>
					{entry.instance !== "" && <Text>Instance: {entry.instance}</Text>}
					<ValueLine
						label="Value: "
						value={renderValue(entry.value)}
						width={width}
						copyKey="x"
					/>
					<ValueLine
						label="Numerical value: "
						value={numericOrValue(entry)}
						width={width}
						copyKey="X"
					/>
					{entry.index !== undefined && <Text>Index: {entry.index}</Text>}
					<Text> </Text>
					<Text color="yellow">{"<C>"} - copy entry to clipboard</Text>
					{entry.binarySizeKb !== undefined && (
						<Text color="yellow">{"<b>"} - extract binary data</Text>
					)}
					<Text color="yellow">{"<w>"} - open tag family documentation</Text>
				</>
			) : (
				<Text dimColor>This file has no value for the selected tag.</Text>
			)}
		</Box>
	);
}
