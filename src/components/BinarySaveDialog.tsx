import { Box, Text } from "ink";
import { useSaveDialogStore } from "@/stores/saveDialogStore";

export function BinarySaveDialog({ width }: { width: number }) {
	const name = useSaveDialogStore((s) => s.name);
	const extension = useSaveDialogStore((s) => s.extension);
	const editingName = useSaveDialogStore((s) => s.editingName);
	const saving = useSaveDialogStore((s) => s.saving);
	const status = useSaveDialogStore((s) => s.status);

	return (
		<Box
			flexDirection="column"
			width={width}
			borderStyle="double"
			paddingX={1}
		>
			<Box justifyContent="center">
				<Text bold>Save binary data</Text>
			</Box>
			<Box flexDirection="row" borderStyle="single">
				<Box flexGrow={1} flexDirection="column">
					<Text dimColor>File name</Text>
					<Text>
						{name}
						{editingName && <Text inverse> </Text>}
					</Text>
				</Box>
				<Box width={Math.max(12, Math.floor(width / 5))} flexDirection="column">
					<Text dimColor>Extension</Text>
					<Text>
						{extension}
						{!editingName && <Text inverse> </Text>}
					</Text>
				</Box>
			</Box>
			<Text color={status.kind === "error" ? "red" : undefined} wrap="wrap">
				{saving ? "Extracting..." : status.text}
			</Text>
			<Text>
				<Text color="green">{"<ENTER>"} - save </Text>
				<Text color="red">{"<ESC>"} - discard </Text>
				<Text>{"<TAB>"} - switch focus</Text>
			</Text>
		</Box>
	);
}
