import { Box, Text } from "ink";
import type { ReactNode } from "react";
import { useSessionStore } from "@/stores/sessionStore";

export const HINTS_BAR_ROWS = 4;

export function HintsBar({ width }: { width: number }) {
	const screen = useSessionStore((s) => s.screen);
	const input = useSessionStore((s) => s.input);
	const status = useSessionStore((s) => s.statusMessage);

	let lines: ReactNode;
	if (status) {
		lines = (
			<Text color={status.kind === "ok" ? "green" : "red"}>{status.text}</Text>
		);
	} else if (screen === "help") {
		lines = <Text>{"<ENTER/ESC/q>"} - go back</Text>;
	} else if (screen === "recursionPrompt") {
		lines = <Text>{"<q>"} - quit</Text>;
	} else if (input === "filter") {
		lines = (
			<>
				<Text color="cyan">Filtering by tags and values.</Text>
				<Text>
					<Text color="green">{"<ENTER>"} - apply </Text>
					<Text color="red">{"<ESC>"} - discard</Text>
				</Text>
			</>
		);
	} else if (input === "binarySaveDialog") {
		lines = <Text>Saving binary data.</Text>;
	} else {
		lines = (
			<>
				<Text>
					{"<↑/↓/←/→/SPACE>"} - scroll {"<f>"} - filter {"<ENTER>"} - details
				</Text>
				<Text>
					<Text color="yellowBright">{"<h>"} - help </Text>
					<Text color="red">{"<q>"} - quit</Text>
				</Text>
			</>
		);
	}

	return (
		<Box
			flexDirection="column"
			width={width}
			height={HINTS_BAR_ROWS}
			borderStyle="single"
			paddingX={1}
		>
			{lines}
		</Box>
	);
}
