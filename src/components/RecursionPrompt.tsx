import { Box, Text } from "ink";

export function RecursionPrompt({
	width,
	loading,
}: {
	width: number;
	loading: boolean;
}) {
	return (
		<Box
			flexDirection="column"
			width={width}
			flexGrow={1}
			alignItems="center"
			justifyContent="center"
		>
			<Text bold wrap="wrap">
				You provided one or more folders as input. Please choose if you want to
				read them recursively:
			</Text>
			{loading ? (
				<Box marginTop={1}>
					<Text dimColor>Reading metadata...</Text>
				</Box>
			) : (
				<Box flexDirection="column" marginTop={1} alignItems="center">
					<Text bold backgroundColor="green">
						{" <y/ENTER>   YES "}
					</Text>
					<Text bold backgroundColor="red">
						{" <n/ESC>     NO  "}
					</Text>
				</Box>
			)}
		</Box>
	);
}
