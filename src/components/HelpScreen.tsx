import { Box, Text } from "ink";

const SECTIONS: { title: string; lines: string[] }[] = [
	{
		title: "General controls",
		lines: [
			"<↑/↓/←/→/SPACE/PGUP/PGDN> - scroll  <f> - filter by tags/values",
			"<ENTER> - toggle show details       <s> - toggle show short tag names",
			"<n> - toggle show numerical representation of tag values",
			"<b> - save binary data from tag     <h> - show this text",
			"<q> - quit",
		],
	},
	{
		title: "Extra controls",
		lines: [
			"<x> - copy tag value to clipboard   <X> - copy tag numerical value to clipboard",
			"<C> - copy all entry data to clipboard",
			"<F> - filter by current tag's group (family)",
			"<w> - try to open a web page with this tag's family's information",
		],
	},
	{
		title: "Multiple files extra controls",
		lines: [
			"<TAB> - next tab                    <SHIFT+TAB> - previous tab",
			"<W> - close the current tab (outside compare mode)",
			"<c> - toggle side-by-side compare mode",
			"<d> - while in side-by-side compare mode, show only lines that differ",
		],
	},
];

export function HelpScreen({ width }: { width: number }) {
	return (
		<Box
			flexDirection="column"
			width={width}
			flexGrow={1}
			borderStyle="single"
			paddingX={1}
		>
			<Text bold>Help</Text>
			{SECTIONS.map((section) => (
				<Box key={section.title} flexDirection="column" marginTop={1}>
					<Box justifyContent="center">
						<Text bold>{section.title}</Text>
					</Box>
					{section.lines.map((line) => (
						<Text key={line}>{line}</Text>
					))}
				</Box>
			))}
			<Box flexDirection="column" marginTop={1}>
				<Text>You can still change tabs while in side-by-side compare mode;</Text>
				<Text>
					this will control what details will be shown, what data will be
					copied, extracted etc.
				</Text>
			</Box>
		</Box>
	);
}
