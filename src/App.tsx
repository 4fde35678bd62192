import { Box, Text } from "ink";
import { useEffect, useMemo } from "react";
import { BinarySaveDialog } from "./components/BinarySaveDialog";
import { FILTER_PANEL_ROWS, FilterPanel } from "./components/FilterPanel";
import { FileTabs } from "./components/FileTabs";
import { HelpScreen } from "./components/HelpScreen";
import { HINTS_BAR_ROWS, HintsBar } from "./components/HintsBar";
import { CompareTable } from "./components/metadata/CompareTable";
import { DetailsPanel } from "./components/metadata/DetailsPanel";
import { TagTable } from "./components/metadata/TagTable";
import { TABLE_CHROME_ROWS } from "./components/metadata/utils";
import { RecursionPrompt } from "./components/RecursionPrompt";
import { TitleBar } from "./components/TitleBar";
import { useAppShortcuts } from "./hooks/useAppShortcuts";
import { useTerminalSize } from "./hooks/useTerminalSize";
import { computeView, selectFromView } from "./lib/view";
import { useSaveDialogStore } from "./stores/saveDialogStore";
import { useSessionStore } from "./stores/sessionStore";

const TITLE_ROWS = 1;
const TABS_ROWS = 1;

export interface MainLayoutInput {
	columns: number;
	rows: number;
	showTabs: boolean;
	showFilter: boolean;
	showDetails: boolean;
	compare: boolean;
}

export interface MainLayout {
	/** Data rows visible in the tag list. */
	listRows: number;
	tableWidth: number;
	detailsWidth: number;
}

export function mainLayout(input: MainLayoutInput): MainLayout {
	const chrome =
		TITLE_ROWS +
		(input.showTabs ? TABS_ROWS : 0) +
		(input.showFilter ? FILTER_PANEL_ROWS : 0) +
		HINTS_BAR_ROWS +
		TABLE_CHROME_ROWS;
	const detailsWidth = input.showDetails
		? Math.floor(input.columns / (input.compare ? 4 : 3))
		: 0;

	return {
		listRows: Math.max(1, input.rows - chrome),
		tableWidth: input.columns - detailsWidth,
		detailsWidth,
	};
}

function MainScreen({ columns, rows }: { columns: number; rows: number }) {
	const files = useSessionStore((s) => s.files);
	const compareRows = useSessionStore((s) => s.compareRows);
	const filter = useSessionStore((s) => s.filter);
	const compare = useSessionStore((s) => s.compare);
	const display = useSessionStore((s) => s.display);
	const viewport = useSessionStore((s) => s.viewport);
	const input = useSessionStore((s) => s.input);
	const showDetails = useSessionStore((s) => s.showDetails);
	const setViewportHeight = useSessionStore((s) => s.setViewportHeight);
	const dialogVisible = useSaveDialogStore((s) => s.visible);

	const view = useMemo(
		() =>
			computeView({
				files,
				compareRows,
				activeFileIndex: viewport.activeFileIndex,
				filter,
				compare,
			}),
		[files, compareRows, viewport.activeFileIndex, filter, compare],
	);

	const multipleFiles = files.length > 1;
	const layout = mainLayout({
		columns,
		rows,
		showTabs: multipleFiles && !compare.enabled,
		showFilter: filter !== "" || input === "filter",
		showDetails,
		compare: compare.enabled,
	});

	useEffect(() => {
		setViewportHeight(layout.listRows);
	}, [layout.listRows, setViewportHeight]);

	const activeFile = files[viewport.activeFileIndex];
	const title = compare.enabled ? "Compare Mode" : (activeFile?.path ?? "");
	const tableHeight = layout.listRows + TABLE_CHROME_ROWS;

	return (
		<Box flexDirection="column">
			<TitleBar title={title} width={columns} />
			{multipleFiles && !compare.enabled && (
				<FileTabs
					files={files}
					activeIndex={viewport.activeFileIndex}
					width={columns}
				/>
			)}
			{(filter !== "" || input === "filter") && (
				<FilterPanel
					filter={filter}
					editing={input === "filter"}
					width={columns}
				/>
			)}
			{dialogVisible ? (
				<Box height={tableHeight} alignItems="center" justifyContent="center">
					<BinarySaveDialog width={Math.min(columns, 72)} />
				</Box>
			) : (
				<Box flexDirection="row">
					{view.mode === "compare" ? (
						<CompareTable
							rows={view.rows}
							files={files}
							activeFileIndex={viewport.activeFileIndex}
							cursor={viewport.cursor}
							scroll={viewport.scrollVertical}
							offset={viewport.scrollHorizontal}
							display={display}
							width={layout.tableWidth}
							height={layout.listRows}
						/>
					) : (
						<TagTable
							entries={view.entries}
							cursor={viewport.cursor}
							scroll={viewport.scrollVertical}
							offset={viewport.scrollHorizontal}
							display={display}
							width={layout.tableWidth}
							rows={layout.listRows}
						/>
					)}
					{showDetails && (
						<DetailsPanel
							entry={selectFromView(
								view,
								viewport.cursor,
								viewport.activeFileIndex,
							)}
							width={layout.detailsWidth}
							height={tableHeight}
						/>
					)}
				</Box>
			)}
		</Box>
	);
}

export default function App() {
	useAppShortcuts();
	const { columns, rows } = useTerminalSize();
	const screen = useSessionStore((s) => s.screen);
	const loading = useSessionStore((s) => s.loading);
	const error = useSessionStore((s) => s.error);

	return (
		<Box flexDirection="column" width={columns} height={rows}>
			{screen === "main" && <MainScreen columns={columns} rows={rows} />}
			{screen === "help" && <HelpScreen width={columns} />}
			{screen === "recursionPrompt" && (
				<RecursionPrompt width={columns} loading={loading} />
			)}
			{error && <Text color="red">{error}</Text>}
			<Box flexGrow={1} />
			<HintsBar width={columns} />
		</Box>
	);
}
