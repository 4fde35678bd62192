import { useStdout } from "ink";
import { useEffect, useState } from "react";

export interface TerminalSize {
	columns: number;
	rows: number;
}

const FALLBACK_SIZE: TerminalSize = { columns: 80, rows: 24 };

export function useTerminalSize(): TerminalSize {
	const { stdout } = useStdout();
	const read = (): TerminalSize => ({
		columns: stdout.columns || FALLBACK_SIZE.columns,
		rows: stdout.rows || FALLBACK_SIZE.rows,
	});
	const [size, setSize] = useState<TerminalSize>(read);

	useEffect(() => {
		const onResize = () => setSize(read());
		stdout.on("resize", onResize);
		return () => {
			stdout.off("resize", onResize);
		};
	}, [stdout]);

	return size;
}
