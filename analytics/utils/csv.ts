import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { Cell, DataTable, Row } from "@player-impact/shared-types";

export type CsvRow = string[];

/**
 * Split CSV text into rows of raw string fields.
 * - double-quoted fields may hold commas, newlines and `""` escapes
 * - a leading UTF-8 BOM is skipped (Excel writes one on UTF-8 exports)
 * - `\r` outside quotes is dropped, so CRLF files parse like LF ones
 * - blank lines yield no row
 */
export const parseCsv = (text: string): CsvRow[] => {
	const rows: CsvRow[] = [];
	let current: string[] = [];
	let field = "";
	let inQuotes = false;
	const start = text.charCodeAt(0) === 0xfeff ? 1 : 0;

	for (let i = start; i < text.length; i += 1) {
		const char = text[i];

		if (inQuotes) {
			if (char === '"') {
				const next = text[i + 1];
				if (next === '"') {
					field += '"';
					i += 1;
				} else {
					inQuotes = false;
				}
			} else {
				field += char;
			}
			continue;
		}

		if (char === '"') {
			inQuotes = true;
			continue;
		}

		if (char === ",") {
			current.push(field);
			field = "";
			continue;
		}

		if (char === "\n") {
			current.push(field);
			field = "";
			if (current.length > 1 || current[0] !== "") {
				rows.push(current);
			}
			current = [];
			continue;
		}

		if (char === "\r") {
			continue;
		}

		field += char;
	}

	if (field.length > 0 || current.length > 0) {
		current.push(field);
		rows.push(current);
	}

	return rows;
};

/**
 * Parse CSV text into a table. Cells stay strings; empty cells become null.
 * Duplicate headers keep their first column.
 */
export const csvToTable = (text: string): DataTable => {
	const [headerRow, ...dataRows] = parseCsv(text);
	if (!headerRow) return { columns: [], rows: [] };

	const columns: string[] = [];
	const positions: number[] = [];
	headerRow.forEach((cell, idx) => {
		const header = cell.trim();
		if (columns.includes(header)) return;
		columns.push(header);
		positions.push(idx);
	});

	const rows = dataRows.map((raw) => {
		const row: Row = {};
		columns.forEach((column, i) => {
			const value = raw[positions[i]] ?? "";
			row[column] = value === "" ? null : value;
		});
		return row;
	});

	return { columns, rows };
};

export const readCsvTable = (path: string): DataTable =>
	csvToTable(readFileSync(path, "utf-8"));

const escapeCsvValue = (value: Cell | undefined) => {
	if (value === null || value === undefined) return "";
	const raw = String(value);
	if (raw.includes(",") || raw.includes("\n") || raw.includes('"')) {
		return `"${raw.replace(/"/g, '""')}"`;
	}
	return raw;
};

export const formatCsv = (rows: Array<Array<Cell | undefined>>) =>
	rows.map((row) => row.map((cell) => escapeCsvValue(cell)).join(",")).join("\n");

export const tableToCsv = (table: DataTable) =>
	formatCsv([
		table.columns,
		...table.rows.map((row) => table.columns.map((column) => row[column])),
	]);

export const writeCsvTable = (path: string, table: DataTable) => {
	mkdirSync(dirname(path), { recursive: true });
	writeFileSync(path, `${tableToCsv(table)}\n`, "utf-8");
};
