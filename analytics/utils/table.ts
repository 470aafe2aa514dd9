/**
 * Table Helpers
 *
 * Immutable operations over `DataTable`. Every helper returns a new table
 * (fresh row objects included) so pipeline stages never alias each other.
 */

import type { Cell, DataTable, Row } from "@player-impact/shared-types";

export const createTable = (columns: string[], rows: Row[] = []): DataTable => ({
	columns: [...columns],
	rows: rows.map((row) => {
		const copy: Row = {};
		for (const column of columns) copy[column] = row[column] ?? null;
		return copy;
	}),
});

export const hasColumn = (table: DataTable, column: string) =>
	table.columns.includes(column);

export const hasColumns = (table: DataTable, columns: string[]) =>
	columns.every((column) => table.columns.includes(column));

export const renameColumns = (
	table: DataTable,
	mapping: Record<string, string>,
): DataTable => {
	const rename = (column: string) => mapping[column] ?? column;
	const columns = table.columns.map(rename);
	const rows = table.rows.map((row) => {
		const next: Row = {};
		for (const column of table.columns) next[rename(column)] = row[column] ?? null;
		return next;
	});
	return { columns, rows };
};

export const selectColumns = (table: DataTable, columns: string[]) =>
	createTable(
		columns.filter((column) => hasColumn(table, column)),
		table.rows,
	);

export const dropColumns = (table: DataTable, columns: string[]) =>
	createTable(
		table.columns.filter((column) => !columns.includes(column)),
		table.rows,
	);

/**
 * Add or replace a column. Existing columns keep their position.
 */
export const withColumn = (
	table: DataTable,
	column: string,
	compute: (row: Row, index: number) => Cell,
): DataTable => {
	const columns = hasColumn(table, column)
		? [...table.columns]
		: [...table.columns, column];
	const rows = table.rows.map((row, index) => ({
		...row,
		[column]: compute(row, index),
	}));
	return { columns, rows };
};

export const filterRows = (
	table: DataTable,
	predicate: (row: Row, index: number) => boolean,
) => createTable(table.columns, table.rows.filter(predicate));

/**
 * Stack tables vertically. The schema is the ordered union of all columns.
 */
export const concatTables = (tables: DataTable[]): DataTable => {
	const columns: string[] = [];
	for (const table of tables) {
		for (const column of table.columns) {
			if (!columns.includes(column)) columns.push(column);
		}
	}
	return createTable(
		columns,
		tables.flatMap((table) => table.rows),
	);
};

export const isMissing = (value: Cell | undefined): boolean =>
	value === null || value === undefined || (typeof value === "number" && Number.isNaN(value));

export const getNumber = (row: Row, column: string): number | null => {
	const value = row[column];
	return typeof value === "number" && Number.isFinite(value) ? value : null;
};

export const getString = (row: Row, column: string): string | null => {
	const value = row[column];
	if (value === null || value === undefined) return null;
	return String(value);
};
