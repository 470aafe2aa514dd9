/**
 * Per-90 rates
 *
 * `nineties` is the exposure denominator, resolved in order:
 * canonical `nineties` → raw `90s` → `minutes / 90`.
 * Rows under the minutes floor get `nineties = null`, which blanks every
 * per-90 value for them. Each requested metric always gets a `_per90`
 * column, filled with null when it cannot be computed.
 */

import type { DataTable } from "@player-impact/shared-types";
import { DEFAULT_MIN_MINUTES } from "../config/pipeline-config";
import { parseOptionalNumber } from "../utils/numeric";
import { createTable, filterRows, getNumber, hasColumn, renameColumns, withColumn } from "../utils/table";

export type Per90Options = {
	minMinutes?: number;
};

export const per90Column = (metric: string) => `${metric}_per90`;

export const resolveNineties = (table: DataTable): DataTable => {
	if (hasColumn(table, "nineties")) return createTable(table.columns, table.rows);
	if (hasColumn(table, "90s")) {
		const renamed = renameColumns(table, { "90s": "nineties" });
		return withColumn(renamed, "nineties", (row) => parseOptionalNumber(row.nineties));
	}
	if (hasColumn(table, "minutes")) {
		return withColumn(table, "nineties", (row) => {
			const minutes = getNumber(row, "minutes");
			return minutes === null ? null : minutes / 90;
		});
	}
	return createTable(table.columns, table.rows);
};

export const addPer90 = (
	table: DataTable,
	metrics: readonly string[],
	{ minMinutes = DEFAULT_MIN_MINUTES }: Per90Options = {},
): DataTable => {
	let out = resolveNineties(table);

	if (!hasColumn(out, "nineties")) {
		for (const metric of metrics) {
			out = withColumn(out, per90Column(metric), () => null);
		}
		return out;
	}

	if (hasColumn(out, "minutes")) {
		out = withColumn(out, "nineties", (row) => {
			const minutes = getNumber(row, "minutes");
			if (minutes !== null && minutes < minMinutes) return null;
			return getNumber(row, "nineties");
		});
	}

	for (const metric of metrics) {
		const present = hasColumn(out, metric);
		out = withColumn(out, per90Column(metric), (row) => {
			if (!present) return null;
			const value = getNumber(row, metric);
			const nineties = getNumber(row, "nineties");
			if (value === null || nineties === null || nineties === 0) return null;
			return value / nineties;
		});
	}

	return out;
};

/**
 * Season-level row filter, separate from the per-90 floor. Rows with
 * unknown minutes are dropped; a table without minutes is returned as is.
 */
export const filterByMinutes = (table: DataTable, minMinutes: number) => {
	if (!hasColumn(table, "minutes")) return createTable(table.columns, table.rows);
	return filterRows(table, (row) => {
		const minutes = getNumber(row, "minutes");
		return minutes !== null && minutes >= minMinutes;
	});
};
