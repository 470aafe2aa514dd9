import type { DataTable, Row } from "@player-impact/shared-types";
import { createTable, getNumber, getString, hasColumn, withColumn } from "../utils/table";

/**
 * mv_log = ln(1 + market value), value_eff = impact / mv_log.
 * Missing value or impact, or mv_log of 0, gives null.
 */
export const addValueEfficiency = (
	table: DataTable,
	impactColumn = "impact_adj",
	valueColumn = "market_value_eur",
): DataTable => {
	const withLog = withColumn(table, "mv_log", (row) => {
		const value = getNumber(row, valueColumn);
		return value === null || value < 0 ? null : Math.log1p(value);
	});

	return withColumn(withLog, "value_eff", (row) => {
		const impact = getNumber(row, impactColumn);
		const mvLog = getNumber(row, "mv_log");
		if (impact === null || mvLog === null || mvLog === 0) return null;
		return impact / mvLog;
	});
};

export const WATCHLIST_SIZE = 20;

/**
 * Top `topN` rows per role by `metric`, roles in sorted order.
 * Rows without a role or a metric value are left out.
 */
export const makeWatchlist = (
	table: DataTable,
	roleColumn: string,
	metric: string,
	topN = WATCHLIST_SIZE,
): DataTable => {
	if (!hasColumn(table, roleColumn) || !hasColumn(table, metric)) {
		return createTable(table.columns);
	}

	const byRole = new Map<string, Row[]>();
	for (const row of table.rows) {
		const role = getString(row, roleColumn);
		if (role === null || getNumber(row, metric) === null) continue;
		const rows = byRole.get(role) ?? [];
		rows.push(row);
		byRole.set(role, rows);
	}

	const rows = [...byRole.keys()]
		.sort()
		.flatMap((role) =>
			(byRole.get(role) ?? [])
				.slice()
				.sort((a, b) => (getNumber(b, metric) ?? 0) - (getNumber(a, metric) ?? 0))
				.slice(0, topN),
		);

	return createTable(table.columns, rows);
};
