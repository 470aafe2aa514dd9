/**
 * Multi-Club Resolver
 *
 * A player who moved mid-season appears once per club, often with an
 * extra aggregate row whose club cell contains "Total".
 *
 * total mode, per player (normalized name):
 *   1. the aggregate "Total" row when present
 *   2. otherwise the row with the most minutes (missing minutes rank last)
 *   3. otherwise the first row in source order
 * club mode: aggregate rows are dropped, every club row is kept.
 *
 * Output keeps the order in which each player first appears.
 */

import type { ClubMode, DataTable, Row } from "@player-impact/shared-types";
import { createTable, getNumber, getString, hasColumn } from "../utils/table";
import { normalizePersonName } from "../valuation/name-normalizer";

const TOTAL_PATTERN = /total/i;

export const isAggregateClubRow = (row: Row) =>
	TOTAL_PATTERN.test(getString(row, "club") ?? "");

const pickCanonicalRow = (group: Row[], useMinutes: boolean): Row => {
	const total = group.find(isAggregateClubRow);
	if (total) return total;
	if (!useMinutes) return group[0];

	let best = group[0];
	let bestMinutes = getNumber(best, "minutes");
	for (const row of group.slice(1)) {
		const minutes = getNumber(row, "minutes");
		if (minutes === null) continue;
		if (bestMinutes === null || minutes > bestMinutes) {
			best = row;
			bestMinutes = minutes;
		}
	}
	return best;
};

export const resolveMultiClub = (table: DataTable, mode: ClubMode): DataTable => {
	if (!hasColumn(table, "player")) return createTable(table.columns, table.rows);

	if (mode === "club") {
		return createTable(
			table.columns,
			table.rows.filter((row) => !isAggregateClubRow(row)),
		);
	}

	const groups = new Map<string, Row[]>();
	for (const row of table.rows) {
		const key = normalizePersonName(row.player);
		const group = groups.get(key);
		if (group) group.push(row);
		else groups.set(key, [row]);
	}

	const useMinutes = hasColumn(table, "minutes");
	const rows = [...groups.values()].map((group) =>
		group.length === 1 ? group[0] : pickCanonicalRow(group, useMinutes),
	);

	return createTable(table.columns, rows);
};

/**
 * Players (normalized name) that still appear more than once
 */
export const countIdentityDuplicates = (table: DataTable) => {
	const counts = new Map<string, number>();
	for (const row of table.rows) {
		const key = normalizePersonName(row.player);
		counts.set(key, (counts.get(key) ?? 0) + 1);
	}
	return [...counts.entries()]
		.filter(([, count]) => count > 1)
		.map(([player, count]) => ({ player, count }));
};
