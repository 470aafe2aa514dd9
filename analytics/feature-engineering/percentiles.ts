import type { DataTable, Role } from "@player-impact/shared-types";
import { getNumber, getString, hasColumn, withColumn } from "../utils/table";

const ROLE_TOKENS: readonly Role[] = ["GK", "DF", "MF", "FW"];

export const percentileColumn = (metric: string) => `${metric}_pct_role`;

/**
 * Primary role from a position string: "DF,MF" → "DF", "FW MF" → "FW"
 */
export const roleFromPosition = (position: string | null): Role | null => {
	if (!position) return null;
	const tokens = position.toUpperCase().split(/[^A-Z]+/).filter(Boolean);
	for (const token of tokens) {
		const role = ROLE_TOKENS.find((candidate) => candidate === token);
		if (role) return role;
	}
	return null;
};

export const assignRoles = (table: DataTable) =>
	withColumn(table, "role", (row) => roleFromPosition(getString(row, "position")));

/**
 * Fractional ranks in (0, 1] with ties sharing the average rank:
 * [10, 20, 20, 30] → [0.25, 0.625, 0.625, 1]
 */
export const averageRankPercentiles = (values: number[]): number[] => {
	const order = values
		.map((value, index) => ({ value, index }))
		.sort((a, b) => a.value - b.value);
	const result = new Array<number>(values.length).fill(0);

	let start = 0;
	while (start < order.length) {
		let end = start;
		while (end + 1 < order.length && order[end + 1].value === order[start].value) {
			end += 1;
		}
		// ranks are 1-based: positions start..end share (start+1 + end+1) / 2
		const averageRank = (start + end + 2) / 2;
		for (let i = start; i <= end; i += 1) {
			result[order[i].index] = averageRank / order.length;
		}
		start = end + 1;
	}

	return result;
};

/**
 * Add `<metric>_pct_role` for each metric: the row's fractional rank among
 * rows with the same role and a present value. A group of one scores 1.0.
 * Missing values and missing roles get null and are not counted.
 */
export const addRolePercentiles = (
	table: DataTable,
	metrics: readonly string[],
	roleColumn = "role",
): DataTable => {
	const hasRoles = hasColumn(table, roleColumn);
	let out = table;

	for (const metric of metrics) {
		const percentiles = new Array<number | null>(table.rows.length).fill(null);

		if (hasRoles && hasColumn(table, metric)) {
			const groups = new Map<string, number[]>();
			table.rows.forEach((row, index) => {
				const role = getString(row, roleColumn);
				if (role === null || getNumber(row, metric) === null) return;
				const members = groups.get(role) ?? [];
				members.push(index);
				groups.set(role, members);
			});

			for (const members of groups.values()) {
				const values = members.map((index) => getNumber(table.rows[index], metric) ?? 0);
				const ranks = averageRankPercentiles(values);
				members.forEach((index, i) => {
					percentiles[index] = ranks[i];
				});
			}
		}

		out = withColumn(out, percentileColumn(metric), (_, index) => percentiles[index]);
	}

	return out;
};
