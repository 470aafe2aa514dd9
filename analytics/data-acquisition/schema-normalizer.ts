/**
 * Schema Normalizer
 *
 * Turns one raw category table into canonical form:
 * - slugged headers renamed through the declarative column maps
 * - repeated header rows and squad/opponent aggregate rows removed
 * - identity strings cleaned, numeric columns coerced (bad cells → null)
 *
 * Missing source columns simply stay absent. Running it twice is a no-op.
 */

import type { DataTable, Row, StatCategory } from "@player-impact/shared-types";
import {
	CATEGORY_COLUMN_MAPS,
	COMMON_COLUMN_MAP,
	STRING_COLUMNS,
	numericColumnsFor,
} from "../config/columns";
import { parseAge, parseOptionalNumber } from "../utils/numeric";
import { createTable, getString, hasColumn } from "../utils/table";
import { collapseWhitespace } from "../valuation/name-normalizer";

// ============================================================================
// HEADERS
// ============================================================================

/**
 * "Cmp%" → "cmp_pct", "G/Sh" → "g_sh", "Tkl+Int" → "tkl_plus_int"
 */
export const slugHeader = (header: string) =>
	header
		.trim()
		.toLowerCase()
		.replace(/%/g, " pct")
		.replace(/\+/g, " plus ")
		.replace(/#/g, " num ")
		.replace(/[^a-z0-9]+/g, "_")
		.replace(/^_+|_+$/g, "");

const slugColumns = (table: DataTable): DataTable => {
	const columns: string[] = [];
	const sources: string[] = [];
	for (const column of table.columns) {
		const slug = slugHeader(column);
		if (!slug || columns.includes(slug)) continue;
		columns.push(slug);
		sources.push(column);
	}

	const rows = table.rows.map((row) => {
		const next: Row = {};
		columns.forEach((column, idx) => {
			next[column] = row[sources[idx]] ?? null;
		});
		return next;
	});

	return { columns, rows };
};

/**
 * Build the rename plan for a header set. A rename is skipped when its
 * target is already present (or claimed by an earlier rename).
 */
export const planRenames = (
	columns: string[],
	category: StatCategory,
): Record<string, string> => {
	const taken = new Set(columns);
	const plan: Record<string, string> = {};

	for (const mapping of [COMMON_COLUMN_MAP, CATEGORY_COLUMN_MAPS[category]]) {
		for (const [source, target] of Object.entries(mapping)) {
			if (!columns.includes(source) || plan[source]) continue;
			if (taken.has(target)) continue;
			plan[source] = target;
			taken.delete(source);
			taken.add(target);
		}
	}

	return plan;
};

const applyRenames = (table: DataTable, plan: Record<string, string>): DataTable => {
	const columns = table.columns.map((column) => plan[column] ?? column);
	const rows = table.rows.map((row) => {
		const next: Row = {};
		table.columns.forEach((column, idx) => {
			next[columns[idx]] = row[column] ?? null;
		});
		return next;
	});
	return { columns, rows };
};

// ============================================================================
// ROWS
// ============================================================================

const AGGREGATE_PLAYER_PATTERNS = [
	/\bsquad\s+total\b/i,
	/\bopponents?\s+total\b/i,
	/^opponents?$/i,
	/^vs\.?\s/i,
];

const OPPONENT_CLUB_PATTERN = /^vs\.?\s/i;

export const isRepeatedHeaderRow = (row: Row) =>
	getString(row, "player")?.trim().toLowerCase() === "player" ||
	getString(row, "rk")?.trim().toLowerCase() === "rk";

/**
 * Squad totals, opponent rows and blank names. A player's own multi-club
 * "Total" row is a real player row and stays.
 */
export const isNonPlayerRow = (row: Row) => {
	const player = getString(row, "player")?.trim() ?? "";
	if (!player) return true;
	if (AGGREGATE_PLAYER_PATTERNS.some((pattern) => pattern.test(player))) {
		return true;
	}
	const club = getString(row, "club")?.trim() ?? "";
	return OPPONENT_CLUB_PATTERN.test(club);
};

const cleanRow = (row: Row, numericColumns: string[]): Row => {
	const next: Row = { ...row };
	for (const column of STRING_COLUMNS) {
		const value = getString(row, column);
		if (column in next) next[column] = value === null ? null : collapseWhitespace(value) || null;
	}
	for (const column of numericColumns) {
		if (!(column in next)) continue;
		next[column] = column === "age" ? parseAge(row[column]) : parseOptionalNumber(row[column]);
	}
	return next;
};

// ============================================================================
// ENTRY POINT
// ============================================================================

export const normalizeTable = (raw: DataTable, category: StatCategory): DataTable => {
	const slugged = slugColumns(raw);
	const renamed = applyRenames(slugged, planRenames(slugged.columns, category));
	const numericColumns = numericColumnsFor(category).filter((column) =>
		hasColumn(renamed, column),
	);

	const rows = renamed.rows
		.filter((row) => !isRepeatedHeaderRow(row))
		.map((row) => cleanRow(row, numericColumns))
		.filter((row) => !hasColumn(renamed, "player") || !isNonPlayerRow(row));

	return createTable(renamed.columns, rows);
};
