/**
 * Join Engine
 *
 * Left joins enrichment tables onto the standard (base) table:
 * - keys are (player, club) when both sides carry both, else (player)
 * - the enrichment side is deduplicated on the key (first row wins)
 * - base precedence: enrichment columns the base already has are dropped
 *   before merging and reported in the step result
 * - `_x` / `_y` leftovers in the base are coalesced into their root first
 *
 * The base row set is never changed: same rows, same order.
 */

import type { Cell, DataTable, Row, StepResult } from "@player-impact/shared-types";
import { createLogger } from "../utils/logger";
import { describeError } from "../utils/errors";
import { createTable, getString, hasColumns, isMissing, selectColumns } from "../utils/table";
import { normalizePersonName } from "../valuation/name-normalizer";

const logger = createLogger("JoinEngine");

export type JoinKeys = ["player", "club"] | ["player"];

export type JoinOutcome = {
	table: DataTable;
	keys: JoinKeys;
	addedColumns: string[];
	droppedColumns: string[];
};

export type NamedTable = {
	name: string;
	table: DataTable;
};

// ============================================================================
// KEYS
// ============================================================================

export const chooseJoinKeys = (base: DataTable, other: DataTable): JoinKeys | null => {
	if (hasColumns(base, ["player", "club"]) && hasColumns(other, ["player", "club"])) {
		return ["player", "club"];
	}
	if (hasColumns(base, ["player"]) && hasColumns(other, ["player"])) {
		return ["player"];
	}
	return null;
};

export const joinKeyFor = (row: Row, keys: JoinKeys) =>
	keys
		.map((key) =>
			key === "player" ? normalizePersonName(row.player) : (getString(row, key) ?? "").trim(),
		)
		.join("|");

// ============================================================================
// SUFFIX COALESCING
// ============================================================================

const SUFFIX_PATTERN = /^(.+)_(x|y)$/;

/**
 * Fold `<root>_x` / `<root>_y` into `<root>` (first non-missing, `_x`
 * first) and drop every suffixed column. An existing `<root>` is kept as is.
 */
export const coalesceSuffixColumns = (table: DataTable): DataTable => {
	const roots = new Map<string, string[]>();
	for (const column of table.columns) {
		const match = column.match(SUFFIX_PATTERN);
		if (!match) continue;
		const suffixed = roots.get(match[1]) ?? [];
		suffixed.push(column);
		roots.set(match[1], suffixed);
	}
	if (roots.size === 0) return createTable(table.columns, table.rows);

	const suffixedColumns = new Set([...roots.values()].flat());
	const columns: string[] = [];
	for (const column of table.columns) {
		if (!suffixedColumns.has(column)) {
			columns.push(column);
			continue;
		}
		const root = column.replace(SUFFIX_PATTERN, "$1");
		if (!table.columns.includes(root) && !columns.includes(root)) columns.push(root);
	}

	const rows = table.rows.map((row) => {
		const next: Row = { ...row };
		for (const [root, suffixed] of roots) {
			if (!table.columns.includes(root)) {
				const ordered = [`${root}_x`, `${root}_y`].filter((column) =>
					suffixed.includes(column),
				);
				let value: Cell = null;
				for (const column of ordered) {
					if (!isMissing(row[column])) {
						value = row[column];
						break;
					}
				}
				next[root] = value;
			}
			for (const column of suffixed) delete next[column];
		}
		return next;
	});

	return createTable(columns, rows);
};

// ============================================================================
// LEFT JOIN
// ============================================================================

const mergeLeft = (
	base: DataTable,
	other: DataTable,
	keys: JoinKeys,
): JoinOutcome => {
	const cleanBase = coalesceSuffixColumns(base);
	const keyColumns: string[] = [...keys];

	const droppedColumns = other.columns.filter(
		(column) => !keyColumns.includes(column) && cleanBase.columns.includes(column),
	);
	const addedColumns = other.columns.filter(
		(column) => !keyColumns.includes(column) && !droppedColumns.includes(column),
	);

	const lookup = new Map<string, Row>();
	for (const row of other.rows) {
		const key = joinKeyFor(row, keys);
		if (!lookup.has(key)) lookup.set(key, row);
	}

	const rows = cleanBase.rows.map((row) => {
		const match = lookup.get(joinKeyFor(row, keys));
		const next: Row = { ...row };
		for (const column of addedColumns) {
			next[column] = match ? (match[column] ?? null) : null;
		}
		return next;
	});

	return {
		table: createTable([...cleanBase.columns, ...addedColumns], rows),
		keys,
		addedColumns,
		droppedColumns,
	};
};

export const leftJoin = (
	base: DataTable,
	other: DataTable,
	label = "enrichment",
): StepResult<JoinOutcome> => {
	const unchanged: JoinOutcome = {
		table: base,
		keys: ["player"],
		addedColumns: [],
		droppedColumns: [],
	};

	const keys = chooseJoinKeys(base, other);
	if (!keys) {
		return {
			status: "skipped",
			value: unchanged,
			reason: `${label}: no shared player column to join on`,
		};
	}

	try {
		const outcome = mergeLeft(base, other, keys);
		if (outcome.droppedColumns.length) {
			logger.warn(
				`${label}: base values kept for ${outcome.droppedColumns.join(", ")}; enrichment values discarded`,
			);
		}
		return {
			status: "applied",
			value: outcome,
			detail: `${label}: +${outcome.addedColumns.length} cols on ${keys.join("+")}`,
		};
	} catch (error) {
		logger.error(`${label}: join failed, keeping base table`, error);
		return {
			status: "failed",
			value: { ...unchanged, keys },
			reason: `${label}: ${describeError(error)}`,
		};
	}
};

// ============================================================================
// ENRICHMENT STEPS
// ============================================================================

const MINUTE_COLUMNS = ["player", "club", "minutes", "nineties"];

/**
 * Copy minutes/nineties from the resolved standard table onto an
 * enrichment table that lacks them. Columns the table already has win.
 */
export const attachMinutesFromStandard = (
	table: DataTable,
	standard: DataTable | null,
	label = "enrichment",
): StepResult<DataTable> => {
	if (!standard) {
		return { status: "skipped", value: table, reason: `${label}: no standard table` };
	}

	const minutes = selectColumns(standard, MINUTE_COLUMNS);
	if (!minutes.columns.some((column) => column === "minutes" || column === "nineties")) {
		return {
			status: "skipped",
			value: table,
			reason: `${label}: standard table has no minutes`,
		};
	}
	if (!minutes.columns.some((column) => !table.columns.includes(column))) {
		return {
			status: "skipped",
			value: table,
			reason: `${label}: minutes already present`,
		};
	}

	const joined = leftJoin(table, minutes, `${label} minutes`);
	if (joined.status === "applied") {
		return { status: "applied", value: joined.value.table, detail: joined.detail };
	}
	logger.warn(`Could not attach minutes from standard: ${joined.reason}`);
	return { status: joined.status, value: table, reason: joined.reason };
};

export type AnalyticBuild = {
	table: DataTable;
	steps: Array<StepResult<JoinOutcome> & { name: string }>;
};

/**
 * Standard table left-joined with each enrichment in order
 */
export const buildAnalyticTable = (
	base: DataTable,
	enrichments: NamedTable[],
): AnalyticBuild => {
	let table = createTable(base.columns, base.rows);
	const steps: AnalyticBuild["steps"] = [];

	for (const { name, table: enrichment } of enrichments) {
		if (!enrichment.rows.length) {
			steps.push({
				name,
				status: "skipped",
				value: {
					table,
					keys: ["player"],
					addedColumns: [],
					droppedColumns: [],
				},
				reason: `${name}: empty table`,
			});
			continue;
		}

		const result = leftJoin(table, enrichment, name);
		steps.push({ ...result, name });
		table = result.value.table;

		if (result.status === "applied") {
			logger.info(`Joined ${name}: +${result.value.addedColumns.length} cols`);
		} else {
			logger.warn(result.reason);
		}
	}

	return { table, steps };
};
