/**
 * Manual market-value overrides
 *
 * Operator-maintained CSV keyed by exact (player, club). An override value
 * always replaces the automatically matched one.
 */

import { existsSync } from "node:fs";
import type { DataTable, ManualOverride, StepResult } from "@player-impact/shared-types";
import { z } from "zod";
import { readCsvTable } from "../utils/csv";
import { ManualOverrideSchemaError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { parseOptionalNumber } from "../utils/numeric";
import { getNumber, getString, hasColumn } from "../utils/table";
import { collapseWhitespace } from "./name-normalizer";

const logger = createLogger("ManualOverrides");

export const REQUIRED_OVERRIDE_COLUMNS = ["player", "club", "market_value_eur"] as const;

const cellSchema = z.union([z.string(), z.number(), z.null()]);

const overrideRowSchema = z.object({
	player: z.string().transform(collapseWhitespace).pipe(z.string().min(1)),
	club: z.string().transform(collapseWhitespace).pipe(z.string().min(1)),
	market_value_eur: cellSchema.transform((value) => parseOptionalNumber(value)),
});

/**
 * Validate an override table. Missing required columns are fatal;
 * individual rows without player or club are skipped with a warning.
 */
export const parseManualOverrides = (table: DataTable, source = "manual overrides") => {
	const missing = REQUIRED_OVERRIDE_COLUMNS.filter((column) => !hasColumn(table, column));
	if (missing.length) {
		throw new ManualOverrideSchemaError(source, [...missing]);
	}

	const overrides: ManualOverride[] = [];
	table.rows.forEach((row, index) => {
		const parsed = overrideRowSchema.safeParse(row);
		if (!parsed.success) {
			logger.warn(
				`Skipping override row ${index + 1}: ${parsed.error.issues
					.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
					.join("; ")}`,
			);
			return;
		}
		overrides.push({
			player: parsed.data.player,
			club: parsed.data.club,
			marketValueEur: parsed.data.market_value_eur,
		});
	});

	return overrides;
};

export const loadManualOverrides = (path: string | null): StepResult<ManualOverride[]> => {
	if (!path) {
		return { status: "skipped", value: [], reason: "no manual override file configured" };
	}
	if (!existsSync(path)) {
		return { status: "skipped", value: [], reason: `no manual override file at ${path}` };
	}

	const overrides = parseManualOverrides(readCsvTable(path), path);
	logger.info(`Loaded ${overrides.length} manual overrides from ${path}`);
	return { status: "applied", value: overrides };
};

const overrideKey = (player: string, club: string) =>
	`${collapseWhitespace(player)}|${collapseWhitespace(club)}`;

/**
 * Sets `market_value_eur` from overrides and records the value's origin in
 * `market_value_source` ("manual" | "matched" | null).
 */
export const applyManualOverrides = (
	table: DataTable,
	overrides: readonly ManualOverride[],
): DataTable => {
	const byKey = new Map<string, number>();
	for (const override of overrides) {
		if (override.marketValueEur === null) continue;
		byKey.set(overrideKey(override.player, override.club), override.marketValueEur);
	}

	const columns = [...table.columns];
	for (const column of ["market_value_eur", "market_value_source"]) {
		if (!columns.includes(column)) columns.push(column);
	}

	let applied = 0;
	const rows = table.rows.map((row) => {
		const player = getString(row, "player");
		const club = getString(row, "club");
		const manual = player && club ? byKey.get(overrideKey(player, club)) : undefined;
		if (manual !== undefined) {
			applied += 1;
			return { ...row, market_value_eur: manual, market_value_source: "manual" };
		}
		const matched = getNumber(row, "market_value_eur");
		return {
			...row,
			market_value_eur: matched,
			market_value_source: matched === null ? null : "matched",
		};
	});

	if (overrides.length) logger.info(`Applied ${applied}/${overrides.length} manual overrides`);
	return { columns, rows };
};
