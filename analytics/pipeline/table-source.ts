import { existsSync } from "node:fs";
import { join } from "node:path";
import type { DataTable, StatCategory } from "@player-impact/shared-types";
import { readCsvTable } from "../utils/csv";

/**
 * Where raw category tables come from. Returns null when a table is absent.
 */
export interface RawTableSource {
	read(category: StatCategory, seasonId: string): DataTable | null;
}

export const rawTablePath = (rawDir: string, category: StatCategory, seasonId: string) =>
	join(rawDir, `${category}_${seasonId}.csv`);

export const createCsvTableSource = (rawDir: string): RawTableSource => ({
	read: (category, seasonId) => {
		const path = rawTablePath(rawDir, category, seasonId);
		return existsSync(path) ? readCsvTable(path) : null;
	},
});

/**
 * In-memory source keyed by `<category>_<seasonId>`
 */
export const createMemoryTableSource = (
	tables: Record<string, DataTable>,
): RawTableSource => {
	const byKey = new Map(Object.entries(tables));
	return {
		read: (category, seasonId) => byKey.get(`${category}_${seasonId}`) ?? null,
	};
};
