/**
 * Season build
 *
 * raw category tables → normalize → resolve clubs → join onto standard
 * → per-90 → minutes filter → roles → percentiles → impact
 */

import type { DataTable, StatCategory, StepResult } from "@player-impact/shared-types";
import {
	ALL_PER90_METRICS,
	CATEGORY_KEEP_COLUMNS,
	ENRICHMENT_CATEGORIES,
} from "../config/columns";
import { type PipelineConfig, resolveSeasonId } from "../config/pipeline-config";
import {
	type AnalyticBuild,
	type NamedTable,
	attachMinutesFromStandard,
	buildAnalyticTable,
} from "../data-acquisition/join-engine";
import { countIdentityDuplicates, resolveMultiClub } from "../data-acquisition/multi-club-resolver";
import { normalizeTable } from "../data-acquisition/schema-normalizer";
import { computeRoleImpacts, validateRoleWeights } from "../feature-engineering/impact-score";
import { addPer90, filterByMinutes } from "../feature-engineering/per90";
import { addRolePercentiles, assignRoles } from "../feature-engineering/percentiles";
import { RawTableMissingError, describeError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { concatTables, dropColumns, hasColumn, selectColumns, withColumn } from "../utils/table";
import type { RawTableSource } from "./table-source";

const logger = createLogger("SeasonBuild");

const EXPOSURE_COLUMNS = ["minutes", "nineties"];

export type SeasonBuild = {
	label: string;
	seasonId: string;
	table: DataTable;
	loads: Array<StepResult<DataTable | null> & { name: StatCategory }>;
	minutes: Array<StepResult<DataTable> & { name: StatCategory }>;
	joins: AnalyticBuild["steps"];
};

/**
 * One category table in canonical, club-resolved form. Enrichment tables
 * borrow minutes from `standard` (normalized, not yet resolved) so the
 * resolver can tie-break on them.
 */
export const prepareCategoryTable = (
	raw: DataTable,
	category: StatCategory,
	seasonId: string,
	config: PipelineConfig,
	standard: DataTable | null = null,
) => {
	let table = normalizeTable(raw, category);
	let minutes: StepResult<DataTable> | null = null;
	if (category !== "standard") {
		minutes = attachMinutesFromStandard(table, standard, category);
		table = minutes.value;
	}

	const resolved = resolveMultiClub(table, config.clubMode);
	if (config.clubMode === "total") {
		const duplicates = countIdentityDuplicates(resolved);
		if (duplicates.length) {
			logger.warn(`${category} ${seasonId}: ${duplicates.length} players still repeated`);
		}
	}

	return {
		table: selectColumns(resolved, CATEGORY_KEEP_COLUMNS[category]),
		minutes,
	};
};

export const buildCategoryTable = (
	source: RawTableSource,
	category: StatCategory,
	seasonId: string,
	config: PipelineConfig,
	standard: DataTable | null = null,
) => {
	const raw = source.read(category, seasonId);
	return raw ? prepareCategoryTable(raw, category, seasonId, config, standard) : null;
};

export const buildSeason = (
	label: string,
	config: PipelineConfig,
	source: RawTableSource,
): SeasonBuild => {
	const seasonId = resolveSeasonId(config, label);
	logger.info(`Building ${label} season (${seasonId})`);

	const rawStandard = source.read("standard", seasonId);
	if (!rawStandard) throw new RawTableMissingError("standard", seasonId);
	// normalizing twice is a no-op, so the resolved standard can start from this
	const normalizedStandard = normalizeTable(rawStandard, "standard");
	const standard = prepareCategoryTable(normalizedStandard, "standard", seasonId, config);

	const enrichments: NamedTable[] = [];
	const loads: SeasonBuild["loads"] = [];
	const minutes: SeasonBuild["minutes"] = [];
	for (const category of ENRICHMENT_CATEGORIES) {
		let built: ReturnType<typeof buildCategoryTable>;
		try {
			built = buildCategoryTable(source, category, seasonId, config, normalizedStandard);
		} catch (error) {
			logger.error(`${category} ${seasonId}: could not load, skipping`, error);
			loads.push({
				name: category,
				status: "failed",
				value: null,
				reason: `${category}: ${describeError(error)}`,
			});
			continue;
		}
		if (!built) {
			logger.warn(`No ${category} table for ${seasonId}, skipping`);
			loads.push({
				name: category,
				status: "skipped",
				value: null,
				reason: `${category}: no raw table`,
			});
			continue;
		}
		loads.push({
			name: category,
			status: "applied",
			value: built.table,
			detail: `${category}: ${built.table.rows.length} rows`,
		});
		if (built.minutes) minutes.push({ ...built.minutes, name: category });

		const shared = EXPOSURE_COLUMNS.filter((column) => hasColumn(standard.table, column));
		enrichments.push({ name: category, table: dropColumns(built.table, shared) });
	}

	const joined = buildAnalyticTable(standard.table, enrichments);

	let table = addPer90(joined.table, ALL_PER90_METRICS, { minMinutes: config.minMinutes });
	if (config.applyMinutesFilter) {
		const before = table.rows.length;
		table = filterByMinutes(table, config.minMinutes);
		logger.info(`Minutes filter (>= ${config.minMinutes}): ${before} → ${table.rows.length} rows`);
	}

	table = assignRoles(table);
	table = addRolePercentiles(table, config.percentileMetrics);
	validateRoleWeights(config.roleCoreWeights);
	table = computeRoleImpacts(table, {
		roleCoreWeights: config.roleCoreWeights,
		percentileMetrics: config.percentileMetrics,
		coreWeight: config.coreWeight,
		bonusWeight: config.bonusWeight,
		reliabilityM1: config.reliabilityM1,
	});

	logger.success(`${label} season: ${table.rows.length} players, ${table.columns.length} columns`);
	return { label, seasonId, table, loads, minutes, joins: joined.steps };
};

export type FailedSeason = {
	label: string;
	reason: string;
};

/**
 * Every requested season stacked with a leading `season` column. A season
 * without its standard table is reported in `failed` and left out.
 */
export const buildCombined = (
	config: PipelineConfig,
	source: RawTableSource,
	labels: string[] = Object.keys(config.seasons),
) => {
	const seasons: SeasonBuild[] = [];
	const failed: FailedSeason[] = [];
	for (const label of labels) {
		try {
			seasons.push(buildSeason(label, config, source));
		} catch (error) {
			if (!(error instanceof RawTableMissingError)) throw error;
			logger.error(`${label} season skipped: ${error.message}`);
			failed.push({ label, reason: error.message });
		}
	}
	const tagged = seasons.map(({ seasonId, table }) => {
		const withSeason = withColumn(table, "season", () => seasonId);
		return selectColumns(withSeason, [
			"season",
			...table.columns.filter((column) => column !== "season"),
		]);
	});
	return { seasons, failed, table: concatTables(tagged) };
};
