import { existsSync } from "node:fs";
import { join } from "node:path";
import type { DataTable } from "@player-impact/shared-types";
import type { PipelineConfig } from "../config/pipeline-config";
import { readCsvTable, writeCsvTable } from "../utils/csv";
import { createLogger } from "../utils/logger";
import { loadManualOverrides } from "../valuation/manual-overrides";
import { makeWatchlist } from "../valuation/value-efficiency";
import { type FailedSeason, buildCombined } from "./build-season";
import { type RawTableSource, createCsvTableSource } from "./table-source";
import { type ValuationInputs, attachMarketValues } from "./valuation-step";

const logger = createLogger("Pipeline");

export type PipelineIo = {
	source?: RawTableSource;
	outDir?: string;
	labels?: string[];
	writeTable?: (path: string, table: DataTable) => void;
};

export type PipelineSummary = {
	seasons: Array<{ label: string; seasonId: string; rows: number }>;
	failedSeasons: FailedSeason[];
	written: string[];
};

const loadValuationInputs = (config: PipelineConfig): ValuationInputs | null => {
	const { valuations, playerRegistry, manualOverrides } = config.paths;
	if (!valuations || !playerRegistry) {
		logger.info("Valuation inputs not configured, skipping market values");
		return null;
	}
	for (const path of [valuations, playerRegistry]) {
		if (!existsSync(path)) {
			logger.warn(`Valuation input missing at ${path}, skipping market values`);
			return null;
		}
	}

	const overrides = loadManualOverrides(manualOverrides);
	if (overrides.status === "skipped") logger.info(overrides.reason);

	return {
		valuations: readCsvTable(valuations),
		registry: readCsvTable(playerRegistry),
		overrides: overrides.value,
	};
};

export const runPipeline = (config: PipelineConfig, io: PipelineIo = {}): PipelineSummary => {
	const source = io.source ?? createCsvTableSource(config.paths.rawDir);
	const outDir = io.outDir ?? config.paths.outDir;
	const writeTable = io.writeTable ?? writeCsvTable;
	const written: string[] = [];

	const write = (name: string, table: DataTable) => {
		const path = join(outDir, name);
		writeTable(path, table);
		written.push(path);
		logger.info(`📁 ${path} (${table.rows.length} rows)`);
	};

	const combined = buildCombined(config, source, io.labels);
	for (const season of combined.seasons) {
		write(`players_analytic_${season.seasonId}.csv`, season.table);
	}
	write("players_analytic_combined.csv", combined.table);

	const inputs = loadValuationInputs(config);
	if (inputs) {
		for (const season of combined.seasons) {
			const valued = attachMarketValues(season.table, inputs, config);
			write(`players_valued_${season.seasonId}.csv`, valued.table);
			write(`match_audit_${season.seasonId}.csv`, valued.audit);
			write(`watchlist_${season.seasonId}.csv`, makeWatchlist(valued.table, "role", "value_eff"));
		}
	}

	if (combined.failed.length) {
		logger.warn(
			`Pipeline finished with ${combined.failed.length} seasons skipped: ${combined.failed
				.map(({ label }) => label)
				.join(", ")}`,
		);
	} else {
		logger.success(`Pipeline finished: ${written.length} files written`);
	}
	return {
		seasons: combined.seasons.map(({ label, seasonId, table }) => ({
			label,
			seasonId,
			rows: table.rows.length,
		})),
		failedSeasons: combined.failed,
		written,
	};
};
