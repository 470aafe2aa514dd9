/**
 * Pipeline Configuration
 *
 * All tunable values for a pipeline run. A config object is passed
 * explicitly to every stage so runs with different policies can coexist.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "../utils/errors";

// ============================================================================
// DEFAULTS
// ============================================================================

/** Rows under this many minutes get no per-90 rates */
export const DEFAULT_MIN_MINUTES = 300;

/** Minutes at which the reliability ramp reaches 1.0 */
export const DEFAULT_RELIABILITY_M1 = 900;

/** Minimum token-sort similarity (0-100) for a fuzzy match */
export const DEFAULT_FUZZY_MIN_SCORE = 92;

export const DEFAULT_CORE_WEIGHT = 0.85;
export const DEFAULT_BONUS_WEIGHT = 0.15;

/**
 * Per-90 metrics ranked within role; the impact bonus averages the ones
 * outside a role's core set.
 */
export const DEFAULT_PERCENTILE_METRICS = [
	"key_passes_per90",
	"prog_passes_per90",
	"shots_per90",
	"xg_per90",
	"interceptions_per90",
	"tackles_won_per90",
	"prog_carries_per90",
];

/**
 * Core weights per role, keyed by per-90 metric. Each set sums to 1.0.
 */
export const DEFAULT_ROLE_CORE_WEIGHTS: Record<string, Record<string, number>> = {
	MF: {
		prog_passes_per90: 0.3,
		prog_carries_per90: 0.25,
		key_passes_per90: 0.25,
		interceptions_per90: 0.2,
	},
	FW: {
		xg_per90: 0.35,
		shots_per90: 0.2,
		key_passes_per90: 0.2,
		prog_carries_per90: 0.25,
	},
	DF: {
		interceptions_per90: 0.35,
		tackles_won_per90: 0.25,
		prog_passes_per90: 0.25,
		prog_carries_per90: 0.15,
	},
};

export const DEFAULT_SEASONS: Record<string, string> = {
	live: "2025-2026",
	benchmark: "2024-2025",
};

// ============================================================================
// SCHEMA
// ============================================================================

const pathsSchema = z
	.object({
		rawDir: z.string().min(1).default("data/raw"),
		outDir: z.string().min(1).default("data/processed"),
		valuations: z.string().min(1).nullable().default(null),
		playerRegistry: z.string().min(1).nullable().default(null),
		manualOverrides: z.string().min(1).nullable().default(null),
	})
	.strict();

export const pipelineConfigSchema = z
	.object({
		clubMode: z.enum(["total", "club"]).default("total"),
		minMinutes: z.number().int().nonnegative().default(DEFAULT_MIN_MINUTES),
		applyMinutesFilter: z.boolean().default(true),
		reliabilityM1: z.number().int().positive().default(DEFAULT_RELIABILITY_M1),
		coreWeight: z.number().min(0).max(1).default(DEFAULT_CORE_WEIGHT),
		bonusWeight: z.number().min(0).max(1).default(DEFAULT_BONUS_WEIGHT),
		roleCoreWeights: z
			.record(z.string(), z.record(z.string(), z.number().nonnegative()))
			.default(DEFAULT_ROLE_CORE_WEIGHTS),
		percentileMetrics: z
			.array(z.string().min(1))
			.default(DEFAULT_PERCENTILE_METRICS),
		fuzzyMinScore: z
			.number()
			.int()
			.min(0)
			.max(100)
			.default(DEFAULT_FUZZY_MIN_SCORE),
		seasons: z
			.record(z.string(), z.string().min(1))
			.default(DEFAULT_SEASONS),
		valuationAsOf: z
			.string()
			.regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
			.nullable()
			.default(null),
		paths: pathsSchema.default({}),
	})
	.strict();

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

// ============================================================================
// LOADING
// ============================================================================

export const DEFAULT_CONFIG_PATH = "analytics/config/pipeline.config.json";

const formatIssues = (error: z.ZodError) =>
	error.issues
		.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
		.join("; ");

export const parsePipelineConfig = (input: unknown): PipelineConfig => {
	const parsed = pipelineConfigSchema.safeParse(input ?? {});
	if (!parsed.success) {
		throw new ConfigError(`Invalid pipeline config: ${formatIssues(parsed.error)}`);
	}
	return parsed.data;
};

export const createPipelineConfig = (overrides: PipelineConfigInput = {}) =>
	parsePipelineConfig(overrides);

/**
 * Read and validate a JSON config file. Relative data paths resolve
 * against the config file's directory.
 */
export const loadPipelineConfig = (path = DEFAULT_CONFIG_PATH): PipelineConfig => {
	const absolute = resolve(path);
	if (!existsSync(absolute)) {
		throw new ConfigError(`Config file not found: ${absolute}`);
	}

	let payload: unknown;
	try {
		payload = JSON.parse(readFileSync(absolute, "utf-8"));
	} catch (error) {
		throw new ConfigError(
			`Config file ${absolute} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
		);
	}

	const config = parsePipelineConfig(payload);
	const baseDir = dirname(absolute);
	const resolvePath = (value: string | null) =>
		value === null ? null : resolve(baseDir, value);

	return {
		...config,
		paths: {
			rawDir: resolve(baseDir, config.paths.rawDir),
			outDir: resolve(baseDir, config.paths.outDir),
			valuations: resolvePath(config.paths.valuations),
			playerRegistry: resolvePath(config.paths.playerRegistry),
			manualOverrides: resolvePath(config.paths.manualOverrides),
		},
	};
};

export const resolveSeasonId = (config: PipelineConfig, label: string) => {
	const seasonId = config.seasons[label];
	if (!seasonId) {
		throw new ConfigError(
			`Unknown season label "${label}". Configured: ${Object.keys(config.seasons).join(", ")}`,
		);
	}
	return seasonId;
};
