/**
 * Role Impact Score
 *
 * Per row, for roles with a configured core weight set:
 *   reliability = clip(minutes / m1, 0, 1)          (missing minutes → 0)
 *   core        = Σ weight_i × pct_i                 over present core pcts
 *   bonus       = mean(pct_j)                        over the other configured pcts
 *   raw         = coreWeight × core + bonusWeight × bonus
 *   adjusted    = raw × reliability
 *
 * Roles without weights get null scores, not 0.
 */

import type { DataTable, Row } from "@player-impact/shared-types";
import {
	DEFAULT_BONUS_WEIGHT,
	DEFAULT_CORE_WEIGHT,
	DEFAULT_PERCENTILE_METRICS,
	DEFAULT_RELIABILITY_M1,
	DEFAULT_ROLE_CORE_WEIGHTS,
} from "../config/pipeline-config";
import { createLogger } from "../utils/logger";
import { clip, mean } from "../utils/numeric";
import { getNumber, getString } from "../utils/table";
import { percentileColumn } from "./percentiles";

const logger = createLogger("ImpactScore");

export const IMPACT_COLUMNS = [
	"reliability",
	"impact_core",
	"impact_bonus",
	"impact_raw",
	"impact_adj",
] as const;

const IMPACT_COLUMN_SET = new Set<string>(IMPACT_COLUMNS);

export type RoleCoreWeights = Record<string, Record<string, number>>;

export type ImpactOptions = {
	roleCoreWeights?: RoleCoreWeights;
	percentileMetrics?: readonly string[];
	coreWeight?: number;
	bonusWeight?: number;
	reliabilityM1?: number;
	roleColumn?: string;
};

export const reliabilityFactor = (minutes: number | null, m1 = DEFAULT_RELIABILITY_M1) =>
	clip((minutes ?? 0) / m1, 0, 1);

/**
 * Roles whose core weights do not sum to 1.0
 */
export const validateRoleWeights = (weights: RoleCoreWeights) => {
	const invalid = Object.entries(weights)
		.map(([role, set]) => ({
			role,
			total: Object.values(set).reduce((sum, value) => sum + value, 0),
		}))
		.filter(({ total }) => Math.abs(total - 1) > 1e-6);

	for (const { role, total } of invalid) {
		logger.warn(`Core weights for ${role} sum to ${total.toFixed(4)}, expected 1.0`);
	}
	return invalid;
};

type RoleScores = {
	core: number | null;
	bonus: number | null;
	raw: number | null;
};

const scoreRow = (
	row: Row,
	coreSet: Record<string, number>,
	bonusMetrics: string[],
	coreWeight: number,
	bonusWeight: number,
): RoleScores => {
	let core: number | null = null;
	for (const [metric, weight] of Object.entries(coreSet)) {
		const pct = getNumber(row, percentileColumn(metric));
		if (pct === null) continue;
		core = (core ?? 0) + weight * pct;
	}

	const bonusValues = bonusMetrics
		.map((metric) => getNumber(row, percentileColumn(metric)))
		.filter((value): value is number => value !== null);
	const bonus = mean(bonusValues);

	const raw = core === null || bonus === null ? null : coreWeight * core + bonusWeight * bonus;
	return { core, bonus, raw };
};

export const computeRoleImpacts = (
	table: DataTable,
	{
		roleCoreWeights = DEFAULT_ROLE_CORE_WEIGHTS,
		percentileMetrics = DEFAULT_PERCENTILE_METRICS,
		coreWeight = DEFAULT_CORE_WEIGHT,
		bonusWeight = DEFAULT_BONUS_WEIGHT,
		reliabilityM1 = DEFAULT_RELIABILITY_M1,
		roleColumn = "role",
	}: ImpactOptions = {},
): DataTable => {
	const coreByRole = new Map(Object.entries(roleCoreWeights));
	const bonusByRole = new Map<string, string[]>(
		Object.entries(roleCoreWeights).map(([role, coreSet]): [string, string[]] => [
			role,
			percentileMetrics.filter((metric) => !(metric in coreSet)),
		]),
	);

	const columns = [
		...table.columns.filter((column) => !IMPACT_COLUMN_SET.has(column)),
		...IMPACT_COLUMNS,
	];

	const rows = table.rows.map((row) => {
		const reliability = reliabilityFactor(getNumber(row, "minutes"), reliabilityM1);
		const role = getString(row, roleColumn);
		const coreSet = role === null ? undefined : coreByRole.get(role);
		const bonusMetrics = role === null ? undefined : bonusByRole.get(role);

		if (!coreSet || !bonusMetrics) {
			return {
				...row,
				reliability,
				impact_core: null,
				impact_bonus: null,
				impact_raw: null,
				impact_adj: null,
			};
		}

		const { core, bonus, raw } = scoreRow(row, coreSet, bonusMetrics, coreWeight, bonusWeight);
		return {
			...row,
			reliability,
			impact_core: core,
			impact_bonus: bonus,
			impact_raw: raw,
			impact_adj: raw === null ? null : raw * reliability,
		};
	});

	return { columns, rows };
};
