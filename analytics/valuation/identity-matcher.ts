/**
 * Identity Matcher
 *
 * Links source players to valuation records by name:
 * 1. blank name → unmatched_empty (the scorer is never called)
 * 2. exact normalized name → exact
 * 3. best token-sort similarity over all target names; accepted when the
 *    unrounded score >= minScore as fuzzy:<score>, otherwise
 *    unmatched_best_<score>. Labels and the audit carry the rounded score.
 *
 * Several targets sharing a name are split by birth year when the source
 * has a `born` column; otherwise the row is ambiguous:<n> and left unvalued.
 * Every source row gets an audit line, matched or not.
 */

import type {
	DataTable,
	IdentityMatch,
	MatchAuditRow,
	MatchAuditStatus,
	MatchTier,
	Row,
	ValuationRecord,
} from "@player-impact/shared-types";
import { DEFAULT_FUZZY_MIN_SCORE } from "../config/pipeline-config";
import { createLogger } from "../utils/logger";
import { createTable, getNumber, getString } from "../utils/table";
import { extractBest, tokenSortRatio } from "./fuzzy-matching";
import { normalizePersonName } from "./name-normalizer";

const logger = createLogger("IdentityMatcher");

export const MATCH_COLUMNS = [
	"player_id",
	"tm_name",
	"dob",
	"market_value_eur",
	"value_date",
	"match_type",
	"match_confidence",
] as const;

const MATCH_COLUMN_SET = new Set<string>(MATCH_COLUMNS);

export const AUDIT_COLUMNS = ["player", "status", "best", "score"] as const;

export type MatchOptions = {
	minScore?: number;
	playerColumn?: string;
	birthYearColumn?: string;
	scorer?: (a: string, b: string) => number;
};

export type MatchRun = {
	table: DataTable;
	audit: DataTable;
	matches: IdentityMatch[];
};

export const formatMatchTier = (tier: MatchTier) => {
	switch (tier.kind) {
		case "exact":
			return "exact";
		case "fuzzy":
			return `fuzzy:${tier.score}`;
		case "unmatched":
			return tier.bestScore === null ? "unmatched" : `unmatched_best_${tier.bestScore}`;
		case "unmatched_empty":
			return "unmatched_empty";
		case "ambiguous":
			return `ambiguous:${tier.candidates}`;
	}
};

const auditStatus = (tier: MatchTier): MatchAuditStatus => {
	switch (tier.kind) {
		case "exact":
			return "exact";
		case "fuzzy":
			return "fuzzy_matched";
		case "unmatched":
			return "unmatched_low_score";
		case "unmatched_empty":
			return "unmatched_empty";
		case "ambiguous":
			return "ambiguous";
	}
};

const birthYear = (dateOfBirth: string | null) =>
	dateOfBirth ? Number(dateOfBirth.slice(0, 4)) : null;

type Resolution =
	| { kind: "single"; record: ValuationRecord }
	| { kind: "ambiguous"; records: ValuationRecord[] };

const resolveCandidates = (
	candidates: ValuationRecord[],
	sourceBirthYear: number | null,
): Resolution => {
	if (candidates.length === 1) return { kind: "single", record: candidates[0] };
	if (sourceBirthYear !== null) {
		const sameYear = candidates.filter(
			(candidate) => birthYear(candidate.dateOfBirth) === sourceBirthYear,
		);
		if (sameYear.length === 1) return { kind: "single", record: sameYear[0] };
		if (sameYear.length > 1) return { kind: "ambiguous", records: sameYear };
	}
	return { kind: "ambiguous", records: candidates };
};

const buildMatch = (
	sourceIndex: number,
	player: string,
	resolution: Resolution,
	score: number,
	single: MatchTier,
): IdentityMatch => {
	if (resolution.kind === "single") {
		return {
			sourceIndex,
			player,
			tier: single,
			confidence: score / 100,
			target: resolution.record,
			bestCandidate: resolution.record.name,
			score,
		};
	}
	const count = resolution.records.length;
	return {
		sourceIndex,
		player,
		tier: { kind: "ambiguous", candidates: count },
		confidence: score / 100 / count,
		target: null,
		bestCandidate: resolution.records.map((record) => record.name).join(" | "),
		score,
	};
};

export const matchRow = (
	row: Row,
	sourceIndex: number,
	byName: Map<string, ValuationRecord[]>,
	choices: readonly string[],
	{
		minScore = DEFAULT_FUZZY_MIN_SCORE,
		playerColumn = "player",
		birthYearColumn = "born",
		scorer = tokenSortRatio,
	}: MatchOptions = {},
): IdentityMatch => {
	const player = getString(row, playerColumn) ?? "";
	const query = normalizePersonName(player);
	const sourceBirthYear = getNumber(row, birthYearColumn);

	if (!query) {
		return {
			sourceIndex,
			player,
			tier: { kind: "unmatched_empty" },
			confidence: 0,
			target: null,
			bestCandidate: null,
			score: null,
		};
	}

	const exact = byName.get(query);
	if (exact) {
		return buildMatch(sourceIndex, player, resolveCandidates(exact, sourceBirthYear), 100, {
			kind: "exact",
		});
	}

	const best = extractBest(query, choices, scorer);
	const candidates = best ? byName.get(best.choice) : undefined;
	if (!best || !candidates) {
		return {
			sourceIndex,
			player,
			tier: { kind: "unmatched", bestScore: null },
			confidence: 0,
			target: null,
			bestCandidate: null,
			score: null,
		};
	}

	const score = Math.round(best.score);
	if (best.score < minScore) {
		return {
			sourceIndex,
			player,
			tier: { kind: "unmatched", bestScore: score },
			confidence: 0,
			target: null,
			bestCandidate: candidates[0].name,
			score,
		};
	}

	return buildMatch(
		sourceIndex,
		player,
		resolveCandidates(candidates, sourceBirthYear),
		score,
		{ kind: "fuzzy", score },
	);
};

export const indexTargets = (targets: readonly ValuationRecord[]) => {
	const byName = new Map<string, ValuationRecord[]>();
	for (const target of targets) {
		if (!target.nameNorm) continue;
		const existing = byName.get(target.nameNorm);
		if (existing) existing.push(target);
		else byName.set(target.nameNorm, [target]);
	}
	return { byName, choices: [...byName.keys()] };
};

export const toAuditRow = (match: IdentityMatch): MatchAuditRow => ({
	player: match.player,
	status: auditStatus(match.tier),
	best: match.bestCandidate,
	score: match.score,
});

export const matchPlayers = (
	source: DataTable,
	targets: readonly ValuationRecord[],
	options: MatchOptions = {},
): MatchRun => {
	const { byName, choices } = indexTargets(targets);
	const matches = source.rows.map((row, index) =>
		matchRow(row, index, byName, choices, options),
	);

	const columns = [
		...source.columns.filter((column) => !MATCH_COLUMN_SET.has(column)),
		...MATCH_COLUMNS,
	];
	const rows = source.rows.map((row, index) => {
		const match = matches[index];
		const target = match.target;
		return {
			...row,
			player_id: target?.playerId ?? null,
			tm_name: target?.name ?? null,
			dob: target?.dateOfBirth ?? null,
			market_value_eur: target?.marketValueEur ?? null,
			value_date: target?.valueDate ?? null,
			match_type: formatMatchTier(match.tier),
			match_confidence: match.confidence,
		};
	});

	const auditRows = matches.map(toAuditRow);
	const summary = new Map<MatchAuditStatus, number>();
	for (const row of auditRows) summary.set(row.status, (summary.get(row.status) ?? 0) + 1);
	logger.info(
		`Matched ${source.rows.length} players: ${[...summary.entries()]
			.map(([status, count]) => `${status}=${count}`)
			.join(", ")}`,
	);

	return {
		table: createTable(columns, rows),
		audit: createTable(
			[...AUDIT_COLUMNS],
			auditRows.map(({ player, status, best, score }) => ({ player, status, best, score })),
		),
		matches,
	};
};
