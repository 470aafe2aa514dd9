/**
 * Column Mapping Tables
 *
 * Declarative header harmonization: slugged source header → canonical name.
 * The common map applies to every category, then the category map.
 * Canonical names are never used as source names, which keeps renaming
 * idempotent.
 */

import type { StatCategory } from "@player-impact/shared-types";

export const STAT_CATEGORIES: readonly StatCategory[] = [
	"standard",
	"shooting",
	"passing",
	"possession",
	"defending",
] as const;

export const ENRICHMENT_CATEGORIES: readonly StatCategory[] = STAT_CATEGORIES.filter(
	(category) => category !== "standard",
);

export const STRING_COLUMNS = ["player", "club", "position"] as const;

export const COMMON_COLUMN_MAP: Record<string, string> = {
	squad: "club",
	team: "club",
	pos: "position",
	mp: "matches_played",
	min: "minutes",
	"90s": "nineties",
	gls: "goals",
	ast: "assists",
	xag: "xa",
};

export const CATEGORY_COLUMN_MAPS: Record<StatCategory, Record<string, string>> = {
	standard: {
		crdy: "yellow_cards",
		crdr: "red_cards",
		pkatt: "penalties_attempted",
	},
	shooting: {
		sh: "shots",
		sot: "shots_on_target",
		sot_pct: "shots_on_target_pct",
		g_sh: "goals_per_shot",
		g_sot: "goals_per_shot_on_target",
		dist: "avg_shot_dist",
		fk: "free_kick_shots",
	},
	passing: {
		kp: "key_passes",
		cmp: "passes_completed",
		att: "passes_attempted",
		cmp_pct: "pass_completion_pct",
		prgp: "prog_passes",
		prog: "prog_passes",
		"1_3": "passes_final_third",
		ppa: "passes_penalty_area",
	},
	possession: {
		prgc: "prog_carries",
		prog: "prog_carries",
		prgr: "prog_passes_received",
		succ: "take_ons_won",
		att: "take_ons_attempted",
		att_3rd: "touches_att_3rd",
		att_pen: "touches_att_pen",
	},
	defending: {
		tkl: "tackles",
		tklw: "tackles_won",
		tkl_w: "tackles_won",
		int: "interceptions",
		clr: "clearances",
		err: "errors",
		press: "pressures",
	},
};

export const COMMON_NUMERIC_COLUMNS = [
	"age",
	"born",
	"matches_played",
	"starts",
	"minutes",
	"nineties",
	"goals",
	"assists",
	"xg",
	"npxg",
	"xa",
	"blocks",
	"pressures",
];

export const numericColumnsFor = (category: StatCategory) => [
	...new Set([
		...COMMON_NUMERIC_COLUMNS,
		...Object.values(CATEGORY_COLUMN_MAPS[category]),
	]),
];

/**
 * Raw counts that get a `<metric>_per90` column, per category
 */
export const PER90_METRICS: Record<StatCategory, string[]> = {
	standard: ["goals", "assists", "xg", "xa"],
	shooting: ["shots", "shots_on_target"],
	passing: ["key_passes", "prog_passes"],
	possession: ["prog_carries", "take_ons_won"],
	defending: ["tackles", "tackles_won", "interceptions", "blocks", "pressures"],
};

export const ALL_PER90_METRICS = STAT_CATEGORIES.flatMap(
	(category) => PER90_METRICS[category],
);

/**
 * Columns each category contributes to the analytic table
 */
export const CATEGORY_KEEP_COLUMNS: Record<StatCategory, string[]> = {
	standard: [
		"player",
		"position",
		"club",
		"nation",
		"age",
		"born",
		"matches_played",
		"starts",
		"minutes",
		"nineties",
		"goals",
		"assists",
		"xg",
		"npxg",
		"xa",
	],
	shooting: [
		"player",
		"club",
		"minutes",
		"nineties",
		"shots",
		"shots_on_target",
		"goals_per_shot",
		"goals_per_shot_on_target",
		"avg_shot_dist",
	],
	passing: [
		"player",
		"club",
		"minutes",
		"nineties",
		"key_passes",
		"prog_passes",
		"passes_completed",
		"passes_attempted",
		"pass_completion_pct",
	],
	possession: [
		"player",
		"club",
		"minutes",
		"nineties",
		"prog_carries",
		"touches_att_3rd",
		"take_ons_won",
		"take_ons_attempted",
	],
	defending: [
		"player",
		"club",
		"minutes",
		"nineties",
		"tackles",
		"tackles_won",
		"interceptions",
		"blocks",
		"pressures",
		"clearances",
		"errors",
	],
};
