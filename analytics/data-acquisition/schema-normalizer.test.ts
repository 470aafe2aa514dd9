import { describe, expect, it } from "vitest";
import { createTable } from "../utils/table";
import {
	isNonPlayerRow,
	normalizeTable,
	planRenames,
	slugHeader,
} from "./schema-normalizer";

const RAW_COLUMNS = [
	"Rk",
	"Player",
	"Nation",
	"Pos",
	"Squad",
	"Age",
	"Born",
	"MP",
	"Min",
	"90s",
	"Gls",
	"Ast",
	"xG",
	"xAG",
];

const rawRow = (values: string[]) =>
	Object.fromEntries(RAW_COLUMNS.map((column, idx) => [column, values[idx] ?? null]));

const rawStandard = createTable(RAW_COLUMNS, [
	rawRow(["1", "Alice  Smith", "eng ENG", "MF", "Arsenal", "24-123", "2000", "20", "1,234", "13.7", "4", "2", "3.1", "1.9"]),
	rawRow(RAW_COLUMNS),
	rawRow(["", "Squad Total", "", "", "Arsenal", "", "", "", "9,900", "110", "40", "30", "", ""]),
	rawRow(["2", "", "", "DF", "Arsenal", "", "", "", "90", "1", "", "", "", ""]),
	rawRow(["3", "Opponent Total", "", "", "vs Arsenal", "", "", "", "9,900", "110", "", "", "", ""]),
	rawRow(["4", "Bob Jones", "fr FRA", "FW", "Total", "27", "1997", "30", "2,100", "23.3", "9", "n/a", "8.0", "2.0"]),
]);

describe("slugHeader", () => {
	it("should slug punctuation-heavy headers", () => {
		expect(slugHeader("Cmp%")).toBe("cmp_pct");
		expect(slugHeader("G/Sh")).toBe("g_sh");
		expect(slugHeader("Tkl+Int")).toBe("tkl_plus_int");
		expect(slugHeader(" 90s ")).toBe("90s");
	});
});

describe("planRenames", () => {
	it("should let the first source claim a target", () => {
		expect(planRenames(["squad", "team"], "standard")).toEqual({ squad: "club" });
		expect(planRenames(["prgp", "prog"], "passing")).toEqual({ prgp: "prog_passes" });
	});

	it("should apply category-specific maps", () => {
		expect(planRenames(["att"], "passing")).toEqual({ att: "passes_attempted" });
		expect(planRenames(["att"], "possession")).toEqual({ att: "take_ons_attempted" });
	});

	it("should not rename onto a canonical column that already exists", () => {
		expect(planRenames(["min", "minutes"], "standard")).toEqual({});
	});
});

describe("isNonPlayerRow", () => {
	it("should keep a player's own multi-club total", () => {
		expect(isNonPlayerRow({ player: "Bob Jones", club: "Total" })).toBe(false);
	});

	it("should flag squad, opponent and blank rows", () => {
		expect(isNonPlayerRow({ player: "Squad Total", club: "Arsenal" })).toBe(true);
		expect(isNonPlayerRow({ player: "Opponents", club: null })).toBe(true);
		expect(isNonPlayerRow({ player: "Alice", club: "vs Arsenal" })).toBe(true);
		expect(isNonPlayerRow({ player: "  ", club: "Arsenal" })).toBe(true);
	});
});

describe("normalizeTable", () => {
	const normalized = normalizeTable(rawStandard, "standard");

	it("should rename headers to canonical names", () => {
		expect(normalized.columns).toEqual([
			"rk",
			"player",
			"nation",
			"position",
			"club",
			"age",
			"born",
			"matches_played",
			"minutes",
			"nineties",
			"goals",
			"assists",
			"xg",
			"xa",
		]);
	});

	it("should drop header repeats and aggregate rows but keep player totals", () => {
		expect(normalized.rows.map((row) => row.player)).toEqual(["Alice Smith", "Bob Jones"]);
	});

	it("should coerce numbers and clean identity strings", () => {
		expect(normalized.rows[0]).toEqual({
			rk: "1",
			player: "Alice Smith",
			nation: "eng ENG",
			position: "MF",
			club: "Arsenal",
			age: 24,
			born: 2000,
			matches_played: 20,
			minutes: 1234,
			nineties: 13.7,
			goals: 4,
			assists: 2,
			xg: 3.1,
			xa: 1.9,
		});
		expect(normalized.rows[1].assists).toBeNull();
	});

	it("should be idempotent", () => {
		expect(normalizeTable(normalized, "standard")).toEqual(normalized);
	});

	it("should leave absent source columns absent", () => {
		const minimal = normalizeTable(
			createTable(["Player", "Squad"], [{ Player: "Cara", Squad: "Porto" }]),
			"defending",
		);
		expect(minimal.columns).toEqual(["player", "club"]);
	});
});
