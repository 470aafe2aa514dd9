import { describe, expect, it } from "vitest";
import { createTable } from "../utils/table";
import { addValueEfficiency, makeWatchlist } from "./value-efficiency";

describe("addValueEfficiency", () => {
	const table = createTable(
		["player", "impact_adj", "market_value_eur"],
		[
			{ player: "A", impact_adj: 0.5, market_value_eur: Math.E - 1 },
			{ player: "B", impact_adj: 0.5, market_value_eur: 0 },
			{ player: "C", impact_adj: 0.5, market_value_eur: null },
			{ player: "D", impact_adj: null, market_value_eur: 1_000_000 },
		],
	);
	const out = addValueEfficiency(table);

	it("should divide impact by log market value", () => {
		expect(out.rows[0].mv_log).toBeCloseTo(1, 10);
		expect(out.rows[0].value_eff).toBeCloseTo(0.5, 10);
	});

	it("should give null for a zero log value or missing inputs", () => {
		expect(out.rows[1]).toMatchObject({ mv_log: 0, value_eff: null });
		expect(out.rows[2]).toMatchObject({ mv_log: null, value_eff: null });
		expect(out.rows[3].mv_log).toBeCloseTo(Math.log1p(1_000_000), 10);
		expect(out.rows[3].value_eff).toBeNull();
	});
});

describe("makeWatchlist", () => {
	const table = createTable(
		["player", "role", "value_eff"],
		[
			{ player: "A", role: "MF", value_eff: 0.02 },
			{ player: "B", role: "DF", value_eff: 0.01 },
			{ player: "C", role: "MF", value_eff: 0.05 },
			{ player: "D", role: "MF", value_eff: null },
			{ player: "E", role: null, value_eff: 0.09 },
			{ player: "F", role: "DF", value_eff: 0.03 },
			{ player: "G", role: "MF", value_eff: 0.04 },
		],
	);

	it("should take the top rows per role, roles sorted", () => {
		expect(makeWatchlist(table, "role", "value_eff", 2).rows.map((row) => row.player)).toEqual([
			"F",
			"B",
			"C",
			"G",
		]);
	});

	it("should keep twenty rows per role by default", () => {
		const crowded = createTable(
			["player", "role", "value_eff"],
			Array.from({ length: 25 }, (_, index) => ({
				player: `P${index}`,
				role: "FW",
				value_eff: index,
			})),
		);
		const rows = makeWatchlist(crowded, "role", "value_eff").rows;
		expect(rows).toHaveLength(20);
		expect(rows[0].player).toBe("P24");
		expect(rows[19].player).toBe("P5");
	});

	it("should return an empty table when the metric is absent", () => {
		expect(makeWatchlist(table, "role", "impact_adj").rows).toEqual([]);
	});
});
