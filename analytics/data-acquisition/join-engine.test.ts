import type { Cell, DataTable } from "@player-impact/shared-types";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createTable } from "../utils/table";
import {
	attachMinutesFromStandard,
	buildAnalyticTable,
	chooseJoinKeys,
	coalesceSuffixColumns,
	leftJoin,
} from "./join-engine";

const standard = createTable(
	["player", "club", "minutes", "goals"],
	[
		{ player: "José Álvarez", club: "Valencia", minutes: 1800, goals: 6 },
		{ player: "Min-jun Lee", club: "Porto", minutes: 900, goals: 2 },
		{ player: "Ana Ruiz", club: "Sevilla", minutes: 450, goals: 0 },
	],
);

const shooting = createTable(
	["player", "club", "shots", "goals"],
	[
		{ player: "Jose Alvarez", club: "Valencia", shots: 40, goals: 99 },
		{ player: "Jose Alvarez", club: "Valencia", shots: 12, goals: 99 },
		{ player: "Min-jun Lee", club: "Porto", shots: 18, goals: 99 },
		{ player: "Someone Else", club: "Porto", shots: 5, goals: 1 },
	],
);

const unreadable: DataTable = {
	columns: ["player", "club", "key_passes"],
	rows: [
		{
			get player(): Cell {
				throw new Error("unreadable row");
			},
			club: "Porto",
			key_passes: 3,
		},
	],
};

describe("chooseJoinKeys", () => {
	it("should prefer player and club", () => {
		expect(chooseJoinKeys(standard, shooting)).toEqual(["player", "club"]);
	});

	it("should fall back to player only", () => {
		const noClub = createTable(["player", "shots"]);
		expect(chooseJoinKeys(standard, noClub)).toEqual(["player"]);
	});

	it("should return null without a shared player column", () => {
		expect(chooseJoinKeys(standard, createTable(["club"]))).toBeNull();
	});
});

describe("leftJoin", () => {
	beforeEach(() => {
		vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("should keep every base row in order", () => {
		const result = leftJoin(standard, shooting, "shooting");
		expect(result.status).toBe("applied");
		expect(result.value.table.rows.map((row) => row.player)).toEqual([
			"José Álvarez",
			"Min-jun Lee",
			"Ana Ruiz",
		]);
	});

	it("should take the first enrichment row per normalized key", () => {
		const result = leftJoin(standard, shooting, "shooting");
		expect(result.value.table.rows.map((row) => row.shots)).toEqual([40, 18, null]);
	});

	it("should keep base values for colliding columns and report them", () => {
		const result = leftJoin(standard, shooting, "shooting");
		expect(result.value.droppedColumns).toEqual(["goals"]);
		expect(result.value.addedColumns).toEqual(["shots"]);
		expect(result.value.table.columns).toEqual(["player", "club", "minutes", "goals", "shots"]);
		expect(result.value.table.rows[0].goals).toBe(6);
		expect(console.warn).toHaveBeenCalledWith(
			"⚠️ [JoinEngine] shooting: base values kept for goals; enrichment values discarded",
		);
	});

	it("should describe the applied join", () => {
		const result = leftJoin(standard, shooting, "shooting");
		expect(result.status === "applied" ? result.detail : null).toBe(
			"shooting: +1 cols on player+club",
		);
	});

	it("should fail and keep the base table when a row cannot be read", () => {
		vi.spyOn(console, "error").mockImplementation(() => {});
		const result = leftJoin(standard, unreadable, "passing");
		expect(result.status).toBe("failed");
		expect(result.status === "failed" ? result.reason : null).toBe("passing: unreadable row");
		expect(result.value.table).toEqual(standard);
		expect(result.value.addedColumns).toEqual([]);
	});

	it("should skip when there is nothing to join on", () => {
		const result = leftJoin(standard, createTable(["club", "shots"]), "shooting");
		expect(result.status).toBe("skipped");
		expect(result.value.table).toEqual(standard);
	});
});

describe("coalesceSuffixColumns", () => {
	it("should fold _x and _y into the root", () => {
		const table = createTable(
			["player", "xg_x", "xg_y", "goals"],
			[
				{ player: "A", xg_x: null, xg_y: 1.2, goals: 1 },
				{ player: "B", xg_x: 0.5, xg_y: 0.9, goals: 0 },
			],
		);
		const coalesced = coalesceSuffixColumns(table);
		expect(coalesced.columns).toEqual(["player", "xg", "goals"]);
		expect(coalesced.rows.map((row) => row.xg)).toEqual([1.2, 0.5]);
	});

	it("should keep an existing root and drop the suffixed copies", () => {
		const table = createTable(["xg", "xg_x"], [{ xg: 2, xg_x: 3 }]);
		expect(coalesceSuffixColumns(table)).toEqual({ columns: ["xg"], rows: [{ xg: 2 }] });
	});
});

describe("attachMinutesFromStandard", () => {
	beforeEach(() => {
		vi.spyOn(console, "error").mockImplementation(() => {});
		vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("should copy minutes onto an enrichment table", () => {
		const passing = createTable(["player", "club", "key_passes"], [
			{ player: "Min-jun Lee", club: "Porto", key_passes: 14 },
		]);
		const result = attachMinutesFromStandard(passing, standard, "passing");
		expect(result.status).toBe("applied");
		expect(result.value.columns).toEqual(["player", "club", "key_passes", "minutes"]);
		expect(result.value.rows[0].minutes).toBe(900);
	});

	it("should skip without a standard table", () => {
		const passing = createTable(["player", "key_passes"]);
		expect(attachMinutesFromStandard(passing, null).status).toBe("skipped");
	});

	it("should fail and return the table unchanged when the join fails", () => {
		const result = attachMinutesFromStandard(unreadable, standard, "passing");
		expect(result.status).toBe("failed");
		expect(result.status === "failed" ? result.reason : null).toBe(
			"passing minutes: unreadable row",
		);
		expect(result.value).toBe(unreadable);
	});

	it("should skip when minutes are already present", () => {
		const passing = createTable(["player", "club", "minutes"]);
		const result = attachMinutesFromStandard(passing, standard, "passing");
		expect(result.status === "skipped" ? result.reason : null).toBe(
			"passing: minutes already present",
		);
	});
});

describe("buildAnalyticTable", () => {
	beforeEach(() => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("should join enrichments in order and skip empty tables", () => {
		const { table, steps } = buildAnalyticTable(standard, [
			{ name: "shooting", table: shooting },
			{ name: "defending", table: createTable(["player", "club", "tackles"]) },
		]);
		expect(table.rows).toHaveLength(3);
		expect(steps.map((step) => [step.name, step.status])).toEqual([
			["shooting", "applied"],
			["defending", "skipped"],
		]);
	});
});
