import { describe, expect, it } from "vitest";
import { createTable } from "../utils/table";
import { countIdentityDuplicates, isAggregateClubRow, resolveMultiClub } from "./multi-club-resolver";

const transferSeason = createTable(
	["player", "club", "minutes"],
	[
		{ player: "Jonas Schmidt", club: "Bayern", minutes: 800 },
		{ player: "Min-jun Lee", club: "Porto", minutes: 1500 },
		{ player: "Jonas Schmidt", club: "Dortmund", minutes: 1000 },
		{ player: "Jonas Schmidt", club: "Total", minutes: 1800 },
	],
);

describe("isAggregateClubRow", () => {
	it("should detect Total in the club cell", () => {
		expect(isAggregateClubRow({ club: "Total" })).toBe(true);
		expect(isAggregateClubRow({ club: "2 Clubs (Total)" })).toBe(true);
		expect(isAggregateClubRow({ club: "Tottenham" })).toBe(false);
	});
});

describe("resolveMultiClub (total mode)", () => {
	it("should keep the Total row for a player with one", () => {
		const resolved = resolveMultiClub(transferSeason, "total");
		expect(resolved.rows).toEqual([
			{ player: "Jonas Schmidt", club: "Total", minutes: 1800 },
			{ player: "Min-jun Lee", club: "Porto", minutes: 1500 },
		]);
		expect(countIdentityDuplicates(resolved)).toEqual([]);
	});

	it("should prefer the Total row over a club row with more minutes", () => {
		const table = createTable(
			["player", "club", "minutes"],
			[
				{ player: "Jonas Schmidt", club: "Club A", minutes: 1200 },
				{ player: "Jonas Schmidt", club: "Club B (Total)", minutes: 600 },
			],
		);
		expect(resolveMultiClub(table, "total").rows).toEqual([
			{ player: "Jonas Schmidt", club: "Club B (Total)", minutes: 600 },
		]);
	});

	it("should fall back to the row with the most minutes", () => {
		const table = createTable(
			["player", "club", "minutes"],
			[
				{ player: "Ana Ruiz", club: "Sevilla", minutes: 500 },
				{ player: "Ana Ruiz", club: "Betis", minutes: null },
				{ player: "Ana Ruiz", club: "Getafe", minutes: 700 },
			],
		);
		expect(resolveMultiClub(table, "total").rows).toEqual([
			{ player: "Ana Ruiz", club: "Getafe", minutes: 700 },
		]);
	});

	it("should keep the earlier row on a minutes tie", () => {
		const table = createTable(
			["player", "club", "minutes"],
			[
				{ player: "Ana Ruiz", club: "Sevilla", minutes: 700 },
				{ player: "Ana Ruiz", club: "Getafe", minutes: 700 },
			],
		);
		expect(resolveMultiClub(table, "total").rows[0].club).toBe("Sevilla");
	});

	it("should use the first occurrence without a minutes column", () => {
		const table = createTable(
			["player", "club"],
			[
				{ player: "José Álvarez", club: "Valencia" },
				{ player: "Jose Alvarez", club: "Villarreal" },
			],
		);
		expect(resolveMultiClub(table, "total").rows).toEqual([
			{ player: "José Álvarez", club: "Valencia" },
		]);
	});

	it("should return the table unchanged without a player column", () => {
		const table = createTable(["club"], [{ club: "Porto" }, { club: "Porto" }]);
		expect(resolveMultiClub(table, "total")).toEqual(table);
	});
});

describe("resolveMultiClub (club mode)", () => {
	it("should drop aggregate rows and keep every club row", () => {
		const resolved = resolveMultiClub(transferSeason, "club");
		expect(resolved.rows.map((row) => row.club)).toEqual(["Bayern", "Porto", "Dortmund"]);
		expect(countIdentityDuplicates(resolved)).toEqual([{ player: "jonas schmidt", count: 2 }]);
	});
});
