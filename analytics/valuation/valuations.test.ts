import { describe, expect, it } from "vitest";
import { createTable } from "../utils/table";
import { buildLatestValuations, parseDateCell } from "./valuations";

const valuations = createTable(
	["player_id", "date", "market_value_in_eur"],
	[
		{ player_id: "1", date: "2024-01-01", market_value_in_eur: "10000000" },
		{ player_id: "1", date: "2025-03-01", market_value_in_eur: "15000000" },
		{ player_id: "1", date: "2026-01-01", market_value_in_eur: "30000000" },
		{ player_id: "2", date: "2025-01-01", market_value_in_eur: "500000" },
		{ player_id: "2", date: "2025-01-01", market_value_in_eur: "600000" },
		{ player_id: "3", date: "not a date", market_value_in_eur: "1" },
	],
);

const registry = createTable(
	["player_id", "name", "date_of_birth"],
	[
		{ player_id: "1", name: "José Álvarez", date_of_birth: "1998-03-02" },
		{ player_id: "2", name: "Jonathan Smith", date_of_birth: null },
	],
);

describe("parseDateCell", () => {
	it("should parse ISO dates and reject the rest", () => {
		expect(parseDateCell("2025-03-01")?.getFullYear()).toBe(2025);
		expect(parseDateCell("01/03/2025")).toBeNull();
		expect(parseDateCell(null)).toBeNull();
	});
});

describe("buildLatestValuations", () => {
	it("should keep the latest value on or before the as-of date", () => {
		expect(buildLatestValuations(valuations, registry, "2025-06-30")).toEqual([
			{
				playerId: "1",
				name: "José Álvarez",
				nameNorm: "jose alvarez",
				dateOfBirth: "1998-03-02",
				marketValueEur: 15_000_000,
				valueDate: "2025-03-01",
			},
			{
				playerId: "2",
				name: "Jonathan Smith",
				nameNorm: "jonathan smith",
				dateOfBirth: null,
				marketValueEur: 600_000,
				valueDate: "2025-01-01",
			},
		]);
	});

	it("should include a valuation dated on the as-of day", () => {
		const records = buildLatestValuations(valuations, registry, "2026-01-01");
		expect(records[0].marketValueEur).toBe(30_000_000);
	});

	it("should read the value from a market_value_eur column", () => {
		const table = createTable(["player_id", "date", "market_value_eur"], [
			{ player_id: "9", date: "2025-01-01", market_value_eur: "2,500,000" },
		]);
		const [only] = buildLatestValuations(table, registry, new Date(2025, 5, 1));
		expect(only).toMatchObject({ playerId: "9", name: "", marketValueEur: 2_500_000 });
	});

	it("should throw for an invalid as-of date", () => {
		expect(() => buildLatestValuations(valuations, registry, "someday")).toThrow(
			"Invalid valuation as-of date: someday",
		);
	});
});
