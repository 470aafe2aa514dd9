/**
 * Valuation snapshot
 *
 * Latest market value per external player id as of a date, joined with the
 * identity registry for the display name and birth date.
 */

import type { Cell, DataTable, Row, ValuationRecord } from "@player-impact/shared-types";
import { format, isAfter, isValid, parseISO } from "date-fns";
import { parseOptionalNumber } from "../utils/numeric";
import { getString } from "../utils/table";
import { normalizePersonName } from "./name-normalizer";

const VALUE_COLUMNS = ["market_value_in_eur", "market_value_eur", "market_value"];

export const parseDateCell = (value: Cell | undefined): Date | null => {
	if (value === null || value === undefined) return null;
	const parsed = parseISO(String(value).trim());
	return isValid(parsed) ? parsed : null;
};

const toISODate = (date: Date) => format(date, "yyyy-MM-dd");

const readValue = (row: Row) => {
	for (const column of VALUE_COLUMNS) {
		if (column in row) return parseOptionalNumber(row[column]);
	}
	return null;
};

type DatedValuation = {
	playerId: string;
	date: Date;
	marketValueEur: number | null;
};

export const buildLatestValuations = (
	valuations: DataTable,
	registry: DataTable,
	asOf: string | Date,
): ValuationRecord[] => {
	const asOfDate = typeof asOf === "string" ? parseISO(asOf) : asOf;
	if (!isValid(asOfDate)) {
		throw new Error(`Invalid valuation as-of date: ${String(asOf)}`);
	}

	const latest = new Map<string, DatedValuation>();
	for (const row of valuations.rows) {
		const playerId = getString(row, "player_id")?.trim();
		const date = parseDateCell(row.date);
		if (!playerId || !date || isAfter(date, asOfDate)) continue;

		const current = latest.get(playerId);
		// same-day snapshots: the later row in the file wins
		if (!current || !isAfter(current.date, date)) {
			latest.set(playerId, { playerId, date, marketValueEur: readValue(row) });
		}
	}

	const people = new Map<string, Row>();
	for (const row of registry.rows) {
		const playerId = getString(row, "player_id")?.trim();
		if (playerId && !people.has(playerId)) people.set(playerId, row);
	}

	return [...latest.values()]
		.sort((a, b) => a.playerId.localeCompare(b.playerId))
		.map((valuation) => {
			const person = people.get(valuation.playerId);
			const name = person ? (getString(person, "name") ?? "") : "";
			const dob = person ? parseDateCell(person.date_of_birth) : null;
			return {
				playerId: valuation.playerId,
				name,
				nameNorm: normalizePersonName(name),
				dateOfBirth: dob ? toISODate(dob) : null,
				marketValueEur: valuation.marketValueEur,
				valueDate: toISODate(valuation.date),
			};
		});
};
