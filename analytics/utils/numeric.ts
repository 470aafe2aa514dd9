import type { Cell } from "@player-impact/shared-types";

const MISSING_TOKENS = new Set(["", "na", "n/a", "nan", "null", "-", "—"]);

/**
 * Lenient numeric coercion: thousands separators and trailing `%` are
 * stripped, anything unparsable becomes null.
 */
export const parseOptionalNumber = (value: Cell | undefined): number | null => {
	if (value === null || value === undefined) return null;
	if (typeof value === "number") return Number.isFinite(value) ? value : null;
	const trimmed = value.trim();
	if (MISSING_TOKENS.has(trimmed.toLowerCase())) return null;
	const cleaned = trimmed.replace(/,/g, "").replace(/%$/, "");
	if (cleaned === "") return null;
	const parsed = Number(cleaned);
	return Number.isFinite(parsed) ? parsed : null;
};

/**
 * Ages come as "24-123" (years-days) on current tables and as plain
 * years on older ones.
 */
export const parseAge = (value: Cell | undefined): number | null => {
	if (typeof value === "string") {
		const match = value.trim().match(/^(\d{1,2})-(\d{1,3})$/);
		if (match) return Number(match[1]);
	}
	return parseOptionalNumber(value);
};

export const clip = (value: number, min: number, max: number) =>
	Math.min(max, Math.max(min, value));

export const mean = (values: number[]) =>
	values.length ? values.reduce((sum, value) => sum + value, 0) / values.length : null;
