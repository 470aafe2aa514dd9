import type { Cell } from "@player-impact/shared-types";

/**
 * Identity key for player names. Both sides of every comparison
 * (resolver groups, join keys, valuation matching) go through this.
 *
 * "José  Álvarez-Ruiz" → "jose alvarez-ruiz"
 */
export const normalizePersonName = (raw: Cell | undefined) => {
	if (raw === null || raw === undefined) return "";
	return String(raw)
		.normalize("NFKD")
		.replace(/[\u0300-\u036f]/g, "")
		.toLowerCase()
		.replace(/[^a-z0-9\s'-]/g, "")
		.replace(/\s+/g, " ")
		.trim();
};

/**
 * Whitespace cleanup for display strings (player, club, position)
 */
export const collapseWhitespace = (raw: string) => raw.replace(/\s+/g, " ").trim();
