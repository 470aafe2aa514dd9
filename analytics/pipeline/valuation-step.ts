import type { DataTable, ManualOverride } from "@player-impact/shared-types";
import { format } from "date-fns";
import type { PipelineConfig } from "../config/pipeline-config";
import { matchPlayers } from "../valuation/identity-matcher";
import { applyManualOverrides } from "../valuation/manual-overrides";
import { addValueEfficiency } from "../valuation/value-efficiency";
import { buildLatestValuations } from "../valuation/valuations";

export type ValuationInputs = {
	valuations: DataTable;
	registry: DataTable;
	overrides: readonly ManualOverride[];
};

/**
 * latest valuations → identity matching → manual overrides → value efficiency
 */
export const attachMarketValues = (
	table: DataTable,
	inputs: ValuationInputs,
	config: PipelineConfig,
	today: Date = new Date(),
) => {
	const asOf = config.valuationAsOf ?? format(today, "yyyy-MM-dd");
	const targets = buildLatestValuations(inputs.valuations, inputs.registry, asOf);
	const matched = matchPlayers(table, targets, { minScore: config.fuzzyMinScore });
	const overridden = applyManualOverrides(matched.table, inputs.overrides);

	return {
		table: addValueEfficiency(overridden),
		audit: matched.audit,
		matches: matched.matches,
	};
};
