export type PipelineErrorCode =
	| "CONFIG_INVALID"
	| "MANUAL_OVERRIDE_SCHEMA"
	| "RAW_TABLE_MISSING";

export class PipelineError extends Error {
	readonly code: PipelineErrorCode;

	constructor(code: PipelineErrorCode, message: string) {
		super(message);
		this.name = "PipelineError";
		this.code = code;
	}
}

export class ConfigError extends PipelineError {
	constructor(message: string) {
		super("CONFIG_INVALID", message);
		this.name = "ConfigError";
	}
}

/**
 * Fatal for the run: the override file lacks required columns.
 */
export class ManualOverrideSchemaError extends PipelineError {
	readonly missingColumns: string[];

	constructor(path: string, missingColumns: string[]) {
		super(
			"MANUAL_OVERRIDE_SCHEMA",
			`Manual overrides at ${path} must include columns: ${missingColumns.join(", ")}`,
		);
		this.name = "ManualOverrideSchemaError";
		this.missingColumns = missingColumns;
	}
}

export class RawTableMissingError extends PipelineError {
	constructor(category: string, seasonId: string) {
		super("RAW_TABLE_MISSING", `No raw ${category} table for season ${seasonId}`);
		this.name = "RawTableMissingError";
	}
}

export const describeError = (error: unknown) =>
	error instanceof Error ? error.message : String(error);
