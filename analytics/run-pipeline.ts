import { resolve } from "node:path";
import { DEFAULT_CONFIG_PATH, loadPipelineConfig } from "./config/pipeline-config";
import { runPipeline } from "./pipeline/run-pipeline";

const parseArg = (args: string[], key: string) => {
	const index = args.findIndex((a) => a === key);
	if (index === -1) return null;
	return args[index + 1] ?? null;
};

const main = () => {
	const args = process.argv.slice(2);
	const configPath = parseArg(args, "--config") ?? DEFAULT_CONFIG_PATH;
	const season = parseArg(args, "--season");
	const outDir = parseArg(args, "--out");

	if (args.includes("--help")) {
		console.log(
			"Usage: tsx analytics/run-pipeline.ts [--config <pipeline.config.json>] [--season <label>] [--out <dir>]",
		);
		return;
	}

	const config = loadPipelineConfig(configPath);
	const summary = runPipeline(config, {
		labels: season ? [season] : undefined,
		outDir: outDir ? resolve(outDir) : undefined,
	});

	for (const { label, seasonId, rows } of summary.seasons) {
		console.log(`✅ ${label} (${seasonId}): ${rows} players`);
	}
	for (const { label, reason } of summary.failedSeasons) {
		console.error(`❌ ${label}: ${reason}`);
	}
	if (!summary.seasons.length) process.exitCode = 1;
};

try {
	main();
} catch (error) {
	console.error("❌ Pipeline failed:", error);
	process.exit(1);
}
