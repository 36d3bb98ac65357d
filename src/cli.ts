import { Command } from "commander";
import type { DestinationStream } from "pino";
import { type Config, getConfig, loadConfig, useConfig } from "./config.js";
import { type ExecRunner, resolveCommand } from "./lib/exec.js";
import { type GcloudOptions, listProjects } from "./lib/gcloud.js";
import { initLogger } from "./lib/logging/logger.js";
import { searchDirs } from "./lib/paths.js";
import { packageVersion } from "./lib/version.js";
import { type RunSummary, countResources } from "./orchestrator.js";
import { type ReportSink, stdoutSink } from "./report.js";
import { gcloudListers } from "./resources/listers.js";

export type CliOptions = {
	verbose: boolean;
	configPath?: string;
};

export function buildProgram(): Command {
	return new Command()
		.name("gcp-resource-count")
		.description(
			"Count billable resources in every Google Cloud project visible to the active gcloud account",
		)
		.version(packageVersion())
		.argument("[mode]", 'pass "verbose" to surface gcloud diagnostics on stderr')
		.option("-c, --config <path>", "TOML config file")
		.allowUnknownOption()
		.allowExcessArguments();
}

/**
 * Parses user arguments (without node and script path). Verbose only when the
 * first argument is exactly `verbose`; anything else runs quiet.
 */
export function parseCliArgs(
	argv: string[],
	program: Command = buildProgram(),
): CliOptions {
	program.parse(argv, { from: "user" });
	const opts = program.opts<{ config?: string }>();
	return { verbose: program.args[0] === "verbose", configPath: opts.config };
}

export type RunOptions = {
	sink?: ReportSink;
	stderr?: (line: string) => void;
	exec?: ExecRunner;
	logDest?: DestinationStream;
};

export type RunResult = { code: number; summary?: RunSummary };

export async function run(
	cli: CliOptions,
	runOpts: RunOptions = {},
): Promise<RunResult> {
	const cfg: Config = cli.configPath
		? useConfig(loadConfig(cli.configPath))
		: getConfig();
	const log = initLogger({
		level: cli.verbose ? "debug" : undefined,
		dest: runOpts.logDest,
	});
	const stderr =
		runOpts.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));

	const name = cfg.gcloud.command;
	const command = resolveCommand(name, searchDirs(cfg.gcloud.path_dirs));
	if (!command) {
		stderr(
			`Error: ${name} not installed or not in execution path, ${name} is required for script execution.`,
		);
		return { code: 1 };
	}
	log.debug({ command }, "using inventory command");

	const gcloud: GcloudOptions = {
		command,
		verbosity: cli.verbose ? "verbose" : "quiet",
		timeoutMs: cfg.gcloud.timeout_ms,
		maxBufferBytes: cfg.gcloud.max_buffer_mb * 1024 * 1024,
		exec: runOpts.exec,
		log,
	};
	const summary = await countResources({
		listProjects: () => listProjects(gcloud),
		listers: gcloudListers(gcloud),
		sink: runOpts.sink ?? stdoutSink,
		log,
	});
	if (summary.failures.length) {
		log.debug(
			{ failures: summary.failures.length },
			"some queries failed and were counted as zero",
		);
	}
	return { code: 0, summary };
}
