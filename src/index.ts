#!/usr/bin/env node
import { parseCliArgs, run } from "./cli.js";

async function main(): Promise<number> {
	const cli = parseCliArgs(process.argv.slice(2));
	const { code } = await run(cli);
	return code;
}

main().then(
	(code) => {
		process.exitCode = code;
	},
	(err: unknown) => {
		// the logger may not exist yet, e.g. when the config file is invalid
		const msg = err instanceof Error ? err.message : String(err);
		process.stderr.write(`gcp-resource-count: ${msg}\n`);
		process.exitCode = 1;
	},
);
