import os from "node:os";
import pino, {
	type DestinationStream,
	type LevelWithSilent,
	type Logger,
	type LoggerOptions,
} from "pino";
import pretty from "pino-pretty";
import { getConfig } from "../../config.js";
import { packageVersion } from "../version.js";

export const SERVICE_NAME = "gcp-resource-count";

// gcloud can echo access tokens in debug output.
const DEFAULT_REDACT = [
	"access_token",
	"*.access_token",
	"*.token",
	"*.secret",
	"*.password",
	"*.private_key",
];

export type LoggerOverrides = {
	level?: LevelWithSilent;
	format?: "pretty" | "json";
	dest?: DestinationStream;
};

/**
 * Logs always go to stderr so that stdout carries only the report.
 * `dest` bypasses the configured sink (tests).
 */
export function buildLogger(overrides: LoggerOverrides = {}): Logger {
	const cfg = getConfig();
	const opts: LoggerOptions = {
		base: {
			service: SERVICE_NAME,
			version: packageVersion(),
			host: os.hostname(),
		},
		level: overrides.level ?? cfg.logs.level,
		redact: { paths: DEFAULT_REDACT, censor: "[REDACTED]" },
		messageKey: "msg",
	};
	if (overrides.dest) return pino(opts, overrides.dest);

	const format = overrides.format ?? cfg.logs.format;
	if (format === "pretty") {
		return pino(
			opts,
			pretty({
				destination: 2,
				sync: true,
				colorize: process.stderr.isTTY,
				ignore: "pid,hostname,host,service,version",
				translateTime: "SYS:HH:MM:ss",
			}),
		);
	}
	return pino(opts, pino.destination({ dest: 2, sync: true }));
}

let _logger: Logger | null = null;

export function logger(): Logger {
	if (!_logger) {
		_logger = buildLogger();
	}
	return _logger;
}

// Rebuilds the singleton, e.g. once the CLI knows whether it runs verbose.
export function initLogger(overrides: LoggerOverrides = {}): Logger {
	_logger = buildLogger(overrides);
	return _logger;
}

export function childLogger(bindings: Record<string, unknown>): Logger {
	return logger().child(bindings);
}
