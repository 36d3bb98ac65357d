import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import toml from "toml";
import { z } from "zod";
import { expandTilde } from "./lib/paths.js";

export const LOG_LEVELS = [
	"debug",
	"info",
	"warn",
	"error",
	"silent",
] as const;

export const zConfig = z.object({
	gcloud: z
		.object({
			command: z.string().min(1).default("gcloud"),
			path_dirs: z.array(z.string()).default([]),
			timeout_ms: z.number().int().positive().optional(),
			max_buffer_mb: z.number().positive().default(64),
		})
		.default({}),
	logs: z
		.object({
			level: z.enum(LOG_LEVELS).default("warn"),
			format: z.enum(["pretty", "json"]).default("pretty"),
		})
		.default({}),
});

export type Config = z.infer<typeof zConfig>;

export function defaultConfigPath(): string {
	return (
		process.env.GCP_RESOURCE_COUNT_CONFIG ??
		path.join(os.homedir(), ".config", "gcp-resource-count", "config.toml")
	);
}

/**
 * Reads and validates a TOML config file. A missing file yields the defaults;
 * a malformed one throws (toml syntax error or ZodError).
 */
export function loadConfig(cfgPath: string = defaultConfigPath()): Config {
	const raw = fs.existsSync(cfgPath) ? fs.readFileSync(cfgPath, "utf8") : "";
	const parsed = zConfig.parse(raw.trim() ? toml.parse(raw) : {});
	parsed.gcloud.path_dirs = parsed.gcloud.path_dirs.map(expandTilde);
	const envLevel = z
		.enum(LOG_LEVELS)
		.safeParse(process.env.GCP_RESOURCE_COUNT_LOG_LEVEL);
	if (envLevel.success) parsed.logs.level = envLevel.data;
	return parsed;
}

let cached: Config | null = null;

export function getConfig(): Config {
	if (!cached) cached = loadConfig();
	return cached;
}

// Replaces the cached config, e.g. after `--config <path>`.
export function useConfig(cfg: Config): Config {
	cached = cfg;
	return cfg;
}
