import type { Logger } from "pino";
import { z } from "zod";
import { type ExecResult, type ExecRunner, safeExecFile } from "./exec.js";

export type Verbosity = "quiet" | "verbose";

export type FailureReason =
	| "api_disabled"
	| "permission_denied"
	| "not_found"
	| "invalid_output"
	| "unknown";

export type ListOutcome =
	| { ok: true; data: unknown }
	| { ok: false; reason: FailureReason; detail: string };

export type GcloudOptions = {
	/** Resolved path of the gcloud binary. */
	command: string;
	verbosity: Verbosity;
	timeoutMs?: number;
	maxBufferBytes?: number;
	exec?: ExecRunner;
	log?: Logger;
};

export function verbosityArgs(verbosity: Verbosity): string[] {
	return verbosity === "verbose"
		? ["--verbosity", "error"]
		: ["--verbosity", "critical", "--quiet"];
}

export function classifyFailure(stderr: string): FailureReason {
	const s = stderr.toLowerCase();
	if (
		s.includes("service_disabled") ||
		s.includes("has not been used") ||
		s.includes("is disabled") ||
		s.includes("not enabled")
	)
		return "api_disabled";
	if (s.includes("permission") || s.includes("403")) return "permission_denied";
	if (s.includes("not_found") || s.includes("404")) return "not_found";
	return "unknown";
}

async function run(opts: GcloudOptions, args: string[]): Promise<ListOutcome> {
	const exec = opts.exec ?? safeExecFile;
	let res: ExecResult;
	try {
		res = await exec(opts.command, args, {
			timeoutMs: opts.timeoutMs,
			maxBufferBytes: opts.maxBufferBytes,
			envExtra: { CLOUDSDK_CORE_DISABLE_PROMPTS: "1" },
		});
	} catch (e) {
		return { ok: false, reason: "unknown", detail: String(e) };
	}
	if (res.code !== 0) {
		return {
			ok: false,
			reason: classifyFailure(res.stderr),
			detail: res.stderr.trim(),
		};
	}
	// gcloud prints nothing at all for some empty listings
	if (!res.stdout.trim()) return { ok: true, data: [] };
	try {
		return { ok: true, data: JSON.parse(res.stdout) };
	} catch (e) {
		return {
			ok: false,
			reason: "invalid_output",
			detail: e instanceof Error ? e.message : String(e),
		};
	}
}

/** `gcloud <args> --project <id> --format json <verbosity flags>` */
export function listArgs(
	args: readonly string[],
	project: string,
	verbosity: Verbosity,
): string[] {
	return [
		...args,
		"--project",
		project,
		"--format",
		"json",
		...verbosityArgs(verbosity),
	];
}

export function gcloudList(
	opts: GcloudOptions,
	args: readonly string[],
	project: string,
): Promise<ListOutcome> {
	return run(opts, listArgs(args, project, opts.verbosity));
}

const ProjectEntry = z.object({ projectId: z.string().min(1) });

/** Project ids visible to the active gcloud account; [] on any failure. */
export async function listProjects(opts: GcloudOptions): Promise<string[]> {
	const out = await run(opts, ["projects", "list", "--format", "json"]);
	if (!out.ok) {
		opts.log?.debug(
			{ reason: out.reason, stderr: out.detail },
			"project listing failed",
		);
		return [];
	}
	const ids: string[] = [];
	for (const entry of Array.isArray(out.data) ? out.data : []) {
		const parsed = ProjectEntry.safeParse(entry);
		if (parsed.success) ids.push(parsed.data.projectId);
	}
	return ids;
}
