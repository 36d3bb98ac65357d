import { execFile } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { promisify } from "node:util";

const pexecFile = promisify(execFile);

export type ExecResult = {
	code: number;
	stdout: string;
	stderr: string;
};

export type ExecOptions = {
	timeoutMs?: number;
	maxBufferBytes?: number;
	envExtra?: Record<string, string>;
};

export type ExecRunner = (
	file: string,
	args?: string[],
	opts?: ExecOptions,
) => Promise<ExecResult>;

type ExecFailure = Error & {
	code?: number | string;
	killed?: boolean;
	signal?: NodeJS.Signals | null;
	stdout?: string | Buffer;
	stderr?: string | Buffer;
};

function isExecFailure(err: unknown): err is ExecFailure {
	return err instanceof Error;
}

export function validateArgs(args: string[]) {
	const MAX_ARG = 8192;
	for (const a of args) {
		if (a.length > MAX_ARG) throw new Error("arg_too_large");
		if (/\u0000|[\x00-\x08\x0B\x0C\x0E-\x1F]/.test(a))
			throw new Error("arg_control_char");
	}
}

function isFile(p: string): boolean {
	return fs.statSync(p, { throwIfNoEntry: false })?.isFile() ?? false;
}

/** First match of `file` across `dirs`, or the path itself when absolute. */
export function resolveCommand(file: string, dirs: string[]): string | null {
	if (path.isAbsolute(file)) return isFile(file) ? file : null;
	for (const dir of dirs) {
		const full = path.join(dir, file);
		if (isFile(full)) return full;
	}
	return null;
}

/**
 * Runs `file` without a shell. Non-zero exits, timeouts and spawn errors come
 * back as an ExecResult; only invalid arguments throw.
 */
export async function safeExecFile(
	file: string,
	args: string[] = [],
	opts: ExecOptions = {},
): Promise<ExecResult> {
	validateArgs(args);
	const env: NodeJS.ProcessEnv = {
		...process.env,
		LANG: "C",
		LC_ALL: "C",
		...(opts.envExtra ?? {}),
	};
	try {
		const { stdout, stderr } = await pexecFile(file, args, {
			timeout: opts.timeoutMs ?? 0,
			windowsHide: true,
			shell: false,
			env,
			maxBuffer: opts.maxBufferBytes ?? 64 * 1024 * 1024,
		});
		return { code: 0, stdout, stderr };
	} catch (err) {
		if (!isExecFailure(err)) {
			return { code: 1, stdout: "", stderr: String(err) };
		}
		// node kills the child once output passes maxBuffer
		if (err.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
			return {
				code: 1,
				stdout: err.stdout?.toString() ?? "",
				stderr: "output_too_large",
			};
		}
		if (err.killed && err.signal) {
			return {
				code: 124,
				stdout: err.stdout?.toString() ?? "",
				stderr: "timeout",
			};
		}
		if (err.code === "ENOENT") {
			return { code: 127, stdout: "", stderr: `command_not_found: ${file}` };
		}
		return {
			code: typeof err.code === "number" ? err.code : 1,
			stdout: err.stdout?.toString() ?? "",
			stderr: err.stderr?.toString() || err.message || "exec error",
		};
	}
}
