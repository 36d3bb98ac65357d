import os from "node:os";
import path from "node:path";

export function expandTilde(p: string): string {
	if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
	return p;
}

// Extra directories first, then the inherited PATH.
export function searchDirs(extra: string[] = []): string[] {
	const fromEnv = (process.env.PATH ?? "")
		.split(path.delimiter)
		.filter(Boolean);
	return [...extra.map(expandTilde), ...fromEnv];
}
