import fs from "node:fs";
import { z } from "zod";

const PackageJson = z.object({ version: z.string() });

// Same relative depth from src/lib and dist/lib.
const PKG_URL = new URL("../../package.json", import.meta.url);

export function packageVersion(): string {
	if (!fs.existsSync(PKG_URL)) return "0.0.0";
	const parsed = PackageJson.safeParse(
		JSON.parse(fs.readFileSync(PKG_URL, "utf8")),
	);
	return parsed.success ? parsed.data.version : "0.0.0";
}
