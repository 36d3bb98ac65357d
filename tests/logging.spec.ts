import os from "node:os";
import path from "node:path";
import { beforeAll, describe, expect, it } from "vitest";
import { loadConfig, useConfig } from "../src/config.js";
import { SERVICE_NAME, buildLogger } from "../src/lib/logging/logger.js";
import { packageVersion } from "../src/lib/version.js";
import { capture } from "./helpers/fakes.js";

beforeAll(() => {
	useConfig(loadConfig(path.join(os.tmpdir(), "grc-no-such-config.toml")));
});

describe("logging", () => {
	it("emits JSON with base metadata", async () => {
		const { stream, lines } = capture();
		buildLogger({ dest: stream }).warn({ project: "proj-a" }, "query failed");
		await new Promise((resolve) => setTimeout(resolve, 10));

		expect(lines).toHaveLength(1);
		expect(lines[0]).toMatchObject({
			msg: "query failed",
			project: "proj-a",
			service: SERVICE_NAME,
			version: packageVersion(),
			host: os.hostname(),
		});
	});

	it("uses the configured level unless overridden", async () => {
		const quiet = capture();
		buildLogger({ dest: quiet.stream }).debug("hidden");
		const verbose = capture();
		buildLogger({ dest: verbose.stream, level: "debug" }).debug("shown");
		await new Promise((resolve) => setTimeout(resolve, 10));

		expect(quiet.lines).toEqual([]);
		expect(verbose.lines.map((l) => l.msg)).toEqual(["shown"]);
	});

	it("redacts tokens", async () => {
		const { stream, lines } = capture();
		buildLogger({ dest: stream }).warn(
			{ access_token: "test-token", creds: { token: "test-token", account: "ci" } },
			"auth",
		);
		await new Promise((resolve) => setTimeout(resolve, 10));

		expect(lines[0].access_token).toBe("[REDACTED]");
		expect(lines[0].creds).toEqual({ token: "[REDACTED]", account: "ci" });
	});

	it("reads the package version", () => {
		expect(packageVersion()).toBe("0.1.0");
	});
});
