import type { ResourceCounts } from "./lib/counters.js";
import { RESOURCE_KINDS, type ResourceKind, labelOf } from "./resources/kinds.js";

export const SEPARATOR = "#".repeat(83);

export type ReportSink = (line: string) => void;

export const stdoutSink: ReportSink = (line) => {
	process.stdout.write(`${line}\n`);
};

export function countLine(kind: ResourceKind, n: number): string {
	return `  Count of ${labelOf(kind)}: ${n}`;
}

export class ReportWriter {
	constructor(private readonly sink: ReportSink) {}

	projectHeader(project: string): void {
		this.sink(SEPARATOR);
		this.sink(`Processing Project: ${project}`);
	}

	count(kind: ResourceKind, n: number): void {
		this.sink(countLine(kind, n));
	}

	projectTotal(project: string, total: number): void {
		this.sink(`Total billable resources for Project ${project}: ${total}`);
		this.sink(SEPARATOR);
		this.sink("");
	}

	totals(counts: ResourceCounts, total: number): void {
		this.sink(SEPARATOR);
		this.sink("Totals for all projects");
		for (const kind of RESOURCE_KINDS) this.count(kind, counts[kind]);
		this.sink(`Total billable resources for all projects: ${total}`);
		this.sink(SEPARATOR);
	}
}
