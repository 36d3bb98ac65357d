import type { Logger } from "pino";
import { CounterSet, type ResourceCounts } from "./lib/counters.js";
import type { FailureReason, ListOutcome } from "./lib/gcloud.js";
import { childLogger } from "./lib/logging/logger.js";
import { countRecords } from "./lib/records.js";
import { type ReportSink, ReportWriter } from "./report.js";
import { RESOURCE_KINDS, type ResourceKind } from "./resources/kinds.js";
import type { ResourceLister } from "./resources/listers.js";

export type QueryFailure = {
	project: string;
	kind: ResourceKind;
	reason: FailureReason;
};

export type ProjectSummary = {
	project: string;
	counts: ResourceCounts;
	total: number;
};

export type RunSummary = {
	projects: ProjectSummary[];
	totals: ResourceCounts;
	total: number;
	failures: QueryFailure[];
};

export type RunDeps = {
	listProjects: () => Promise<string[]>;
	listers: readonly ResourceLister[];
	sink: ReportSink;
	log?: Logger;
};

// One lister per kind, in report order, whatever order they were given in.
function inReportOrder(listers: readonly ResourceLister[]): ResourceLister[] {
	return RESOURCE_KINDS.map((kind) => {
		const lister = listers.find((l) => l.kind === kind);
		if (!lister) throw new Error(`no lister for resource kind ${kind}`);
		return lister;
	});
}

async function safeList(
	lister: ResourceLister,
	project: string,
): Promise<ListOutcome> {
	try {
		return await lister.list(project);
	} catch (e) {
		return { ok: false, reason: "unknown", detail: String(e) };
	}
}

/**
 * Walks every project, querying each resource type in report order, and
 * writes the report as it goes. A failed query counts as zero.
 */
export async function countResources(deps: RunDeps): Promise<RunSummary> {
	const log = deps.log ?? childLogger({ component: "orchestrator" });
	const listers = inReportOrder(deps.listers);
	const report = new ReportWriter(deps.sink);
	const counters = new CounterSet();
	const projects: ProjectSummary[] = [];
	const failures: QueryFailure[] = [];

	let projectIds: string[];
	try {
		projectIds = await deps.listProjects();
	} catch (e) {
		log.debug({ err: e }, "project listing failed");
		projectIds = [];
	}
	log.debug({ count: projectIds.length }, "projects listed");

	counters.resetProjectCounters();
	counters.resetGlobalCounters();

	for (const project of projectIds) {
		report.projectHeader(project);
		for (const lister of listers) {
			const kind = lister.kind;
			const outcome = await safeList(lister, project);
			let n = 0;
			if (outcome.ok) {
				n = countRecords(outcome.data);
			} else {
				failures.push({ project, kind, reason: outcome.reason });
				log.debug(
					{ project, kind, reason: outcome.reason, stderr: outcome.detail },
					"query failed, counting zero",
				);
			}
			report.count(kind, counters.add(kind, n));
		}
		const total = counters.projectTotal();
		report.projectTotal(project, total);
		projects.push({ project, counts: counters.projectCounts(), total });
		counters.foldProject();
		counters.resetProjectCounters();
	}

	const totals = counters.globalCounts();
	const total = counters.globalTotal();
	report.totals(totals, total);
	return { projects, totals, total, failures };
}
