/**
 * Billable resource types, in report order. `args` is the gcloud list
 * command; `--project`, `--format json` and verbosity flags are appended.
 */
export const RESOURCE_TYPES = [
	{
		kind: "compute",
		label: "Running Compute Instances",
		args: ["compute", "instances", "list", "--filter=status:(RUNNING)"],
	},
	{ kind: "sql", label: "SQL Instances", args: ["sql", "instances", "list"] },
	{ kind: "storage", label: "Storage Buckets", args: ["storage", "ls"] },
	{
		kind: "filestore",
		label: "Filestore",
		args: ["filestore", "instances", "list"],
	},
	// datasets are only listed through the alpha surface
	{ kind: "bigquery", label: "BigQuery", args: ["alpha", "bq", "datasets", "list"] },
	{
		kind: "bigtable",
		label: "BigTable",
		args: ["bigtable", "instances", "list"],
	},
	{ kind: "spanner", label: "Spanner", args: ["spanner", "instances", "list"] },
	{ kind: "redis", label: "Redis", args: ["redis", "instances", "list"] },
	{
		kind: "memcache",
		label: "Memcache",
		args: ["memcache", "instances", "list"],
	},
	{
		kind: "firestore",
		label: "Firestore",
		args: ["firestore", "databases", "list"],
	},
] as const;

export type ResourceType = (typeof RESOURCE_TYPES)[number];
export type ResourceKind = ResourceType["kind"];

export const RESOURCE_KINDS: readonly ResourceKind[] = RESOURCE_TYPES.map(
	(t) => t.kind,
);

export function labelOf(kind: ResourceKind): string {
	for (const t of RESOURCE_TYPES) if (t.kind === kind) return t.label;
	return kind;
}
