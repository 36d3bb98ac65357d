import { RESOURCE_KINDS, type ResourceKind } from "../resources/kinds.js";

export type ResourceCounts = Record<ResourceKind, number>;

export function emptyCounts(): ResourceCounts {
	return {
		compute: 0,
		sql: 0,
		storage: 0,
		filestore: 0,
		bigquery: 0,
		bigtable: 0,
		spanner: 0,
		redis: 0,
		memcache: 0,
		firestore: 0,
	};
}

export function sumCounts(counts: ResourceCounts): number {
	let total = 0;
	for (const kind of RESOURCE_KINDS) total += counts[kind];
	return total;
}

/**
 * Per-project and global accumulators. Totals are always derived, never
 * stored, so they cannot drift from the ten counts.
 */
export class CounterSet {
	private project: ResourceCounts = emptyCounts();
	private global: ResourceCounts = emptyCounts();

	resetProjectCounters(): void {
		this.project = emptyCounts();
	}

	resetGlobalCounters(): void {
		this.global = emptyCounts();
	}

	add(kind: ResourceKind, n: number): number {
		if (!Number.isSafeInteger(n) || n < 0) {
			throw new RangeError(`count must be a non-negative integer, got ${n}`);
		}
		this.project[kind] += n;
		return this.project[kind];
	}

	/** Adds every per-project count into its global counterpart. */
	foldProject(): void {
		for (const kind of RESOURCE_KINDS) this.global[kind] += this.project[kind];
	}

	projectCounts(): ResourceCounts {
		return { ...this.project };
	}

	globalCounts(): ResourceCounts {
		return { ...this.global };
	}

	projectTotal(): number {
		return sumCounts(this.project);
	}

	globalTotal(): number {
		return sumCounts(this.global);
	}
}
