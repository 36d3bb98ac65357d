import { z } from "zod";

const ResourceRecord = z
	.object({ name: z.string().optional() })
	.passthrough();

export function asArray(v: unknown): unknown[] {
	if (Array.isArray(v)) return v;
	if (v && typeof v === "object") return Object.values(v);
	return [];
}

function isRecordOrNull(v: unknown): v is Record<string, unknown> | null {
	return v === null || (typeof v === "object" && !Array.isArray(v));
}

/**
 * One entry per record in a listing: its `name`, or null when the record has
 * none. Null elements count as records without a name; other non-objects are
 * not records.
 */
export function recordNames(listing: unknown): (string | null)[] {
	return asArray(listing)
		.filter(isRecordOrNull)
		.map((it) => {
			const parsed = ResourceRecord.safeParse(it);
			return parsed.success ? (parsed.data.name ?? null) : null;
		});
}

export function countRecords(listing: unknown): number {
	return recordNames(listing).length;
}
