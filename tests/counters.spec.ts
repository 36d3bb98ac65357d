import { describe, expect, it } from "vitest";
import { CounterSet, emptyCounts, sumCounts } from "../src/lib/counters.js";

describe("counters", () => {
	it("starts at zero in both scopes", () => {
		const c = new CounterSet();
		expect(c.projectCounts()).toEqual(emptyCounts());
		expect(c.globalCounts()).toEqual(emptyCounts());
		expect(c.projectTotal()).toBe(0);
		expect(c.globalTotal()).toBe(0);
	});

	it("returns the running per-project count from add", () => {
		const c = new CounterSet();
		expect(c.add("redis", 2)).toBe(2);
		expect(c.add("redis", 3)).toBe(5);
		expect(c.add("spanner", 0)).toBe(0);
		expect(c.projectTotal()).toBe(5);
	});

	it("folds project counts into global and resets without double counting", () => {
		const c = new CounterSet();
		c.add("compute", 3);
		c.add("storage", 1);
		c.foldProject();
		c.resetProjectCounters();
		expect(c.projectTotal()).toBe(0);

		c.add("compute", 4);
		c.foldProject();
		c.resetProjectCounters();

		expect(c.globalCounts()).toEqual({ ...emptyCounts(), compute: 7, storage: 1 });
		expect(c.globalTotal()).toBe(8);
	});

	it("resets global counters independently", () => {
		const c = new CounterSet();
		c.add("sql", 1);
		c.foldProject();
		c.resetGlobalCounters();
		expect(c.globalTotal()).toBe(0);
		expect(c.projectCounts().sql).toBe(1);
	});

	it("rejects negative and fractional counts", () => {
		const c = new CounterSet();
		expect(() => c.add("bigtable", -1)).toThrow(RangeError);
		expect(() => c.add("bigtable", 1.5)).toThrow(RangeError);
		expect(c.projectCounts().bigtable).toBe(0);
	});

	it("sums all ten kinds", () => {
		const counts = {
			compute: 1,
			sql: 2,
			storage: 3,
			filestore: 4,
			bigquery: 5,
			bigtable: 6,
			spanner: 7,
			redis: 8,
			memcache: 9,
			firestore: 10,
		};
		expect(sumCounts(counts)).toBe(55);
	});

	it("hands out copies", () => {
		const c = new CounterSet();
		const snap = c.projectCounts();
		snap.compute = 99;
		expect(c.projectCounts().compute).toBe(0);
	});
});
