import { describe } from "vitest";
import { CandidateList } from "../src/candidates.js";
import { formatTarget, parseTarget } from "../src/target.js";

const A = parseTarget("hostA");
const B = parseTarget("hostB");
const C = parseTarget("hostC");
const X = parseTarget("X");

function take(list: CandidateList, count: number): string[] {
	const hosts: string[] = [];
	for (let i = 0; i < count; i++) {
		hosts.push(formatTarget(list.nextTarget(false)));
	}
	return hosts;
}

describe("CandidateList", (it) => {
	it("should always use the original address for the first attempt", ({
		expect,
	}) => {
		const list = new CandidateList(A, { failover: [B], override: X });

		expect(list.nextTarget(true)).toBe(A);
		expect(list.nextTarget(true)).toBe(A);
		expect(list.cursor).toBe(0);
	});

	it("should cycle the original address followed by the failover list", ({
		expect,
	}) => {
		const list = new CandidateList(A, { failover: [B, C] });

		expect(take(list, 7)).toEqual([
			"hostA",
			"hostB",
			"hostC",
			"hostA",
			"hostB",
			"hostC",
			"hostA",
		]);
	});

	it("should pick ([A]++F)[(n-1) mod (1+|F|)] for the n-th reconnect", ({
		expect,
	}) => {
		const failover = [B, C, X];
		const cycle = [A, ...failover];
		const list = new CandidateList(A, { failover });

		for (let n = 1; n <= 12; n++) {
			const expected = cycle[(n - 1) % cycle.length];
			expect(list.nextTarget(false)).toBe(expected);
		}
	});

	it("should retry only the original address with an empty failover list", ({
		expect,
	}) => {
		const list = new CandidateList(A, { failover: [] });

		expect(list.size).toBe(1);
		expect(take(list, 3)).toEqual(["hostA", "hostA", "hostA"]);
	});

	it("should return the sticky address for every reconnect", ({ expect }) => {
		const list = new CandidateList(A, { failover: [B], override: X });

		expect(take(list, 3)).toEqual(["X", "X", "X"]);
		expect(list.cursor).toBe(0);
	});

	it("should resume the cycle where it was once the sticky address is cleared", ({
		expect,
	}) => {
		const list = new CandidateList(A, { failover: [B, C] });
		expect(take(list, 2)).toEqual(["hostA", "hostB"]);

		list.configure({ override: X });
		expect(take(list, 2)).toEqual(["X", "X"]);

		list.configure({ override: null });
		expect(take(list, 2)).toEqual(["hostC", "hostA"]);
	});

	it("should keep fields absent from a reconfiguration", ({ expect }) => {
		const list = new CandidateList(A, { failover: [B], override: X });

		list.configure({ failover: [C] });
		expect(list.override).toBe(X);

		list.configure({ override: null });
		expect(list.failoverTargets).toEqual([C]);
	});

	it("should wrap the cursor when the failover list shrinks", ({ expect }) => {
		const list = new CandidateList(A, { failover: [B, C] });
		take(list, 2);
		expect(list.cursor).toBe(2);

		list.configure({ failover: [B] });
		expect(list.cursor).toBe(0);
		expect(take(list, 2)).toEqual(["hostA", "hostB"]);
	});

	it("should keep counting reconnects when a failover list is added", ({
		expect,
	}) => {
		const list = new CandidateList(A);
		expect(take(list, 1)).toEqual(["hostA"]);

		list.configure({ failover: [B] });
		expect(list.cursor).toBe(1);
		expect(take(list, 3)).toEqual(["hostB", "hostA", "hostB"]);
	});
});
