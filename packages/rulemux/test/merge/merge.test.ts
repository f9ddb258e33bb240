/**
 * Tests for the three-way snapshot merge.
 */
import { describe, expect, test } from "vitest"
import { contentHash } from "../../src/ir/identity"
import type { Snapshot } from "../../src/merge"
import { mergeSnapshots } from "../../src/merge"
import type { StoredRule } from "../../src/types/rule"

const T0 = "2026-04-01T00:00:00.000Z"
const T1 = "2026-04-02T00:00:00.000Z"
const T2 = "2026-04-03T00:00:00.000Z"

function stored(id: string, overrides: Partial<StoredRule> = {}): StoredRule {
	return {
		id,
		project: "web",
		scope: "project",
		activation: "always",
		name: id,
		content: `Rule ${id}.`,
		createdAt: T0,
		updatedAt: T0,
		storeVersion: "1",
		...overrides,
	}
}

function snap(...rules: StoredRule[]): Snapshot {
	return new Map(rules.map((r) => [r.id, r]))
}

describe("mergeSnapshots", () => {
	test("keeps additions from both sides, ordered by id", () => {
		const result = mergeSnapshots({
			base: snap(),
			local: snap(stored("b")),
			remote: snap(stored("a")),
		})
		expect(result.rules.map((r) => r.id)).toEqual(["a", "b"])
		expect(result.warnings).toEqual([])
	})

	test("takes the side that changed", () => {
		const base = stored("a")
		const remote = stored("a", { content: "Remote edit.", updatedAt: T1 })
		const result = mergeSnapshots({ base: snap(base), local: snap(base), remote: snap(remote) })
		expect(result.rules).toEqual([remote])
		expect(result.warnings).toEqual([])
	})

	test("takes a one-sided change even when the other side has a later timestamp", () => {
		const base = stored("a")
		const local = stored("a", { content: "Local edit.", updatedAt: T1 })
		const remote = stored("a", { sourceFormat: "cursor", updatedAt: T2 })
		const result = mergeSnapshots({ base: snap(base), local: snap(local), remote: snap(remote) })
		expect(result.rules).toEqual([local])
		expect(result.warnings).toEqual([])
	})

	test("both sides making the same change is not a conflict", () => {
		const base = stored("a")
		const local = stored("a", { content: "Same.", updatedAt: T1 })
		const remote = stored("a", { content: "Same.", updatedAt: T2 })
		const result = mergeSnapshots({ base: snap(base), local: snap(local), remote: snap(remote) })
		expect(result.rules).toEqual([remote])
		expect(result.warnings).toEqual([])
	})

	test("the later edit wins a concurrent change, with a warning", () => {
		const base = stored("a")
		const local = stored("a", { content: "Local edit.", updatedAt: T2 })
		const remote = stored("a", { content: "Remote edit.", updatedAt: T1 })

		const result = mergeSnapshots({ base: snap(base), local: snap(local), remote: snap(remote) })

		expect(result.rules).toEqual([local])
		expect(result.warnings).toEqual([
			{
				ruleId: "a",
				kind: "both-modified",
				name: "a",
				localUpdatedAt: T2,
				remoteUpdatedAt: T1,
				kept: "local",
				discardedContentHash: contentHash("Remote edit."),
				message: `Rule "a" (a) was changed on both sides; keeping the local version (updated ${T2})`,
			},
		])
	})

	test("equal timestamps break ties the same way from either side", () => {
		const base = stored("a")
		const x = stored("a", { content: "Version X.", updatedAt: T1 })
		const y = stored("a", { content: "Version Y.", updatedAt: T1 })

		const one = mergeSnapshots({ base: snap(base), local: snap(x), remote: snap(y) })
		const two = mergeSnapshots({ base: snap(base), local: snap(y), remote: snap(x) })

		expect(one.rules).toEqual(two.rules)
		expect(one.warnings).toHaveLength(1)
		expect(two.warnings).toHaveLength(1)
		expect(one.warnings[0]?.kept).not.toBe(two.warnings[0]?.kept)
	})

	test("keeps a modification over a deletion, with a warning", () => {
		const base = stored("a")
		const remote = stored("a", { content: "Remote edit.", updatedAt: T1 })

		const result = mergeSnapshots({ base: snap(base), local: snap(), remote: snap(remote) })

		expect(result.rules).toEqual([remote])
		expect(result.warnings).toEqual([
			{
				ruleId: "a",
				kind: "modify-delete",
				name: "a",
				localUpdatedAt: undefined,
				remoteUpdatedAt: T1,
				kept: "remote",
				message: 'Rule "a" (a) was modified on the remote side and deleted on the local side; keeping the modification',
			},
		])
	})

	test("lets a deletion win over an untouched record", () => {
		const base = stored("a")
		const result = mergeSnapshots({ base: snap(base), local: snap(base), remote: snap() })
		expect(result.rules).toEqual([])
		expect(result.warnings).toEqual([])
	})

	test("drops rules deleted on both sides", () => {
		const result = mergeSnapshots({ base: snap(stored("a")), local: snap(), remote: snap() })
		expect(result.rules).toEqual([])
	})

	test("unrelated histories resolve overlapping ids by timestamp", () => {
		const local = stored("a", { content: "Local.", updatedAt: T1 })
		const remote = stored("a", { content: "Remote.", updatedAt: T2 })

		const result = mergeSnapshots({ base: snap(), local: snap(local), remote: snap(remote) })

		expect(result.rules).toEqual([remote])
		expect(result.warnings.map((w) => [w.kind, w.kept])).toEqual([["both-modified", "remote"]])
	})

	test("is commutative over the surviving rules", () => {
		const base = snap(stored("a"), stored("b"), stored("c"))
		const left = snap(
			stored("a", { content: "Left a.", updatedAt: T1 }),
			stored("b"),
			stored("d", { updatedAt: T1 }),
		)
		const right = snap(
			stored("a", { content: "Right a.", updatedAt: T2 }),
			stored("c", { content: "Right c.", updatedAt: T1 }),
		)

		const forward = mergeSnapshots({ base, local: left, remote: right })
		const backward = mergeSnapshots({ base, local: right, remote: left })

		expect(forward.rules).toEqual(backward.rules)
		expect(forward.rules.map((r) => [r.id, r.content])).toEqual([
			["a", "Right a."],
			["c", "Right c."],
			["d", "Rule d."],
		])
	})
})
