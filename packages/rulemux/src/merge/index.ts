/**
 * Three-way merge of rule snapshots.
 *
 * Resolution is per rule id. Nothing is ever left as a conflict: every
 * case picks a winner, and every case where a change is discarded is
 * reported as a MergeWarning.
 */
import { contentHash, rulesEquivalent } from "../ir/identity"
import { serializeRecord } from "../store/record"
import type { StoredRule } from "../types/rule"

// ============================================================
// Types
// ============================================================

export type Snapshot = ReadonlyMap<string, StoredRule>

export interface MergeInput {
	/** Common ancestor; empty when histories are unrelated */
	base: Snapshot
	local: Snapshot
	remote: Snapshot
}

export type MergeWarningKind = "both-modified" | "modify-delete"

export interface MergeWarning {
	ruleId: string
	kind: MergeWarningKind
	/** Rule name, when either side has one */
	name?: string
	localUpdatedAt?: string
	remoteUpdatedAt?: string
	/** Side whose version survived */
	kept: "local" | "remote"
	/** Hash of the discarded content, absent when the discarded side was a deletion */
	discardedContentHash?: string
	message: string
}

export interface MergeResult {
	/** Merged rules, ordered by id */
	rules: StoredRule[]
	warnings: MergeWarning[]
}

// ============================================================
// Merge
// ============================================================

/**
 * Merge two snapshots against their common ancestor.
 *
 * - changed on one side only: that side wins
 * - changed on both sides: the later updatedAt wins, ties broken by content hash
 * - modified on one side, deleted on the other: the modification survives
 * - deleted on one side, untouched on the other: the deletion wins
 */
export function mergeSnapshots(input: MergeInput): MergeResult {
	const { base, local, remote } = input
	const ids = new Set<string>([...base.keys(), ...local.keys(), ...remote.keys()])
	const rules: StoredRule[] = []
	const warnings: MergeWarning[] = []

	for (const id of [...ids].sort()) {
		const b = base.get(id)
		const l = local.get(id)
		const r = remote.get(id)

		if (l && r) {
			rules.push(resolveBoth(id, b, l, r, warnings))
			continue
		}

		const survivor = l ?? r
		if (!survivor) continue // deleted on both sides
		const side = l ? "local" : "remote"

		if (!b) {
			// Added on one side only
			rules.push(survivor)
		} else if (!rulesEquivalent(b, survivor)) {
			rules.push(survivor)
			warnings.push({
				ruleId: id,
				kind: "modify-delete",
				name: survivor.name,
				localUpdatedAt: l?.updatedAt,
				remoteUpdatedAt: r?.updatedAt,
				kept: side,
				message: `Rule ${label(survivor)} was modified on the ${side} side and deleted on the ${otherSide(side)} side; keeping the modification`,
			})
		}
		// Otherwise untouched here and deleted there: stays deleted
	}

	return { rules, warnings }
}

function resolveBoth(
	id: string,
	base: StoredRule | undefined,
	local: StoredRule,
	remote: StoredRule,
	warnings: MergeWarning[],
): StoredRule {
	if (rulesEquivalent(local, remote)) return newerBookkeeping(local, remote)

	if (base) {
		const localChanged = !rulesEquivalent(base, local)
		const remoteChanged = !rulesEquivalent(base, remote)
		if (localChanged && !remoteChanged) return local
		if (remoteChanged && !localChanged) return remote
	}

	const kept = pickWinner(local, remote)
	const winner = kept === "local" ? local : remote
	const loser = kept === "local" ? remote : local
	warnings.push({
		ruleId: id,
		kind: "both-modified",
		name: winner.name ?? loser.name,
		localUpdatedAt: local.updatedAt,
		remoteUpdatedAt: remote.updatedAt,
		kept,
		discardedContentHash: contentHash(loser.content),
		message: `Rule ${label(winner)} was changed on both sides; keeping the ${kept} version (updated ${winner.updatedAt})`,
	})
	return winner
}

/**
 * Later updatedAt wins; equal timestamps fall back to the greater content
 * hash so every machine picks the same side.
 */
function pickWinner(local: StoredRule, remote: StoredRule): "local" | "remote" {
	const l = Date.parse(local.updatedAt)
	const r = Date.parse(remote.updatedAt)
	if (l !== r) return l > r ? "local" : "remote"
	return contentHash(serializeRecord(local)) >= contentHash(serializeRecord(remote)) ? "local" : "remote"
}

/**
 * Both sides agree on the substance; keep whichever record carries the
 * later bookkeeping so the result is the same regardless of side.
 */
function newerBookkeeping(local: StoredRule, remote: StoredRule): StoredRule {
	const l = Date.parse(local.updatedAt)
	const r = Date.parse(remote.updatedAt)
	if (l !== r) return l > r ? local : remote
	return serializeRecord(local) >= serializeRecord(remote) ? local : remote
}

function label(rule: StoredRule): string {
	return rule.name ? `"${rule.name}" (${rule.id})` : rule.id
}

function otherSide(side: "local" | "remote"): "local" | "remote" {
	return side === "local" ? "remote" : "local"
}
