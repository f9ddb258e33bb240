/**
 * Store synchronization with its remote.
 *
 * The only place where histories are merged. Push and pull between the
 * store and a dialect never touch the remote.
 */
import type { MergeWarning } from "../merge"
import { mergeSnapshots } from "../merge"
import type { Store } from "../store"
import type { VersionControl } from "../store/vcs"
import type { StoredRule } from "../types/rule"
import type { Logger } from "../utils/logger"
import { createLogger } from "../utils/logger"

export type SyncStatus = "up-to-date" | "pushed" | "fast-forwarded" | "merged"

export interface SyncOptions {
	/** Commit message for uncommitted store changes found before syncing */
	pendingMessage?: string
	logger?: Logger
}

export interface SyncResult {
	status: SyncStatus
	/** Every rule where a concurrent change was discarded */
	warnings: MergeWarning[]
	/** Merge commit, when one was created */
	commit?: string
}

/**
 * Bring the store and its remote to the same state.
 *
 * 1. Commit anything left staged.
 * 2. Fetch and compare histories.
 * 3. Push, fast-forward, or merge record-by-record then push.
 */
export async function syncStore(
	store: Store,
	vcs: VersionControl,
	options: SyncOptions = {},
): Promise<SyncResult> {
	const log = options.logger ?? createLogger("sync")

	await store.commit(options.pendingMessage ?? "Record local changes before sync")
	await vcs.fetch()
	const { localHead, remoteHead, base, ahead, behind } = await vcs.divergence()

	if (!remoteHead) {
		if (!localHead) return { status: "up-to-date", warnings: [] }
		log.debug("Remote has no history; publishing local store")
		await vcs.push()
		return { status: "pushed", warnings: [] }
	}

	if (ahead === 0 && behind === 0) return { status: "up-to-date", warnings: [] }

	if (ahead === 0) {
		log.debug(`Fast-forwarding ${behind} commit(s)`)
		await vcs.fastForward(remoteHead)
		return { status: "fast-forwarded", warnings: [] }
	}

	if (behind === 0) {
		log.debug(`Pushing ${ahead} commit(s)`)
		await vcs.push()
		return { status: "pushed", warnings: [] }
	}

	log.debug(`Histories diverged (${ahead} local, ${behind} remote); merging records`)
	const baseRules = base ? await store.readSnapshot(base) : new Map<string, StoredRule>()
	const localRules = await store.readWorking()
	const remoteRules = await store.readSnapshot(remoteHead)
	const merged = mergeSnapshots({ base: baseRules, local: localRules, remote: remoteRules })

	await vcs.beginMerge(remoteHead)
	await store.replaceAll(merged.rules)
	const commit = await store.commit(mergeMessage(merged.warnings))
	await vcs.push()

	for (const warning of merged.warnings) log.debug(warning.message)
	return { status: "merged", warnings: merged.warnings, commit }
}

function mergeMessage(warnings: readonly MergeWarning[]): string {
	if (warnings.length === 0) return "Merge remote rules"
	const lines = warnings.map((w) => `- ${w.kind} ${w.ruleId}: kept ${w.kept}`)
	return ["Merge remote rules", "", ...lines].join("\n")
}
