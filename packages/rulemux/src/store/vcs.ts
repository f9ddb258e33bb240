/**
 * Version-control collaborator used by the store.
 *
 * The store and the sync engine only talk to git through this interface,
 * so tests run against an in-memory implementation.
 */

export interface Divergence {
	/** Current local commit, undefined before the first commit */
	localHead?: string
	/** Remote-tracking commit, undefined when the remote has no history yet */
	remoteHead?: string
	/** Best common ancestor, undefined when histories are unrelated */
	base?: string
	/** Local commits the remote lacks */
	ahead: number
	/** Remote commits the local copy lacks */
	behind: number
}

export interface VersionControl {
	/** Create the repository if needed and wire up the configured remote */
	init(): Promise<void>
	/** Whether a remote is configured */
	hasRemote(): Promise<boolean>
	/** Stage additions, modifications and deletions of paths relative to the store root */
	stage(paths: string[]): Promise<void>
	/**
	 * Commit staged changes. Returns the new commit id, or undefined when
	 * nothing is staged and no merge is in progress.
	 */
	commit(message: string): Promise<string | undefined>
	/** Current local commit */
	head(): Promise<string | undefined>
	/** Update remote-tracking state */
	fetch(): Promise<void>
	/** Compare local history with the last fetched remote state */
	divergence(): Promise<Divergence>
	/** Read every file under `prefix` at `ref`, keyed by path relative to the store root */
	readTree(ref: string, prefix: string): Promise<Map<string, string>>
	/** Move the local branch and working copy to `ref`, which must descend from the local head */
	fastForward(ref: string): Promise<void>
	/** Start a merge with `ref` whose result is supplied by the caller before `commit` */
	beginMerge(ref: string): Promise<void>
	/** Publish local commits to the remote */
	push(): Promise<void>
}
