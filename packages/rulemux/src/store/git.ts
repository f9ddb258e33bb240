import type { SimpleGit } from "simple-git"
import simpleGit, { CheckRepoActions } from "simple-git"
import { LockContentionError } from "../errors"
import { createLogger } from "../utils/logger"
import type { Divergence, VersionControl } from "./vcs"

const log = createLogger("git")

const LOCK_ERROR_RE = /index\.lock|\.lock': File exists|another git process|cannot lock ref/i

// ============================================================
// Types
// ============================================================

export interface GitRemote {
	/** Remote URL (any form git accepts) */
	url: string
	/** Remote name, "origin" by default */
	name?: string
	/** Branch to sync, "main" by default */
	branch?: string
}

export interface GitVersionControlOptions {
	/** Store root; the repository lives here */
	root: string
	remote?: GitRemote
	/** Commit identity, for machines without a configured git user */
	identity?: { name: string; email: string }
}

// ============================================================
// simple-git backed implementation
// ============================================================

/**
 * Git implementation of the store's version-control collaborator.
 *
 * Every call goes through simple-git scoped to the store root. Failures
 * caused by another git process holding a lock surface as
 * LockContentionError so callers can retry.
 */
export class GitVersionControl implements VersionControl {
	private readonly root: string
	private readonly remote?: GitRemote
	private readonly git: SimpleGit
	/** Untrimmed instance for reading file contents verbatim */
	private readonly rawGit: SimpleGit

	constructor(options: GitVersionControlOptions) {
		this.root = options.root
		this.remote = options.remote
		const config = options.identity
			? [`user.name=${options.identity.name}`, `user.email=${options.identity.email}`]
			: []
		this.git = simpleGit({ baseDir: options.root, trimmed: true, config })
		this.rawGit = simpleGit({ baseDir: options.root, trimmed: false, config })
	}

	private get remoteName(): string {
		return this.remote?.name ?? "origin"
	}

	private get branch(): string {
		return this.remote?.branch ?? "main"
	}

	private get trackingRef(): string {
		return `${this.remoteName}/${this.branch}`
	}

	async init(): Promise<void> {
		await this.run(async () => {
			if (!(await this.git.checkIsRepo(CheckRepoActions.IS_REPO_ROOT))) {
				log.debug("Initializing repository at", this.root)
				await this.git.raw(["init", `--initial-branch=${this.branch}`])
			}
			if (!this.remote) return
			const remotes = await this.git.getRemotes(true)
			const existing = remotes.find((r) => r.name === this.remoteName)
			if (!existing) {
				await this.git.addRemote(this.remoteName, this.remote.url)
			} else if (existing.refs.fetch !== this.remote.url) {
				await this.git.remote(["set-url", this.remoteName, this.remote.url])
			}
		})
	}

	async hasRemote(): Promise<boolean> {
		return this.run(async () => {
			const remotes = await this.git.getRemotes()
			return remotes.some((r) => r.name === this.remoteName)
		})
	}

	async stage(paths: string[]): Promise<void> {
		if (paths.length === 0) return
		await this.run(() => this.git.raw(["add", "-A", "--", ...paths]))
	}

	async commit(message: string): Promise<string | undefined> {
		return this.run(async () => {
			const staged = await this.git.raw(["diff", "--cached", "--name-only"])
			const merging = await this.revParse("MERGE_HEAD")
			if (!staged && !merging) return undefined
			await this.git.raw(["commit", "--no-verify", "-m", message])
			return this.revParse("HEAD")
		})
	}

	async head(): Promise<string | undefined> {
		return this.run(() => this.revParse("HEAD"))
	}

	async fetch(): Promise<void> {
		await this.run(() => this.git.fetch(this.remoteName))
	}

	async divergence(): Promise<Divergence> {
		return this.run(async () => {
			const localHead = await this.revParse("HEAD")
			const remoteHead = await this.revParse(this.trackingRef)
			if (!localHead || !remoteHead) {
				return { localHead, remoteHead, ahead: localHead ? 1 : 0, behind: remoteHead ? 1 : 0 }
			}

			let base: string | undefined
			try {
				base = (await this.git.raw(["merge-base", localHead, remoteHead])) || undefined
			} catch {
				// Unrelated histories have no merge base
				base = undefined
			}
			const counts = await this.git.raw([
				"rev-list",
				"--left-right",
				"--count",
				`${localHead}...${remoteHead}`,
			])
			const [ahead = 0, behind = 0] = counts.split(/\s+/).map((n) => Number.parseInt(n, 10))
			return { localHead, remoteHead, base, ahead, behind }
		})
	}

	async readTree(ref: string, prefix: string): Promise<Map<string, string>> {
		return this.run(async () => {
			const files = new Map<string, string>()
			const listing = await this.git.raw(["ls-tree", "-r", "--name-only", ref, "--", prefix])
			for (const path of listing.split("\n").filter(Boolean)) {
				files.set(path, await this.rawGit.raw(["show", `${ref}:${path}`]))
			}
			return files
		})
	}

	async fastForward(ref: string): Promise<void> {
		await this.run(async () => {
			if (await this.revParse("HEAD")) {
				await this.git.raw(["merge", "--ff-only", ref])
			} else {
				await this.git.raw(["reset", "--hard", ref])
			}
		})
	}

	async beginMerge(ref: string): Promise<void> {
		// "ours" keeps the local tree; the caller writes the merged records
		// before committing.
		await this.run(() =>
			this.git.raw(["merge", "-s", "ours", "--no-commit", "--no-ff", "--allow-unrelated-histories", ref]),
		)
	}

	async push(): Promise<void> {
		await this.run(() => this.git.raw(["push", "-u", this.remoteName, `HEAD:refs/heads/${this.branch}`]))
	}

	private async revParse(ref: string): Promise<string | undefined> {
		try {
			const out = await this.git.raw(["rev-parse", "-q", "--verify", `${ref}^{commit}`])
			return out || undefined
		} catch {
			// Unborn branch or unknown ref
			return undefined
		}
	}

	private async run<T>(task: () => Promise<T>): Promise<T> {
		try {
			return await task()
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err)
			if (LOCK_ERROR_RE.test(message)) {
				throw new LockContentionError(this.root, err)
			}
			throw err
		}
	}
}
