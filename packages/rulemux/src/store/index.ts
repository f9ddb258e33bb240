/**
 * Git-backed rule store.
 *
 * Layout under the store root:
 *
 *   manifest.json
 *   rules/<project>/<rule-id>.yml
 *
 * User-global rules live under the reserved project "user". Every mutation
 * stages its files; `commit` records them as one git commit.
 */
import { basename, join } from "node:path"
import {
	InvalidRuleError,
	ProjectExistsError,
	ProjectNotFoundError,
	ReservedProjectError,
	StoreNotFoundError,
} from "../errors"
import { deriveRuleId, rulesEquivalent } from "../ir/identity"
import { assertValidRule } from "../ir/validate"
import type { Rule, Scope, StoredRule } from "../types/rule"
import { STORE_VERSION, USER_PROJECT } from "../types/rule"
import {
	ensureDir,
	isDirectory,
	listDirs,
	listFiles,
	readTextFile,
	removeDir,
	removeFile,
	writeFileSafe,
} from "../utils/fs"
import type { Logger } from "../utils/logger"
import { createLogger } from "../utils/logger"
import { MANIFEST_FILE, readManifest, writeManifest } from "./manifest"
import { parseRecord, serializeRecord } from "./record"
import type { VersionControl } from "./vcs"

export const RULES_DIR = "rules"
const RECORD_EXT = ".yml"
/** Former name of the user group directory */
const LEGACY_USER_PROJECT = "_user"
const PROJECT_NAME_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/

// ============================================================
// Types
// ============================================================

export interface StoreOptions {
	/** Store root directory (the git working copy) */
	root: string
	vcs: VersionControl
	/** Time source for bookkeeping timestamps */
	clock?: () => Date
	logger?: Logger
}

export interface RuleFilter {
	project?: string
	scope?: Scope
	/** Dialect the rules were read from */
	sourceFormat?: string
}

export type PutStatus = "created" | "updated" | "unchanged"

export interface PutOptions {
	/** Work out the outcome without writing or staging */
	dryRun?: boolean
}

export interface PutResult {
	/** The record as persisted */
	rule: StoredRule
	status: PutStatus
}

interface LoadedRecord {
	rule: StoredRule
	/** Path relative to the store root */
	path: string
}

// ============================================================
// Helpers
// ============================================================

/**
 * Throw unless `name` is usable as a single directory segment.
 */
export function assertProjectName(name: string): void {
	if (!PROJECT_NAME_RE.test(name)) {
		throw new InvalidRuleError(
			`invalid project name "${name}": use letters, digits, ".", "_" or "-", starting with a letter or digit`,
		)
	}
}

export function recordPath(rule: Pick<StoredRule, "project" | "id">): string {
	return `${RULES_DIR}/${rule.project}/${rule.id}${RECORD_EXT}`
}

function laterTimestamp(...timestamps: (string | undefined)[]): string {
	let latest: string | undefined
	for (const ts of timestamps) {
		if (ts === undefined) continue
		if (latest === undefined || Date.parse(ts) > Date.parse(latest)) latest = ts
	}
	return latest ?? new Date(0).toISOString()
}

/** Project/name/id ordering used by every listing */
export function compareStoredRules(a: StoredRule, b: StoredRule): number {
	return (
		a.project.localeCompare(b.project) ||
		(a.name ?? "").localeCompare(b.name ?? "") ||
		a.id.localeCompare(b.id)
	)
}

function matchesFilter(rule: StoredRule, filter: RuleFilter): boolean {
	if (filter.project !== undefined && rule.project !== filter.project) return false
	if (filter.scope !== undefined && rule.scope !== filter.scope) return false
	if (filter.sourceFormat !== undefined && rule.sourceFormat !== filter.sourceFormat) return false
	return true
}

/**
 * Parse a set of record files (path relative to the store root → text)
 * into rules keyed by id.
 */
export function parseRecords(files: Map<string, string>): Map<string, StoredRule> {
	const rules = new Map<string, StoredRule>()
	for (const [path, text] of files) {
		if (!path.endsWith(RECORD_EXT)) continue
		const rule = parseRecord(text, path)
		rules.set(rule.id, rule)
	}
	return rules
}

// ============================================================
// Store
// ============================================================

export class Store {
	readonly root: string
	private readonly vcs: VersionControl
	private readonly clock: () => Date
	private readonly log: Logger

	constructor(options: StoreOptions) {
		this.root = options.root
		this.vcs = options.vcs
		this.clock = options.clock ?? (() => new Date())
		this.log = options.logger ?? createLogger("store")
	}

	/**
	 * Insert or update a rule.
	 *
	 * The record is matched by id, then by (project, name); a rule matching
	 * nothing gets a deterministic id. A rule equivalent to its record is
	 * left untouched, so repeated pushes do not bump timestamps.
	 */
	async put(rule: Rule, options: PutOptions = {}): Promise<PutResult> {
		assertValidRule(rule)
		const project = this.resolveProject(rule)
		const records = await this.loadRecords()

		let existing = rule.id ? records.get(rule.id) : undefined
		if (!existing && !rule.id && rule.name) {
			existing = [...records.values()].find(
				(r) => r.rule.project === project && r.rule.name === rule.name,
			)
		}
		const id = rule.id ?? existing?.rule.id ?? deriveRuleId(project, rule)
		existing ??= records.get(id)

		const now = this.clock().toISOString()
		const createdAt = existing?.rule.createdAt ?? rule.createdAt ?? now
		const candidate: StoredRule = {
			id,
			project,
			scope: rule.scope,
			activation: rule.activation,
			content: rule.content,
			createdAt,
			updatedAt: laterTimestamp(now, createdAt, existing?.rule.updatedAt),
			storeVersion: STORE_VERSION,
		}
		if (rule.globs && rule.globs.length > 0) candidate.globs = [...rule.globs]
		if (rule.name !== undefined) candidate.name = rule.name
		if (rule.description !== undefined) candidate.description = rule.description
		const sourceFormat = rule.sourceFormat ?? existing?.rule.sourceFormat
		if (sourceFormat !== undefined) candidate.sourceFormat = sourceFormat

		if (existing && rulesEquivalent(existing.rule, candidate)) {
			return { rule: existing.rule, status: "unchanged" }
		}
		const status: PutStatus = existing ? "updated" : "created"
		if (options.dryRun) return { rule: candidate, status }

		const path = recordPath(candidate)
		await writeFileSafe(this.abs(path), serializeRecord(candidate))
		const staged = [path]
		if (existing && existing.path !== path) {
			await removeFile(this.abs(existing.path))
			staged.push(existing.path)
		}
		await this.vcs.stage(staged)
		this.log.debug(status, path)
		return { rule: candidate, status }
	}

	/**
	 * All records matching the filter, ordered by project, name, then id.
	 */
	async getAll(filter: RuleFilter = {}): Promise<StoredRule[]> {
		const records = await this.loadRecords()
		return [...records.values()]
			.map((r) => r.rule)
			.filter((rule) => matchesFilter(rule, filter))
			.sort(compareStoredRules)
	}

	async get(id: string): Promise<StoredRule | undefined> {
		return (await this.loadRecords()).get(id)?.rule
	}

	/**
	 * Delete a record. Returns whether it existed.
	 */
	async remove(id: string): Promise<boolean> {
		const record = (await this.loadRecords()).get(id)
		if (!record) return false
		await removeFile(this.abs(record.path))
		await this.vcs.stage([record.path])
		this.log.debug("Removed", record.path)
		return true
	}

	/**
	 * Record staged changes. Returns the commit id, or undefined when there
	 * was nothing to commit.
	 */
	async commit(message: string): Promise<string | undefined> {
		const id = await this.vcs.commit(message)
		if (id) this.log.debug(`Committed ${id.slice(0, 8)}: ${message}`)
		return id
	}

	/**
	 * Known project groups, always including the user group.
	 */
	async listProjects(): Promise<string[]> {
		const projects = new Set<string>([USER_PROJECT])
		for (const { rule } of (await this.loadRecords()).values()) {
			projects.add(rule.project)
		}
		return [...projects].sort((a, b) => a.localeCompare(b))
	}

	/**
	 * Move every rule of `oldName` to `newName`. Returns the number of
	 * rules moved. Refuses to merge into an existing project.
	 */
	async renameProject(oldName: string, newName: string): Promise<number> {
		for (const name of [oldName, newName]) {
			if (name === USER_PROJECT) throw new ReservedProjectError(name)
		}
		assertProjectName(newName)

		const records = [...(await this.loadRecords()).values()]
		const moving = records.filter((r) => r.rule.project === oldName)
		if (moving.length === 0) throw new ProjectNotFoundError(oldName)
		if (oldName === newName) return 0
		if (records.some((r) => r.rule.project === newName)) throw new ProjectExistsError(newName)

		const now = this.clock().toISOString()
		const staged: string[] = []
		for (const record of moving) {
			const moved: StoredRule = {
				...record.rule,
				project: newName,
				updatedAt: laterTimestamp(now, record.rule.updatedAt),
			}
			const path = recordPath(moved)
			await writeFileSafe(this.abs(path), serializeRecord(moved))
			await removeFile(this.abs(record.path))
			staged.push(path, record.path)
		}
		await this.vcs.stage(staged)
		this.log.info(`Renamed project ${oldName} → ${newName} (${moving.length} rules)`)
		return moving.length
	}

	/**
	 * Rules as committed at `ref`, keyed by id.
	 */
	async readSnapshot(ref: string): Promise<Map<string, StoredRule>> {
		return parseRecords(await this.vcs.readTree(ref, RULES_DIR))
	}

	/**
	 * Rules in the working copy, keyed by id.
	 */
	async readWorking(): Promise<Map<string, StoredRule>> {
		const rules = new Map<string, StoredRule>()
		for (const [id, record] of await this.loadRecords()) rules.set(id, record.rule)
		return rules
	}

	/**
	 * Make the working copy hold exactly `rules`, staging the difference.
	 * Used to apply a merge result.
	 */
	async replaceAll(rules: readonly StoredRule[]): Promise<void> {
		const current = await this.loadRecords()
		const keep = new Set<string>()
		const staged: string[] = []

		for (const rule of rules) {
			const path = recordPath(rule)
			keep.add(path)
			const text = serializeRecord(rule)
			const previous = current.get(rule.id)
			if (previous?.path === path && serializeRecord(previous.rule) === text) continue
			await writeFileSafe(this.abs(path), text)
			staged.push(path)
		}
		for (const record of current.values()) {
			if (keep.has(record.path)) continue
			await removeFile(this.abs(record.path))
			staged.push(record.path)
		}
		await this.vcs.stage(staged)
	}

	/**
	 * Move records from the legacy `rules/_user` directory into the user
	 * group and stage the move. Returns the number of records moved; a
	 * store that already has a user group is left alone.
	 */
	async migrateLegacyUserDir(): Promise<number> {
		const legacyDir = join(this.root, RULES_DIR, LEGACY_USER_PROJECT)
		if (!(await isDirectory(legacyDir))) return 0
		if (await isDirectory(join(this.root, RULES_DIR, USER_PROJECT))) return 0

		const staged: string[] = []
		const files = await listFiles(legacyDir, (name) => name.endsWith(RECORD_EXT))
		for (const file of files) {
			const oldPath = `${RULES_DIR}/${LEGACY_USER_PROJECT}/${basename(file)}`
			const rule: StoredRule = { ...parseRecord(await readTextFile(file), oldPath), project: USER_PROJECT }
			const path = recordPath(rule)
			await writeFileSafe(this.abs(path), serializeRecord(rule))
			staged.push(path, oldPath)
		}
		await removeDir(legacyDir)
		if (staged.length > 0) await this.vcs.stage(staged)
		this.log.info(`Migrated ${files.length} rule(s) from ${LEGACY_USER_PROJECT}/ to ${USER_PROJECT}/`)
		return files.length
	}

	// ─── Internals ───────────────────────────────────────────────────

	private resolveProject(rule: Rule): string {
		if (rule.scope === "user") return USER_PROJECT
		if (!rule.project) {
			throw new InvalidRuleError("a project is required for non-user rules", rule.name)
		}
		if (rule.project === USER_PROJECT) throw new ReservedProjectError(rule.project)
		assertProjectName(rule.project)
		return rule.project
	}

	private abs(relative: string): string {
		return join(this.root, ...relative.split("/"))
	}

	private async loadRecords(): Promise<Map<string, LoadedRecord>> {
		const records = new Map<string, LoadedRecord>()
		const rulesRoot = join(this.root, RULES_DIR)
		for (const project of await listDirs(rulesRoot)) {
			const files = await listFiles(join(rulesRoot, project), (name) => name.endsWith(RECORD_EXT))
			for (const file of files) {
				const path = `${RULES_DIR}/${project}/${basename(file)}`
				const rule = parseRecord(await readTextFile(file), path)
				records.set(rule.id, { rule, path })
			}
		}
		return records
	}
}

// ============================================================
// Lifecycle
// ============================================================

/**
 * Create a store, or adopt the remote's history when one is configured
 * and already holds a store. Idempotent on an existing store.
 */
export async function initStore(options: StoreOptions): Promise<Store> {
	const { root, vcs } = options
	const clock = options.clock ?? (() => new Date())
	await ensureDir(root)
	await vcs.init()

	if (await vcs.hasRemote()) {
		await vcs.fetch()
		const { localHead, remoteHead } = await vcs.divergence()
		if (!localHead && remoteHead) await vcs.fastForward(remoteHead)
	}

	if (!(await readManifest(root))) {
		await writeManifest(root, clock().toISOString())
		await ensureDir(join(root, RULES_DIR))
		await vcs.stage([MANIFEST_FILE])
		await vcs.commit("Initialize rule store")
	}
	return new Store(options)
}

/**
 * Open an existing store. Throws StoreNotFoundError when `root` holds none.
 * A legacy `rules/_user` directory is moved to the user group on open.
 */
export async function openStore(options: StoreOptions): Promise<Store> {
	if (!(await readManifest(options.root))) throw new StoreNotFoundError(options.root)
	const store = new Store(options)
	await store.migrateLegacyUserDir()
	return store
}
