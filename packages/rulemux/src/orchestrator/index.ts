/**
 * Conversion orchestrator.
 *
 * Ties dialect adapters and the store into the three user-facing flows:
 * direct conversion, push (dialect -> store) and pull (store -> dialect).
 * None of them talks to the remote; only `syncStore` merges.
 */
import { getDialect, listDialects } from "../dialects"
import { MalformedMetadataError, UnreadableSourceError } from "../errors"
import type { Store } from "../store"
import type { Rule, Scope, StoredRule } from "../types/rule"
import { USER_PROJECT } from "../types/rule"
import type { Logger } from "../utils/logger"
import { createLogger } from "../utils/logger"
import type { WriteOptions, WriteResult } from "../writer"

// ============================================================
// Types
// ============================================================

export interface ConvertOptions {
	/** Source dialect id or alias */
	from: string
	/** Target dialect id or alias */
	to: string
	/** Root to read from */
	input: string
	/** Root to write beneath */
	output: string
	scope?: Scope
	dryRun?: boolean
	backup?: WriteOptions["backup"]
}

export interface ConvertResult {
	/** Rules read from the source, after the scope filter */
	rules: Rule[]
	write: WriteResult
}

export interface PushOptions {
	store: Store
	/** Dialect id or alias */
	format: string
	input: string
	/** Project group for non-user rules */
	project: string
	scope?: Scope
	/**
	 * Remove records from the same dialect that this read no longer produced:
	 * in the project, and in the user group when the read covers user rules
	 */
	prune?: boolean
	dryRun?: boolean
	/** Commit message; a default naming the dialect is used otherwise */
	message?: string
	logger?: Logger
}

export interface PushResult {
	/** Number of rules read from the dialect */
	read: number
	created: StoredRule[]
	updated: StoredRule[]
	unchanged: StoredRule[]
	pruned: StoredRule[]
	/** Rules renamed because another rule of the same read had their name */
	warnings: string[]
	/** Commit id, absent on dry runs and when nothing changed */
	commit?: string
	dryRun: boolean
}

export interface PullOptions {
	store: Store
	format: string
	output: string
	project: string
	scope?: Scope
	dryRun?: boolean
	backup?: WriteOptions["backup"]
}

export interface PullResult {
	rules: StoredRule[]
	write: WriteResult
}

export interface SourceSpec {
	format: string
	root: string
	scope?: Scope
}

export interface SourceReadResult {
	format: string
	root: string
	rules: Rule[]
}

export interface SourceReadFailure {
	format: string
	root: string
	error: UnreadableSourceError | MalformedMetadataError
}

export interface ReadSourcesResult {
	sources: SourceReadResult[]
	failures: SourceReadFailure[]
}

// ============================================================
// Direct conversion
// ============================================================

/**
 * Read rules in one dialect and write them in another. No store involved.
 */
export async function convertRules(options: ConvertOptions): Promise<ConvertResult> {
	const source = getDialect(options.from)
	const target = getDialect(options.to)

	const rules = await source.read(options.input, { scope: options.scope })
	const write = await target.write(rules, options.output, {
		dryRun: options.dryRun,
		backup: options.backup,
	})
	return { rules, write }
}

// ============================================================
// Push / pull
// ============================================================

/** Store group a rule lands in */
function groupOf(rule: Rule, project: string): string {
	return rule.scope === "user" ? USER_PROJECT : project
}

/**
 * Rules of one read that share a group and a name would overwrite each
 * other in the store; later ones get a `-2`, `-3`... suffix instead.
 */
function distinctNames(
	rules: readonly Rule[],
	project: string,
): { rules: Rule[]; warnings: string[] } {
	const key = (group: string, name: string) => `${group}/${name}`
	const taken = new Set(rules.flatMap((r) => (r.name ? [key(groupOf(r, project), r.name)] : [])))
	const used = new Set<string>()
	const warnings: string[] = []

	const result = rules.map((rule) => {
		if (!rule.name) return rule
		const group = groupOf(rule, project)
		if (!used.has(key(group, rule.name))) {
			used.add(key(group, rule.name))
			return rule
		}
		let n = 2
		const free = (name: string) => !taken.has(key(group, name)) && !used.has(key(group, name))
		while (!free(`${rule.name}-${n}`)) n++
		const name = `${rule.name}-${n}`
		used.add(key(group, name))
		warnings.push(
			`${rule.name}: another rule in "${group}" has this name; the ${rule.activation} one is stored as "${name}"`,
		)
		return { ...rule, name }
	})
	return { rules: result, warnings }
}

/**
 * Read a dialect and upsert every rule into the store, then commit.
 *
 * Without `prune`, push only adds and updates. With it, records from the
 * same dialect (matching the scope filter) that were not read this time
 * are removed from the project. The user group is pruned too when the
 * read produced user rules, the scope filter is "user", or the project
 * is the user group itself; a project checkout without user rules leaves
 * them alone.
 */
export async function pushRules(options: PushOptions): Promise<PushResult> {
	const { store } = options
	const log = options.logger ?? createLogger("push")
	const dialect = getDialect(options.format)
	const dryRun = options.dryRun ?? false

	const read = await dialect.read(options.input, { scope: options.scope })
	const { rules, warnings } = distinctNames(read, options.project)
	const result: PushResult = {
		read: rules.length,
		created: [],
		updated: [],
		unchanged: [],
		pruned: [],
		warnings,
		dryRun,
	}

	const touched = new Set<string>()
	for (const rule of rules) {
		const { rule: stored, status } = await store.put({ ...rule, project: options.project }, { dryRun })
		touched.add(stored.id)
		result[status].push(stored)
	}

	if (options.prune) {
		const groups = new Set([options.project])
		const coversUser =
			options.scope === "user" ||
			options.project === USER_PROJECT ||
			rules.some((r) => r.scope === "user")
		if (coversUser) groups.add(USER_PROJECT)

		const candidates: StoredRule[] = []
		for (const project of groups) {
			candidates.push(...(await store.getAll({ project, sourceFormat: dialect.id, scope: options.scope })))
		}
		for (const stale of candidates) {
			if (touched.has(stale.id)) continue
			if (!dryRun) await store.remove(stale.id)
			result.pruned.push(stale)
		}
	}

	if (!dryRun) {
		result.commit = await store.commit(
			options.message ?? `Push ${result.read} rule(s) from ${dialect.id} into ${options.project}`,
		)
	}
	log.debug(
		`push ${dialect.id}: ${result.created.length} created, ${result.updated.length} updated, ${result.unchanged.length} unchanged, ${result.pruned.length} pruned`,
	)
	return result
}

/**
 * Write a project's rules (plus user-global rules) from the store into a dialect.
 */
export async function pullRules(options: PullOptions): Promise<PullResult> {
	const { store } = options
	const dialect = getDialect(options.format)

	const rules = await store.getAll({ project: options.project, scope: options.scope })
	if (options.project !== USER_PROJECT) {
		rules.push(...(await store.getAll({ project: USER_PROJECT, scope: options.scope })))
	}

	const write = await dialect.write(rules, options.output, {
		dryRun: options.dryRun,
		backup: options.backup,
	})
	return { rules, write }
}

// ============================================================
// Batch reads
// ============================================================

/**
 * Read several independent sources. A source that cannot be read or
 * holds malformed metadata is reported and skipped; anything else aborts.
 */
export async function readSources(sources: readonly SourceSpec[]): Promise<ReadSourcesResult> {
	const result: ReadSourcesResult = { sources: [], failures: [] }
	for (const source of sources) {
		const dialect = getDialect(source.format)
		try {
			const rules = await dialect.read(source.root, { scope: source.scope })
			result.sources.push({ format: dialect.id, root: source.root, rules })
		} catch (err) {
			if (err instanceof UnreadableSourceError || err instanceof MalformedMetadataError) {
				result.failures.push({ format: dialect.id, root: source.root, error: err })
				continue
			}
			throw err
		}
	}
	return result
}

/**
 * Read every dialect beneath one root.
 */
export async function scanAll(root: string, scope?: Scope): Promise<ReadSourcesResult> {
	return readSources(listDialects().map((d) => ({ format: d.id, root, scope })))
}
