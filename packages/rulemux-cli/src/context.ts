/**
 * Shared plumbing for commands: config, store access and error exits.
 */
import { basename, resolve } from "node:path"
import consola from "consola"
import type { RulemuxConfig, Scope, Store } from "rulemux"
import { GitVersionControl, loadConfig, openStore, parseScope } from "rulemux"

export interface StoreContext {
	config: RulemuxConfig
	vcs: GitVersionControl
	store: Store
}

/**
 * Load config and open the configured store.
 * Throws StoreNotFoundError when `rulemux init` has not run.
 */
export async function loadStoreContext(): Promise<StoreContext> {
	const config = await loadConfig()
	const vcs = createVcs(config)
	const store = await openStore({ root: config.storePath, vcs })
	return { config, vcs, store }
}

export function createVcs(config: RulemuxConfig): GitVersionControl {
	return new GitVersionControl({ root: config.storePath, remote: config.remote })
}

/** Resolve a path argument against the working directory */
export function resolveDir(path: string | undefined): string {
	return resolve(path || process.cwd())
}

/** `--project`, defaulting to the directory name of the rules root */
export function resolveProject(project: string | undefined, root: string): string {
	return project || basename(root)
}

export function resolveScope(scope: string | undefined): Scope | undefined {
	return scope ? parseScope(scope) : undefined
}

/**
 * Print an error (as `{ error }` in JSON mode) and exit 1.
 */
export function exitWithError(err: unknown, json: boolean): never {
	const message = err instanceof Error ? err.message : String(err)
	if (json) {
		consola.log(JSON.stringify({ error: message }, null, "\t"))
	} else {
		consola.error(message)
	}
	process.exit(1)
}
