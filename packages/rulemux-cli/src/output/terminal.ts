/**
 * Terminal output formatting utilities for the rulemux CLI.
 */

import consola from "consola"
import type {
	BackupInfo,
	MergeWarning,
	RestoreResult,
	Rule,
	UserLocation,
	WriteResult,
} from "rulemux"
import { tildify } from "rulemux"

/**
 * One-line description of a rule for listings.
 */
export function describeRule(rule: Rule): string {
	const name = rule.name ?? "(unnamed)"
	const globs = rule.globs?.length ? ` [${rule.globs.join(", ")}]` : ""
	return `${name}  ${rule.scope}/${rule.activation}${globs}`
}

export function printRules(title: string, rules: readonly Rule[]): void {
	if (rules.length === 0) return
	consola.log("")
	consola.info(`${title} (${rules.length}):`)
	for (const rule of rules) {
		consola.log(`  ${describeRule(rule)}`)
	}
}

/**
 * Print per-file statuses and warnings of a dialect write.
 */
export function printWriteResult(result: WriteResult): void {
	const created = result.changes.filter((c) => c.status === "create")
	const updated = result.changes.filter((c) => c.status === "update")
	const unchanged = result.changes.filter((c) => c.status === "unchanged")
	const verb = result.dryRun ? "Would write" : "Wrote"

	consola.log("")
	if (created.length + updated.length > 0) {
		consola.success(`${verb} (${created.length + updated.length}):`)
		for (const c of created) consola.log(`  + ${tildify(c.path)}`)
		for (const c of updated) consola.log(`  ~ ${tildify(c.path)}`)
	}
	if (unchanged.length > 0) {
		consola.info(`Unchanged (${unchanged.length}):`)
		for (const c of unchanged) consola.log(`  = ${tildify(c.path)}`)
	}
	if (result.changes.length === 0) {
		consola.info("No files to write.")
	}

	printWarnings(result.warnings)

	if (result.backupDir) {
		consola.info(`Backup snapshot: ${tildify(result.backupDir)}`)
		consola.log("  Run `rulemux restore` to revert if needed.")
	}
	if (result.dryRun) {
		consola.log("")
		consola.info("This was a dry-run. Run without --dry-run to apply changes.")
	}
}

export function printWarnings(warnings: readonly string[]): void {
	if (warnings.length === 0) return
	consola.log("")
	consola.warn(`Warnings (${warnings.length}):`)
	for (const w of warnings) {
		consola.log(`  ${w}`)
	}
}

/**
 * Merge warnings are always shown in full; each one is a discarded change.
 */
export function printMergeWarnings(warnings: readonly MergeWarning[]): void {
	if (warnings.length === 0) return
	consola.log("")
	consola.box({
		title: `Merge warnings (${warnings.length})`,
		message: warnings
			.map((w) => {
				const discarded = w.discardedContentHash ? `\n   discarded content ${w.discardedContentHash.slice(0, 12)}` : ""
				return `${w.message}${discarded}`
			})
			.join("\n\n"),
	})
	consola.log("  Discarded versions remain in the store's git history.")
}

/**
 * Print discovered user-level locations, grouped by dialect.
 */
export function printUserLocations(locations: readonly UserLocation[]): void {
	let current = ""
	for (const loc of locations) {
		if (loc.format !== current) {
			current = loc.format
			consola.log("")
			consola.log(`  ${loc.format}:`)
		}
		if (loc.kind === "web-ui") {
			consola.log(`    (web UI)  ${loc.note ?? ""}`)
			continue
		}
		const display = `${tildify(loc.path ?? "")}${loc.kind === "dir" ? "/" : ""}`
		if (!loc.exists) {
			consola.log(`    ${display.padEnd(56)}  not found`)
			continue
		}
		let detail = ""
		if (loc.kind === "dir") {
			detail = loc.files?.length ? `(${loc.files.length} file(s): ${loc.files.join(", ")})` : "(empty)"
		} else if (loc.lines !== undefined) {
			detail = `(${loc.lines} lines)`
		}
		const note = loc.note ? `  [${loc.note}]` : ""
		consola.log(`    ${display.padEnd(56)}  found  ${detail}${note}`)
	}
	consola.log("")
}

/**
 * Print a list of available backups.
 */
export function printBackupList(backups: BackupInfo[]): void {
	if (backups.length === 0) {
		consola.info("No backups found.")
		return
	}

	consola.log("")
	consola.log(`Available backups (${backups.length}):`)
	consola.log("")

	for (const backup of backups) {
		const date = new Date(backup.manifest.createdAt).toLocaleString()
		consola.log(`  ${backup.id}`)
		consola.log(`    Created: ${date}`)
		consola.log(`    Files:   ${backup.manifest.files.length}`)
		consola.log(`    Desc:    ${backup.manifest.description}`)
		consola.log("")
	}
}

/**
 * Print restore results.
 */
export function printRestoreResult(result: RestoreResult): void {
	if (result.restored.length > 0) {
		consola.success(`Restored (${result.restored.length}):`)
		for (const f of result.restored) {
			consola.log(`  < ${tildify(f)}`)
		}
	}

	if (result.removed.length > 0) {
		consola.info(`Removed newly created files (${result.removed.length}):`)
		for (const f of result.removed) {
			consola.log(`  - ${tildify(f)}`)
		}
	}

	if (result.errors.length > 0) {
		consola.error(`Errors (${result.errors.length}):`)
		for (const e of result.errors) {
			consola.log(`  ! ${e.path}: ${e.error}`)
		}
	}

	if (result.restored.length === 0 && result.removed.length === 0 && result.errors.length === 0) {
		consola.info("Nothing to restore.")
	}
}
