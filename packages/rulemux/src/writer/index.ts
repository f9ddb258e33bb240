/**
 * Shared writer.
 *
 * Writes rendered dialect files beneath a root. Supports dry-run mode and
 * a backup snapshot before any file is touched. Writes are not
 * transactional: on failure, files already written stay in place and the
 * WriteError lists them, so re-running the same write is always safe.
 */
import { join } from "node:path"
import { createBackup } from "../backup"
import type { RenderResult } from "../dialects/types"
import { WriteError } from "../errors"
import { safeReadFile, writeFileSafe } from "../utils/fs"

export interface WriteOptions {
	/** Report what would change without touching disk */
	dryRun?: boolean
	/** Snapshot every file about to change into this backups directory first */
	backup?: { dir: string; description?: string }
}

export type FileStatus = "create" | "update" | "unchanged"

export interface FileChange {
	/** Absolute path */
	path: string
	status: FileStatus
}

export interface WriteResult {
	/** Root the files were written beneath */
	root: string
	/** Every rendered file with its status relative to what is on disk */
	changes: FileChange[]
	/** Files actually written (always empty in dry-run mode) */
	filesWritten: string[]
	/** Renderer warnings (dropped fields, size limits) */
	warnings: string[]
	dryRun: boolean
	/** Backup snapshot directory, if one was created */
	backupDir?: string
}

/**
 * Write rendered files beneath `root`.
 *
 * Files whose content already matches are left untouched.
 */
export async function writeRenderedFiles(
	root: string,
	rendered: RenderResult,
	options: WriteOptions = {},
): Promise<WriteResult> {
	const dryRun = options.dryRun ?? false
	const result: WriteResult = {
		root,
		changes: [],
		filesWritten: [],
		warnings: [...rendered.warnings],
		dryRun,
	}

	// ─── Plan ────────────────────────────────────────────────────────
	const planned: Array<FileChange & { content: string }> = []
	for (const file of rendered.files) {
		const path = join(root, ...file.path.split("/"))
		const existing = await safeReadFile(path)
		const status: FileStatus =
			existing === undefined ? "create" : existing === file.content ? "unchanged" : "update"
		planned.push({ path, status, content: file.content })
		result.changes.push({ path, status })
	}

	if (dryRun) return result

	const toWrite = planned.filter((p) => p.status !== "unchanged")

	// ─── Backup ──────────────────────────────────────────────────────
	if (options.backup && toWrite.length > 0) {
		result.backupDir = await createBackup(
			options.backup.dir,
			toWrite.map((p) => p.path),
			options.backup.description,
		)
	}

	// ─── Write ───────────────────────────────────────────────────────
	for (const file of toWrite) {
		try {
			await writeFileSafe(file.path, file.content)
		} catch (err) {
			throw new WriteError(file.path, [...result.filesWritten], err)
		}
		result.filesWritten.push(file.path)
	}

	return result
}
