/**
 * Backup and restore module.
 *
 * Creates timestamped snapshots of dialect files before they are
 * overwritten so users can revert a conversion or pull.
 *
 * Backup structure:
 *   <backupsDir>/
 *     2026-02-11T12-00-00/
 *       manifest.json        -- metadata + file list
 *       files/
 *         0001.dat           -- file contents, keyed by manifest index
 *         0002.dat
 *         ...
 */
import { createHash } from "node:crypto"
import { join } from "node:path"
import {
	ensureDir,
	exists,
	removeDir,
	removeFile,
	safeReadDir,
	safeReadFile,
	writeFileSafe,
} from "../utils/fs"
import { isPlainObject, parseJsonc, stringifyJson } from "../utils/json"
import { RULEMUX_VERSION } from "../version"

// ─── Types ───────────────────────────────────────────────────────────

export interface BackupManifest {
	/** ISO timestamp of when the backup was created */
	createdAt: string
	/** rulemux version that created this backup */
	version: string
	/** Human-readable description */
	description: string
	/** Files that were backed up */
	files: BackupFileEntry[]
}

export interface BackupFileEntry {
	/** Original absolute path of the file */
	originalPath: string
	/** Filename inside the backup's files/ directory */
	backupFilename: string
	/** Whether the file existed before the write (false = newly created by it) */
	existedBefore: boolean
	/** SHA-256 hash of the backed-up content */
	hash?: string
}

export interface BackupInfo {
	/** Backup directory name (timestamp) */
	id: string
	/** Full path to backup directory */
	path: string
	/** Parsed manifest */
	manifest: BackupManifest
}

/** One line of `restore --list --json` */
export interface BackupSummary {
	id: string
	createdAt: string
	description: string
	/** Number of files in the backup */
	files: number
}

export interface RestoreResult {
	/** Files that were restored to their original location */
	restored: string[]
	/** Files that were removed (newly created by the write, not in backup) */
	removed: string[]
	/** Files that failed to restore */
	errors: Array<{ path: string; error: string }>
}

// ─── Backup ──────────────────────────────────────────────────────────

/**
 * Snapshot every file a write is about to touch.
 *
 * @param backupsDir - Directory holding all backups
 * @param targetPaths - Absolute paths the writer will create or overwrite
 * @param description - Why this backup was made
 * @returns The backup directory path, or undefined if there was nothing to back up
 */
export async function createBackup(
	backupsDir: string,
	targetPaths: string[],
	description = "Pre-write backup",
	now: Date = new Date(),
): Promise<string | undefined> {
	if (targetPaths.length === 0) return undefined

	const timestamp = now.toISOString().replace(/[:.]/g, "-").slice(0, 19)
	let backupDir = join(backupsDir, timestamp)
	for (let n = 2; await exists(backupDir); n++) {
		backupDir = join(backupsDir, `${timestamp}-${n}`)
	}
	const filesDir = join(backupDir, "files")

	await ensureDir(filesDir)

	const manifest: BackupManifest = {
		createdAt: now.toISOString(),
		version: RULEMUX_VERSION,
		description,
		files: [],
	}

	let fileIndex = 0

	for (const targetPath of targetPaths) {
		fileIndex++
		const backupFilename = `${fileIndex.toString().padStart(4, "0")}.dat`
		const content = await safeReadFile(targetPath)

		if (content !== undefined) {
			await writeFileSafe(join(filesDir, backupFilename), content)
		}

		manifest.files.push({
			originalPath: targetPath,
			backupFilename,
			existedBefore: content !== undefined,
			...(content !== undefined ? { hash: sha256(content) } : {}),
		})
	}

	await writeFileSafe(join(backupDir, "manifest.json"), stringifyJson(manifest))

	return backupDir
}

// ─── List ────────────────────────────────────────────────────────────

/**
 * List all available backups, sorted newest first.
 */
export async function listBackups(backupsDir: string): Promise<BackupInfo[]> {
	const backups: BackupInfo[] = []

	for (const entry of await safeReadDir(backupsDir)) {
		const backupDir = join(backupsDir, entry)
		const manifest = await readManifest(join(backupDir, "manifest.json"))

		if (manifest) {
			backups.push({ id: entry, path: backupDir, manifest })
		}
	}

	backups.sort(
		(a, b) => b.manifest.createdAt.localeCompare(a.manifest.createdAt) || b.id.localeCompare(a.id),
	)

	return backups
}

export function summarizeBackup(backup: BackupInfo): BackupSummary {
	const { createdAt, description, files } = backup.manifest
	return { id: backup.id, createdAt, description, files: files.length }
}

async function readManifest(path: string): Promise<BackupManifest | undefined> {
	const text = await safeReadFile(path)
	if (text === undefined) return undefined

	let parsed: unknown
	try {
		parsed = parseJsonc(text)
	} catch {
		return undefined
	}
	if (!isPlainObject(parsed)) return undefined
	const rawFiles = parsed.files
	if (!Array.isArray(rawFiles)) return undefined
	const entries: unknown[] = rawFiles

	const files: BackupFileEntry[] = []
	for (const entry of entries) {
		if (
			!isPlainObject(entry) ||
			typeof entry.originalPath !== "string" ||
			typeof entry.backupFilename !== "string" ||
			typeof entry.existedBefore !== "boolean"
		) {
			return undefined
		}
		files.push({
			originalPath: entry.originalPath,
			backupFilename: entry.backupFilename,
			existedBefore: entry.existedBefore,
			...(typeof entry.hash === "string" ? { hash: entry.hash } : {}),
		})
	}

	return {
		createdAt: typeof parsed.createdAt === "string" ? parsed.createdAt : "",
		version: typeof parsed.version === "string" ? parsed.version : "",
		description: typeof parsed.description === "string" ? parsed.description : "",
		files,
	}
}

// ─── Restore ─────────────────────────────────────────────────────────

/**
 * Restore files from a backup.
 *
 * - Files that existed before the write are restored to their original content
 * - Files that were newly created by the write are deleted
 *
 * @param backupId - Backup directory name, or "latest" for the most recent
 */
export async function restoreBackup(backupsDir: string, backupId = "latest"): Promise<RestoreResult> {
	const result: RestoreResult = {
		restored: [],
		removed: [],
		errors: [],
	}

	const backups = await listBackups(backupsDir)
	if (backups.length === 0) {
		throw new Error("No backups found. Backups are created by `rulemux convert` and `rulemux pull`.")
	}

	const backup = backupId === "latest" ? backups[0] : backups.find((b) => b.id === backupId)

	if (!backup) {
		throw new Error(
			`Backup "${backupId}" not found. Available: ${backups.map((b) => b.id).join(", ")}`,
		)
	}

	const filesDir = join(backup.path, "files")

	for (const entry of backup.manifest.files) {
		try {
			if (entry.existedBefore) {
				const backupContent = await safeReadFile(join(filesDir, entry.backupFilename))
				if (backupContent === undefined) {
					result.errors.push({ path: entry.originalPath, error: "Backup file content not found" })
				} else if (entry.hash && sha256(backupContent) !== entry.hash) {
					result.errors.push({ path: entry.originalPath, error: "Backup file content is corrupted" })
				} else {
					await writeFileSafe(entry.originalPath, backupContent)
					result.restored.push(entry.originalPath)
				}
			} else if (await removeFile(entry.originalPath)) {
				result.removed.push(entry.originalPath)
			}
		} catch (err) {
			result.errors.push({
				path: entry.originalPath,
				error: err instanceof Error ? err.message : String(err),
			})
		}
	}

	return result
}

// ─── Cleanup ─────────────────────────────────────────────────────────

/**
 * Delete a specific backup.
 */
export async function deleteBackup(backupsDir: string, backupId: string): Promise<void> {
	const backupDir = join(backupsDir, backupId)

	if (!(await exists(join(backupDir, "manifest.json")))) {
		throw new Error(`Backup "${backupId}" not found.`)
	}

	await removeDir(backupDir)
}

function sha256(content: string): string {
	return createHash("sha256").update(content, "utf-8").digest("hex")
}
