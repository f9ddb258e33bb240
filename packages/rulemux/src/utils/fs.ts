/**
 * Filesystem utilities with safe error handling.
 *
 * Uses only Node.js APIs. Directory listings are sorted so every reader
 * sees files in the same order on every platform.
 */
import type { Dirent } from "node:fs"
import { mkdir, readdir, readFile, rm, stat, unlink, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"

/**
 * Check if a file or directory exists.
 */
export async function exists(path: string): Promise<boolean> {
	try {
		await stat(path)
		return true
	} catch {
		return false
	}
}

/**
 * Check if a path exists and is a directory.
 */
export async function isDirectory(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isDirectory()
	} catch {
		return false
	}
}

/**
 * Safely read a file, returning undefined if it doesn't exist.
 */
export async function safeReadFile(path: string): Promise<string | undefined> {
	try {
		return await readFile(path, "utf-8")
	} catch {
		return undefined
	}
}

/**
 * Read a file that is known to exist. Errors propagate to the caller.
 */
export async function readTextFile(path: string): Promise<string> {
	return readFile(path, "utf-8")
}

/**
 * List entry names in a directory (sorted), returning empty array if the dir doesn't exist.
 */
export async function safeReadDir(path: string): Promise<string[]> {
	try {
		return (await readdir(path)).sort()
	} catch {
		return []
	}
}

/**
 * List files (not directories) in a directory whose names pass `filter`, sorted by name.
 */
export async function listFiles(dir: string, filter: (name: string) => boolean): Promise<string[]> {
	let entries: Dirent[]
	try {
		entries = await readdir(dir, { withFileTypes: true })
	} catch {
		return []
	}
	return entries
		.filter((e) => e.isFile() && filter(e.name))
		.map((e) => e.name)
		.sort()
		.map((name) => join(dir, name))
}

/**
 * List subdirectory names of a directory, sorted.
 */
export async function listDirs(dir: string): Promise<string[]> {
	let entries: Dirent[]
	try {
		entries = await readdir(dir, { withFileTypes: true })
	} catch {
		return []
	}
	return entries
		.filter((e) => e.isDirectory())
		.map((e) => e.name)
		.sort()
}

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export async function ensureDir(path: string): Promise<void> {
	await mkdir(path, { recursive: true })
}

/**
 * Write a file, creating parent directories as needed.
 */
export async function writeFileSafe(path: string, content: string): Promise<void> {
	await ensureDir(dirname(path))
	await writeFile(path, content, "utf-8")
}

/**
 * Delete a file if it exists. Returns whether anything was removed.
 */
export async function removeFile(path: string): Promise<boolean> {
	if (!(await exists(path))) return false
	await unlink(path)
	return true
}

/**
 * Recursively delete a directory if it exists.
 */
export async function removeDir(path: string): Promise<void> {
	await rm(path, { recursive: true, force: true })
}
