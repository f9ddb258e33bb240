import { join } from "node:path"
import { MalformedMetadataError } from "../errors"
import { STORE_VERSION } from "../types/rule"
import { safeReadFile, writeFileSafe } from "../utils/fs"
import { isPlainObject, parseJsonc, stringifyJson } from "../utils/json"

export const MANIFEST_FILE = "manifest.json"

/** Marks a directory as a rule store */
export interface StoreManifest {
	/** Record schema version */
	version: string
	/** ISO-8601 creation time */
	createdAt: string
}

export function manifestPath(root: string): string {
	return join(root, MANIFEST_FILE)
}

/**
 * Read the store manifest. Returns undefined when the directory is not a store.
 */
export async function readManifest(root: string): Promise<StoreManifest | undefined> {
	const path = manifestPath(root)
	const text = await safeReadFile(path)
	if (text === undefined) return undefined

	let parsed: unknown
	try {
		parsed = parseJsonc(text)
	} catch (err) {
		throw new MalformedMetadataError(path, err instanceof Error ? err.message : String(err))
	}
	if (!isPlainObject(parsed)) {
		throw new MalformedMetadataError(path, "manifest is not an object")
	}
	const { version, createdAt } = parsed
	if (typeof version !== "string" || typeof createdAt !== "string") {
		throw new MalformedMetadataError(path, `"version" and "createdAt" must be strings`)
	}
	return { version, createdAt }
}

export async function writeManifest(root: string, createdAt: string): Promise<StoreManifest> {
	const manifest: StoreManifest = { version: STORE_VERSION, createdAt }
	await writeFileSafe(manifestPath(root), stringifyJson(manifest))
	return manifest
}
