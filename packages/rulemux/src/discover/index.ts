/**
 * User-level rule locations per dialect.
 *
 * Some dialects keep user rules in a readable file or directory; others
 * keep them in app settings or a web UI, which are listed with a hint.
 */
import { homedir } from "node:os"
import { basename, join } from "node:path"
import { getDialect, listDialects } from "../dialects"
import type { DialectId } from "../types/rule"
import { exists, isDirectory, listFiles, safeReadFile } from "../utils/fs"
import {
	antigravityUserDir,
	claudeUserDir,
	cursorUserSettingsPath,
	geminiUserDir,
	windsurfUserDir,
} from "../utils/paths"

export type UserLocationKind = "file" | "dir" | "web-ui"

export interface UserLocation {
	format: DialectId
	kind: UserLocationKind
	/** Absolute path, absent for web-ui locations */
	path?: string
	/** Whether the file or directory exists */
	exists: boolean
	/** Line count (files) or markdown file names (directories) when found */
	lines?: number
	files?: string[]
	/** Extra context, e.g. where to edit rules that have no file */
	note?: string
	/**
	 * Root to hand to the dialect's `read` to import these rules.
	 * Absent when the location cannot be read by its adapter.
	 */
	readRoot?: string
}

export interface DiscoverOptions {
	home?: string
	/** Dialect id or alias; all dialects when omitted */
	format?: string
	platform?: NodeJS.Platform
	env?: NodeJS.ProcessEnv
}

interface LocationSpec {
	kind: UserLocationKind
	path?: string
	note?: string
	readRoot?: string
}

function locationSpecs(format: DialectId, options: Required<DiscoverOptions>): LocationSpec[] {
	const { home } = options
	switch (format) {
		case "claude": {
			const dir = claudeUserDir(home)
			return [
				{ kind: "file", path: join(dir, "CLAUDE.md"), readRoot: dir },
				{ kind: "dir", path: join(dir, "rules"), readRoot: dir },
			]
		}
		case "gemini": {
			const dir = geminiUserDir(home)
			return [{ kind: "file", path: join(dir, "GEMINI.md"), readRoot: dir }]
		}
		case "antigravity": {
			const dir = antigravityUserDir(home)
			return [{ kind: "dir", path: join(dir, "rules"), readRoot: dir }]
		}
		case "windsurf": {
			const dir = windsurfUserDir(home)
			return [{ kind: "file", path: join(dir, "global_rules.md"), readRoot: dir }]
		}
		case "cursor":
			return [
				{
					kind: "file",
					path: cursorUserSettingsPath(home, options.platform, options.env),
					note: "user rules embedded in JSON; edit via Cursor Settings UI",
				},
			]
		case "copilot":
			return [{ kind: "web-ui", note: "github.com → Settings → Copilot → Personal instructions" }]
	}
}

async function inspect(format: DialectId, loc: LocationSpec): Promise<UserLocation> {
	const location: UserLocation = { format, kind: loc.kind, exists: false }
	if (loc.note) location.note = loc.note
	const path = loc.path
	if (!path) return location
	location.path = path

	if (loc.kind === "dir") {
		location.exists = await isDirectory(path)
		if (location.exists) {
			const files = await listFiles(path, (name) => name.endsWith(".md"))
			location.files = files.map((f) => basename(f))
		}
	} else {
		const text = await safeReadFile(path)
		location.exists = text !== undefined || (await exists(path))
		if (text !== undefined) location.lines = countLines(text)
	}
	if (location.exists && loc.readRoot) location.readRoot = loc.readRoot
	return location
}

function countLines(text: string): number {
	if (text === "") return 0
	return text.replace(/\n$/, "").split("\n").length
}

/**
 * List user-level rule locations, one or more per dialect.
 */
export async function discoverUserLocations(options: DiscoverOptions = {}): Promise<UserLocation[]> {
	const resolved: Required<DiscoverOptions> = {
		home: options.home ?? homedir(),
		format: options.format ?? "",
		platform: options.platform ?? process.platform,
		env: options.env ?? process.env,
	}
	const formats = options.format ? [getDialect(options.format).id] : listDialects().map((d) => d.id)

	const locations: UserLocation[] = []
	for (const format of formats) {
		for (const loc of locationSpecs(format, resolved)) {
			locations.push(await inspect(format, loc))
		}
	}
	return locations
}
