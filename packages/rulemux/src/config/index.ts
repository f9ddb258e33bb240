/**
 * rulemux configuration.
 *
 * Lives at <rulemux home>/config.json (JSONC, comments allowed):
 *
 *   {
 *     // where the git-backed store lives
 *     "storePath": "~/.rulemux/store",
 *     "remote": { "url": "git@example.com:me/rules.git", "branch": "main" },
 *     "backupsDir": "~/.rulemux/backups"
 *   }
 *
 * Every value is resolved here and passed on explicitly; nothing else
 * reads the config file.
 */
import { homedir } from "node:os"
import { ConfigError } from "../errors"
import { safeReadFile, writeFileSafe } from "../utils/fs"
import { isPlainObject, parseJsonc, stringifyJson } from "../utils/json"
import {
	configPath,
	defaultBackupsDir,
	defaultStorePath,
	expandTilde,
	rulemuxHome,
	tildify,
} from "../utils/paths"

export interface RemoteConfig {
	url: string
	/** Branch to sync */
	branch: string
	/** Remote name */
	name: string
}

export interface RulemuxConfig {
	/** rulemux home directory the config was resolved against */
	home: string
	/** Path of the config file (may not exist yet) */
	path: string
	/** Absolute store root */
	storePath: string
	remote?: RemoteConfig
	/** Absolute backups directory */
	backupsDir: string
}

export interface LoadConfigOptions {
	/** User home directory, defaults to the OS home */
	home?: string
	env?: NodeJS.ProcessEnv
}

/**
 * Load configuration, falling back to defaults for anything unset.
 * Throws ConfigError when the file exists but is invalid.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<RulemuxConfig> {
	const userHome = options.home ?? homedir()
	const home = rulemuxHome(options.env ?? process.env, userHome)
	const path = configPath(home)

	const config: RulemuxConfig = {
		home,
		path,
		storePath: defaultStorePath(home),
		backupsDir: defaultBackupsDir(home),
	}

	const text = await safeReadFile(path)
	if (text === undefined) return config

	let raw: unknown
	try {
		raw = parseJsonc(text)
	} catch (err) {
		throw new ConfigError(path, err instanceof Error ? err.message : String(err))
	}
	if (!isPlainObject(raw)) throw new ConfigError(path, "expected an object")

	const storePath = readString(raw, "storePath", path)
	if (storePath !== undefined) config.storePath = expandTilde(storePath, userHome)
	const backupsDir = readString(raw, "backupsDir", path)
	if (backupsDir !== undefined) config.backupsDir = expandTilde(backupsDir, userHome)

	const remote = raw.remote
	if (remote !== undefined && remote !== null) {
		if (!isPlainObject(remote)) throw new ConfigError(path, `"remote" must be an object`)
		const url = readString(remote, "url", path, "remote.")
		if (!url) throw new ConfigError(path, `"remote.url" is required`)
		config.remote = {
			url,
			branch: readString(remote, "branch", path, "remote.") ?? "main",
			name: readString(remote, "name", path, "remote.") ?? "origin",
		}
	}

	return config
}

/**
 * Write the configurable fields back to the config file.
 * Paths under the home directory are stored with `~`.
 */
export async function saveConfig(config: RulemuxConfig, home: string = homedir()): Promise<void> {
	const data: Record<string, unknown> = {
		storePath: tildify(config.storePath, home),
		backupsDir: tildify(config.backupsDir, home),
	}
	if (config.remote) data.remote = config.remote
	await writeFileSafe(config.path, stringifyJson(data))
}

function readString(
	obj: Record<string, unknown>,
	key: string,
	path: string,
	prefix = "",
): string | undefined {
	const value = obj[key]
	if (value === undefined || value === null) return undefined
	if (typeof value !== "string" || value.trim() === "") {
		throw new ConfigError(path, `"${prefix}${key}" must be a non-empty string`)
	}
	return value
}
