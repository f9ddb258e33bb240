/**
 * Path resolution utilities for rulemux's own files and each dialect's
 * user-level locations.
 *
 * Every function takes the home directory explicitly so callers (and tests)
 * decide where things live; nothing here caches a process-wide location.
 */
import { homedir } from "node:os"
import { join } from "node:path"

// ─── rulemux Paths ───────────────────────────────────────────────────

/**
 * rulemux's own directory: $RULEMUX_HOME, or ~/.rulemux.
 */
export function rulemuxHome(env: NodeJS.ProcessEnv = process.env, home: string = homedir()): string {
	const fromEnv = env.RULEMUX_HOME
	if (fromEnv) return expandTilde(fromEnv, home)
	return join(home, ".rulemux")
}

/** <rulemux home>/config.json */
export function configPath(rulemuxDir: string): string {
	return join(rulemuxDir, "config.json")
}

/** <rulemux home>/store/ */
export function defaultStorePath(rulemuxDir: string): string {
	return join(rulemuxDir, "store")
}

/** <rulemux home>/backups/ */
export function defaultBackupsDir(rulemuxDir: string): string {
	return join(rulemuxDir, "backups")
}

/**
 * Expand a leading `~` or `~/` to the home directory.
 */
export function expandTilde(path: string, home: string = homedir()): string {
	if (path === "~") return home
	if (path.startsWith("~/")) return join(home, path.slice(2))
	return path
}

/**
 * Replace a leading home directory with `~` for display.
 */
export function tildify(path: string, home: string = homedir()): string {
	if (path === home) return "~"
	if (path.startsWith(`${home}/`)) return `~/${path.slice(home.length + 1)}`
	return path
}

// ─── Dialect User Paths ──────────────────────────────────────────────

/** ~/.claude/ (holds CLAUDE.md, rules/, commands/, skills/, agents/) */
export function claudeUserDir(home: string): string {
	return join(home, ".claude")
}

/** ~/.gemini/ (holds GEMINI.md) */
export function geminiUserDir(home: string): string {
	return join(home, ".gemini")
}

/** ~/.gemini/antigravity/ (holds rules/) */
export function antigravityUserDir(home: string): string {
	return join(home, ".gemini", "antigravity")
}

/** ~/.codeium/windsurf/memories/ (holds global_rules.md) */
export function windsurfUserDir(home: string): string {
	return join(home, ".codeium", "windsurf", "memories")
}

/**
 * Cursor's user settings.json, where user rules are embedded.
 * Platform-specific:
 * - macOS: ~/Library/Application Support/Cursor/User/settings.json
 * - Linux: ~/.config/Cursor/User/settings.json
 * - Windows: %APPDATA%/Cursor/User/settings.json
 */
export function cursorUserSettingsPath(
	home: string,
	platform: NodeJS.Platform = process.platform,
	env: NodeJS.ProcessEnv = process.env,
): string {
	if (platform === "darwin") {
		return join(home, "Library", "Application Support", "Cursor", "User", "settings.json")
	}
	if (platform === "win32") {
		const appData = env.APPDATA || join(home, "AppData", "Roaming")
		return join(appData, "Cursor", "User", "settings.json")
	}
	const configDir = env.XDG_CONFIG_HOME || join(home, ".config")
	return join(configDir, "Cursor", "User", "settings.json")
}
