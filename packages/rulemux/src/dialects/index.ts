/**
 * Dialect registry.
 */
import { UnknownFormatError } from "../errors"
import type { DialectId } from "../types/rule"
import { antigravityDialect } from "./antigravity"
import { claudeDialect } from "./claude"
import { copilotDialect } from "./copilot"
import { cursorDialect } from "./cursor"
import { geminiDialect } from "./gemini"
import type { DialectAdapter } from "./types"
import { windsurfDialect } from "./windsurf"

const DIALECTS: Record<DialectId, DialectAdapter> = {
	cursor: cursorDialect,
	windsurf: windsurfDialect,
	copilot: copilotDialect,
	claude: claudeDialect,
	gemini: geminiDialect,
	antigravity: antigravityDialect,
}

/**
 * All dialects in a stable order.
 */
export function listDialects(): DialectAdapter[] {
	return Object.values(DIALECTS)
}

/**
 * Look up a dialect by id or alias (case-insensitive).
 * Throws UnknownFormatError for anything else.
 */
export function getDialect(idOrAlias: string): DialectAdapter {
	const wanted = idOrAlias.trim().toLowerCase()
	const match = listDialects().find((d) => d.id === wanted || d.aliases.includes(wanted))
	if (!match) {
		throw new UnknownFormatError(
			idOrAlias,
			listDialects().map((d) => d.id),
		)
	}
	return match
}

/**
 * Resolve a dialect name to its canonical id.
 */
export function parseDialectId(idOrAlias: string): DialectId {
	return getDialect(idOrAlias).id
}
