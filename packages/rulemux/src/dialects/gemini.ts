/**
 * Gemini CLI dialect.
 *
 * Layout: a single `GEMINI.md` at the root, rules as marked sections.
 * A root named `.gemini` (i.e. ~/.gemini) holds user-level rules.
 */
import { basename, join } from "node:path"
import type { Rule } from "../types/rule"
import { exists } from "../utils/fs"
import { DIALECT_CAPABILITIES } from "./capabilities"
import { defineDialect, readSource } from "./define"
import { parseSections, renderSections } from "./sections"
import type { ScannedRule } from "./types"

const CONTEXT_FILE = "GEMINI.md"
const caps = DIALECT_CAPABILITIES.gemini

async function scan(root: string): Promise<ScannedRule[]> {
	const path = join(root, CONTEXT_FILE)
	if (!(await exists(path))) return []

	const rules = parseSections(await readSource(path), path, {
		scope: basename(root) === ".gemini" ? "user" : caps.defaultScope,
		activation: caps.defaultActivation,
		name: "gemini",
	})
	return rules.map((rule) => ({ path, rule }))
}

function render(rules: readonly Rule[]) {
	if (rules.length === 0) return { files: [], warnings: [] }
	return { files: [{ path: CONTEXT_FILE, content: renderSections(rules) }], warnings: [] }
}

export const geminiDialect = defineDialect({
	id: "gemini",
	label: "Gemini CLI",
	aliases: ["gemini-cli"],
	layoutSummary: "GEMINI.md",
	scan,
	render,
})
