/**
 * Google Antigravity dialect.
 *
 * Layout:
 * - `.agent/rules/*.md` -- project rules (legacy `.agents/rules/` is read too)
 * - `rules/*.md` -- user rules; the root is ~/.gemini/antigravity
 *
 * Files are plain markdown: no frontmatter, no activation, no globs. Every
 * rule reads as "always"; the layout decides the scope.
 */
import { join } from "node:path"
import { uniqueStems } from "../ir/identity"
import type { Rule, Scope } from "../types/rule"
import { isDirectory, listFiles } from "../utils/fs"
import { DIALECT_CAPABILITIES } from "./capabilities"
import { defineDialect, fileStem, readSource } from "./define"
import type { ScannedRule } from "./types"

const PROJECT_DIR = ".agent/rules"
const LEGACY_PROJECT_DIR = ".agents/rules"
const USER_DIR = "rules"
const caps = DIALECT_CAPABILITIES.antigravity

async function resolveRulesDir(root: string): Promise<{ dir: string; scope: Scope } | undefined> {
	for (const relative of [PROJECT_DIR, LEGACY_PROJECT_DIR]) {
		const dir = join(root, ...relative.split("/"))
		if (await isDirectory(dir)) return { dir, scope: caps.defaultScope }
	}
	const userDir = join(root, USER_DIR)
	if (await isDirectory(userDir)) return { dir: userDir, scope: "user" }
	return undefined
}

async function scan(root: string): Promise<ScannedRule[]> {
	const location = await resolveRulesDir(root)
	if (!location) return []

	const scanned: ScannedRule[] = []
	for (const path of await listFiles(location.dir, (name) => name.endsWith(".md"))) {
		const content = (await readSource(path)).trimEnd()
		if (!content.trim()) continue
		scanned.push({
			path,
			rule: {
				scope: location.scope,
				activation: caps.defaultActivation,
				name: fileStem(path),
				content,
			},
		})
	}
	return scanned
}

/**
 * A set containing any user rule is written to the user layout; the
 * directory, not the file, carries the scope.
 */
function render(rules: readonly Rule[]) {
	const dir = rules.some((r) => r.scope === "user") ? USER_DIR : PROJECT_DIR
	const warnings: string[] = []
	if (dir === USER_DIR && rules.some((r) => r.scope !== "user")) {
		warnings.push("antigravity: mixed user and project rules; all are written to the user rules/ directory")
	}

	const stems = uniqueStems(rules)
	const files = rules.map((rule, i) => ({
		path: `${dir}/${stems[i]}.md`,
		content: `${rule.content}\n`,
	}))
	return { files, warnings }
}

export const antigravityDialect = defineDialect({
	id: "antigravity",
	label: "Google Antigravity",
	aliases: ["google-antigravity"],
	layoutSummary: ".agent/rules/*.md",
	scan,
	render,
})
