/**
 * Cursor dialect.
 *
 * Layout:
 * - `.cursor/rules/*.mdc` -- one rule per file (YAML frontmatter + markdown)
 * - `.cursorrules` -- legacy single-file rules (read only)
 *
 * Frontmatter correspondence:
 *   alwaysApply: true            -> activation "always"
 *   globs (string or list)       -> activation "glob"
 *   description, no globs        -> activation "ai_decides"
 *   none of the above            -> activation "on_demand" (Cursor's "manual")
 *
 * Cursor has no scope concept; every rule reads back as "project".
 */
import { join } from "node:path"
import { uniqueStems } from "../ir/identity"
import type { Activation, Rule } from "../types/rule"
import { exists, listFiles } from "../utils/fs"
import { parseFrontmatter, serializeFrontmatter } from "../utils/yaml"
import { DIALECT_CAPABILITIES } from "./capabilities"
import {
	compactRule,
	defineDialect,
	fileStem,
	optionalBoolean,
	optionalGlobs,
	optionalString,
	readSource,
} from "./define"
import type { RenderedFile, ScannedRule } from "./types"

const RULES_DIR = ".cursor/rules"
const LEGACY_FILE = ".cursorrules"
const caps = DIALECT_CAPABILITIES.cursor

/** Frontmatter fields for .mdc rule files */
interface CursorRuleFrontmatter {
	description?: string
	globs?: string[]
	alwaysApply?: boolean
}

/**
 * Map Cursor's rule modes onto activations.
 */
export function cursorActivation(fm: CursorRuleFrontmatter): Activation {
	if (fm.alwaysApply === true) return "always"
	if (fm.globs && fm.globs.length > 0) return "glob"
	if (fm.description) return "ai_decides"
	return "on_demand"
}

async function scan(root: string): Promise<ScannedRule[]> {
	const scanned: ScannedRule[] = []

	const files = await listFiles(join(root, RULES_DIR), (name) => /\.mdc?$/.test(name))
	for (const path of files) {
		const { frontmatter, body } = parseFrontmatter(await readSource(path))
		const fm: CursorRuleFrontmatter = {
			description: optionalString(frontmatter, "description", path),
			globs: optionalGlobs(frontmatter, "globs", path),
			alwaysApply: optionalBoolean(frontmatter, "alwaysApply", path),
		}
		if (!body.trim()) continue

		scanned.push({
			path,
			rule: compactRule({
				scope: caps.defaultScope,
				activation: cursorActivation(fm),
				globs: fm.globs,
				name: fileStem(path),
				description: fm.description,
				content: body,
			}),
		})
	}

	const legacyPath = join(root, LEGACY_FILE)
	if (await exists(legacyPath)) {
		const content = (await readSource(legacyPath)).trimEnd()
		if (content.trim()) {
			scanned.push({
				path: legacyPath,
				rule: { scope: caps.defaultScope, activation: "always", name: "cursorrules", content },
			})
		}
	}

	return scanned
}

/**
 * Fields the frontmatter cannot carry for an activation (a description on
 * an on_demand rule, globs on on_demand and ai_decides rules) are left out;
 * the capability table reports them.
 */
function render(rules: readonly Rule[]) {
	const stems = uniqueStems(rules)
	const files: RenderedFile[] = rules.map((rule, i) => {
		const frontmatter: Record<string, unknown> = {}
		if (rule.description && rule.activation !== "on_demand") {
			frontmatter.description = rule.description
		}
		const keepsGlobs = rule.activation === "glob" || rule.activation === "always"
		if (keepsGlobs && rule.globs && rule.globs.length > 0) frontmatter.globs = rule.globs
		frontmatter.alwaysApply = rule.activation === "always"

		return {
			path: `${RULES_DIR}/${stems[i]}.mdc`,
			content: serializeFrontmatter(frontmatter, rule.content),
		}
	})
	return { files, warnings: [] }
}

export const cursorDialect = defineDialect({
	id: "cursor",
	label: "Cursor",
	layoutSummary: ".cursor/rules/*.mdc",
	scan,
	render,
})
