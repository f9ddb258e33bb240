/**
 * GitHub Copilot dialect.
 *
 * Layout:
 * - `.github/copilot-instructions.md` -- repository-wide instructions (sections)
 * - `.github/instructions/*.instructions.md` -- path-specific instructions
 *   with `applyTo` (comma-separated globs), `name`, `description`
 *
 * An `applyTo` file reads as scope "path", activation "glob". Everything
 * else lives in the repository-wide file.
 */
import { join } from "node:path"
import { uniqueStems } from "../ir/identity"
import type { Rule } from "../types/rule"
import { exists, listFiles } from "../utils/fs"
import { parseFrontmatter, serializeFrontmatter } from "../utils/yaml"
import { DIALECT_CAPABILITIES } from "./capabilities"
import {
	compactRule,
	defineDialect,
	fileStem,
	optionalGlobs,
	optionalString,
	readSource,
} from "./define"
import { parseSections, renderSections } from "./sections"
import type { RenderedFile, ScannedRule } from "./types"

const MAIN_FILE = ".github/copilot-instructions.md"
const INSTRUCTIONS_DIR = ".github/instructions"
const INSTRUCTIONS_SUFFIX = ".instructions.md"
const caps = DIALECT_CAPABILITIES.copilot

async function scan(root: string): Promise<ScannedRule[]> {
	const scanned: ScannedRule[] = []

	const mainPath = join(root, ...MAIN_FILE.split("/"))
	if (await exists(mainPath)) {
		const rules = parseSections(await readSource(mainPath), mainPath, {
			scope: caps.defaultScope,
			activation: caps.defaultActivation,
			name: "copilot-instructions",
		})
		for (const rule of rules) scanned.push({ path: mainPath, rule })
	}

	const files = await listFiles(join(root, INSTRUCTIONS_DIR), (name) =>
		name.endsWith(INSTRUCTIONS_SUFFIX),
	)
	for (const path of files) {
		const { frontmatter, body } = parseFrontmatter(await readSource(path))
		if (!body.trim()) continue

		const globs = optionalGlobs(frontmatter, "applyTo", path)
		scanned.push({
			path,
			rule: compactRule({
				scope: globs ? "path" : caps.defaultScope,
				activation: globs ? "glob" : caps.defaultActivation,
				globs,
				name: optionalString(frontmatter, "name", path) ?? fileStem(fileStem(path)),
				description: optionalString(frontmatter, "description", path),
				content: body,
			}),
		})
	}

	return scanned
}

/** Rules that only make sense for matching files go to `applyTo` files */
function isPathSpecific(rule: Rule): boolean {
	return rule.activation === "glob" || rule.scope === "path"
}

function render(rules: readonly Rule[]) {
	const files: RenderedFile[] = []

	const general = rules.filter((r) => !isPathSpecific(r))
	const specific = rules.filter(isPathSpecific)

	if (general.length > 0) {
		files.push({ path: MAIN_FILE, content: renderSections(general) })
	}

	const stems = uniqueStems(specific)
	specific.forEach((rule, i) => {
		const frontmatter: Record<string, unknown> = {}
		if (rule.name) frontmatter.name = rule.name
		if (rule.description) frontmatter.description = rule.description
		frontmatter.applyTo = (rule.globs ?? []).join(",")

		files.push({
			path: `${INSTRUCTIONS_DIR}/${stems[i]}${INSTRUCTIONS_SUFFIX}`,
			content: serializeFrontmatter(frontmatter, rule.content),
		})
	})

	return { files, warnings: [] }
}

export const copilotDialect = defineDialect({
	id: "copilot",
	label: "GitHub Copilot",
	aliases: ["github-copilot", "ghcopilot"],
	layoutSummary: ".github/copilot-instructions.md, .github/instructions/*.instructions.md",
	scan,
	render,
})
