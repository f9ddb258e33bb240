/**
 * Windsurf dialect.
 *
 * Layout:
 * - `.windsurf/rules/*.md` -- project rules, optional frontmatter
 * - `global_rules.md` -- user rules (the root is ~/.codeium/windsurf/memories)
 *
 * Frontmatter correspondence (`trigger`):
 *   always_on       <-> "always"   (also the default without frontmatter)
 *   glob            <-> "glob"     (`globs`, comma-separated)
 *   model_decision  <-> "ai_decides" (`description`)
 *   manual          <-> "on_demand"
 */
import { join } from "node:path"
import { MalformedMetadataError } from "../errors"
import { uniqueStems } from "../ir/identity"
import type { Activation, Rule } from "../types/rule"
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

const RULES_DIR = ".windsurf/rules"
const GLOBAL_FILE = "global_rules.md"
const caps = DIALECT_CAPABILITIES.windsurf

/** Windsurf's documented character budgets */
export const WINDSURF_FILE_LIMIT = 6000
export const WINDSURF_TOTAL_LIMIT = 12000

const TRIGGER_TO_ACTIVATION: Partial<Record<string, Activation>> = {
	always_on: "always",
	glob: "glob",
	model_decision: "ai_decides",
	manual: "on_demand",
}

const ACTIVATION_TO_TRIGGER: Record<Activation, string> = {
	always: "always_on",
	glob: "glob",
	ai_decides: "model_decision",
	on_demand: "manual",
}

async function scan(root: string): Promise<ScannedRule[]> {
	const scanned: ScannedRule[] = []

	const globalPath = join(root, GLOBAL_FILE)
	if (await exists(globalPath)) {
		const rules = parseSections(await readSource(globalPath), globalPath, {
			scope: "user",
			activation: caps.defaultActivation,
			name: "global-rules",
		})
		for (const rule of rules) scanned.push({ path: globalPath, rule })
	}

	const files = await listFiles(join(root, RULES_DIR), (name) => name.endsWith(".md"))
	for (const path of files) {
		const { frontmatter, body } = parseFrontmatter(await readSource(path))
		if (!body.trim()) continue

		const trigger = optionalString(frontmatter, "trigger", path)
		const activation = trigger ? TRIGGER_TO_ACTIVATION[trigger] : caps.defaultActivation
		if (!activation) {
			throw new MalformedMetadataError(path, `unknown trigger "${trigger}"`)
		}

		scanned.push({
			path,
			rule: compactRule({
				scope: caps.defaultScope,
				activation,
				globs: optionalGlobs(frontmatter, "globs", path),
				name: fileStem(path),
				description: optionalString(frontmatter, "description", path),
				content: body,
			}),
		})
	}

	return scanned
}

function render(rules: readonly Rule[]) {
	const files: RenderedFile[] = []
	const warnings: string[] = []

	const userRules = rules.filter((r) => r.scope === "user")
	const projectRules = rules.filter((r) => r.scope !== "user")

	if (userRules.length > 0) {
		files.push({ path: GLOBAL_FILE, content: renderSections(userRules) })
	}

	const stems = uniqueStems(projectRules)
	projectRules.forEach((rule, i) => {
		const frontmatter: Record<string, unknown> = { trigger: ACTIVATION_TO_TRIGGER[rule.activation] }
		if (rule.globs && rule.globs.length > 0) frontmatter.globs = rule.globs.join(",")
		if (rule.description) frontmatter.description = rule.description
		files.push({
			path: `${RULES_DIR}/${stems[i]}.md`,
			content: serializeFrontmatter(frontmatter, rule.content),
		})
	})

	let total = 0
	for (const file of files) {
		total += file.content.length
		if (file.content.length > WINDSURF_FILE_LIMIT) {
			warnings.push(
				`${file.path}: ${file.content.length} characters exceeds Windsurf's ${WINDSURF_FILE_LIMIT}-character file limit`,
			)
		}
	}
	if (total > WINDSURF_TOTAL_LIMIT) {
		warnings.push(
			`windsurf rules total ${total} characters, above the ${WINDSURF_TOTAL_LIMIT}-character combined limit`,
		)
	}

	return { files, warnings }
}

export const windsurfDialect = defineDialect({
	id: "windsurf",
	label: "Windsurf",
	layoutSummary: ".windsurf/rules/*.md, global_rules.md",
	scan,
	render,
})
