/**
 * Claude Code dialect.
 *
 * Project layout (root is the repository):
 * - `CLAUDE.md` -- memory file; rules are written as marked sections
 * - `.claude/rules/*.md` -- always-on rules, `paths` frontmatter makes them glob rules
 * - `.claude/commands/*.md` -- slash commands -> "on_demand"
 * - `.claude/skills/<name>/SKILL.md` -- skills -> "ai_decides"
 * - `.claude/agents/*.md` -- subagents -> "ai_decides" (read only)
 *
 * User layout: when the root itself is named `.claude` (i.e. ~/.claude),
 * the same subdirectories sit directly beneath it and rules get scope "user".
 *
 * Command, skill and agent frontmatter that carries more than `name` and
 * `description` (allowed-tools, model, ...) is kept verbatim in the content
 * and written back unchanged.
 */
import { basename, join } from "node:path"
import { uniqueStems } from "../ir/identity"
import type { Activation, Rule, Scope } from "../types/rule"
import { exists, listDirs, listFiles } from "../utils/fs"
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

const MEMORY_FILE = "CLAUDE.md"
const caps = DIALECT_CAPABILITIES.claude

/** Frontmatter keys that map onto rule fields; anything else keeps the raw file */
const MAPPED_KEYS = new Set(["name", "description"])

interface ClaudeLayout {
	scope: Scope
	/** Directory holding rules/, commands/, skills/, agents/ */
	base: string
	/** Same, relative to the root, POSIX-style ("" for the user layout) */
	relativeBase: string
}

function layoutFor(root: string): ClaudeLayout {
	if (basename(root) === ".claude") {
		return { scope: "user", base: root, relativeBase: "" }
	}
	return { scope: caps.defaultScope, base: join(root, ".claude"), relativeBase: ".claude/" }
}

// ─── Read ────────────────────────────────────────────────────────────

async function scan(root: string): Promise<ScannedRule[]> {
	const layout = layoutFor(root)
	const scanned: ScannedRule[] = []

	const memoryPath = join(root, MEMORY_FILE)
	if (await exists(memoryPath)) {
		const rules = parseSections(await readSource(memoryPath), memoryPath, {
			scope: layout.scope,
			activation: caps.defaultActivation,
			name: "claude",
		})
		for (const rule of rules) scanned.push({ path: memoryPath, rule })
	}

	// rules/*.md
	for (const path of await listFiles(join(layout.base, "rules"), isMarkdown)) {
		const { frontmatter, body } = parseFrontmatter(await readSource(path))
		if (!body.trim()) continue
		const globs = optionalGlobs(frontmatter, "paths", path)
		scanned.push({
			path,
			rule: compactRule({
				scope: layout.scope,
				activation: globs ? "glob" : caps.defaultActivation,
				globs,
				name: fileStem(path),
				description: optionalString(frontmatter, "description", path),
				content: body,
			}),
		})
	}

	// commands/*.md
	for (const path of await listFiles(join(layout.base, "commands"), isMarkdown)) {
		const rule = await readFrontmatterRule(path, fileStem(path), "on_demand", layout.scope)
		if (rule) scanned.push({ path, rule })
	}

	// skills/<name>/SKILL.md
	for (const dir of await listDirs(join(layout.base, "skills"))) {
		const path = join(layout.base, "skills", dir, "SKILL.md")
		if (!(await exists(path))) continue
		const rule = await readFrontmatterRule(path, dir, "ai_decides", layout.scope)
		if (rule) scanned.push({ path, rule })
	}

	// agents/*.md
	for (const path of await listFiles(join(layout.base, "agents"), isMarkdown)) {
		const rule = await readFrontmatterRule(path, fileStem(path), "ai_decides", layout.scope)
		if (rule) scanned.push({ path, rule })
	}

	return scanned
}

/**
 * Commands, skills and agents: name and description come from frontmatter.
 * An "ai_decides" file without a description falls back to "on_demand".
 */
async function readFrontmatterRule(
	path: string,
	fallbackName: string,
	activation: Activation,
	scope: Scope,
): Promise<Rule | undefined> {
	const raw = await readSource(path)
	const { frontmatter, hasFrontmatter, body } = parseFrontmatter(raw)
	const description = optionalString(frontmatter, "description", path)
	const name = optionalString(frontmatter, "name", path) ?? fallbackName
	const keepsRaw = hasFrontmatter && Object.keys(frontmatter).some((key) => !MAPPED_KEYS.has(key))
	const content = keepsRaw ? raw.trimEnd() : body
	if (!content.trim()) return undefined

	return compactRule({
		scope,
		activation: activation === "ai_decides" && !description ? "on_demand" : activation,
		name,
		description,
		content,
	})
}

function isMarkdown(name: string): boolean {
	return name.endsWith(".md")
}

// ─── Write ───────────────────────────────────────────────────────────

function render(rules: readonly Rule[], root: string) {
	const layout = layoutFor(root)
	const files: RenderedFile[] = []

	const memoryRules = rules.filter((r) => r.activation !== "on_demand" && r.activation !== "ai_decides")
	if (memoryRules.length > 0) {
		files.push({ path: MEMORY_FILE, content: renderSections(memoryRules) })
	}

	const commands = rules.filter((r) => r.activation === "on_demand")
	const commandStems = uniqueStems(commands)
	commands.forEach((rule, i) => {
		const frontmatter: Record<string, unknown> = {}
		if (rule.description) frontmatter.description = rule.description
		files.push({
			path: `${layout.relativeBase}commands/${commandStems[i]}.md`,
			content: renderFrontmatterFile(rule, frontmatter),
		})
	})

	const skills = rules.filter((r) => r.activation === "ai_decides")
	const skillStems = uniqueStems(skills)
	skills.forEach((rule, i) => {
		const stem = skillStems[i] ?? ""
		files.push({
			path: `${layout.relativeBase}skills/${stem}/SKILL.md`,
			content: renderFrontmatterFile(rule, { name: rule.name ?? stem, description: rule.description }),
		})
	})

	return { files, warnings: [] }
}

/**
 * Content that already carries its own frontmatter is written as-is.
 */
function renderFrontmatterFile(rule: Rule, frontmatter: Record<string, unknown>): string {
	if (rule.content.startsWith("---\n") || Object.keys(frontmatter).length === 0) {
		return `${rule.content}\n`
	}
	return serializeFrontmatter(frontmatter, rule.content)
}

export const claudeDialect = defineDialect({
	id: "claude",
	label: "Claude Code",
	aliases: ["claude-code"],
	layoutSummary: "CLAUDE.md, .claude/{rules,commands,skills,agents}",
	rootScope: (root) => layoutFor(root).scope,
	scan,
	render,
})
