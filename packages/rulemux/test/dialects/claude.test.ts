/**
 * Tests for the Claude Code dialect.
 */
import { join } from "node:path"
import { describe, expect, test } from "vitest"
import { claudeDialect } from "../../src/dialects/claude"
import type { Rule } from "../../src/types/rule"
import { readText, useTmpDirs, writeFiles } from "../helpers/tmp"

const tmpDir = useTmpDirs("claude")

describe("claudeDialect.read", () => {
	test("reads memory, rules, commands, skills and agents", async () => {
		const root = tmpDir()
		await writeFiles(root, {
			"CLAUDE.md": "# Project\n\nRun tests with vitest.\n",
			".claude/rules/api.md": '---\npaths:\n  - "api/**"\n---\n\nValidate input.\n',
			".claude/commands/release.md": "---\ndescription: Cut a release\n---\n\nBump and tag.\n",
			".claude/skills/pdf/SKILL.md": "---\nname: pdf\ndescription: Working with PDFs\n---\n\nUse pdf-lib.\n",
			".claude/agents/reviewer.md": "---\ndescription: Reviews diffs\n---\n\nBe picky.\n",
		})

		const rules = await claudeDialect.read(root)

		expect(rules).toEqual([
			{ scope: "project", activation: "always", name: "claude", content: "# Project\n\nRun tests with vitest.", sourceFormat: "claude" },
			{ scope: "project", activation: "glob", globs: ["api/**"], name: "api", content: "Validate input.", sourceFormat: "claude" },
			{
				scope: "project",
				activation: "on_demand",
				name: "release",
				description: "Cut a release",
				content: "Bump and tag.",
				sourceFormat: "claude",
			},
			{
				scope: "project",
				activation: "ai_decides",
				name: "pdf",
				description: "Working with PDFs",
				content: "Use pdf-lib.",
				sourceFormat: "claude",
			},
			{
				scope: "project",
				activation: "ai_decides",
				name: "reviewer",
				description: "Reviews diffs",
				content: "Be picky.",
				sourceFormat: "claude",
			},
		])
	})

	test("keeps command frontmatter it does not map", async () => {
		const root = tmpDir()
		const raw = "---\ndescription: Commit staged work\nallowed-tools: Bash(git commit:*)\n---\n\nWrite a commit message."
		await writeFiles(root, { ".claude/commands/commit.md": `${raw}\n` })

		const [rule] = await claudeDialect.read(root)
		expect(rule?.content).toBe(raw)
		expect(rule?.description).toBe("Commit staged work")

		const out = tmpDir()
		await claudeDialect.write(rule ? [rule] : [], out)
		expect(await readText(out, ".claude/commands/commit.md")).toBe(`${raw}\n`)
	})

	test("a skill without a description reads as on_demand", async () => {
		const root = tmpDir()
		await writeFiles(root, { ".claude/skills/notes/SKILL.md": "Plain notes.\n" })

		const [rule] = await claudeDialect.read(root)
		expect(rule?.activation).toBe("on_demand")
		expect(rule?.name).toBe("notes")
	})

	test("a root named .claude reads as user scope", async () => {
		const home = tmpDir()
		await writeFiles(home, {
			".claude/CLAUDE.md": "Be brief.\n",
			".claude/commands/standup.md": "Summarize yesterday.\n",
		})

		const rules = await claudeDialect.read(join(home, ".claude"))
		expect(rules.map((r) => [r.name, r.scope, r.activation])).toEqual([
			["claude", "user", "always"],
			["standup", "user", "on_demand"],
		])
	})
})

describe("claudeDialect.write", () => {
	const rules: Rule[] = [
		{ scope: "project", activation: "glob", globs: ["*.ts"], name: "typescript", content: "Use strict mode." },
		{ scope: "project", activation: "on_demand", name: "release", content: "Bump and tag." },
		{ scope: "project", activation: "ai_decides", name: "sql", description: "When writing SQL", content: "Prefer CTEs." },
	]

	test("places rules by activation", async () => {
		const root = tmpDir()
		const result = await claudeDialect.write(rules, root)

		expect(result.filesWritten).toEqual([
			join(root, "CLAUDE.md"),
			join(root, ".claude", "commands", "release.md"),
			join(root, ".claude", "skills", "sql", "SKILL.md"),
		])
		expect(await readText(root, "CLAUDE.md")).toBe(
			'## typescript\n<!-- rulemux {"name":"typescript","scope":"project","activation":"glob","globs":["*.ts"]} -->\n\nUse strict mode.\n',
		)
		expect(await readText(root, ".claude/commands/release.md")).toBe("Bump and tag.\n")
		expect(await readText(root, ".claude/skills/sql/SKILL.md")).toBe(
			'---\nname: "sql"\ndescription: "When writing SQL"\n---\n\nPrefer CTEs.\n',
		)
	})

	test("reads back what it writes", async () => {
		const root = tmpDir()
		await claudeDialect.write(rules, root)
		const back = await claudeDialect.read(root)
		expect(back).toEqual(rules.map((r) => ({ ...r, sourceFormat: "claude" })))
	})

	test("writes the user layout without a .claude prefix", () => {
		const rendered = claudeDialect.render(
			[{ scope: "user", activation: "on_demand", name: "standup", content: "Summarize." }],
			"/home/dev/.claude",
		)
		expect(rendered.files.map((f) => f.path)).toEqual(["commands/standup.md"])
		expect(rendered.warnings).toEqual([])
	})

	test("warns when commands drop globs", () => {
		const rendered = claudeDialect.render([
			{ scope: "project", activation: "on_demand", globs: ["*.sql"], name: "migrate", content: "Run it." },
		])
		expect(rendered.warnings).toEqual(['migrate: claude drops globs (*.sql) for "on_demand" rules'])
	})

	test("a path-scoped skill reads back with the layout's scope and no globs", async () => {
		const root = tmpDir()
		const skill: Rule = {
			scope: "path",
			activation: "ai_decides",
			globs: ["db/**"],
			name: "schema",
			description: "When changing the schema",
			content: "Add a migration.",
		}

		const result = await claudeDialect.write([skill], root)

		expect(result.warnings).toEqual([
			'schema: claude cannot express scope "path" with activation "ai_decides"',
			'schema: claude drops globs (db/**) for "ai_decides" rules',
		])
		expect(await claudeDialect.read(root)).toEqual([
			{
				scope: "project",
				activation: "ai_decides",
				name: "schema",
				description: "When changing the schema",
				content: "Add a migration.",
				sourceFormat: "claude",
			},
		])
	})

	test("commands written to a user root cannot keep project scope", () => {
		const rendered = claudeDialect.render(
			[{ scope: "project", activation: "on_demand", name: "standup", content: "Summarize." }],
			"/home/dev/.claude",
		)
		expect(rendered.warnings).toEqual([
			'standup: claude cannot express scope "project" with activation "on_demand"',
		])
	})
})
