/**
 * Tests for the GitHub Copilot dialect.
 */
import { describe, expect, test } from "vitest"
import { copilotDialect } from "../../src/dialects/copilot"
import type { Rule } from "../../src/types/rule"
import { readText, useTmpDirs, writeFiles } from "../helpers/tmp"

const tmpDir = useTmpDirs("copilot")

describe("copilotDialect", () => {
	test("reads a hand-written instructions file as one rule", async () => {
		const root = tmpDir()
		await writeFiles(root, { ".github/copilot-instructions.md": "# Conventions\n\nUse pnpm.\n" })

		expect(await copilotDialect.read(root)).toEqual([
			{
				scope: "project",
				activation: "always",
				name: "copilot-instructions",
				content: "# Conventions\n\nUse pnpm.",
				sourceFormat: "copilot",
			},
		])
	})

	test("reads applyTo files as path rules", async () => {
		const root = tmpDir()
		await writeFiles(root, {
			".github/instructions/react.instructions.md":
				'---\napplyTo: "src/**/*.tsx, src/**/*.jsx"\ndescription: React components\n---\n\nUse function components.\n',
			".github/instructions/notes.md": "Not an instructions file.\n",
		})

		expect(await copilotDialect.read(root)).toEqual([
			{
				scope: "path",
				activation: "glob",
				globs: ["src/**/*.tsx", "src/**/*.jsx"],
				name: "react",
				description: "React components",
				content: "Use function components.",
				sourceFormat: "copilot",
			},
		])
	})

	test("splits general and path-specific rules on write", async () => {
		const root = tmpDir()
		const rules: Rule[] = [
			{ scope: "project", activation: "always", name: "pnpm", content: "Use pnpm." },
			{ scope: "path", activation: "glob", globs: ["src/**/*.tsx"], name: "react", content: "Use hooks." },
		]

		const result = await copilotDialect.write(rules, root)

		expect(result.warnings).toEqual([])
		expect(await readText(root, ".github/instructions/react.instructions.md")).toBe(
			'---\nname: "react"\napplyTo: "src/**/*.tsx"\n---\n\nUse hooks.\n',
		)
		expect(await readText(root, ".github/copilot-instructions.md")).toBe(
			'## pnpm\n<!-- rulemux {"name":"pnpm","scope":"project","activation":"always"} -->\n\nUse pnpm.\n',
		)

		const back = await copilotDialect.read(root)
		expect(back).toEqual(rules.map((r) => ({ ...r, sourceFormat: "copilot" })))
	})

	test("warns when a project glob rule will read back as path-scoped", () => {
		const rendered = copilotDialect.render([
			{ scope: "project", activation: "glob", globs: ["*.ts"], name: "ts", content: "Strict." },
		])
		expect(rendered.files.map((f) => f.path)).toEqual([".github/instructions/ts.instructions.md"])
		expect(rendered.warnings).toEqual(['ts: copilot cannot express scope "project" with activation "glob"'])
	})
})
