/**
 * End-to-end conversions through real files in temp directories.
 */
import { mkdir } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, test } from "vitest"
import { getDialect, listDialects } from "../../src/dialects"
import type { ActivationSupport } from "../../src/dialects/capabilities"
import { supportedActivations, survivingScopes } from "../../src/dialects/capabilities"
import { InvalidRuleError } from "../../src/errors"
import { convertRules } from "../../src/orchestrator"
import type { Activation, Rule, Scope } from "../../src/types/rule"
import { readText, useTmpDirs, writeFiles } from "../helpers/tmp"

const tmpDir = useTmpDirs("integration")

const TYPESCRIPT_MDC = '---\nglobs:\n  - "*.ts"\nalwaysApply: false\n---\n\nUse strict mode.\n'

function withoutSource(rules: Rule[]): Rule[] {
	return rules.map(({ sourceFormat: _, ...rule }) => rule)
}

describe("Cursor -> Claude -> Cursor", () => {
	test("a glob rule survives the round trip byte for byte", async () => {
		const cursorIn = tmpDir()
		const claudeDir = tmpDir()
		const cursorOut = tmpDir()
		await writeFiles(cursorIn, { ".cursor/rules/typescript.mdc": TYPESCRIPT_MDC })

		const first = await convertRules({ from: "cursor", to: "claude", input: cursorIn, output: claudeDir })
		expect(first.rules).toEqual([
			{
				scope: "project",
				activation: "glob",
				globs: ["*.ts"],
				name: "typescript",
				content: "Use strict mode.",
				sourceFormat: "cursor",
			},
		])
		expect(await readText(claudeDir, "CLAUDE.md")).toBe(
			'## typescript\n<!-- rulemux {"name":"typescript","scope":"project","activation":"glob","globs":["*.ts"]} -->\n\nUse strict mode.\n',
		)

		const second = await convertRules({ from: "claude", to: "cursor", input: claudeDir, output: cursorOut })
		expect(withoutSource(second.rules)).toEqual(withoutSource(first.rules))
		expect(await readText(cursorOut, ".cursor/rules/typescript.mdc")).toBe(TYPESCRIPT_MDC)
	})
})

describe("capability table", () => {
	function sampleRule(scope: Scope, activation: Activation, support: ActivationSupport): Rule {
		const rule: Rule = { scope, activation, name: `${scope}-${activation}`, content: `Applies ${activation}.` }
		if (support.globs) rule.globs = ["src/**/*.ts", "test/**"]
		if (support.description) rule.description = `Pick this for ${activation} work`
		return rule
	}

	for (const dialect of listDialects()) {
		for (const activation of supportedActivations(dialect.capabilities)) {
			const support = dialect.capabilities.activations[activation]
			if (!support) continue

			test(`${dialect.id} keeps every field it claims for ${activation} rules`, async () => {
				const root = tmpDir()
				for (const scope of survivingScopes(support, dialect.capabilities, dialect.rootScope(root))) {
					const rule = sampleRule(scope, activation, support)
					const out = join(root, scope)
					await mkdir(out, { recursive: true })

					const result = await dialect.write([rule], out)
					expect(result.warnings).toEqual([])
					expect(withoutSource(await dialect.read(out))).toEqual([rule])
				}
			})
		}
	}
})

describe("invalid rules", () => {
	test("a path-scoped rule with no globs is rejected and nothing is written", async () => {
		const root = tmpDir()
		const bad: Rule = { scope: "path", activation: "always", globs: [], name: "orphan", content: "Nowhere." }

		for (const dialect of listDialects()) {
			await expect(dialect.write([bad], root)).rejects.toBeInstanceOf(InvalidRuleError)
		}
		await expect(readText(root, "CLAUDE.md")).rejects.toThrow()
	})

	test("a path-scoped source rule without globs fails the read", async () => {
		const root = tmpDir()
		await writeFiles(root, {
			"GEMINI.md": '## orphan\n<!-- rulemux {"name":"orphan","scope":"path","activation":"always"} -->\n\nNowhere.\n',
		})
		await expect(getDialect("gemini").read(root)).rejects.toThrow("Malformed metadata in")
	})
})
