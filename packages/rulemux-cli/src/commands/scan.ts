/**
 * rulemux scan -- Read every dialect found beneath a directory.
 */

import { defineCommand } from "citty"
import consola from "consola"
import { getDialect, scanAll } from "rulemux"
import { exitWithError, resolveDir, resolveScope } from "../context"
import { describeRule } from "../output/terminal"

export default defineCommand({
	meta: {
		name: "scan",
		description: "Scan a directory for rules in every dialect",
	},
	args: {
		input: {
			type: "string",
			description: "Directory to scan (default: current directory)",
		},
		scope: {
			type: "string",
			description: "Only report rules with this scope: user, project, path",
		},
		json: {
			type: "boolean",
			description: "Output as JSON",
			default: false,
		},
	},
	async run({ args }) {
		try {
			const input = resolveDir(args.input)
			if (!args.json) consola.start(`Scanning ${input}...`)

			const result = await scanAll(input, resolveScope(args.scope))

			if (args.json) {
				consola.log(
					JSON.stringify(
						{
							root: input,
							sources: result.sources.map((s) => ({ format: s.format, rules: s.rules })),
							failures: result.failures.map((f) => ({
								format: f.format,
								code: f.error.code,
								error: f.error.message,
							})),
						},
						null,
						"\t",
					),
				)
				return
			}

			const found = result.sources.filter((s) => s.rules.length > 0)
			consola.log("")
			if (found.length === 0 && result.failures.length === 0) {
				consola.info("No rules found.")
			}
			for (const source of found) {
				consola.log(`  ${getDialect(source.format).label} (${source.rules.length}):`)
				for (const rule of source.rules) {
					consola.log(`    ${describeRule(rule)}`)
				}
				consola.log("")
			}
			if (result.failures.length > 0) {
				consola.error(`Unreadable (${result.failures.length}):`)
				for (const f of result.failures) {
					consola.log(`  ! ${f.format}: ${f.error.message}`)
				}
				consola.log("")
			}
		} catch (err) {
			exitWithError(err, args.json)
		}
	},
})
