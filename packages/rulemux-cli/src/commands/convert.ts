/**
 * rulemux convert -- Translate rules from one dialect to another.
 */

import { defineCommand } from "citty"
import consola from "consola"
import { convertRules, getDialect, loadConfig } from "rulemux"
import { exitWithError, resolveDir, resolveScope } from "../context"
import { printRules, printWriteResult } from "../output/terminal"

export default defineCommand({
	meta: {
		name: "convert",
		description: "Convert rules between dialects without touching the store",
	},
	args: {
		from: {
			type: "string",
			description: "Source dialect: cursor, windsurf, copilot, claude, gemini, antigravity",
			required: true,
		},
		to: {
			type: "string",
			description: "Target dialect",
			required: true,
		},
		input: {
			type: "string",
			description: "Directory to read from (default: current directory)",
		},
		output: {
			type: "string",
			description: "Directory to write beneath (default: the input directory)",
		},
		scope: {
			type: "string",
			description: "Only convert rules with this scope: user, project, path",
		},
		"dry-run": {
			type: "boolean",
			description: "Report what would change without writing files",
			default: false,
		},
		backup: {
			type: "boolean",
			description: "Backup existing files before overwriting",
			default: true,
		},
		json: {
			type: "boolean",
			description: "Output as JSON",
			default: false,
		},
	},
	async run({ args }) {
		try {
			const from = getDialect(args.from)
			const to = getDialect(args.to)
			const input = resolveDir(args.input)
			const output = args.output ? resolveDir(args.output) : input
			const dryRun = args["dry-run"]

			if (!args.json) consola.start(`Converting ${from.label} -> ${to.label}...`)

			const config = await loadConfig()
			const result = await convertRules({
				from: from.id,
				to: to.id,
				input,
				output,
				scope: resolveScope(args.scope),
				dryRun,
				backup: args.backup
					? { dir: config.backupsDir, description: `Before convert to ${to.id}` }
					: undefined,
			})

			if (args.json) {
				consola.log(JSON.stringify({ from: from.id, to: to.id, ...result }, null, "\t"))
				return
			}

			printRules("Rules read", result.rules)
			printWriteResult(result.write)
			if (!dryRun) {
				consola.log("")
				consola.success(`Conversion complete! (${from.label} -> ${to.label})`)
			}
		} catch (err) {
			exitWithError(err, args.json)
		}
	},
})
