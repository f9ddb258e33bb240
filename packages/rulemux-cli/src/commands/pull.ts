/**
 * rulemux pull -- Write a project's stored rules in a dialect.
 */

import { defineCommand } from "citty"
import consola from "consola"
import { getDialect, pullRules } from "rulemux"
import { exitWithError, loadStoreContext, resolveDir, resolveProject, resolveScope } from "../context"
import { printRules, printWriteResult } from "../output/terminal"

export default defineCommand({
	meta: {
		name: "pull",
		description: "Write stored rules for a project (plus user rules) in a dialect (no remote sync)",
	},
	args: {
		format: {
			type: "string",
			description: "Dialect to write: cursor, windsurf, copilot, claude, gemini, antigravity",
			required: true,
		},
		output: {
			type: "string",
			description: "Directory to write beneath (default: current directory)",
		},
		project: {
			type: "string",
			description: "Project group (default: name of the output directory)",
		},
		scope: {
			type: "string",
			description: "Only pull rules with this scope: user, project, path",
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
			const dialect = getDialect(args.format)
			const output = resolveDir(args.output)
			const project = resolveProject(args.project, output)
			const { config, store } = await loadStoreContext()

			if (!args.json) consola.start(`Writing "${project}" rules as ${dialect.label}...`)

			const result = await pullRules({
				store,
				format: dialect.id,
				output,
				project,
				scope: resolveScope(args.scope),
				dryRun: args["dry-run"],
				backup: args.backup
					? { dir: config.backupsDir, description: `Before pull of ${project} as ${dialect.id}` }
					: undefined,
			})

			if (args.json) {
				consola.log(JSON.stringify({ project, ...result }, null, "\t"))
				return
			}

			if (result.rules.length === 0) {
				consola.warn(`No rules in the store for "${project}".`)
				return
			}
			printRules("Rules", result.rules)
			printWriteResult(result.write)
		} catch (err) {
			exitWithError(err, args.json)
		}
	},
})
