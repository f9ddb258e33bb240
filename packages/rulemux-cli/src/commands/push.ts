/**
 * rulemux push -- Read a dialect's rules into the store and commit.
 */

import { defineCommand } from "citty"
import consola from "consola"
import { getDialect, pushRules } from "rulemux"
import { exitWithError, loadStoreContext, resolveDir, resolveProject, resolveScope } from "../context"
import { printRules, printWarnings } from "../output/terminal"

export default defineCommand({
	meta: {
		name: "push",
		description: "Store a dialect's rules under a project (no remote sync)",
	},
	args: {
		format: {
			type: "string",
			description: "Dialect to read: cursor, windsurf, copilot, claude, gemini, antigravity",
			required: true,
		},
		input: {
			type: "string",
			description: "Directory to read from (default: current directory)",
		},
		project: {
			type: "string",
			description: "Project group (default: name of the input directory)",
		},
		scope: {
			type: "string",
			description: "Only push rules with this scope: user, project, path",
		},
		prune: {
			type: "boolean",
			description: "Remove stored rules from this dialect that no longer exist in the input",
			default: false,
		},
		"dry-run": {
			type: "boolean",
			description: "Report what would change without touching the store",
			default: false,
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
			const input = resolveDir(args.input)
			const project = resolveProject(args.project, input)
			const { store } = await loadStoreContext()

			if (!args.json) consola.start(`Reading ${dialect.label} rules from ${input}...`)

			const result = await pushRules({
				store,
				format: dialect.id,
				input,
				project,
				scope: resolveScope(args.scope),
				prune: args.prune,
				dryRun: args["dry-run"],
			})

			if (args.json) {
				consola.log(JSON.stringify({ project, ...result }, null, "\t"))
				return
			}

			if (result.read === 0) {
				consola.warn("No rules found.")
			}
			printRules("Created", result.created)
			printRules("Updated", result.updated)
			printRules("Unchanged", result.unchanged)
			printRules("Pruned", result.pruned)
			printWarnings(result.warnings)

			consola.log("")
			if (result.dryRun) {
				consola.info("This was a dry-run. Run without --dry-run to update the store.")
			} else if (result.commit) {
				consola.success(`Stored ${result.read} rule(s) under "${project}" (${result.commit.slice(0, 8)})`)
			} else {
				consola.success(`Store already up to date for "${project}".`)
			}
		} catch (err) {
			exitWithError(err, args.json)
		}
	},
})
