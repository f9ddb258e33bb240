/**
 * rulemux sync -- Reconcile the store with its remote.
 */

import { defineCommand } from "citty"
import consola from "consola"
import { syncStore } from "rulemux"
import { exitWithError, loadStoreContext } from "../context"
import { printMergeWarnings } from "../output/terminal"

const STATUS_MESSAGES = {
	"up-to-date": "Store is up to date with the remote.",
	pushed: "Pushed local changes to the remote.",
	"fast-forwarded": "Pulled remote changes.",
	merged: "Merged local and remote changes and pushed the result.",
} as const

export default defineCommand({
	meta: {
		name: "sync",
		description: "Fetch, merge and push the store's git remote",
	},
	args: {
		json: {
			type: "boolean",
			description: "Output as JSON",
			default: false,
		},
	},
	async run({ args }) {
		try {
			const { config, store, vcs } = await loadStoreContext()
			if (!config.remote) {
				throw new Error("No remote configured. Run `rulemux init --remote <url>` first.")
			}

			if (!args.json) consola.start(`Syncing with ${config.remote.url}...`)
			const result = await syncStore(store, vcs)

			if (args.json) {
				consola.log(JSON.stringify(result, null, "\t"))
				return
			}

			printMergeWarnings(result.warnings)
			consola.log("")
			consola.success(STATUS_MESSAGES[result.status])
		} catch (err) {
			exitWithError(err, args.json)
		}
	},
})
