/**
 * rulemux init -- Create the rule store (optionally backed by a git remote).
 */

import { resolve } from "node:path"
import { defineCommand } from "citty"
import consola from "consola"
import { expandTilde, initStore, loadConfig, saveConfig, tildify } from "rulemux"
import { createVcs, exitWithError } from "../context"

export default defineCommand({
	meta: {
		name: "init",
		description: "Initialize the rule store",
	},
	args: {
		store: {
			type: "string",
			description: "Store directory (default: ~/.rulemux/store)",
		},
		remote: {
			type: "string",
			description: "Git remote URL to sync with",
		},
		branch: {
			type: "string",
			description: "Remote branch (default: main)",
		},
	},
	async run({ args }) {
		try {
			const config = await loadConfig()
			if (args.store) config.storePath = resolve(expandTilde(args.store))
			if (args.remote) {
				config.remote = {
					url: args.remote,
					branch: args.branch || config.remote?.branch || "main",
					name: config.remote?.name ?? "origin",
				}
			}

			consola.start(
				config.remote
					? `Initializing store at ${tildify(config.storePath)} (remote ${config.remote.url})...`
					: `Initializing local store at ${tildify(config.storePath)}...`,
			)
			await initStore({ root: config.storePath, vcs: createVcs(config) })
			await saveConfig(config)

			consola.success(`Store ready at ${tildify(config.storePath)}`)
			consola.info(`Config written to ${tildify(config.path)}`)
		} catch (err) {
			exitWithError(err, false)
		}
	},
})
