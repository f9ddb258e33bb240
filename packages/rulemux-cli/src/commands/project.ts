/**
 * rulemux project -- List and rename project groups in the store.
 */

import { defineCommand } from "citty"
import consola from "consola"
import { exitWithError, loadStoreContext } from "../context"

const listCommand = defineCommand({
	meta: {
		name: "list",
		description: "List project groups with their rule counts",
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
			const { store } = await loadStoreContext()
			const rules = await store.getAll()
			const projects = (await store.listProjects()).map((name) => ({
				name,
				rules: rules.filter((r) => r.project === name).length,
			}))

			if (args.json) {
				consola.log(JSON.stringify(projects, null, "\t"))
				return
			}

			consola.log("")
			consola.log("Projects in store:")
			for (const p of projects) {
				consola.log(`  ${p.name} (${p.rules} rule(s))`)
			}
			consola.log("")
		} catch (err) {
			exitWithError(err, args.json)
		}
	},
})

const renameCommand = defineCommand({
	meta: {
		name: "rename",
		description: "Move every rule of a project to a new name and commit",
	},
	args: {
		old: {
			type: "positional",
			description: "Current project name",
			required: true,
		},
		new: {
			type: "positional",
			description: "New project name",
			required: true,
		},
	},
	async run({ args }) {
		try {
			const { store } = await loadStoreContext()
			const moved = await store.renameProject(args.old, args.new)
			await store.commit(`Rename project ${args.old} → ${args.new}`)
			consola.success(`Renamed "${args.old}" → "${args.new}" (${moved} rule(s)) and committed.`)
		} catch (err) {
			exitWithError(err, false)
		}
	},
})

export default defineCommand({
	meta: {
		name: "project",
		description: "Manage project groups in the store",
	},
	subCommands: {
		list: listCommand,
		rename: renameCommand,
	},
})
