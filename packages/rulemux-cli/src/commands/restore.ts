/**
 * rulemux restore -- Undo a convert or pull from the backup taken before it wrote.
 */

import { defineCommand } from "citty"
import consola from "consola"
import { deleteBackup, listBackups, loadConfig, restoreBackup, summarizeBackup } from "rulemux"
import { exitWithError } from "../context"
import { printBackupList, printRestoreResult } from "../output/terminal"

type RestoreAction = { kind: "delete"; id: string } | { kind: "list" } | { kind: "restore"; id: string }

function chooseAction(args: { list: boolean; id?: string; delete?: string }): RestoreAction {
	if (args.delete) return { kind: "delete", id: args.delete }
	if (args.list) return { kind: "list" }
	return { kind: "restore", id: args.id || "latest" }
}

async function runAction(action: RestoreAction, backupsDir: string, json: boolean): Promise<void> {
	switch (action.kind) {
		case "delete": {
			await deleteBackup(backupsDir, action.id)
			if (json) consola.log(JSON.stringify({ deleted: action.id }, null, "\t"))
			else consola.success(`Deleted backup ${action.id}`)
			return
		}
		case "list": {
			const backups = await listBackups(backupsDir)
			if (json) consola.log(JSON.stringify(backups.map(summarizeBackup), null, "\t"))
			else printBackupList(backups)
			return
		}
		case "restore": {
			if (!json) consola.start(`Restoring backup ${action.id}`)
			const result = await restoreBackup(backupsDir, action.id)
			if (json) {
				consola.log(JSON.stringify(result, null, "\t"))
				return
			}
			consola.log("")
			printRestoreResult(result)
			consola.log("")
			if (result.errors.length > 0) consola.warn(`${result.errors.length} file(s) could not be restored`)
			else consola.success("Restored")
		}
	}
}

export default defineCommand({
	meta: {
		name: "restore",
		description: "Restore dialect files from a backup taken before a write",
	},
	args: {
		list: {
			type: "boolean",
			description: "List available backups",
			default: false,
		},
		id: {
			type: "string",
			description: "Backup to restore (defaults to the newest)",
		},
		delete: {
			type: "string",
			description: "Delete a backup by ID",
		},
		json: {
			type: "boolean",
			description: "Output as JSON",
			default: false,
		},
	},
	async run({ args }) {
		try {
			const { backupsDir } = await loadConfig()
			await runAction(chooseAction(args), backupsDir, args.json)
		} catch (err) {
			exitWithError(err, args.json)
		}
	},
})
