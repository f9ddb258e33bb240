/**
 * rulemux discover -- Show where each dialect keeps user-level rules.
 */

import { defineCommand } from "citty"
import consola from "consola"
import { discoverUserLocations, getDialect } from "rulemux"
import { exitWithError } from "../context"
import { printUserLocations } from "../output/terminal"

export default defineCommand({
	meta: {
		name: "discover",
		description: "List user-level rule locations and whether they exist",
	},
	args: {
		format: {
			type: "string",
			description: "Only this dialect (default: all)",
		},
		json: {
			type: "boolean",
			description: "Output as JSON",
			default: false,
		},
	},
	async run({ args }) {
		try {
			const locations = await discoverUserLocations({ format: args.format || undefined })

			if (args.json) {
				consola.log(JSON.stringify(locations, null, "\t"))
				return
			}

			consola.log("")
			consola.log(
				args.format
					? `User-level rules for ${getDialect(args.format).label}:`
					: "User-level rules (all dialects):",
			)
			printUserLocations(locations)
			if (locations.some((l) => l.readRoot)) {
				consola.info("Import with `rulemux push --format <dialect> --input <dir> --scope user`.")
			}
		} catch (err) {
			exitWithError(err, args.json)
		}
	},
})
