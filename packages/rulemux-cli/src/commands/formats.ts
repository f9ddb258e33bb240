/**
 * rulemux formats -- List supported dialects and what each can express.
 */

import { defineCommand } from "citty"
import consola from "consola"
import type { ActivationSupport } from "rulemux"
import { listDialects, supportedActivations } from "rulemux"

function describeSupport(support: ActivationSupport): string {
	const scopes = support.scopes === "root" ? "from the write root" : support.scopes.join(", ")
	const fields: string[] = []
	if (support.globs) fields.push("globs")
	if (support.description) fields.push("description")
	return fields.length > 0 ? `${scopes}; keeps ${fields.join(", ")}` : scopes
}

export default defineCommand({
	meta: {
		name: "formats",
		description: "List supported dialects",
	},
	args: {
		json: {
			type: "boolean",
			description: "Output as JSON",
			default: false,
		},
	},
	run({ args }) {
		const dialects = listDialects().map((d) => ({
			id: d.id,
			label: d.label,
			aliases: d.aliases,
			layout: d.layoutSummary,
			capabilities: d.capabilities,
		}))

		if (args.json) {
			consola.log(JSON.stringify(dialects, null, "\t"))
			return
		}

		consola.log("")
		for (const d of dialects) {
			const aliases = d.aliases.length > 0 ? ` (aliases: ${d.aliases.join(", ")})` : ""
			consola.log(`  ${d.id.padEnd(12)} ${d.label}${aliases}`)
			consola.log(`               layout:      ${d.layout}`)
			for (const activation of supportedActivations(d.capabilities)) {
				const support = d.capabilities.activations[activation]
				if (support) consola.log(`               ${activation.padEnd(12)} ${describeSupport(support)}`)
			}
			consola.log("")
		}
	},
})
