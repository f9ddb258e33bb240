/**
 * Per-dialect capability and default table.
 *
 * Readers take their defaults from here and writers use it to report which
 * fields a one-shot file cannot carry. A capability means the field
 * survives `read(write([rule]))` for that dialect.
 */
import type { Activation, DialectId, Rule, Scope } from "../types/rule"
import { ACTIVATIONS, SCOPES } from "../types/rule"

/** What survives a round-trip for rules of one activation */
export interface ActivationSupport {
	/**
	 * Scopes that read back unchanged. "root" means the files carry no scope
	 * and the directory written to decides it.
	 */
	scopes: readonly Scope[] | "root"
	globs: boolean
	description: boolean
}

export interface DialectCapabilities {
	/** How rules are laid out on disk */
	layout: "multi-file" | "single-file" | "mixed"
	/** Activations the dialect reproduces; any other reads back as `defaultActivation` */
	activations: Partial<Record<Activation, ActivationSupport>>
	/** Scope assigned when the file says nothing */
	defaultScope: Scope
	/** Activation assigned when the file says nothing */
	defaultActivation: Activation
}

const FULL: ActivationSupport = { scopes: SCOPES, globs: true, description: true }

function every(support: ActivationSupport): Record<Activation, ActivationSupport> {
	return { always: support, glob: support, on_demand: support, ai_decides: support }
}

export const DIALECT_CAPABILITIES: Record<DialectId, DialectCapabilities> = {
	cursor: {
		layout: "multi-file",
		activations: {
			always: { scopes: ["project"], globs: true, description: true },
			glob: { scopes: ["project"], globs: true, description: true },
			// a description would turn an on_demand rule into ai_decides
			on_demand: { scopes: ["project"], globs: false, description: false },
			ai_decides: { scopes: ["project"], globs: false, description: true },
		},
		defaultScope: "project",
		defaultActivation: "always",
	},
	windsurf: {
		layout: "multi-file",
		activations: every({ scopes: ["project", "user"], globs: true, description: true }),
		defaultScope: "project",
		defaultActivation: "always",
	},
	copilot: {
		layout: "mixed",
		activations: {
			always: { scopes: ["project", "user"], globs: true, description: true },
			// applyTo files always read back path-scoped
			glob: { scopes: ["path"], globs: true, description: true },
			on_demand: { scopes: ["project", "user"], globs: true, description: true },
			ai_decides: { scopes: ["project", "user"], globs: true, description: true },
		},
		defaultScope: "project",
		defaultActivation: "always",
	},
	claude: {
		layout: "mixed",
		activations: {
			always: FULL,
			glob: FULL,
			// commands and skills
			on_demand: { scopes: "root", globs: false, description: true },
			ai_decides: { scopes: "root", globs: false, description: true },
		},
		defaultScope: "project",
		defaultActivation: "always",
	},
	gemini: {
		layout: "single-file",
		activations: every(FULL),
		defaultScope: "project",
		defaultActivation: "always",
	},
	antigravity: {
		layout: "multi-file",
		activations: {
			always: { scopes: ["project", "user"], globs: false, description: false },
		},
		defaultScope: "project",
		defaultActivation: "always",
	},
}

/** Activations a dialect reproduces, in canonical order */
export function supportedActivations(caps: DialectCapabilities): Activation[] {
	return ACTIVATIONS.filter((a) => caps.activations[a] !== undefined)
}

/**
 * Scopes that survive for one activation. `rootScope` resolves "root"
 * entries and defaults to the dialect's default scope.
 */
export function survivingScopes(
	support: ActivationSupport,
	caps: DialectCapabilities,
	rootScope?: Scope,
): readonly Scope[] {
	return support.scopes === "root" ? [rootScope ?? caps.defaultScope] : support.scopes
}

/**
 * Describe what a dialect's output will not carry for one rule.
 * Returns one message per dropped field; empty when nothing is lost.
 *
 * @param rootScope - Scope the write root gives rules whose files carry none
 */
export function describeLosses(dialect: DialectId, rule: Rule, rootScope?: Scope): string[] {
	const caps = DIALECT_CAPABILITIES[dialect]
	const label = rule.name ?? rule.id ?? "unnamed rule"
	const losses: string[] = []

	const own = caps.activations[rule.activation]
	if (!own) {
		losses.push(
			`${label}: ${dialect} cannot express activation "${rule.activation}"; it will read back as "${caps.defaultActivation}"`,
		)
	}
	const support = own ?? caps.activations[caps.defaultActivation]
	if (!support) return losses

	// Name the activation when another one of the same dialect keeps the field
	const others = supportedActivations(caps).flatMap((a) => {
		const s = caps.activations[a]
		return a === rule.activation || !s ? [] : [s]
	})
	const qualifier = (keptElsewhere: boolean) =>
		own && keptElsewhere ? ` for "${rule.activation}" rules` : ""

	if (!survivingScopes(support, caps, rootScope).includes(rule.scope)) {
		const elsewhere = others.some((s) => survivingScopes(s, caps, rootScope).includes(rule.scope))
		const suffix = own && elsewhere ? ` with activation "${rule.activation}"` : ""
		losses.push(`${label}: ${dialect} cannot express scope "${rule.scope}"${suffix}`)
	}
	if (!support.globs && rule.globs && rule.globs.length > 0) {
		const elsewhere = others.some((s) => s.globs)
		losses.push(`${label}: ${dialect} drops globs (${rule.globs.join(", ")})${qualifier(elsewhere)}`)
	}
	if (!support.description && rule.description) {
		const elsewhere = others.some((s) => s.description)
		losses.push(`${label}: ${dialect} drops the description${qualifier(elsewhere)}`)
	}

	return losses
}
