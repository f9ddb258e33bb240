/**
 * Rule invariants.
 *
 * Violations are reported, never repaired: a path-scoped rule without globs
 * stays invalid instead of quietly becoming an "always" rule.
 */
import { InvalidRuleError } from "../errors"
import type { Activation, Rule, Scope } from "../types/rule"
import { ACTIVATIONS, SCOPES } from "../types/rule"

export type ValidationResult = { ok: true } | { ok: false; error: InvalidRuleError }

/**
 * Check a rule against the canonical invariants.
 */
export function validateRule(rule: Rule): ValidationResult {
	const reason = findViolation(rule)
	if (reason === undefined) return { ok: true }
	return { ok: false, error: new InvalidRuleError(reason, rule.name ?? rule.id) }
}

/**
 * Throw the InvalidRuleError for the first violated invariant, if any.
 */
export function assertValidRule(rule: Rule): void {
	const result = validateRule(rule)
	if (!result.ok) throw result.error
}

function findViolation(rule: Rule): string | undefined {
	if (!isScope(rule.scope)) return `unknown scope "${String(rule.scope)}"`
	if (!isActivation(rule.activation)) return `unknown activation "${String(rule.activation)}"`

	const globCount = rule.globs?.filter((g) => g.trim() !== "").length ?? 0
	if (rule.globs && globCount !== rule.globs.length) return "globs must not contain empty patterns"
	if (rule.scope === "path" && globCount === 0) return "scope \"path\" requires at least one glob"
	if (rule.activation === "glob" && globCount === 0) {
		return "activation \"glob\" requires at least one glob"
	}
	if (rule.activation === "ai_decides" && !rule.description?.trim()) {
		return "activation \"ai_decides\" requires a description"
	}

	if (rule.createdAt && rule.updatedAt && Date.parse(rule.updatedAt) < Date.parse(rule.createdAt)) {
		return "updatedAt is earlier than createdAt"
	}

	return undefined
}

// ─── Enum parsing ────────────────────────────────────────────────────

export function isScope(value: unknown): value is Scope {
	return typeof value === "string" && SCOPES.some((s) => s === value)
}

export function isActivation(value: unknown): value is Activation {
	return typeof value === "string" && ACTIVATIONS.some((a) => a === value)
}

/**
 * Parse a scope name supplied by a caller (CLI flag, config value).
 */
export function parseScope(value: string): Scope {
	if (isScope(value)) return value
	throw new InvalidRuleError(`unknown scope "${value}" (expected ${SCOPES.join(", ")})`)
}

/**
 * Parse an activation name supplied by a caller.
 */
export function parseActivation(value: string): Activation {
	if (isActivation(value)) return value
	throw new InvalidRuleError(`unknown activation "${value}" (expected ${ACTIVATIONS.join(", ")})`)
}
