/**
 * Canonical rule types.
 *
 * Every dialect reads into and writes from these types. No dialect ever
 * sees another dialect's native representation.
 */

// ============================================================
// Enumerations
// ============================================================

/** Where a rule applies */
export type Scope = "user" | "project" | "path"

/** When an agent should consider a rule */
export type Activation = "always" | "glob" | "on_demand" | "ai_decides"

export const SCOPES: readonly Scope[] = ["user", "project", "path"]

export const ACTIVATIONS: readonly Activation[] = ["always", "glob", "on_demand", "ai_decides"]

/** Supported dialect identifiers */
export type DialectId = "cursor" | "windsurf" | "copilot" | "claude" | "gemini" | "antigravity"

export const DIALECT_IDS: readonly DialectId[] = [
	"cursor",
	"windsurf",
	"copilot",
	"claude",
	"gemini",
	"antigravity",
]

/** Reserved project name holding user-global rules */
export const USER_PROJECT = "user"

/** Schema tag written into every stored record */
export const STORE_VERSION = "1"

// ============================================================
// Rule
// ============================================================

/** One logical instruction unit */
export interface Rule {
	/** Stable identifier, assigned by the store on first persistence */
	id?: string
	scope: Scope
	activation: Activation
	/** Path patterns, meaningful when activation is "glob" */
	globs?: string[]
	/** Human-readable label; multi-file dialects use it as the filename stem */
	name?: string
	/** Trigger hint for "ai_decides" activation */
	description?: string
	/** Opaque rule body */
	content: string
	/** Logical project, or USER_PROJECT for user-global rules */
	project?: string
	/** Dialect the rule was last read from */
	sourceFormat?: string
	/** ISO-8601 timestamp */
	createdAt?: string
	/** ISO-8601 timestamp, never earlier than createdAt */
	updatedAt?: string
	storeVersion?: string
}

/** A rule as held by the store: identity and bookkeeping are always present */
export interface StoredRule extends Rule {
	id: string
	project: string
	createdAt: string
	updatedAt: string
	storeVersion: string
}

/** Ordered rule collection. Order only affects output ordering. */
export type RuleSet = Rule[]
