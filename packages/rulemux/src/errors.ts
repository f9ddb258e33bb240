/**
 * Error taxonomy.
 *
 * Every failure raised by the library is a RulemuxError with a stable `code`
 * so callers (the CLI, scripts) can branch without matching on messages.
 */

export type RulemuxErrorCode =
	| "INVALID_RULE"
	| "UNREADABLE_SOURCE"
	| "MALFORMED_METADATA"
	| "WRITE_ERROR"
	| "PROJECT_NOT_FOUND"
	| "PROJECT_EXISTS"
	| "RESERVED_PROJECT"
	| "STORE_NOT_FOUND"
	| "LOCK_CONTENTION"
	| "UNKNOWN_FORMAT"
	| "CONFIG_ERROR"

export class RulemuxError extends Error {
	readonly code: RulemuxErrorCode
	/** Whether re-running the same operation may succeed */
	readonly retryable: boolean

	constructor(
		code: RulemuxErrorCode,
		message: string,
		options: { cause?: unknown; retryable?: boolean } = {},
	) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause })
		this.name = new.target.name
		this.code = code
		this.retryable = options.retryable ?? false
	}
}

// ─── Rule ────────────────────────────────────────────────────────────

export class InvalidRuleError extends RulemuxError {
	readonly reason: string

	constructor(reason: string, ruleName?: string) {
		super("INVALID_RULE", ruleName ? `Invalid rule "${ruleName}": ${reason}` : `Invalid rule: ${reason}`)
		this.reason = reason
	}
}

// ─── Dialect read/write ──────────────────────────────────────────────

export class UnreadableSourceError extends RulemuxError {
	readonly path: string

	constructor(path: string, cause?: unknown) {
		super("UNREADABLE_SOURCE", `Cannot read ${path}${describeCause(cause)}`, { cause })
		this.path = path
	}
}

export class MalformedMetadataError extends RulemuxError {
	readonly path: string
	readonly reason: string

	constructor(path: string, reason: string) {
		super("MALFORMED_METADATA", `Malformed metadata in ${path}: ${reason}`)
		this.path = path
		this.reason = reason
	}
}

export class WriteError extends RulemuxError {
	readonly path: string
	/** Files fully written before the failure; they are left in place */
	readonly filesWritten: string[]

	constructor(path: string, filesWritten: string[], cause?: unknown) {
		super(
			"WRITE_ERROR",
			`Failed to write ${path}${describeCause(cause)} (${filesWritten.length} file(s) already written)`,
			{ cause },
		)
		this.path = path
		this.filesWritten = filesWritten
	}
}

export class UnknownFormatError extends RulemuxError {
	readonly format: string

	constructor(format: string, known: readonly string[]) {
		super("UNKNOWN_FORMAT", `Unknown format "${format}". Available: ${known.join(", ")}`)
		this.format = format
	}
}

// ─── Store ───────────────────────────────────────────────────────────

export class ProjectNotFoundError extends RulemuxError {
	constructor(project: string) {
		super("PROJECT_NOT_FOUND", `Project "${project}" has no rules in the store`)
	}
}

export class ProjectExistsError extends RulemuxError {
	constructor(project: string) {
		super("PROJECT_EXISTS", `Project "${project}" already has rules; refusing to merge projects`)
	}
}

export class ReservedProjectError extends RulemuxError {
	constructor(project: string) {
		super("RESERVED_PROJECT", `Project name "${project}" is reserved for user-global rules`)
	}
}

export class StoreNotFoundError extends RulemuxError {
	constructor(root: string) {
		super("STORE_NOT_FOUND", `No rule store at ${root}. Run \`rulemux init\` first.`)
	}
}

export class LockContentionError extends RulemuxError {
	constructor(root: string, cause?: unknown) {
		super(
			"LOCK_CONTENTION",
			`Another git process holds the lock on ${root}; try again once it finishes`,
			{ cause, retryable: true },
		)
	}
}

export class ConfigError extends RulemuxError {
	constructor(path: string, reason: string) {
		super("CONFIG_ERROR", `Invalid config ${path}: ${reason}`)
	}
}

function describeCause(cause: unknown): string {
	if (cause === undefined) return ""
	return `: ${cause instanceof Error ? cause.message : String(cause)}`
}
