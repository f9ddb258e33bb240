/**
 * JSONC (JSON with comments) reading utilities.
 */
import * as jsonc from "jsonc-parser"

/**
 * Parse a JSONC string (supports comments and trailing commas).
 */
export function parseJsonc<T = unknown>(content: string): T {
	const errors: jsonc.ParseError[] = []
	const result: T = jsonc.parse(content, errors, {
		allowTrailingComma: true,
		disallowComments: false,
	})

	const firstError = errors[0]
	if (firstError) {
		throw new Error(
			`JSONC parse error at offset ${firstError.offset}: ${jsonc.printParseErrorCode(firstError.error)}`,
		)
	}

	return result
}

/**
 * Stringify a value to pretty JSON with a trailing newline.
 */
export function stringifyJson(value: unknown, indent: string = "\t"): string {
	return `${JSON.stringify(value, null, indent)}\n`
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}
