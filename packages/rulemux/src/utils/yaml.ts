/**
 * YAML frontmatter parsing utilities.
 * Handles the lenient YAML that rule files in the wild use (unquoted globs,
 * unquoted colons, etc.).
 */
import YAML from "yaml"
import { isPlainObject } from "./json"

export interface FrontmatterResult {
	/** Parsed frontmatter; empty when the file has none */
	frontmatter: Record<string, unknown>
	/** Whether a frontmatter block was present */
	hasFrontmatter: boolean
	/** Text below the frontmatter, without the separating blank line or trailing whitespace */
	body: string
}

const FRONTMATTER_RE = /^---\n(?:([\s\S]*?)\n)?---(?:\n|$)([\s\S]*)$/

/**
 * Parse a markdown file with YAML frontmatter.
 * Falls back to lenient line parsing if strict YAML fails
 * (Cursor writes `globs: *.ts`, which YAML reads as an alias).
 */
export function parseFrontmatter(content: string): FrontmatterResult {
	const text = normalizeNewlines(content)
	const match = text.match(FRONTMATTER_RE)
	if (!match) {
		return { frontmatter: {}, hasFrontmatter: false, body: text.trimEnd() }
	}

	const rawYaml = match[1] ?? ""
	const body = (match[2] ?? "").replace(/^\n/, "").trimEnd()

	try {
		const frontmatter: unknown = YAML.parse(rawYaml)
		return {
			frontmatter: isPlainObject(frontmatter) ? frontmatter : {},
			hasFrontmatter: true,
			body,
		}
	} catch {
		return { frontmatter: fallbackParseFrontmatter(rawYaml), hasFrontmatter: true, body }
	}
}

/**
 * Fallback YAML parser that handles common quirks:
 * - Unquoted values containing colons or starting with `*`
 * - Flat `key: value` pairs only
 */
function fallbackParseFrontmatter(raw: string): Record<string, unknown> {
	const result: Record<string, unknown> = {}

	for (const line of raw.split("\n")) {
		const trimmed = line.trim()
		if (!trimmed || trimmed.startsWith("#")) continue

		const colonIdx = trimmed.indexOf(":")
		if (colonIdx === -1) continue

		const key = trimmed.slice(0, colonIdx).trim()
		const value = trimmed.slice(colonIdx + 1).trim()

		if (!key) continue

		if (value === "" || value === "~" || value === "null") {
			result[key] = null
		} else if (value === "true") {
			result[key] = true
		} else if (value === "false") {
			result[key] = false
		} else {
			result[key] = unquote(value)
		}
	}

	return result
}

function unquote(value: string): string {
	const quoted = value.match(/^(["'])(.*)\1$/)
	return quoted ? (quoted[2] ?? "") : value
}

/**
 * Serialize frontmatter + body back to a markdown file.
 * Keys keep insertion order, so callers control the layout.
 */
export function serializeFrontmatter(frontmatter: Record<string, unknown>, body: string): string {
	const yamlStr = YAML.stringify(frontmatter, {
		indent: 2,
		lineWidth: 0,
		defaultStringType: "QUOTE_DOUBLE",
		defaultKeyType: "PLAIN",
	}).trim()

	return `---\n${yamlStr}\n---\n${body ? `\n${body}\n` : ""}`
}

export function normalizeNewlines(text: string): string {
	return text.replace(/\r\n?/g, "\n")
}
