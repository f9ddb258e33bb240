/**
 * Fenced JSON settings blocks embedded in rule content.
 *
 * Some rules carry structured settings as a ```json (or ```jsonc) fence.
 * Content is otherwise opaque; these helpers only exist so two copies of a
 * block that differ in key order or formatting compare as the same value.
 */
import { parseJsonc } from "./json"

export interface SettingsBlock {
	/** Fence language tag */
	lang: "json" | "jsonc"
	/** Text between the fences */
	raw: string
	/** Parsed value */
	value: unknown
	/** Offset of the opening fence in the content */
	start: number
	/** Offset just past the closing fence */
	end: number
}

const FENCE_RE = /^```(jsonc?)[ \t]*\n([\s\S]*?)\n```[ \t]*$/gm

/**
 * Find all fenced JSON blocks that parse. Blocks that fail to parse are
 * left out; they are ordinary text as far as the rule is concerned.
 */
export function extractSettingsBlocks(content: string): SettingsBlock[] {
	const blocks: SettingsBlock[] = []

	for (const match of content.matchAll(FENCE_RE)) {
		const lang = match[1] === "jsonc" ? "jsonc" : "json"
		const raw = match[2] ?? ""
		const value = tryParse(raw)
		if (value === undefined) continue

		const start = match.index ?? 0
		blocks.push({ lang, raw, value, start, end: start + match[0].length })
	}

	return blocks
}

/**
 * Rewrite every parsable settings block with sorted keys and two-space
 * indentation. Values are untouched, so normalizing twice is a no-op.
 */
export function normalizeSettingsBlocks(content: string): string {
	const blocks = extractSettingsBlocks(content)
	if (blocks.length === 0) return content

	let result = ""
	let cursor = 0
	for (const block of blocks) {
		result += content.slice(cursor, block.start)
		result += `\`\`\`${block.lang}\n${stableStringify(block.value)}\n\`\`\``
		cursor = block.end
	}
	return result + content.slice(cursor)
}

/**
 * JSON.stringify with object keys sorted at every depth.
 */
export function stableStringify(value: unknown): string {
	return JSON.stringify(sortKeys(value), null, 2)
}

function sortKeys(value: unknown): unknown {
	if (Array.isArray(value)) return value.map(sortKeys)
	if (typeof value !== "object" || value === null) return value

	const sorted: Record<string, unknown> = {}
	for (const key of Object.keys(value).sort()) {
		sorted[key] = sortKeys(Reflect.get(value, key))
	}
	return sorted
}

function tryParse(raw: string): unknown {
	if (raw.trim() === "") return undefined
	try {
		return parseJsonc<unknown>(raw)
	} catch {
		return undefined
	}
}
