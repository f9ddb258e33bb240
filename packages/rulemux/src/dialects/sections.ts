/**
 * Section codec for single-file layouts (CLAUDE.md, GEMINI.md,
 * copilot-instructions.md, global_rules.md).
 *
 * Each rule becomes a heading followed by a one-line HTML comment carrying
 * its metadata, so the file reads naturally but still splits back into the
 * original rules:
 *
 *   ## typescript
 *   <!-- rulemux {"name":"typescript","scope":"project","activation":"glob","globs":["*.ts"]} -->
 *
 *   Use strict mode.
 *
 * Files without markers (hand-written ones) read as a single rule.
 */
import { MalformedMetadataError } from "../errors"
import { isActivation, isScope } from "../ir/validate"
import type { Activation, Rule, Scope } from "../types/rule"
import { isPlainObject } from "../utils/json"
import { compactRule } from "./define"

const SECTION_RE = /^## [^\n]*\n<!-- rulemux (\{.*\}) -->[ \t]*$/gm

export interface SectionDefaults {
	scope: Scope
	activation: Activation
	/** Name for unmarked text */
	name: string
}

// ─── Rendering ───────────────────────────────────────────────────────

/**
 * Render rules as marked sections, in order, separated by blank lines.
 */
export function renderSections(rules: readonly Rule[]): string {
	return rules.map(renderSection).join("\n")
}

function renderSection(rule: Rule): string {
	const heading = (rule.name ?? "Rule").replace(/\s+/g, " ").trim() || "Rule"
	return `## ${heading}\n<!-- rulemux ${JSON.stringify(sectionMeta(rule))} -->\n\n${rule.content}\n`
}

/** Marker payload with a fixed key order */
function sectionMeta(rule: Rule): Record<string, unknown> {
	const meta: Record<string, unknown> = {}
	if (rule.name) meta.name = rule.name
	meta.scope = rule.scope
	meta.activation = rule.activation
	if (rule.globs && rule.globs.length > 0) meta.globs = rule.globs
	if (rule.description) meta.description = rule.description
	return meta
}

// ─── Parsing ─────────────────────────────────────────────────────────

/**
 * Split a single-file document back into rules.
 *
 * @param text - File content with normalized newlines
 * @param path - Source path, for error messages
 * @param defaults - Applied to unmarked text and missing marker fields
 */
export function parseSections(text: string, path: string, defaults: SectionDefaults): Rule[] {
	const matches = [...text.matchAll(SECTION_RE)]
	const first = matches[0]

	if (!first) {
		const content = text.trimEnd()
		if (content.trim() === "") return []
		return [
			{ scope: defaults.scope, activation: defaults.activation, name: defaults.name, content },
		]
	}

	const rules: Rule[] = []

	const preamble = text.slice(0, first.index).trimEnd()
	if (preamble.trim() !== "") {
		rules.push({
			scope: defaults.scope,
			activation: defaults.activation,
			name: defaults.name,
			content: preamble,
		})
	}

	matches.forEach((match, i) => {
		const start = (match.index ?? 0) + match[0].length
		const end = matches[i + 1]?.index ?? text.length
		const content = text.slice(start, end).replace(/^\n\n?/, "").trimEnd()
		rules.push(parseMeta(match[1] ?? "", content, path, defaults))
	})

	return rules
}

function parseMeta(raw: string, content: string, path: string, defaults: SectionDefaults): Rule {
	let meta: unknown
	try {
		meta = JSON.parse(raw)
	} catch {
		throw new MalformedMetadataError(path, `unreadable section marker ${raw}`)
	}
	if (!isPlainObject(meta)) {
		throw new MalformedMetadataError(path, `section marker must be an object: ${raw}`)
	}

	const { name, scope, activation, globs, description } = meta
	if (name !== undefined && typeof name !== "string") {
		throw new MalformedMetadataError(path, "section name must be a string")
	}
	if (scope !== undefined && !isScope(scope)) {
		throw new MalformedMetadataError(path, `unknown scope ${JSON.stringify(scope)}`)
	}
	if (activation !== undefined && !isActivation(activation)) {
		throw new MalformedMetadataError(path, `unknown activation ${JSON.stringify(activation)}`)
	}
	if (description !== undefined && typeof description !== "string") {
		throw new MalformedMetadataError(path, "section description must be a string")
	}

	let globList: string[] | undefined
	if (globs !== undefined) {
		if (!Array.isArray(globs) || !globs.every((g): g is string => typeof g === "string")) {
			throw new MalformedMetadataError(path, "section globs must be a list of strings")
		}
		globList = globs
	}

	return compactRule({
		scope: scope ?? defaults.scope,
		activation: activation ?? defaults.activation,
		globs: globList,
		name,
		description,
		content,
	})
}
