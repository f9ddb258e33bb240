/**
 * Shared adapter plumbing.
 *
 * `defineDialect` turns a scanner + renderer pair into a full adapter:
 * root checks, newline normalization, invariant checks on read, scope
 * filtering, loss warnings and validated writes.
 */
import { basename, extname } from "node:path"
import { MalformedMetadataError, RulemuxError, UnreadableSourceError } from "../errors"
import { assertValidRule, validateRule } from "../ir/validate"
import type { Rule, Scope } from "../types/rule"
import { isDirectory, readTextFile } from "../utils/fs"
import { normalizeNewlines } from "../utils/yaml"
import { writeRenderedFiles } from "../writer"
import { DIALECT_CAPABILITIES, describeLosses } from "./capabilities"
import type { DialectAdapter, DialectDefinition, ScannedRule } from "./types"

export function defineDialect(definition: DialectDefinition): DialectAdapter {
	const capabilities = DIALECT_CAPABILITIES[definition.id]

	const rootScope = (root: string): Scope => definition.rootScope?.(root) ?? capabilities.defaultScope

	const render = (rules: readonly Rule[], root = ".") => {
		const rendered = definition.render(rules, root)
		const scopeAtRoot = rootScope(root)
		const losses = rules.flatMap((rule) => describeLosses(definition.id, rule, scopeAtRoot))
		return { files: rendered.files, warnings: [...losses, ...rendered.warnings] }
	}

	return {
		id: definition.id,
		label: definition.label,
		aliases: definition.aliases ?? [],
		layoutSummary: definition.layoutSummary,
		capabilities,
		rootScope,

		async read(root, options = {}) {
			if (!(await isDirectory(root))) {
				throw new UnreadableSourceError(root)
			}

			let scanned: ScannedRule[]
			try {
				scanned = await definition.scan(root)
			} catch (err) {
				if (err instanceof RulemuxError) throw err
				throw new UnreadableSourceError(root, err)
			}

			const rules: Rule[] = []
			for (const { rule, path } of scanned) {
				const result = validateRule(rule)
				if (!result.ok) {
					throw new MalformedMetadataError(path, result.error.reason)
				}
				if (options.scope && rule.scope !== options.scope) continue
				rules.push({ ...rule, sourceFormat: definition.id })
			}
			return rules
		},

		render,

		async write(rules, root, options = {}) {
			for (const rule of rules) assertValidRule(rule)
			return writeRenderedFiles(root, render(rules, root), options)
		},
	}
}

// ─── Scanner helpers ─────────────────────────────────────────────────

/**
 * Read a source file with normalized newlines.
 * Any failure is reported as UnreadableSourceError for that path.
 */
export async function readSource(path: string): Promise<string> {
	try {
		return normalizeNewlines(await readTextFile(path))
	} catch (err) {
		throw new UnreadableSourceError(path, err)
	}
}

/** File name without directory or extension: `/a/b/style.mdc` -> `style` */
export function fileStem(path: string): string {
	return basename(path, extname(path))
}

/** Keep only defined optional fields so rules compare cleanly */
export function compactRule(rule: Rule): Rule {
	const result: Rule = {
		scope: rule.scope,
		activation: rule.activation,
		content: rule.content,
	}
	if (rule.globs && rule.globs.length > 0) result.globs = rule.globs
	if (rule.name) result.name = rule.name
	if (rule.description) result.description = rule.description
	return result
}

/**
 * Read a metadata value that must be a string when present.
 */
export function optionalString(
	frontmatter: Record<string, unknown>,
	key: string,
	path: string,
): string | undefined {
	const value = frontmatter[key]
	if (value === undefined || value === null) return undefined
	if (typeof value === "string") return value.trim() || undefined
	throw new MalformedMetadataError(path, `"${key}" must be a string`)
}

/**
 * Read a boolean metadata value; accepts the strings "true"/"false" that
 * hand-edited frontmatter often contains.
 */
export function optionalBoolean(
	frontmatter: Record<string, unknown>,
	key: string,
	path: string,
): boolean | undefined {
	const value = frontmatter[key]
	if (value === undefined || value === null) return undefined
	if (typeof value === "boolean") return value
	if (value === "true") return true
	if (value === "false") return false
	throw new MalformedMetadataError(path, `"${key}" must be true or false`)
}

/**
 * Read a glob list: either a YAML list or a comma-separated string.
 */
export function optionalGlobs(
	frontmatter: Record<string, unknown>,
	key: string,
	path: string,
): string[] | undefined {
	const value = frontmatter[key]
	if (value === undefined || value === null) return undefined

	let globs: string[]
	if (typeof value === "string") {
		globs = value.split(",")
	} else if (Array.isArray(value) && value.every((v): v is string => typeof v === "string")) {
		globs = value
	} else {
		throw new MalformedMetadataError(path, `"${key}" must be a string or a list of strings`)
	}

	const cleaned = globs.map((g) => g.trim()).filter((g) => g !== "")
	return cleaned.length > 0 ? cleaned : undefined
}
