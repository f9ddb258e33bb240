/**
 * Store record format.
 *
 * One YAML document per rule, keys in a fixed order, so writing the same
 * rule twice produces the same bytes:
 *
 *   id: 3f1c...
 *   project: web
 *   scope: project
 *   activation: glob
 *   globs:
 *     - "*.ts"
 *   name: typescript
 *   source_format: cursor
 *   created_at: 2026-01-05T09:00:00.000Z
 *   updated_at: 2026-01-05T09:00:00.000Z
 *   store_version: "1"
 *   content: |-
 *     Use strict mode.
 */
import YAML from "yaml"
import { MalformedMetadataError } from "../errors"
import { isActivation, isScope } from "../ir/validate"
import type { StoredRule } from "../types/rule"
import { isPlainObject } from "../utils/json"

export function serializeRecord(rule: StoredRule): string {
	const doc: Record<string, unknown> = {
		id: rule.id,
		project: rule.project,
		scope: rule.scope,
		activation: rule.activation,
	}
	if (rule.globs && rule.globs.length > 0) doc.globs = rule.globs
	if (rule.name !== undefined) doc.name = rule.name
	if (rule.description !== undefined) doc.description = rule.description
	if (rule.sourceFormat !== undefined) doc.source_format = rule.sourceFormat
	doc.created_at = rule.createdAt
	doc.updated_at = rule.updatedAt
	doc.store_version = rule.storeVersion
	doc.content = rule.content

	return YAML.stringify(doc, { indent: 2, lineWidth: 0, blockQuote: "literal" })
}

/**
 * Parse a record, checking every field.
 *
 * @param path - Where the record came from, for error messages
 */
export function parseRecord(text: string, path: string): StoredRule {
	let doc: unknown
	try {
		doc = YAML.parse(text)
	} catch (err) {
		throw new MalformedMetadataError(path, err instanceof Error ? err.message : String(err))
	}
	if (!isPlainObject(doc)) {
		throw new MalformedMetadataError(path, "record is not a mapping")
	}

	const requireString = (key: string): string => {
		const value = doc[key]
		if (typeof value !== "string" || value === "") {
			throw new MalformedMetadataError(path, `"${key}" must be a non-empty string`)
		}
		return value
	}
	const optional = (key: string): string | undefined => {
		const value = doc[key]
		if (value === undefined || value === null) return undefined
		if (typeof value !== "string") {
			throw new MalformedMetadataError(path, `"${key}" must be a string`)
		}
		return value
	}

	const scope = doc.scope
	if (!isScope(scope)) throw new MalformedMetadataError(path, `unknown scope ${String(scope)}`)
	const activation = doc.activation
	if (!isActivation(activation)) {
		throw new MalformedMetadataError(path, `unknown activation ${String(activation)}`)
	}

	const content = doc.content ?? ""
	if (typeof content !== "string") {
		throw new MalformedMetadataError(path, `"content" must be a string`)
	}

	const rule: StoredRule = {
		id: requireString("id"),
		project: requireString("project"),
		scope,
		activation,
		content,
		createdAt: requireString("created_at"),
		updatedAt: requireString("updated_at"),
		storeVersion: requireString("store_version"),
	}

	const globs = doc.globs
	if (globs !== undefined && globs !== null) {
		if (!Array.isArray(globs) || !globs.every((g): g is string => typeof g === "string")) {
			throw new MalformedMetadataError(path, `"globs" must be a list of strings`)
		}
		if (globs.length > 0) rule.globs = globs
	}

	const name = optional("name")
	if (name !== undefined) rule.name = name
	const description = optional("description")
	if (description !== undefined) rule.description = description
	const sourceFormat = optional("source_format")
	if (sourceFormat !== undefined) rule.sourceFormat = sourceFormat

	return rule
}
