/**
 * Rule identity helpers: filename stems, content hashes, derived ids and
 * semantic equality.
 */
import { createHash } from "node:crypto"
import type { Rule } from "../types/rule"
import { normalizeSettingsBlocks } from "../utils/settings-block"

/**
 * 32-bit FNV-1a over the UTF-8 bytes of a string.
 */
export function fnv1a32(text: string): number {
	let hash = 0x811c9dc5
	for (const byte of Buffer.from(text, "utf-8")) {
		hash ^= byte
		hash = Math.imul(hash, 0x01000193)
	}
	return hash >>> 0
}

/**
 * Filesystem-safe stem for a rule.
 *
 * "My Rule!" -> "my-rule_". Unnamed rules get `rule_<fnv1a32 of content>`.
 */
export function filenameStem(rule: Pick<Rule, "name" | "content">): string {
	const name = rule.name?.trim()
	if (name) {
		return name
			.replace(/\s/g, "-")
			.replace(/[^A-Za-z0-9_-]/g, "_")
			.toLowerCase()
	}
	return `rule_${fnv1a32(rule.content).toString(16).padStart(8, "0")}`
}

/**
 * Assign stems to a rule list, suffixing collisions in order: a, a-2, a-3.
 */
export function uniqueStems(rules: readonly Pick<Rule, "name" | "content">[]): string[] {
	const seen = new Map<string, number>()
	return rules.map((rule) => {
		const stem = filenameStem(rule)
		const count = (seen.get(stem) ?? 0) + 1
		seen.set(stem, count)
		return count === 1 ? stem : `${stem}-${count}`
	})
}

/** SHA-256 hex of a rule's content */
export function contentHash(content: string): string {
	return createHash("sha256").update(content, "utf-8").digest("hex")
}

/**
 * Deterministic id for a rule entering the store without one.
 *
 * Named rules hash project + name, so the same rule pushed independently
 * from two machines lands on the same record. Unnamed rules hash content.
 */
export function deriveRuleId(project: string, rule: Pick<Rule, "name" | "content">): string {
	const key = rule.name ? `name\0${project}\0${rule.name}` : `content\0${project}\0${rule.content}`
	const hex = createHash("sha256").update(key, "utf-8").digest("hex")
	const variant = ((Number.parseInt(hex.charAt(16), 16) & 0x3) | 0x8).toString(16)
	return [
		hex.slice(0, 8),
		hex.slice(8, 12),
		`5${hex.slice(13, 16)}`,
		`${variant}${hex.slice(17, 20)}`,
		hex.slice(20, 32),
	].join("-")
}

/**
 * Semantic equality: everything a user can observe, ignoring bookkeeping
 * (timestamps, provenance, schema tag) and settings-block key order.
 */
export function rulesEquivalent(a: Rule, b: Rule): boolean {
	return (
		a.scope === b.scope &&
		a.activation === b.activation &&
		(a.project ?? "") === (b.project ?? "") &&
		(a.name ?? "") === (b.name ?? "") &&
		(a.description ?? "") === (b.description ?? "") &&
		sameList(a.globs ?? [], b.globs ?? []) &&
		(a.content === b.content ||
			normalizeSettingsBlocks(a.content) === normalizeSettingsBlocks(b.content))
	)
}

function sameList(a: readonly string[], b: readonly string[]): boolean {
	return a.length === b.length && a.every((value, i) => value === b[i])
}
