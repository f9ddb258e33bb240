/**
 * Dialect adapter contract.
 *
 * Each dialect supplies a scanner (native files -> rules) and a renderer
 * (rules -> native files). Adapters only ever exchange `Rule` values.
 */
import type { DialectId, Rule, Scope } from "../types/rule"
import type { WriteOptions, WriteResult } from "../writer"
import type { DialectCapabilities } from "./capabilities"

/** One file produced by a renderer, relative to the write root */
export interface RenderedFile {
	/** POSIX-style path relative to the root */
	path: string
	content: string
}

export interface RenderResult {
	/** Files in output order */
	files: RenderedFile[]
	/** Fields the output cannot carry, size warnings, etc. */
	warnings: string[]
}

/** A rule found by a scanner, with the file it came from */
export interface ScannedRule {
	rule: Rule
	/** Absolute path of the source file */
	path: string
}

export interface ReadOptions {
	/** Only return rules with this scope */
	scope?: Scope
}

export interface DialectAdapter {
	id: DialectId
	/** Display name, e.g. "GitHub Copilot" */
	label: string
	/** Alternative names accepted by the registry */
	aliases: readonly string[]
	/** Short layout summary for listings */
	layoutSummary: string
	capabilities: DialectCapabilities
	/** Scope that files written beneath `root` read back with when they carry none */
	rootScope(root: string): Scope
	/**
	 * Read the dialect's files beneath `root`.
	 * Throws UnreadableSourceError or MalformedMetadataError.
	 */
	read(root: string, options?: ReadOptions): Promise<Rule[]>
	/**
	 * Render rules to native files without touching disk. `root` only
	 * matters to dialects whose layout depends on where they are written.
	 */
	render(rules: readonly Rule[], root?: string): RenderResult
	/**
	 * Validate, render and write rules beneath `root`.
	 * Throws InvalidRuleError before writing anything, WriteError on partial failure.
	 */
	write(rules: readonly Rule[], root: string, options?: WriteOptions): Promise<WriteResult>
}

/** What a dialect module provides; `defineDialect` adds the shared read/write plumbing */
export interface DialectDefinition {
	id: DialectId
	label: string
	aliases?: readonly string[]
	layoutSummary: string
	/** Only for layouts where the root decides the scope; the default scope otherwise */
	rootScope?(root: string): Scope
	scan(root: string): Promise<ScannedRule[]>
	render(rules: readonly Rule[], root: string): RenderResult
}
